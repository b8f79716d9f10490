import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { BadRequestError } from '../../errors/http-errors.js';
import {
  DEFAULT_PASSWORD_LENGTH,
  MAX_PASSWORD_LENGTH,
  MIN_PASSWORD_LENGTH,
  PasswordGenerator,
} from '../../services/password-generator.js';
import { generatePasswordQuerySchema, parseBooleanFlag, validateInput } from '../../validation/schemas.js';

export function createPasswordRoutes(authenticate: RequestHandler): Router {
  const router = Router();

  /**
   * Generate a password, e.g. for a user about to be created.
   * Query: length (default 12), special_chars (default false)
   */
  router.get('/generate_password', authenticate, (req: Request, res: Response, next: NextFunction): void => {
    try {
      const query = validateInput(generatePasswordQuerySchema(req.query));
      const length = query.length ?? DEFAULT_PASSWORD_LENGTH;

      if (length < MIN_PASSWORD_LENGTH || length > MAX_PASSWORD_LENGTH) {
        throw new BadRequestError(
          `length must be between ${MIN_PASSWORD_LENGTH} and ${MAX_PASSWORD_LENGTH}`
        );
      }

      const generator = new PasswordGenerator({
        length,
        includeSpecialChars: parseBooleanFlag('special_chars', query.special_chars, false)
      });

      res.json({
        success: true,
        data: { password: generator.generate() },
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}

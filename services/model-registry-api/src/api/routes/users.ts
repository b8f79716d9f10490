import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { UserManager } from '../../services/user-manager.js';
import { createUserSchema, deleteUserSchema, validateInput } from '../../validation/schemas.js';

/**
 * Create user administration routes
 * @param userManager - Runs createUser/dropUser against MongoDB
 * @param guards - Middleware run before each handler (rate limiting, authentication)
 * @returns Express router with user endpoints
 */
export function createUserRoutes(userManager: UserManager, guards: RequestHandler[]): Router {
  const router = Router();

  /**
   * Create a new user in the specified database
   */
  router.post('/create_user', ...guards, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { username, password, role, database } = validateInput(createUserSchema(req.body));

      await userManager.createUser(database, username, password, role);

      res.json({
        success: true,
        message: `User '${username}' created successfully in database '${database}'.`,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Delete a user from the specified database
   */
  router.delete('/delete_user', ...guards, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { username, database } = validateInput(deleteUserSchema(req.body));

      await userManager.deleteUser(database, username);

      res.json({
        success: true,
        message: `User '${username}' deleted successfully from database '${database}'.`,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}

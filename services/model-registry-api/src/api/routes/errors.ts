import { Router, Request, Response, RequestHandler } from 'express';
import { ErrorHandler } from '../../monitoring/error-handler.js';

export function createErrorRoutes(errorHandler: ErrorHandler, authenticate: RequestHandler): Router {
  const router = Router();

  router.get('/', authenticate, (req: Request, res: Response): void => {
    res.json({
      success: true,
      data: {
        stats: errorHandler.getErrorStats(),
        recent: errorHandler.getAllErrors().slice(-10)
      },
      timestamp: new Date().toISOString()
    });
  });

  router.post('/:errorId/resolve', authenticate, (req: Request, res: Response): void => {
    const { errorId } = req.params;

    if (!errorHandler.markErrorResolved(errorId)) {
      res.status(404).json({
        success: false,
        error: 'Not Found',
        message: `Error ${errorId} not found`,
        timestamp: new Date().toISOString()
      });
      return;
    }

    res.json({
      success: true,
      message: `Error ${errorId} marked as resolved`,
      timestamp: new Date().toISOString()
    });
  });

  return router;
}

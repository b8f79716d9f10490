import { Router, Request, Response, NextFunction } from 'express';
import { DATABASE_UNREACHABLE, HealthMonitor } from '../../monitoring/health-monitor.js';

/**
 * Create health check routes
 * @param healthMonitor - Reports process and database health
 * @returns Express router with health endpoints
 */
export function createHealthRoutes(healthMonitor: HealthMonitor): Router {
  const router = Router();

  /**
   * Health summary, 503 when unhealthy
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const health = await healthMonitor.getHealthMetrics();
      res.status(health.status === 'unhealthy' ? 503 : 200).json({
        service: 'Model Registry API',
        version: '1.0.0',
        ...health
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Readiness check endpoint
   */
  router.get('/ready', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      if (await healthMonitor.isReady()) {
        res.json({
          status: 'ready',
          message: 'Service is ready to accept requests',
          timestamp: new Date().toISOString()
        });
      } else {
        res.status(503).json({
          status: 'not_ready',
          message: DATABASE_UNREACHABLE,
          timestamp: new Date().toISOString()
        });
      }
    } catch (error) {
      next(error);
    }
  });

  /**
   * Liveness check endpoint
   */
  router.get('/live', (req: Request, res: Response): void => {
    res.json({
      status: 'alive',
      message: 'Service is alive',
      timestamp: new Date().toISOString(),
      uptime: process.uptime()
    });
  });

  return router;
}

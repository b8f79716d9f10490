import express, { Application } from 'express';
import { setupRoutes } from './api/routes/index.js';
import { BasicCredentials, basicAuth } from './middleware/basic-auth.js';
import { RateLimiter, adminRateLimiter } from './middleware/rate-limiter.js';
import { ErrorHandler } from './monitoring/error-handler.js';
import { HealthMonitor } from './monitoring/health-monitor.js';
import { UserManager } from './services/user-manager.js';
import { DatabaseCommandRunner, DatabaseHealthProbe, ModelStore } from './types/index.js';

export interface AppOptions {
  credentials: BasicCredentials;
  commandRunner: DatabaseCommandRunner;
  modelStore: ModelStore;
  database: DatabaseHealthProbe;
  urlPrefix?: string;
  modelRoot?: string;
  rateLimit?: {
    windowMs: number;
    maxRequests: number;
  };
  exposeErrorDetails?: boolean;
}

export interface RegistryApp {
  app: Application;
  errorHandler: ErrorHandler;
  healthMonitor: HealthMonitor;
  /** Stops background timers owned by the app */
  stop(): void;
}

/**
 * Wire the express application. Storage and database access come in through
 * `options` so the same app runs against MongoDB or in-memory stand-ins.
 */
export function createApp(options: AppOptions): RegistryApp {
  const app = express();
  const urlPrefix = options.urlPrefix ?? '';

  const errorHandler = new ErrorHandler({ exposeDetails: options.exposeErrorDetails });
  const healthMonitor = new HealthMonitor(options.database, errorHandler, {
    exposeDetails: options.exposeErrorDetails
  });
  const globalRateLimiter = new RateLimiter(options.rateLimit ?? { windowMs: 15 * 60 * 1000, maxRequests: 1000 });
  const userAdminLimiter = adminRateLimiter();

  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));

  setupRoutes(app, urlPrefix, {
    userManager: new UserManager(options.commandRunner),
    modelStore: options.modelStore,
    healthMonitor,
    errorHandler,
    authenticate: basicAuth(options.credentials),
    globalRateLimit: globalRateLimiter.middleware(),
    adminRateLimit: userAdminLimiter.middleware(),
    modelRoot: options.modelRoot
  });

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: 'Not Found',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      timestamp: new Date().toISOString()
    });
  });

  // Error handling middleware (must be last)
  app.use(errorHandler.middleware());

  return {
    app,
    errorHandler,
    healthMonitor,
    stop: () => {
      globalRateLimiter.stop();
      userAdminLimiter.stop();
    }
  };
}

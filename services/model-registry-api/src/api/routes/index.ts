import { Application, RequestHandler } from 'express';
import { createHealthRoutes } from './health.js';
import { createUserRoutes } from './users.js';
import { createPasswordRoutes } from './passwords.js';
import { createModelRoutes } from './models.js';
import { createErrorRoutes } from './errors.js';
import { UserManager } from '../../services/user-manager.js';
import { HealthMonitor } from '../../monitoring/health-monitor.js';
import { ErrorHandler } from '../../monitoring/error-handler.js';
import { ModelStore } from '../../types/index.js';

export interface RouteDependencies {
  userManager: UserManager;
  modelStore: ModelStore;
  healthMonitor: HealthMonitor;
  errorHandler: ErrorHandler;
  authenticate: RequestHandler;
  /** Applies to everything except health checks */
  globalRateLimit: RequestHandler;
  /** Per-user limit on user administration, runs after authentication */
  adminRateLimit: RequestHandler;
  modelRoot?: string;
}

/**
 * Setup all API routes for the model registry
 * @param app - Express application instance
 * @param urlPrefix - URL prefix for all routes ('' mounts at the root)
 * @param deps - Services the routes delegate to
 */
export function setupRoutes(app: Application, urlPrefix: string, deps: RouteDependencies): void {
  const base = urlPrefix || '/';

  // Health checks are not rate limited
  app.use(`${urlPrefix}/health`, createHealthRoutes(deps.healthMonitor));
  app.use(deps.globalRateLimit);

  app.use(`${urlPrefix}/errors`, createErrorRoutes(deps.errorHandler, deps.authenticate));

  app.use(base, createUserRoutes(deps.userManager, [deps.authenticate, deps.adminRateLimit]));
  app.use(base, createPasswordRoutes(deps.authenticate));
  app.use(base, createModelRoutes(deps.modelStore, deps.authenticate, { modelRoot: deps.modelRoot }));

  // Root endpoint
  app.get(base, (req, res) => {
    res.json({
      service: 'Model Registry API',
      version: '1.0.0',
      status: 'running',
      endpoints: {
        createUser: `POST ${urlPrefix}/create_user`,
        deleteUser: `DELETE ${urlPrefix}/delete_user`,
        generatePassword: `GET ${urlPrefix}/generate_password`,
        storeModel: `POST ${urlPrefix}/store_model`,
        deleteModel: `DELETE ${urlPrefix}/delete_model`,
        searchModel: `POST ${urlPrefix}/search_model`,
        getModel: `POST ${urlPrefix}/get_model`,
        listModels: `GET ${urlPrefix}/list_models`,
        downloadModel: `GET ${urlPrefix}/download_model`,
        health: `GET ${urlPrefix}/health`,
        errors: `GET ${urlPrefix}/errors`
      },
      timestamp: new Date().toISOString()
    });
  });
}

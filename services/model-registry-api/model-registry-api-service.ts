import dotenv from 'dotenv';
import { createApp } from './src/app.js';
import { ConfigError, loadConfig } from './src/config/index.js';
import { MongoConnection } from './src/database/connection.js';
import { GracefulShutdown } from './src/monitoring/graceful-shutdown.js';
import { GridFsModelStore, gridFsBuckets } from './src/services/gridfs-model-store.js';
import { getErrorMessage } from './src/errors/http-errors.js';

dotenv.config();

async function startService(): Promise<void> {
  const config = loadConfig();

  console.log('🚀 Starting Model Registry API...');
  console.log(`Environment: ${config.nodeEnv}`);
  console.log(`Port: ${config.port}`);
  console.log(`URL Prefix: ${config.urlPrefix || '/'}`);
  if (config.modelRoot) {
    console.log(`Model root: ${config.modelRoot}`);
  }

  const connection = new MongoConnection(config.mongo, {
    serverSelectionTimeoutMs: config.mongo.serverSelectionTimeoutMs
  });

  const gracefulShutdown = new GracefulShutdown(config.shutdown);
  gracefulShutdown.install();

  // The driver reconnects on demand, so an unreachable server only delays readiness
  try {
    await connection.connect();
    console.log('✅ Connected to MongoDB');
  } catch (error) {
    console.warn(`⚠️ MongoDB not reachable at startup: ${getErrorMessage(error)}`);
  }

  const { app, errorHandler, stop } = createApp({
    credentials: { username: config.mongo.username, password: config.mongo.password },
    commandRunner: connection,
    modelStore: new GridFsModelStore(gridFsBuckets(connection)),
    database: connection,
    urlPrefix: config.urlPrefix,
    modelRoot: config.modelRoot,
    rateLimit: config.rateLimit,
    exposeErrorDetails: config.nodeEnv === 'development'
  });

  const server = app.listen(config.port, () => {
    console.log('🌐 Model Registry API running on port', config.port);
    console.log(`🔍 Health check available at: http://localhost:${config.port}${config.urlPrefix}/health`);
  });

  const errorSweep = setInterval(() => {
    const cleared = errorHandler.clearOldErrors();
    if (cleared > 0) {
      console.log(`Cleared ${cleared} old error records`);
    }
  }, 60 * 60 * 1000);
  errorSweep.unref();

  gracefulShutdown.addCleanupTask(async () => {
    console.log('🛑 Closing HTTP server...');
    clearInterval(errorSweep);
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    stop();
  });

  gracefulShutdown.addCleanupTask(async () => {
    console.log('🧹 Closing MongoDB connection...');
    await connection.close();
  });
}

startService().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`❌ Invalid configuration: ${error.message}`);
  } else {
    console.error('💥 Failed to start service:', error);
  }
  process.exit(1);
});

import { getErrorMessage } from '../errors/http-errors.js';
import { DatabaseHealthProbe, HealthStatus } from '../types/index.js';
import { ErrorHandler } from './error-handler.js';

export interface HealthMonitorOptions {
  memoryThreshold?: number;
  /** Report the driver's error message, which names the Mongo host */
  exposeDetails?: boolean;
}

export const DATABASE_UNREACHABLE = 'Database is not reachable';

export class HealthMonitor {
  private database: DatabaseHealthProbe;
  private errorHandler: ErrorHandler;
  private startTime: number;
  private memoryThreshold: number;
  private exposeDetails: boolean;

  constructor(database: DatabaseHealthProbe, errorHandler: ErrorHandler, options: HealthMonitorOptions = {}) {
    this.database = database;
    this.errorHandler = errorHandler;
    this.startTime = Date.now();
    this.memoryThreshold = options.memoryThreshold ?? 0.9;
    this.exposeDetails = options.exposeDetails ?? false;
  }

  /**
   * Get health metrics, including a live database ping
   */
  async getHealthMetrics(): Promise<HealthStatus> {
    const memoryUsage = process.memoryUsage();
    const memoryPercentage = memoryUsage.heapUsed / memoryUsage.heapTotal;
    const database = await this.checkDatabase();
    const errorStats = this.errorHandler.getErrorStats();

    return {
      status: this.determineHealthStatus(database.connected, memoryPercentage),
      timestamp: new Date().toISOString(),
      uptime: Date.now() - this.startTime,
      memory: {
        used: memoryUsage.heapUsed,
        total: memoryUsage.heapTotal,
        percentage: memoryPercentage
      },
      database,
      errors: {
        total: errorStats.total,
        unresolved: errorStats.unresolved
      }
    };
  }

  /**
   * Ready once the database answers a ping
   */
  async isReady(): Promise<boolean> {
    const database = await this.checkDatabase();
    return database.connected;
  }

  private async checkDatabase(): Promise<HealthStatus['database']> {
    try {
      const latencyMs = await this.database.ping();
      return { connected: true, latencyMs };
    } catch (error) {
      return { connected: false, error: this.exposeDetails ? getErrorMessage(error) : DATABASE_UNREACHABLE };
    }
  }

  private determineHealthStatus(databaseConnected: boolean, memoryPercentage: number): HealthStatus['status'] {
    if (!databaseConnected) {
      return 'unhealthy';
    }
    if (memoryPercentage > this.memoryThreshold) {
      return 'degraded';
    }
    return 'healthy';
  }
}

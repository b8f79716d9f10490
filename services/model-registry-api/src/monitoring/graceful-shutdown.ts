export interface ShutdownOptions {
  timeout: number; // milliseconds
  forceExit: boolean;
  cleanupTasks: Array<() => Promise<void>>;
  /** Process exit hook, swapped out in tests */
  exit: (code: number) => void;
}

export class GracefulShutdown {
  private isShuttingDown: boolean = false;
  private shutdownTimeout: NodeJS.Timeout | null = null;
  private options: ShutdownOptions;

  constructor(options: Partial<ShutdownOptions> = {}) {
    this.options = {
      timeout: 30000,
      forceExit: true,
      cleanupTasks: [],
      exit: (code: number) => process.exit(code),
      ...options
    };
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  install(): void {
    // Handle SIGTERM (Docker, Kubernetes)
    process.on('SIGTERM', () => {
      console.log('Received SIGTERM signal');
      void this.shutdown('SIGTERM');
    });

    // Handle SIGINT (Ctrl+C)
    process.on('SIGINT', () => {
      console.log('Received SIGINT signal');
      void this.shutdown('SIGINT');
    });

    process.on('uncaughtException', (error) => {
      console.error('💥 Uncaught Exception:', error);
      void this.shutdown('uncaughtException', error);
    });

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection, reason:', reason);
      void this.shutdown('unhandledRejection', reason);
    });
  }

  /**
   * Add a cleanup task to be executed during shutdown.
   * Tasks run in registration order.
   */
  addCleanupTask(task: () => Promise<void>): void {
    this.options.cleanupTasks.push(task);
  }

  /**
   * Initiate graceful shutdown
   */
  async shutdown(signal: string, error?: unknown): Promise<void> {
    if (this.isShuttingDown) {
      console.log('Shutdown already in progress, ignoring signal:', signal);
      return;
    }

    this.isShuttingDown = true;
    console.log(`Initiating graceful shutdown due to: ${signal}`);

    // Set timeout for forced shutdown
    this.shutdownTimeout = setTimeout(() => {
      console.error('Shutdown timeout reached, forcing exit');
      if (this.options.forceExit) {
        this.options.exit(1);
      }
    }, this.options.timeout);
    this.shutdownTimeout.unref();

    const failures = await this.executeCleanupTasks();

    if (this.shutdownTimeout) {
      clearTimeout(this.shutdownTimeout);
      this.shutdownTimeout = null;
    }

    const exitCode = error !== undefined || failures > 0 ? 1 : 0;
    console.log(`Graceful shutdown completed${failures > 0 ? ` with ${failures} failed cleanup task(s)` : ''}`);
    this.options.exit(exitCode);
  }

  /**
   * Execute custom cleanup tasks, returning how many failed
   */
  private async executeCleanupTasks(): Promise<number> {
    const tasks = this.options.cleanupTasks;
    let failures = 0;

    for (let i = 0; i < tasks.length; i++) {
      try {
        console.log(`Executing cleanup task ${i + 1}/${tasks.length}`);
        await tasks[i]();
      } catch (error) {
        failures++;
        console.error(`Cleanup task ${i + 1} failed:`, error);
        // Continue with other tasks even if one fails
      }
    }

    return failures;
  }

  isShuttingDownInProgress(): boolean {
    return this.isShuttingDown;
  }
}

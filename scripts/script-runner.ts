/**
 * Script Runner Utility
 *
 * Runs a script's main function and turns its outcome into the process exit
 * code, forcing the exit shortly after so stray handles can't keep it alive.
 *
 * Usage:
 *   import { runScript } from './script-runner.js';
 *   runScript(main, { name: 'Docker' });
 */

export interface ScriptOptions {
  /** Script name for logging */
  name: string;
  /** Exit timeout in ms (default: 100) */
  exitTimeout?: number;
}

/**
 * `main` resolves with the exit code it wants; a rejection exits with 1.
 */
export function runScript(
  main: () => Promise<number>,
  options: ScriptOptions = { name: 'Script' }
): void {
  const { name, exitTimeout = 100 } = options;

  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(`${name} failed:`, err instanceof Error ? err.message : err);
      process.exitCode = 1;
    })
    .finally(() => {
      setTimeout(() => {
        process.exit(process.exitCode ?? 0);
      }, exitTimeout);
    });
}

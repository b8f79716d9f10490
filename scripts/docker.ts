/**
 * Docker Script
 *
 * Builds the service image and runs it as a detached container.
 *
 * Usage:
 *   npm run docker:build                         # docker build -t model-registry-api -f Dockerfile .
 *   npm run docker:run                           # docker run -d -p 8000:8000 --name model-registry-api ...
 *   npm run docker:run -- --port=9000 --env-file=.env
 */

import { spawn } from 'node:child_process';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { runScript } from './script-runner.js';

export const IMAGE_NAME = 'model-registry-api';
export const DEFAULT_PORT = 8000;

type DockerCommand = 'build' | 'run';

export interface ParsedArgs {
  command: DockerCommand;
  port: number;
  envFile?: string;
}

/** Runs a command to completion and resolves with its exit status */
export type CommandRunner = (command: string, args: string[]) => Promise<number>;

export interface Output {
  log: (message: string) => void;
  error: (message: string) => void;
}

export function parseArgs(argv: string[], env: Record<string, string | undefined> = process.env): ParsedArgs {
  let command: DockerCommand | undefined;
  let port = env.PORT ? Number(env.PORT) : DEFAULT_PORT;
  let envFile: string | undefined;

  for (const arg of argv) {
    if (arg === 'build' || arg === 'run') {
      command = arg;
    } else if (arg.startsWith('--port=')) {
      port = Number(arg.slice('--port='.length));
    } else if (arg.startsWith('--env-file=')) {
      envFile = arg.slice('--env-file='.length);
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (!command) {
    throw new Error('Usage: docker.ts <build|run> [--port=8000] [--env-file=.env]');
  }
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid port: ${port}`);
  }

  return { command, port, envFile };
}

export function buildArgs(cwd: string): string[] {
  return ['build', '-t', IMAGE_NAME, '-f', resolve(cwd, 'Dockerfile'), '.'];
}

export function runArgs(port: number, envFile?: string): string[] {
  const args = ['run', '-d', '-p', `${port}:${port}`, '-e', `PORT=${port}`];
  if (envFile) {
    args.push('--env-file', envFile);
  }
  args.push('--name', IMAGE_NAME, IMAGE_NAME);
  return args;
}

export const spawnRunner: CommandRunner = (command, args) =>
  new Promise((resolvePromise, reject) => {
    const proc = spawn(command, args, { stdio: 'inherit' });
    proc.on('error', reject);
    proc.on('exit', (code) => resolvePromise(code ?? 1));
  });

/** Exit status a shell reports when the command could not be launched */
const LAUNCH_FAILED = 127;

async function runDocker(runner: CommandRunner, args: string[], output: Output): Promise<number> {
  try {
    return await runner('docker', args);
  } catch (error) {
    output.error(`docker: ${error instanceof Error ? error.message : String(error)}`);
    return LAUNCH_FAILED;
  }
}

export async function buildImage(runner: CommandRunner, output: Output = console, cwd = process.cwd()): Promise<number> {
  output.log(`Building Docker image ${IMAGE_NAME}...`);
  const code = await runDocker(runner, buildArgs(cwd), output);
  if (code !== 0) {
    output.error(`Failed to build the Docker image (exit code ${code}).`);
    return 1;
  }
  output.log(`Docker image ${IMAGE_NAME} built successfully.`);
  return 0;
}

export async function runContainer(
  runner: CommandRunner,
  options: { port: number; envFile?: string },
  output: Output = console
): Promise<number> {
  output.log('Running Docker container...');
  const code = await runDocker(runner, runArgs(options.port, options.envFile), output);
  if (code !== 0) {
    output.error('Failed to start the Docker container.');
    return 1;
  }
  output.log('Docker container started successfully.');
  output.log(`You can access the app at http://localhost:${options.port}`);
  return 0;
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.command === 'build') {
    return buildImage(spawnRunner);
  }
  return runContainer(spawnRunner, { port: args.port, envFile: args.envFile });
}

if (process.argv[1] && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  runScript(main, { name: 'Docker' });
}

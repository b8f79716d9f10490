import { resolve } from 'node:path';
import { describe, expect, it } from 'vitest';
import {
  buildArgs,
  buildImage,
  CommandRunner,
  DEFAULT_PORT,
  IMAGE_NAME,
  Output,
  parseArgs,
  runArgs,
  runContainer,
} from '../docker.js';

function recordingOutput() {
  const logs: string[] = [];
  const errors: string[] = [];
  const output: Output = {
    log: (message) => logs.push(message),
    error: (message) => errors.push(message),
  };
  return { output, logs, errors };
}

function failingRunner(): CommandRunner {
  return async () => {
    throw new Error('spawn docker ENOENT');
  };
}

function fakeRunner(exitCode: number) {
  const calls: Array<{ command: string; args: string[] }> = [];
  const runner: CommandRunner = async (command, args) => {
    calls.push({ command, args });
    return exitCode;
  };
  return { runner, calls };
}

describe('parseArgs', () => {
  it('should default the port', () => {
    expect(parseArgs(['run'], {})).toEqual({ command: 'run', port: DEFAULT_PORT, envFile: undefined });
  });

  it('should take the port from PORT and let --port override it', () => {
    expect(parseArgs(['run'], { PORT: '9000' }).port).toBe(9000);
    expect(parseArgs(['run', '--port=9100'], { PORT: '9000' }).port).toBe(9100);
  });

  it('should read an env file', () => {
    expect(parseArgs(['run', '--env-file=.env'], {}).envFile).toBe('.env');
  });

  it('should reject bad input', () => {
    expect(() => parseArgs([], {})).toThrow('Usage: docker.ts <build|run> [--port=8000] [--env-file=.env]');
    expect(() => parseArgs(['push'], {})).toThrow('Unknown argument: push');
    expect(() => parseArgs(['run', '--port=0'], {})).toThrow('Invalid port: 0');
    expect(() => parseArgs(['run', '--port=http'], {})).toThrow('Invalid port: NaN');
  });
});

describe('docker arguments', () => {
  it('should build from the Dockerfile in the working directory', () => {
    expect(buildArgs('/srv/registry')).toEqual([
      'build',
      '-t',
      IMAGE_NAME,
      '-f',
      resolve('/srv/registry', 'Dockerfile'),
      '.',
    ]);
  });

  it('should publish the port and pass it to the container', () => {
    expect(runArgs(8000)).toEqual([
      'run',
      '-d',
      '-p',
      '8000:8000',
      '-e',
      'PORT=8000',
      '--name',
      'model-registry-api',
      'model-registry-api',
    ]);
    expect(runArgs(9000, '.env')).toContain('--env-file');
  });
});

describe('buildImage', () => {
  it('should report success', async () => {
    const { runner, calls } = fakeRunner(0);
    const { output, logs, errors } = recordingOutput();

    expect(await buildImage(runner, output, '/srv/registry')).toBe(0);
    expect(calls[0].command).toBe('docker');
    expect(logs).toEqual([
      'Building Docker image model-registry-api...',
      'Docker image model-registry-api built successfully.',
    ]);
    expect(errors).toEqual([]);
  });

  it('should report failure with the exit code', async () => {
    const { runner } = fakeRunner(2);
    const { output, errors } = recordingOutput();

    expect(await buildImage(runner, output, '/srv/registry')).toBe(1);
    expect(errors).toEqual(['Failed to build the Docker image (exit code 2).']);
  });

  it('should report a docker binary that cannot be launched', async () => {
    const { output, errors } = recordingOutput();

    expect(await buildImage(failingRunner(), output, '/srv/registry')).toBe(1);
    expect(errors).toEqual([
      'docker: spawn docker ENOENT',
      'Failed to build the Docker image (exit code 127).',
    ]);
  });
});

describe('runContainer', () => {
  it('should print where the app is reachable', async () => {
    const { runner, calls } = fakeRunner(0);
    const { output, logs } = recordingOutput();

    expect(await runContainer(runner, { port: 8000 }, output)).toBe(0);
    expect(calls[0].args).toEqual(runArgs(8000));
    expect(logs).toEqual([
      'Running Docker container...',
      'Docker container started successfully.',
      'You can access the app at http://localhost:8000',
    ]);
  });

  it('should report a container that fails to start', async () => {
    const { runner } = fakeRunner(125);
    const { output, logs, errors } = recordingOutput();

    expect(await runContainer(runner, { port: 8000 }, output)).toBe(1);
    expect(logs).toEqual(['Running Docker container...']);
    expect(errors).toEqual(['Failed to start the Docker container.']);
  });

  it('should print the failure line when docker cannot be launched', async () => {
    const { output, logs, errors } = recordingOutput();

    expect(await runContainer(failingRunner(), { port: 8000 }, output)).toBe(1);
    expect(logs).toEqual(['Running Docker container...']);
    expect(errors).toEqual(['docker: spawn docker ENOENT', 'Failed to start the Docker container.']);
  });
});

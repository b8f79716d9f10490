import type { Server } from 'node:http';
import { AppOptions, RegistryApp, createApp } from '../../src/app.js';
import { DatabaseCommandRunner } from '../../src/types/index.js';
import { InMemoryModelStore } from './in-memory-model-store.js';

export const TEST_CREDENTIALS = { username: 'test-user', password: 'test-secret' };

export function basicAuthHeader(username: string = TEST_CREDENTIALS.username, password: string = TEST_CREDENTIALS.password): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

export interface RecordedCommand {
  database: string;
  command: Record<string, unknown>;
}

/**
 * Records commands; `failWith` makes the next command reject
 */
export class FakeCommandRunner implements DatabaseCommandRunner {
  commands: RecordedCommand[] = [];
  failWith: Error | null = null;

  async runCommand(database: string, command: Record<string, unknown>): Promise<Record<string, unknown>> {
    this.commands.push({ database, command });
    if (this.failWith) {
      const error = this.failWith;
      this.failWith = null;
      throw error;
    }
    return { ok: 1 };
  }
}

export interface TestServer {
  baseUrl: string;
  registry: RegistryApp;
  commandRunner: FakeCommandRunner;
  modelStore: InMemoryModelStore;
  close(): Promise<void>;
}

export async function startTestServer(overrides: Partial<AppOptions> = {}): Promise<TestServer> {
  const commandRunner = new FakeCommandRunner();
  const modelStore = new InMemoryModelStore();
  const registry = createApp({
    credentials: TEST_CREDENTIALS,
    commandRunner,
    modelStore,
    database: { ping: async () => 2 },
    ...overrides
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = registry.app.listen(0, '127.0.0.1', () => resolve(listening));
  });

  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    registry,
    commandRunner,
    modelStore,
    close: async () => {
      registry.stop();
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }
  };
}

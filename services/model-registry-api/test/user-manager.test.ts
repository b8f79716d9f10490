import { describe, it, expect } from 'vitest';
import { MongoNetworkError } from 'mongodb';
import { UserCommandError } from '../src/errors/http-errors.js';
import { UserManager } from '../src/services/user-manager.js';
import { FakeCommandRunner } from './helpers/test-server.js';

describe('UserManager', () => {
  it('should run createUser scoped to the target database', async () => {
    const runner = new FakeCommandRunner();
    await new UserManager(runner).createUser('analytics', 'alice', 'test-password', 'readWrite');

    expect(runner.commands).toEqual([
      {
        database: 'analytics',
        command: {
          createUser: 'alice',
          pwd: 'test-password',
          roles: [{ role: 'readWrite', db: 'analytics' }],
        },
      },
    ]);
  });

  it('should run dropUser', async () => {
    const runner = new FakeCommandRunner();
    await new UserManager(runner).deleteUser('analytics', 'alice');

    expect(runner.commands).toEqual([{ database: 'analytics', command: { dropUser: 'alice' } }]);
  });

  it('should turn server rejections into UserCommandError', async () => {
    const runner = new FakeCommandRunner();
    runner.failWith = new Error('User "alice@analytics" already exists');

    const attempt = new UserManager(runner).createUser('analytics', 'alice', 'test-password', 'read');

    await expect(attempt).rejects.toBeInstanceOf(UserCommandError);
    await expect(attempt).rejects.toThrow('User "alice@analytics" already exists');
  });

  it('should pass connectivity failures through unchanged', async () => {
    const runner = new FakeCommandRunner();
    const failure = new MongoNetworkError('connection refused');
    runner.failWith = failure;

    await expect(new UserManager(runner).deleteUser('analytics', 'alice')).rejects.toBe(failure);
  });
});

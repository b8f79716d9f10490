import { isConnectivityError } from '../database/errors.js';
import { UserCommandError, getErrorMessage } from '../errors/http-errors.js';
import { DatabaseCommandRunner, MongoRoleGrant } from '../types/index.js';

/**
 * Creates and drops MongoDB users scoped to a single database.
 * Server-side rejections (duplicate user, unknown role) surface as 400s.
 */
export class UserManager {
  private readonly runner: DatabaseCommandRunner;

  constructor(runner: DatabaseCommandRunner) {
    this.runner = runner;
  }

  async createUser(database: string, user: string, password: string, role: string): Promise<void> {
    const roles: MongoRoleGrant[] = [{ role, db: database }];
    await this.execute(database, { createUser: user, pwd: password, roles });
    console.log(`👤 Created user '${user}' in database '${database}' with role '${role}'`);
  }

  async deleteUser(database: string, user: string): Promise<void> {
    await this.execute(database, { dropUser: user });
    console.log(`🗑️ Dropped user '${user}' from database '${database}'`);
  }

  private async execute(database: string, command: Record<string, unknown>): Promise<void> {
    try {
      await this.runner.runCommand(database, command);
    } catch (error) {
      if (isConnectivityError(error)) {
        throw error;
      }
      throw new UserCommandError(getErrorMessage(error));
    }
  }
}

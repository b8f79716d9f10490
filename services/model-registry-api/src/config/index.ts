export interface MongoCredentials {
  username: string;
  password: string;
  host: string;
  authDb: string;
}

export interface ServiceConfig {
  port: number;
  urlPrefix: string;
  nodeEnv: string;
  mongo: MongoCredentials & {
    serverSelectionTimeoutMs: number;
  };
  modelRoot?: string;
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
  shutdown: {
    timeout: number;
    forceExit: boolean;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function requireString(env: Env, key: string): string {
  const value = readString(env, key);
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Credentials are taken verbatim; surrounding spaces may be part of a password
 */
function requireSecret(env: Env, key: string): string {
  const value = env[key];
  if (!value || !value.trim()) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function readInt(env: Env, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative integer, got '${raw}'`);
  }
  return value;
}

/**
 * Strip trailing slashes and make sure a non-empty prefix starts with one.
 */
export function normalizeUrlPrefix(prefix: string | undefined): string {
  if (!prefix) {
    return '';
  }
  const trimmed = prefix.replace(/\/+$/, '');
  if (!trimmed) {
    return '';
  }
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

/**
 * Build the service configuration from environment variables.
 * The Mongo credential keys keep their lowercase names from the deployment environment.
 */
export function loadConfig(env: Env = process.env): ServiceConfig {
  return {
    port: readInt(env, 'PORT', 8000),
    urlPrefix: normalizeUrlPrefix(readString(env, 'URL_PREFIX')),
    nodeEnv: readString(env, 'NODE_ENV') ?? 'development',
    mongo: {
      username: requireSecret(env, 'mongo_username'),
      password: requireSecret(env, 'mongo_password'),
      host: requireString(env, 'mongo_host'),
      authDb: readString(env, 'mongo_auth_db') ?? 'admin',
      serverSelectionTimeoutMs: readInt(env, 'MONGO_SERVER_SELECTION_TIMEOUT_MS', 5000),
    },
    modelRoot: readString(env, 'MODEL_ROOT'),
    rateLimit: {
      windowMs: readInt(env, 'RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000),
      maxRequests: readInt(env, 'RATE_LIMIT_MAX_REQUESTS', 1000),
    },
    shutdown: {
      timeout: readInt(env, 'SHUTDOWN_TIMEOUT_MS', 30000),
      forceExit: readString(env, 'FORCE_EXIT_ON_SHUTDOWN') !== 'false',
    },
  };
}

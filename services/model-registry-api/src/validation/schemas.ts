/**
 * Request schemas
 *
 * Every route validates its body or query through one of these before
 * touching MongoDB. Defaults mirror the registry's conventional
 * `model_registry` database and `llm` bucket.
 */

import { type } from 'arktype';
import { BadRequestError } from '../errors/http-errors.js';

export const DEFAULT_DATABASE = 'model_registry';
export const DEFAULT_COLLECTION = 'llm';

export const createUserSchema = type({
  username: 'string > 0',
  password: 'string > 0',
  role: 'string > 0',
  database: 'string > 0',
});

export const deleteUserSchema = type({
  username: 'string > 0',
  database: 'string > 0',
});

export const storeModelSchema = type({
  database: 'string > 0',
  collection: 'string > 0',
  modelPath: 'string > 0',
  modelArchitecture: 'string > 0',
  modelVersion: 'number',
  project_name: 'string > 0',
});

/** Shared by delete_model, search_model, get_model and download_model */
export const modelReferenceSchema = type({
  database: ['string > 0', '=', DEFAULT_DATABASE],
  collection: ['string > 0', '=', DEFAULT_COLLECTION],
  modelId: 'string > 0',
});

export const listModelsQuerySchema = type({
  database: ['string > 0', '=', DEFAULT_DATABASE],
  collection: ['string > 0', '=', DEFAULT_COLLECTION],
  'project_name?': 'string > 0',
});

export const generatePasswordQuerySchema = type({
  'length?': 'string.integer.parse',
  'special_chars?': 'string',
});

const TRUE_FLAGS = new Set(['true', '1', 'yes', 'on']);
const FALSE_FLAGS = new Set(['false', '0', 'no', 'off']);

/**
 * Read a boolean query flag: true/false, 1/0, yes/no or on/off in any case
 */
export function parseBooleanFlag(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_FLAGS.has(normalized)) {
    return true;
  }
  if (FALSE_FLAGS.has(normalized)) {
    return false;
  }
  throw new BadRequestError(`${name} must be a boolean (true/false, 1/0, yes/no, on/off), got '${value}'`);
}

export type CreateUserRequest = typeof createUserSchema.infer;
export type DeleteUserRequest = typeof deleteUserSchema.infer;
export type StoreModelRequest = typeof storeModelSchema.infer;
export type ModelReferenceRequest = typeof modelReferenceSchema.infer;

/**
 * Unwrap an arktype validation result, throwing a 400 on failure
 *
 * @example
 * ```typescript
 * const body = validateInput(createUserSchema(req.body));
 * ```
 */
export function validateInput<T>(schemaResult: T | InstanceType<typeof type.errors>): T {
  if (schemaResult instanceof type.errors) {
    throw new BadRequestError(schemaResult.summary);
  }
  return schemaResult;
}

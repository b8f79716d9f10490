import { MongoNetworkError, MongoServerSelectionError } from 'mongodb';

/**
 * True when the driver could not reach a server at all, as opposed to the
 * server rejecting a command.
 */
export function isConnectivityError(error: unknown): boolean {
  return error instanceof MongoNetworkError || error instanceof MongoServerSelectionError;
}

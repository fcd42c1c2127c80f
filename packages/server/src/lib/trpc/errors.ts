// Mapping runtime errors onto tRPC error codes

import { IngestionError, SchemaError, ValidationError } from '@campaign-demand/runtime';
import { TRPCError } from './index.js';

/**
 * Convert a runtime error into the matching TRPCError, keeping it as
 * the cause. Anything unrecognized is returned as an internal error.
 */
export function toTRPCError(error: unknown): TRPCError {
  if (error instanceof TRPCError) {
    return error;
  }
  if (error instanceof SchemaError || error instanceof ValidationError) {
    return new TRPCError({ code: 'BAD_REQUEST', message: error.message, cause: error });
  }
  if (error instanceof IngestionError) {
    return new TRPCError({ code: 'UNPROCESSABLE_CONTENT', message: error.message, cause: error });
  }
  return new TRPCError({
    code: 'INTERNAL_SERVER_ERROR',
    message: error instanceof Error ? error.message : 'Unknown error',
    cause: error,
  });
}

/**
 * Run a synchronous engine call, rethrowing its errors as TRPCErrors.
 */
export function callEngine<T>(fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw toTRPCError(error);
  }
}

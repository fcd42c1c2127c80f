// tRPC initialization
//
// Sets up tRPC with superjson transformer for proper Date/Map/Set serialization.
// This is the foundation for type-safe API routes.

import { initTRPC, TRPCError } from '@trpc/server';
import superjson from 'superjson';
import { SchemaError } from '@campaign-demand/runtime';
import type { Context } from './context.js';

/**
 * Extra error data for clients: the error code, and for schema
 * failures the missing column names.
 */
export function errorData(error: TRPCError): { code: TRPCError['code']; missingColumns?: string[] } {
  if (error.cause instanceof SchemaError) {
    return { code: error.code, missingColumns: error.cause.missingColumns };
  }
  return { code: error.code };
}

/**
 * Initialize tRPC with context and superjson transformer.
 */
const t = initTRPC.context<Context>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        ...errorData(error),
      },
    };
  },
});

/**
 * Export router factory.
 */
export const router = t.router;

/**
 * Export procedure helpers.
 *
 * - publicProcedure: No session required (upload)
 */
export const publicProcedure = t.procedure;

/**
 * Export middleware factory.
 */
export const middleware = t.middleware;

/**
 * Server-side caller factory (used by tests and in-process callers).
 */
export const createCallerFactory = t.createCallerFactory;

/**
 * Re-export TRPCError for use in routers.
 */
export { TRPCError };

// tRPC middleware for session-scoped procedures

import { z } from 'zod';
import { publicProcedure, TRPCError } from './index.js';

/**
 * Session procedure - requires a live session.
 *
 * Resolves `sessionId` from the input and passes the session to
 * downstream procedures as `ctx.session`.
 */
export const sessionProcedure = publicProcedure
  .input(z.object({ sessionId: z.string().min(1) }))
  .use(async ({ ctx, input, next }) => {
    const session = await ctx.sessions.get(input.sessionId);
    if (!session) {
      throw new TRPCError({
        code: 'NOT_FOUND',
        message: `Session not found: ${input.sessionId}`,
      });
    }

    return next({
      ctx: {
        ...ctx,
        session,
      },
    });
  });

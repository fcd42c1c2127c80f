// Sessions router

import { router } from '../index.js';
import { sessionProcedure } from '../middleware.js';

export const sessionsRouter = router({
  /**
   * Drop a session and its table.
   */
  close: sessionProcedure.mutation(async ({ ctx }) => {
    const closed = await ctx.sessions.delete(ctx.session.id);
    ctx.logger.info('Session closed', { sessionId: ctx.session.id });
    return { closed };
  }),
});

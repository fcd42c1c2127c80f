// Root router - combines all domain routers
//
// This is the main entry point for the tRPC API.
// All routers are merged here to create the complete API surface.

import { router } from '../index.js';
import { campaignsRouter } from './campaigns.js';
import { periodsRouter } from './periods.js';
import { estimatesRouter } from './estimates.js';
import { exportsRouter } from './exports.js';
import { sessionsRouter } from './sessions.js';

/**
 * The root router that combines all domain routers.
 *
 * Usage from client:
 * ```ts
 * // Upload
 * const { sessionId } = await trpc.campaigns.upload.mutate({ contentBase64 });
 *
 * // Estimate
 * const result = await trpc.estimates.run.mutate({
 *   sessionId,
 *   earlier: { country: 'DE', window: { start: '2023-01-01', end: '2023-12-31' } },
 *   later: { country: 'DE', window: { start: '2024-01-01', end: '2024-12-31' } },
 *   growthPercent: 10,
 * });
 * ```
 */
export const appRouter = router({
  campaigns: campaignsRouter,
  periods: periodsRouter,
  estimates: estimatesRouter,
  exports: exportsRouter,
  sessions: sessionsRouter,
});

/**
 * Export the router type for client-side type inference.
 */
export type AppRouter = typeof appRouter;

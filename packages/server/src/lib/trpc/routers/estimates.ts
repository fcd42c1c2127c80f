// Estimates router - blended demand for two periods

import { describeEstimationWarning, runEstimation } from '@campaign-demand/runtime';
import { router } from '../index.js';
import { sessionProcedure } from '../middleware.js';
import { callEngine } from '../errors.js';
import { formatEstimate } from '../../presentation.js';
import { EstimationInputSchema, toEstimationRequest } from './estimation-input.js';

export const estimatesRouter = router({
  /**
   * Filter both periods, keep the selected rows, and estimate demand.
   */
  run: sessionProcedure.input(EstimationInputSchema).mutation(({ ctx, input }) => {
    const request = toEstimationRequest(input, ctx.config);
    const result = callEngine(() =>
      runEstimation(ctx.session.table, request, { logger: ctx.logger })
    );

    return {
      ...result,
      headline: formatEstimate(result.estimate.estimate),
      messages: result.estimate.warnings.map(describeEstimationWarning),
    };
  }),
});

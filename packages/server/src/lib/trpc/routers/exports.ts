// Exports router - selected rows of both periods as a delimited file

import { z } from 'zod';
import { exportSelectedRows, runEstimation } from '@campaign-demand/runtime';
import { router } from '../index.js';
import { sessionProcedure } from '../middleware.js';
import { callEngine } from '../errors.js';
import { exportFilename } from '../../presentation.js';
import { EstimationInputSchema, toEstimationRequest } from './estimation-input.js';

export const exportsRouter = router({
  /**
   * Export the union of both periods' selected rows.
   */
  csv: sessionProcedure
    .input(EstimationInputSchema.extend({ delimiter: z.enum([',', ';', '\t']).default(',') }))
    .mutation(({ ctx, input }) => {
      const request = toEstimationRequest(input, ctx.config);
      const { table } = ctx.session;

      const exported = callEngine(() => {
        const { earlier, later } = runEstimation(table, request, { logger: ctx.logger });
        return exportSelectedRows(table, earlier.selected, later.selected, {
          delimiter: input.delimiter,
        });
      });

      ctx.logger.info('Selection exported', { rows: exported.rows.length });

      return {
        filename: exportFilename(input.delimiter),
        rowCount: exported.rows.length,
        content: exported.content,
      };
    }),
});

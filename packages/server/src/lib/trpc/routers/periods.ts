// Periods router - filter one period for row selection

import { z } from 'zod';
import {
  MIN_KEYWORD_LENGTH,
  PeriodFilterOptionsInputSchema,
  PeriodQuerySchema,
} from '@campaign-demand/protocol';
import { filterPeriod } from '@campaign-demand/runtime';
import { router } from '../index.js';
import { sessionProcedure } from '../middleware.js';
import { callEngine } from '../errors.js';
import { formatRowLabel } from '../../presentation.js';
import { isTooShortKeyword } from './estimation-input.js';

export const periodsRouter = router({
  /**
   * Filter the session's table for one period.
   *
   * A keyword that is given but too short is not searched for; the
   * caller gets `keyword_too_short` and no rows.
   */
  filter: sessionProcedure
    .input(
      z.object({
        period: PeriodQuerySchema,
        options: PeriodFilterOptionsInputSchema.optional(),
      })
    )
    .query(({ ctx, input }) => {
      if (isTooShortKeyword(input.period.keyword)) {
        return { status: 'keyword_too_short' as const, minLength: MIN_KEYWORD_LENGTH, rows: [] };
      }

      const filtered = callEngine(() =>
        filterPeriod(ctx.session.table, input.period, input.options)
      );
      return {
        status: 'ok' as const,
        rows: filtered.map((record) => ({ record, label: formatRowLabel(record) })),
      };
    }),
});

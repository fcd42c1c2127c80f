// Shared input for procedures that run the estimation pipeline

import { z } from 'zod';
import {
  GrowthPercentSchema,
  MIN_KEYWORD_LENGTH,
  PeriodFilterOptionsInputSchema,
  PeriodQuerySchema,
  isSearchableKeyword,
  type PeriodQuery,
} from '@campaign-demand/protocol';
import type { EstimationRequest } from '@campaign-demand/runtime';
import type { ServerConfig } from '../../config.js';
import { TRPCError } from '../index.js';

const RowIdsSchema = z.array(z.number().int().nonnegative());

export const EstimationInputSchema = z.object({
  earlier: PeriodQuerySchema,
  later: PeriodQuerySchema,
  growthPercent: GrowthPercentSchema,
  earlierRowIds: RowIdsSchema.optional(),
  laterRowIds: RowIdsSchema.optional(),
  options: PeriodFilterOptionsInputSchema.optional(),
});

export type EstimationInput = z.infer<typeof EstimationInputSchema>;

/**
 * True when a keyword was given but is too short to search for.
 */
export function isTooShortKeyword(keyword: string | undefined): boolean {
  return (keyword?.trim() ?? '') !== '' && !isSearchableKeyword(keyword);
}

function assertSearchableKeyword(period: string, query: PeriodQuery): void {
  if (isTooShortKeyword(query.keyword)) {
    throw new TRPCError({
      code: 'BAD_REQUEST',
      message: `${period} keyword must be at least ${MIN_KEYWORD_LENGTH} characters`,
    });
  }
}

/**
 * Check an estimation input against the server's limits and turn it
 * into a pipeline request.
 */
export function toEstimationRequest(input: EstimationInput, config: ServerConfig): EstimationRequest {
  if (input.growthPercent < config.growthMin || input.growthPercent > config.growthMax) {
    throw new TRPCError({
      code: 'BAD_REQUEST',
      message: `growthPercent must be between ${config.growthMin} and ${config.growthMax}, got ${input.growthPercent}`,
    });
  }
  assertSearchableKeyword('Earlier', input.earlier);
  assertSearchableKeyword('Later', input.later);

  return {
    earlier: input.earlier,
    later: input.later,
    growthPercent: input.growthPercent,
    earlierRowIds: input.earlierRowIds,
    laterRowIds: input.laterRowIds,
    filterOptions: input.options,
  };
}

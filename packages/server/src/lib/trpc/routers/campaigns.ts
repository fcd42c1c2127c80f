// Campaigns router - upload a campaign file and look up its values

import { z } from 'zod';
import { ingestCampaignFile, listCategories, listCountries } from '@campaign-demand/runtime';
import { router, publicProcedure, TRPCError } from '../index.js';
import { sessionProcedure } from '../middleware.js';
import { toTRPCError } from '../errors.js';

const Base64Schema = z
  .string()
  .regex(/^[A-Za-z0-9+/]*={0,2}$/, { message: 'Expected base64-encoded file content' });

export const campaignsRouter = router({
  /**
   * Load a tab-separated campaign file into a new session.
   */
  upload: publicProcedure
    .input(
      z.object({
        contentBase64: Base64Schema,
        encoding: z.string().min(1).optional(),
        requireCampaignName: z.boolean().default(true),
        requireCategory: z.boolean().default(false),
      })
    )
    .mutation(async ({ ctx, input }) => {
      const bytes = Buffer.from(input.contentBase64, 'base64');
      if (bytes.length > ctx.config.maxUploadBytes) {
        throw new TRPCError({
          code: 'PAYLOAD_TOO_LARGE',
          message: `File is ${bytes.length} bytes, the limit is ${ctx.config.maxUploadBytes}`,
        });
      }

      const result = ingestCampaignFile(bytes, {
        encoding: input.encoding ?? ctx.config.defaultEncoding,
        requireCampaignName: input.requireCampaignName,
        requireCategory: input.requireCategory,
        logger: ctx.logger,
      });
      if (!result.ok) {
        throw toTRPCError(result.error);
      }

      const { table } = result;
      const session = await ctx.sessions.create(table);
      ctx.logger.info('Session created', { sessionId: session.id, rows: table.records.length });

      return {
        sessionId: session.id,
        expiresAt: session.expiresAt,
        rowCount: table.records.length,
        columns: [...table.columns],
        encoding: table.encoding,
        countries: listCountries(table),
        categories: table.hasCategory ? listCategories(table) : [],
      };
    }),

  /**
   * Countries present in the session's table, in order of appearance.
   */
  countries: sessionProcedure.query(({ ctx }) => listCountries(ctx.session.table)),

  /**
   * Categories present in the session's table, optionally for one country.
   */
  categories: sessionProcedure
    .input(z.object({ country: z.string().optional() }))
    .query(({ ctx, input }) => listCategories(ctx.session.table, input.country)),
});

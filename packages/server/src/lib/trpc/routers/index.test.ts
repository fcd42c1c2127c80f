// Tests for the API routers, called in process

import { describe, it, expect, beforeEach } from 'vitest';
import { createInMemorySessionRepository } from '@campaign-demand/repositories';
import { silentLogger, SchemaError } from '@campaign-demand/runtime';
import { loadConfig, type ServerConfig } from '../../config.js';
import { createCallerFactory } from '../index.js';
import type { Context } from '../context.js';
import { appRouter } from './index.js';

const FILE = [
  ['Country', 'Campaign name', 'Description', 'Category_name', 'Date Start', 'Date End', 'Demand'],
  ['DE', 'Winter 23', 'Winter SALE', 'Shoes', '02.01.2023', '20.01.2023', '100,00 €'],
  ['DE', 'Winter 23 B', 'Winter sale extra', 'Shoes', '05.01.2023', '25.01.2023', '300,00 €'],
  ['DE', 'Winter 24', 'Winter Sale', 'Shoes', '03.01.2024', '21.01.2024', '200,00 €'],
  ['DE', 'Newsletter', 'Weekly news', 'Shoes', '03.01.2024', '21.01.2024', '9.999,00 €'],
  ['AT', 'Winter 24 AT', 'Winter sale', 'Shoes', '03.01.2024', '21.01.2024', '50,00 €'],
  ['DE', 'Winter 24 C', 'Winter sale', 'Bags', '04.01.2024', '22.01.2024', 'unknown'],
]
  .map((row) => row.join('\t'))
  .join('\n');

function toBase64(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64');
}

const createCaller = createCallerFactory(appRouter);

const periods = {
  earlier: { country: 'DE', keyword: 'sale', window: { start: '2023-01-01', end: '2023-01-31' } },
  later: { country: 'DE', keyword: 'sale', window: { start: '2024-01-01', end: '2024-01-31' } },
};

describe('appRouter', () => {
  let config: ServerConfig;
  let ctx: Context;
  let caller: ReturnType<typeof createCaller>;
  let sessionId: string;

  beforeEach(async () => {
    config = loadConfig({});
    ctx = {
      sessions: createInMemorySessionRepository(),
      logger: silentLogger,
      config,
    };
    caller = createCaller(ctx);
    ({ sessionId } = await caller.campaigns.upload({ contentBase64: toBase64(FILE) }));
  });

  describe('campaigns.upload', () => {
    it('loads the file into a new session', async () => {
      const result = await caller.campaigns.upload({ contentBase64: toBase64(FILE) });

      expect(result.sessionId).not.toBe(sessionId);
      expect(result.rowCount).toBe(6);
      expect(result.encoding).toBe('utf-8');
      expect(result.columns).toEqual([
        'Country',
        'Campaign name',
        'Description',
        'Category_name',
        'Date Start',
        'Date End',
        'Demand',
      ]);
      expect(result.countries).toEqual(['DE', 'AT']);
      expect(result.categories).toEqual(['Shoes', 'Bags']);
      expect(await ctx.sessions.size()).toBe(2);
    });

    it('reports missing columns as a bad request', async () => {
      const missingDemand = 'Country\tCampaign name\tDescription\tDate Start\tDate End\nDE\ta\tb\t01.01.2024\t02.01.2024';

      const error = await caller.campaigns
        .upload({ contentBase64: toBase64(missingDemand) })
        .catch((e: unknown) => e);

      expect(error).toMatchObject({ code: 'BAD_REQUEST', message: 'Missing required columns: Demand' });
      expect(error).toHaveProperty('cause');
      expect(error instanceof Error && error.cause instanceof SchemaError).toBe(true);
    });

    it('reports unreadable files as unprocessable', async () => {
      await expect(caller.campaigns.upload({ contentBase64: '' })).rejects.toMatchObject({
        code: 'UNPROCESSABLE_CONTENT',
        message: 'File has no header row',
      });
    });

    it('rejects content that is not base64', async () => {
      await expect(caller.campaigns.upload({ contentBase64: 'not base64!' })).rejects.toMatchObject({
        code: 'BAD_REQUEST',
      });
    });

    it('rejects files over the upload limit', async () => {
      const small = createCaller({ ...ctx, config: { ...config, maxUploadBytes: 10 } });

      await expect(small.campaigns.upload({ contentBase64: toBase64(FILE) })).rejects.toMatchObject({
        code: 'PAYLOAD_TOO_LARGE',
      });
    });
  });

  describe('campaigns lookups', () => {
    it('lists countries and categories', async () => {
      expect(await caller.campaigns.countries({ sessionId })).toEqual(['DE', 'AT']);
      expect(await caller.campaigns.categories({ sessionId })).toEqual(['Shoes', 'Bags']);
      expect(await caller.campaigns.categories({ sessionId, country: 'AT' })).toEqual(['Shoes']);
    });

    it('rejects unknown sessions', async () => {
      await expect(caller.campaigns.countries({ sessionId: 'missing' })).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'Session not found: missing',
      });
    });
  });

  describe('periods.filter', () => {
    it('returns matching rows with labels', async () => {
      const result = await caller.periods.filter({ sessionId, period: periods.earlier });

      expect(result.status).toBe('ok');
      expect(result.rows.map((row) => row.record.rowId)).toEqual([0, 1]);
      expect(result.rows[0]?.label).toBe('Winter 23 | 2023-01-02 - 2023-01-20 | Demand: 100');
    });

    it('does not search for a keyword that is too short', async () => {
      const result = await caller.periods.filter({
        sessionId,
        period: { ...periods.earlier, keyword: ' sa ' },
      });

      expect(result).toEqual({ status: 'keyword_too_short', minLength: 3, rows: [] });
    });

    it('rejects malformed window bounds', async () => {
      await expect(
        caller.periods.filter({
          sessionId,
          period: { ...periods.earlier, window: { start: '01.01.2023', end: '2023-01-31' } },
        })
      ).rejects.toMatchObject({ code: 'BAD_REQUEST' });
    });
  });

  describe('procedure types', () => {
    it('posts estimation inputs as mutations', () => {
      expect(appRouter.estimates.run._def.type).toBe('mutation');
      expect(appRouter.exports.csv._def.type).toBe('mutation');
      expect(appRouter.periods.filter._def.type).toBe('query');
    });

    it('accepts a long list of retained row ids', async () => {
      const manyIds = Array.from({ length: 5000 }, (_, index) => index);
      const result = await caller.estimates.run({
        sessionId,
        ...periods,
        growthPercent: 10,
        earlierRowIds: manyIds,
        laterRowIds: manyIds,
      });

      expect(result.estimate.estimate).toBeCloseTo(210);
    });
  });

  describe('estimates.run', () => {
    it('blends both periods', async () => {
      const result = await caller.estimates.run({ sessionId, ...periods, growthPercent: 10 });

      expect(result.estimate.estimate).toBeCloseTo(210);
      expect(result.estimate.basis).toBe('blended');
      expect(result.headline).toBe('Estimated Demand: 210.00 EUR');
      expect(result.messages).toEqual([]);
    });

    it('keeps only the retained rows', async () => {
      const result = await caller.estimates.run({
        sessionId,
        ...periods,
        growthPercent: 10,
        earlierRowIds: [1],
      });

      expect(result.earlier.selected.map((r) => r.rowId)).toEqual([1]);
      expect(result.estimate.estimate).toBeCloseTo(265);
    });

    it('reports when nothing can be estimated', async () => {
      const result = await caller.estimates.run({
        sessionId,
        earlier: { ...periods.earlier, country: 'FR' },
        later: { ...periods.later, country: 'FR' },
        growthPercent: 0,
      });

      expect(result.estimate.estimate).toBeNull();
      expect(result.headline).toBeNull();
      expect(result.messages).toEqual([
        'No campaigns selected from the Earlier period',
        'No campaigns selected from the Later period',
        'Cannot estimate demand: neither period has numeric demand',
      ]);
    });

    it('rejects growth outside the configured range', async () => {
      await expect(
        caller.estimates.run({ sessionId, ...periods, growthPercent: 150 })
      ).rejects.toMatchObject({
        code: 'BAD_REQUEST',
        message: 'growthPercent must be between 0 and 100, got 150',
      });
    });

    it('rejects a keyword that is too short', async () => {
      await expect(
        caller.estimates.run({
          sessionId,
          earlier: periods.earlier,
          later: { ...periods.later, keyword: 'ab' },
          growthPercent: 10,
        })
      ).rejects.toMatchObject({
        code: 'BAD_REQUEST',
        message: 'Later keyword must be at least 3 characters',
      });
    });
  });

  describe('exports.csv', () => {
    it('exports the selected rows of both periods', async () => {
      const result = await caller.exports.csv({ sessionId, ...periods, growthPercent: 10 });

      expect(result.filename).toBe('selected_campaigns.csv');
      expect(result.rowCount).toBe(4);
      expect(result.content).toBe(
        [
          'Country,Campaign name,Description,Category_name,Date Start,Date End,Demand',
          'DE,Winter 23,Winter SALE,Shoes,2023-01-02,2023-01-20,100',
          'DE,Winter 23 B,Winter sale extra,Shoes,2023-01-05,2023-01-25,300',
          'DE,Winter 24,Winter Sale,Shoes,2024-01-03,2024-01-21,200',
          'DE,Winter 24 C,Winter sale,Bags,2024-01-04,2024-01-22,',
          '',
        ].join('\n')
      );
    });

    it('writes a row selected in both periods once', async () => {
      const result = await caller.exports.csv({
        sessionId,
        earlier: periods.earlier,
        later: periods.earlier,
        growthPercent: 0,
        delimiter: '\t',
      });

      expect(result.filename).toBe('selected_campaigns.tsv');
      expect(result.rowCount).toBe(2);
    });
  });

  describe('sessions.close', () => {
    it('drops the session', async () => {
      expect(await caller.sessions.close({ sessionId })).toEqual({ closed: true });

      await expect(caller.campaigns.countries({ sessionId })).rejects.toMatchObject({
        code: 'NOT_FOUND',
      });
    });
  });
});

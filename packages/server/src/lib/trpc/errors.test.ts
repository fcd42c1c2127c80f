// Tests for runtime-to-tRPC error mapping

import { describe, it, expect } from 'vitest';
import { IngestionError, SchemaError, ValidationError } from '@campaign-demand/runtime';
import { TRPCError, errorData } from './index.js';
import { callEngine, toTRPCError } from './errors.js';

describe('toTRPCError', () => {
  it('maps schema and validation errors to BAD_REQUEST', () => {
    const schema = toTRPCError(new SchemaError(['Demand']));
    expect(schema.code).toBe('BAD_REQUEST');
    expect(schema.message).toBe('Missing required columns: Demand');

    expect(toTRPCError(new ValidationError('Bad window')).code).toBe('BAD_REQUEST');
  });

  it('maps ingestion errors to UNPROCESSABLE_CONTENT', () => {
    const error = toTRPCError(new IngestionError('File has no header row'));
    expect(error.code).toBe('UNPROCESSABLE_CONTENT');
    expect(error.message).toBe('File has no header row');
  });

  it('passes TRPCErrors through', () => {
    const original = new TRPCError({ code: 'NOT_FOUND', message: 'gone' });
    expect(toTRPCError(original)).toBe(original);
  });

  it('treats anything else as internal', () => {
    const error = toTRPCError(new Error('boom'));
    expect(error.code).toBe('INTERNAL_SERVER_ERROR');
    expect(error.message).toBe('boom');
  });
});

describe('callEngine', () => {
  it('returns the result', () => {
    expect(callEngine(() => 42)).toBe(42);
  });

  it('rethrows as TRPCError', () => {
    expect(() =>
      callEngine(() => {
        throw new ValidationError('Bad window');
      })
    ).toThrow(TRPCError);
  });
});

describe('errorData', () => {
  it('adds missing columns for schema failures', () => {
    const error = toTRPCError(new SchemaError(['Demand', 'Date End']));
    expect(errorData(error)).toEqual({ code: 'BAD_REQUEST', missingColumns: ['Demand', 'Date End'] });
  });

  it('carries only the code otherwise', () => {
    expect(errorData(toTRPCError(new Error('boom')))).toEqual({ code: 'INTERNAL_SERVER_ERROR' });
  });
});

import { describe, expect, it } from 'vitest';
import { InsufficientBalanceError, RedemptionCodeUnavailableError } from '@pointwell/core';
import { ForbiddenError, NotFoundError, nextFreeSlug, slugify, toErrorResponse } from './utils.js';

describe('slugify', () => {
  it('lowercases, strips accents and joins words with dashes', () => {
    expect(slugify('Café  Olé & Sons')).toBe('cafe-ole-sons');
    expect(slugify('  Corner Store -- Downtown ')).toBe('corner-store-downtown');
  });

  it('returns an empty string when nothing usable remains', () => {
    expect(slugify('!!!')).toBe('');
  });
});

describe('nextFreeSlug', () => {
  it('keeps the base slug while it is free', () => {
    expect(nextFreeSlug('corner-cafe', new Set())).toBe('corner-cafe');
  });

  it('appends the first unused numeric suffix', () => {
    expect(nextFreeSlug('corner-cafe', new Set(['corner-cafe']))).toBe('corner-cafe-1');
    expect(nextFreeSlug('corner-cafe', new Set(['corner-cafe', 'corner-cafe-1', 'corner-cafe-2']))).toBe(
      'corner-cafe-3',
    );
  });

  it('falls back to a generic base for empty names', () => {
    expect(nextFreeSlug('', new Set(['business']))).toBe('business-1');
  });
});

describe('toErrorResponse', () => {
  it('maps ledger errors to their status and code', () => {
    expect(toErrorResponse(new InsufficientBalanceError(30, 50))).toEqual({
      statusCode: 409,
      body: { error: 'Insufficient points balance', code: 'insufficient_balance' },
    });
    expect(toErrorResponse(new RedemptionCodeUnavailableError(5))).toEqual({
      statusCode: 503,
      body: {
        error: 'Unable to issue a unique redemption code after 5 attempts',
        code: 'redemption_code_unavailable',
      },
    });
  });

  it('maps http errors without a code', () => {
    expect(toErrorResponse(new ForbiddenError())).toEqual({ statusCode: 403, body: { error: 'Forbidden' } });
    expect(toErrorResponse(new NotFoundError('Offer'))).toEqual({ statusCode: 404, body: { error: 'Offer not found' } });
  });

  it('leaves unexpected errors to the caller', () => {
    expect(toErrorResponse(new Error('boom'))).toBeNull();
    expect(toErrorResponse('boom')).toBeNull();
  });
});

import { isLedgerError, type LedgerErrorCode } from '@pointwell/core';

const LEDGER_ERROR_STATUS: Record<LedgerErrorCode, number> = {
  invalid_amount: 422,
  insufficient_balance: 409,
  wallet_not_found: 404,
  offer_not_found: 404,
  offer_expired_or_inactive: 409,
  tier_configuration_missing: 422,
  redemption_code_unavailable: 503,
};

/** Raised inside a unit of work to abort it with a specific response. */
export class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class ForbiddenError extends HttpError {
  constructor() {
    super(403, 'Forbidden');
  }
}

export class NotFoundError extends HttpError {
  constructor(resource: string) {
    super(404, `${resource} not found`);
  }
}

export interface ErrorResponse {
  statusCode: number;
  body: { error: string; code?: string };
}

/** Maps expected failures to a response; anything else is left to the caller to log. */
export function toErrorResponse(error: unknown): ErrorResponse | null {
  if (isLedgerError(error)) {
    return { statusCode: LEDGER_ERROR_STATUS[error.code], body: { error: error.message, code: error.code } };
  }
  if (error instanceof HttpError) {
    return { statusCode: error.statusCode, body: { error: error.message } };
  }
  return null;
}

export function slugify(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, '')
    .trim()
    .replace(/[\s_-]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/** First of `base`, `base-1`, `base-2`… not already taken. */
export function nextFreeSlug(base: string, taken: ReadonlySet<string>): string {
  const root = base || 'business';
  if (!taken.has(root)) {
    return root;
  }
  let suffix = 1;
  while (taken.has(`${root}-${suffix}`)) {
    suffix += 1;
  }
  return `${root}-${suffix}`;
}

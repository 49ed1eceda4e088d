export type LedgerErrorCode =
  | 'invalid_amount'
  | 'insufficient_balance'
  | 'wallet_not_found'
  | 'offer_not_found'
  | 'offer_expired_or_inactive'
  | 'tier_configuration_missing'
  | 'redemption_code_unavailable';

/**
 * Base class for every condition the ledger reports back to its caller.
 * None of these are fatal; the caller decides how to present them.
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidAmountError extends LedgerError {
  constructor(readonly points: number) {
    super('invalid_amount', `Points must be a positive integer, received ${points}`);
  }
}

export class InsufficientBalanceError extends LedgerError {
  constructor(
    readonly available: number,
    readonly requested: number,
  ) {
    super('insufficient_balance', 'Insufficient points balance');
  }
}

export class WalletNotFoundError extends LedgerError {
  constructor(readonly lookup: string) {
    super('wallet_not_found', 'Wallet not found for this business');
  }
}

export class OfferNotFoundError extends LedgerError {
  constructor(readonly offerId: string) {
    super('offer_not_found', 'Offer not found');
  }
}

export class OfferExpiredOrInactiveError extends LedgerError {
  constructor(readonly offerId: string) {
    super('offer_expired_or_inactive', 'This offer is no longer valid');
  }
}

export class TierConfigurationMissingError extends LedgerError {
  constructor(readonly businessId: string) {
    super('tier_configuration_missing', 'Tier catalog must include a baseline tier with minimum_points = 0');
  }
}

export class RedemptionCodeUnavailableError extends LedgerError {
  constructor(readonly attempts: number) {
    super('redemption_code_unavailable', `Unable to issue a unique redemption code after ${attempts} attempts`);
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}

import {
  InsufficientBalanceError,
  OfferExpiredOrInactiveError,
  OfferNotFoundError,
  RedemptionCodeUnavailableError,
  WalletNotFoundError,
} from './errors.js';
import { debitWallet, type LedgerHelpers } from './ledger.js';
import { generateRedemptionCode, isOfferValid } from './offers.js';
import type { Logger, Offer, Redemption, Wallet, WalletTransaction } from './types.js';

export const DEFAULT_CODE_ATTEMPTS = 5;

export interface DirectoryHelpers {
  getOffer(businessId: string, offerId: string): Promise<Offer | null>;
  /** Implementations hold the wallet row for the rest of the unit of work. */
  getWallet(customerId: string, businessId: string): Promise<Wallet | null>;
}

export interface RedemptionHelpers extends LedgerHelpers, DirectoryHelpers {
  /** Resolves to false, writing nothing, when another redemption already holds the code. */
  insertRedemption(redemption: Redemption): Promise<boolean>;
}

export interface AiMetricsCollaborator {
  incrementRedemptionCount(offerId: string): Promise<void>;
}

export interface RedeemRequest {
  customerId: string;
  businessId: string;
  offerId: string;
}

export interface RedeemOptions {
  codeAttempts?: number;
  generateCode?: () => string;
}

export interface RedeemOutcome {
  redemption: Redemption;
  offer: Offer;
  wallet: Wallet;
  transaction: WalletTransaction | null;
}

export async function redeemOffer(
  helpers: RedemptionHelpers,
  request: RedeemRequest,
  options: RedeemOptions = {},
): Promise<RedeemOutcome> {
  const offer = await helpers.getOffer(request.businessId, request.offerId);
  if (!offer) {
    throw new OfferNotFoundError(request.offerId);
  }

  const wallet = await helpers.getWallet(request.customerId, request.businessId);
  if (!wallet) {
    throw new WalletNotFoundError(`${request.customerId}@${request.businessId}`);
  }

  const now = helpers.now();
  if (!isOfferValid(offer, now)) {
    throw new OfferExpiredOrInactiveError(offer.id);
  }

  if (wallet.pointsBalance < offer.pointsRequired) {
    throw new InsufficientBalanceError(wallet.pointsBalance, offer.pointsRequired);
  }

  let debited: { wallet: Wallet; transaction: WalletTransaction | null } = { wallet, transaction: null };
  if (offer.pointsRequired > 0) {
    debited = await debitWallet(helpers, wallet, {
      points: offer.pointsRequired,
      kind: 'redeem',
      description: `Redemption of ${offer.title}`,
      reference: offer.id,
    });
  }

  const redemption = await issueRedemption(
    helpers,
    {
      id: helpers.generateId(),
      walletId: wallet.id,
      offerId: offer.id,
      pointsUsed: offer.pointsRequired,
      isUsed: false,
      redeemedAt: now,
      usedAt: null,
    },
    options,
  );

  return { redemption, offer, wallet: debited.wallet, transaction: debited.transaction };
}

async function issueRedemption(
  helpers: RedemptionHelpers,
  draft: Omit<Redemption, 'code'>,
  options: RedeemOptions,
): Promise<Redemption> {
  const attempts = Math.max(1, options.codeAttempts ?? DEFAULT_CODE_ATTEMPTS);
  const generate = options.generateCode ?? (() => generateRedemptionCode());

  for (let attempt = 0; attempt < attempts; attempt++) {
    const redemption: Redemption = { ...draft, code: generate() };
    if (await helpers.insertRedemption(redemption)) {
      return redemption;
    }
  }

  throw new RedemptionCodeUnavailableError(attempts);
}

/**
 * Telemetry only: a failing counter is logged and never reaches the caller.
 */
export async function recordRedemptionMetric(
  metrics: AiMetricsCollaborator,
  offer: Pick<Offer, 'id' | 'isAiGenerated'>,
  logger: Logger,
): Promise<void> {
  if (!offer.isAiGenerated) {
    return;
  }

  try {
    await metrics.incrementRedemptionCount(offer.id);
  } catch (error) {
    logger.warn({ err: error, offerId: offer.id }, 'Failed to update AI offer redemption count');
  }
}

export interface RedemptionUsageHelpers {
  now(): Date;
  /** Stamps only a still-unused row and resolves to the stored state afterwards. */
  markRedemptionUsed(redemptionId: string, usedAt: Date): Promise<Redemption>;
}

/**
 * Marks a redemption code as consumed. A redemption that is already used is
 * returned unchanged so `usedAt` keeps its first value.
 */
export async function markRedemptionUsed(
  helpers: RedemptionUsageHelpers,
  redemption: Redemption,
): Promise<Redemption> {
  if (redemption.isUsed) {
    return redemption;
  }

  const now = helpers.now();
  const usedAt = now.getTime() < redemption.redeemedAt.getTime() ? redemption.redeemedAt : now;
  return helpers.markRedemptionUsed(redemption.id, usedAt);
}

export interface RedemptionCoordinatorOptions extends RedeemOptions {
  runInTransaction<T>(work: (helpers: RedemptionHelpers) => Promise<T>): Promise<T>;
  metrics: AiMetricsCollaborator;
  logger: Logger;
}

export interface RedeemReceipt {
  redemptionId: string;
  code: string;
  pointsUsed: number;
  pointsBalance: number;
}

export class RedemptionCoordinator {
  constructor(private readonly options: RedemptionCoordinatorOptions) {}

  async redeem(request: RedeemRequest): Promise<RedeemReceipt> {
    const { runInTransaction, metrics, logger, codeAttempts, generateCode } = this.options;
    const outcome = await runInTransaction((helpers) =>
      redeemOffer(helpers, request, { codeAttempts, generateCode }),
    );

    await recordRedemptionMetric(metrics, outcome.offer, logger);

    logger.info(
      {
        redemptionId: outcome.redemption.id,
        walletId: outcome.wallet.id,
        offerId: outcome.offer.id,
        pointsUsed: outcome.redemption.pointsUsed,
      },
      'Offer redeemed',
    );

    return {
      redemptionId: outcome.redemption.id,
      code: outcome.redemption.code,
      pointsUsed: outcome.redemption.pointsUsed,
      pointsBalance: outcome.wallet.pointsBalance,
    };
  }
}

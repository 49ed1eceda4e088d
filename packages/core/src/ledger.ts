import { InsufficientBalanceError, InvalidAmountError } from './errors.js';
import { selectTier, type TierCatalogHelpers } from './tiers.js';
import type { Business, Tier, TransactionKind, Wallet, WalletTransaction } from './types.js';

export interface ApplyCreditArgs {
  walletId: string;
  points: number;
  oldestActivePoints: Date;
  at: Date;
}

export interface ApplyTierArgs {
  walletId: string;
  tierId: string;
  /** Lifetime total the tier was selected for. */
  lifetimePoints: number;
}

export interface ApplyDebitArgs {
  walletId: string;
  points: number;
  at: Date;
}

export interface LedgerHelpers extends TierCatalogHelpers {
  now(): Date;
  generateId(): string;
  applyCredit(args: ApplyCreditArgs): Promise<Wallet>;
  /**
   * Conditional decrement: must only succeed while the stored balance still
   * covers `points`, and resolve to null otherwise.
   */
  applyDebit(args: ApplyDebitArgs): Promise<Wallet | null>;
  /**
   * Conditional tier write: must only succeed while the stored lifetime total
   * still equals `lifetimePoints`, and resolve to null otherwise.
   */
  applyTier(args: ApplyTierArgs): Promise<Wallet | null>;
  insertTransaction(transaction: WalletTransaction): Promise<void>;
}

export interface LedgerInput {
  points: number;
  kind: TransactionKind;
  description: string;
  reference?: string | null;
}

export interface LedgerResult {
  wallet: Wallet;
  transaction: WalletTransaction;
}

function assertPositiveAmount(points: number): void {
  if (!Number.isSafeInteger(points) || points <= 0) {
    throw new InvalidAmountError(points);
  }
}

export async function creditWallet(helpers: LedgerHelpers, wallet: Wallet, input: LedgerInput): Promise<LedgerResult> {
  assertPositiveAmount(input.points);

  const at = helpers.now();
  const credited = await helpers.applyCredit({
    walletId: wallet.id,
    points: input.points,
    oldestActivePoints: wallet.oldestActivePoints ?? at,
    at,
  });

  const tiers = await helpers.getTiers(wallet.businessId);
  const tier = selectTier(tiers, credited.lifetimePoints);
  let updated = credited;
  if (tier && tier.id !== credited.currentTierId) {
    // Null means a later credit moved the lifetime total on; that credit assigns the tier.
    updated =
      (await helpers.applyTier({ walletId: wallet.id, tierId: tier.id, lifetimePoints: credited.lifetimePoints })) ??
      credited;
  }

  const transaction: WalletTransaction = {
    id: helpers.generateId(),
    walletId: wallet.id,
    points: input.points,
    kind: input.kind,
    description: input.description,
    reference: input.reference ?? null,
    createdAt: at,
  };
  await helpers.insertTransaction(transaction);

  return { wallet: updated, transaction };
}

export async function debitWallet(helpers: LedgerHelpers, wallet: Wallet, input: LedgerInput): Promise<LedgerResult> {
  assertPositiveAmount(input.points);

  if (wallet.pointsBalance < input.points) {
    throw new InsufficientBalanceError(wallet.pointsBalance, input.points);
  }

  const at = helpers.now();
  const updated = await helpers.applyDebit({ walletId: wallet.id, points: input.points, at });
  if (!updated) {
    // Another debit committed between the read and the conditional update.
    throw new InsufficientBalanceError(wallet.pointsBalance, input.points);
  }

  const transaction: WalletTransaction = {
    id: helpers.generateId(),
    walletId: wallet.id,
    points: -input.points,
    kind: input.kind,
    description: input.description,
    reference: input.reference ?? null,
    createdAt: at,
  };
  await helpers.insertTransaction(transaction);

  return { wallet: updated, transaction };
}

export function pointsForPurchase(
  amount: number,
  business: Pick<Business, 'pointsPerCurrency'>,
  tier: Pick<Tier, 'pointMultiplier'> | null,
): number {
  if (!Number.isFinite(amount) || amount <= 0) {
    return 0;
  }
  const multiplier = tier && tier.pointMultiplier > 0 ? tier.pointMultiplier : 1;
  return Math.floor(amount * business.pointsPerCurrency * multiplier);
}

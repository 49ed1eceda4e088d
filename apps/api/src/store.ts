import {
  generateId,
  type AiMetricsCollaborator,
  type ApplyCreditArgs,
  type ApplyDebitArgs,
  type ApplyTierArgs,
  type Business,
  type BusinessCategory,
  type BusinessConfig,
  type Offer,
  type OfferType,
  type Redemption,
  type RedemptionHelpers,
  type RedemptionUsageHelpers,
  type Tier,
  type TransactionKind,
  type Wallet,
  type WalletTransaction,
} from '@pointwell/core';
import type { Pool, PoolClient } from 'pg';
import { rowLock } from './db.js';

export type Queryable = Pool | PoolClient;

type Timestamp = Date | string;
type Numeric = number | string;

export interface BusinessRow {
  business_id: string;
  slug: string;
  name: string;
  email: string;
  category: BusinessCategory;
  point_value: Numeric;
  points_per_currency: Numeric;
  is_active: boolean;
  is_verified: boolean;
}

export interface BusinessConfigRow {
  business_id: string;
  enable_point_expiry: boolean;
  point_expiry_days: Numeric;
  enable_cross_business_redemption: boolean;
  cross_business_conversion_rate: Numeric;
}

export interface TierRow {
  tier_id: string;
  business_id: string;
  name: string;
  description: string | null;
  minimum_points: Numeric;
  point_multiplier: Numeric;
  special_offers: boolean;
  priority_support: boolean;
  exclusive_events: boolean;
  color_code: string;
}

export interface OfferRow {
  offer_id: string;
  business_id: string;
  title: string;
  description: string;
  offer_type: OfferType;
  points_required: Numeric;
  discount_percentage: Numeric | null;
  discount_amount: Numeric | null;
  points_multiplier: Numeric | null;
  free_item_description: string | null;
  is_active: boolean;
  valid_from: Timestamp;
  valid_until: Timestamp | null;
  specific_tier_id: string | null;
  is_ai_generated: boolean;
}

export interface WalletRow {
  wallet_id: string;
  customer_id: string;
  business_id: string;
  points_balance: Numeric;
  lifetime_points: Numeric;
  current_tier_id: string | null;
  oldest_active_points: Timestamp | null;
  last_activity: Timestamp;
  created_at: Timestamp;
}

export interface TransactionRow {
  transaction_id: string;
  wallet_id: string;
  points: Numeric;
  kind: TransactionKind;
  description: string;
  reference: string | null;
  created_at: Timestamp;
}

export interface RedemptionRow {
  redemption_id: string;
  wallet_id: string;
  offer_id: string;
  points_used: Numeric;
  code: string;
  is_used: boolean;
  redeemed_at: Timestamp;
  used_at: Timestamp | null;
}

function optionalNumber(value: Numeric | null): number | null {
  return value === null ? null : Number(value);
}

function optionalDate(value: Timestamp | null): Date | null {
  return value === null ? null : new Date(value);
}

export function toBusiness(row: BusinessRow): Business {
  return {
    id: row.business_id,
    slug: row.slug,
    name: row.name,
    email: row.email,
    category: row.category,
    pointValue: Number(row.point_value),
    pointsPerCurrency: Number(row.points_per_currency),
    isActive: row.is_active,
    isVerified: row.is_verified,
  };
}

export function toBusinessConfig(row: BusinessConfigRow): BusinessConfig {
  return {
    businessId: row.business_id,
    enablePointExpiry: row.enable_point_expiry,
    pointExpiryDays: Number(row.point_expiry_days),
    enableCrossBusinessRedemption: row.enable_cross_business_redemption,
    crossBusinessConversionRate: Number(row.cross_business_conversion_rate),
  };
}

export function toTier(row: TierRow): Tier {
  return {
    id: row.tier_id,
    businessId: row.business_id,
    name: row.name,
    description: row.description,
    minimumPoints: Number(row.minimum_points),
    pointMultiplier: Number(row.point_multiplier),
    specialOffers: row.special_offers,
    prioritySupport: row.priority_support,
    exclusiveEvents: row.exclusive_events,
    colorCode: row.color_code,
  };
}

export function toOffer(row: OfferRow): Offer {
  return {
    id: row.offer_id,
    businessId: row.business_id,
    title: row.title,
    description: row.description,
    type: row.offer_type,
    pointsRequired: Number(row.points_required),
    discountPercentage: optionalNumber(row.discount_percentage),
    discountAmount: optionalNumber(row.discount_amount),
    pointsMultiplier: optionalNumber(row.points_multiplier),
    freeItemDescription: row.free_item_description,
    isActive: row.is_active,
    validFrom: new Date(row.valid_from),
    validUntil: optionalDate(row.valid_until),
    specificTierId: row.specific_tier_id,
    isAiGenerated: row.is_ai_generated,
  };
}

export function toWallet(row: WalletRow): Wallet {
  return {
    id: row.wallet_id,
    customerId: row.customer_id,
    businessId: row.business_id,
    pointsBalance: Number(row.points_balance),
    lifetimePoints: Number(row.lifetime_points),
    currentTierId: row.current_tier_id,
    oldestActivePoints: optionalDate(row.oldest_active_points),
    lastActivity: new Date(row.last_activity),
    createdAt: new Date(row.created_at),
  };
}

export function toTransaction(row: TransactionRow): WalletTransaction {
  return {
    id: row.transaction_id,
    walletId: row.wallet_id,
    points: Number(row.points),
    kind: row.kind,
    description: row.description,
    reference: row.reference,
    createdAt: new Date(row.created_at),
  };
}

export function toRedemption(row: RedemptionRow): Redemption {
  return {
    id: row.redemption_id,
    walletId: row.wallet_id,
    offerId: row.offer_id,
    pointsUsed: Number(row.points_used),
    code: row.code,
    isUsed: row.is_used,
    redeemedAt: new Date(row.redeemed_at),
    usedAt: optionalDate(row.used_at),
  };
}

export async function findWalletById(db: Queryable, walletId: string, options: { lock?: boolean } = {}) {
  const result = await db.query<WalletRow>(
    `SELECT * FROM wallets WHERE wallet_id = $1${options.lock ? rowLock() : ''}`,
    [walletId],
  );
  return result.rowCount === 0 ? null : toWallet(result.rows[0]);
}

export async function findRedemptionById(db: Queryable, redemptionId: string, options: { lock?: boolean } = {}) {
  const result = await db.query<RedemptionRow>(
    `SELECT * FROM offer_redemptions WHERE redemption_id = $1${options.lock ? rowLock() : ''}`,
    [redemptionId],
  );
  return result.rowCount === 0 ? null : toRedemption(result.rows[0]);
}

export async function listTiers(db: Queryable, businessId: string): Promise<Tier[]> {
  const result = await db.query<TierRow>(
    `SELECT * FROM loyalty_tiers WHERE business_id = $1 ORDER BY minimum_points`,
    [businessId],
  );
  return result.rows.map(toTier);
}

export type LedgerStore = RedemptionHelpers & RedemptionUsageHelpers;

/**
 * Postgres-backed helpers for one unit of work. Every method runs on the
 * client that owns the surrounding transaction.
 */
export function createLedgerHelpers(client: PoolClient, now: () => Date): LedgerStore {
  return {
    now,
    generateId,

    getTiers: (businessId) => listTiers(client, businessId),

    async getOffer(businessId, offerId) {
      const result = await client.query<OfferRow>(
        `SELECT * FROM offers WHERE business_id = $1 AND offer_id = $2`,
        [businessId, offerId],
      );
      return result.rowCount === 0 ? null : toOffer(result.rows[0]);
    },

    async getWallet(customerId, businessId) {
      const result = await client.query<WalletRow>(
        `SELECT * FROM wallets WHERE customer_id = $1 AND business_id = $2${rowLock()}`,
        [customerId, businessId],
      );
      return result.rowCount === 0 ? null : toWallet(result.rows[0]);
    },

    async applyCredit(args: ApplyCreditArgs) {
      const result = await client.query<WalletRow>(
        `UPDATE wallets
            SET points_balance = points_balance + $2,
                lifetime_points = lifetime_points + $2,
                oldest_active_points = $3,
                last_activity = $4
          WHERE wallet_id = $1
          RETURNING *`,
        [args.walletId, args.points, args.oldestActivePoints.toISOString(), args.at.toISOString()],
      );
      if (result.rowCount === 0) {
        throw new Error(`Wallet ${args.walletId} disappeared during credit`);
      }
      return toWallet(result.rows[0]);
    },

    async applyDebit(args: ApplyDebitArgs) {
      const result = await client.query<WalletRow>(
        `UPDATE wallets
            SET points_balance = points_balance - $2,
                last_activity = $3
          WHERE wallet_id = $1 AND points_balance >= $2
          RETURNING *`,
        [args.walletId, args.points, args.at.toISOString()],
      );
      return result.rowCount === 0 ? null : toWallet(result.rows[0]);
    },

    async applyTier(args: ApplyTierArgs) {
      const result = await client.query<WalletRow>(
        `UPDATE wallets
            SET current_tier_id = $2
          WHERE wallet_id = $1 AND lifetime_points = $3
          RETURNING *`,
        [args.walletId, args.tierId, args.lifetimePoints],
      );
      return result.rowCount === 0 ? null : toWallet(result.rows[0]);
    },

    async insertTransaction(transaction) {
      await client.query(
        `INSERT INTO wallet_transactions (transaction_id, wallet_id, points, kind, description, reference, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          transaction.id,
          transaction.walletId,
          transaction.points,
          transaction.kind,
          transaction.description,
          transaction.reference,
          transaction.createdAt.toISOString(),
        ],
      );
    },

    async insertRedemption(redemption) {
      // A failed INSERT would abort the surrounding transaction, so a taken code is skipped instead.
      const result = await client.query(
        `INSERT INTO offer_redemptions (redemption_id, wallet_id, offer_id, points_used, code, is_used, redeemed_at, used_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         ON CONFLICT (code) DO NOTHING
         RETURNING redemption_id`,
        [
          redemption.id,
          redemption.walletId,
          redemption.offerId,
          redemption.pointsUsed,
          redemption.code,
          redemption.isUsed,
          redemption.redeemedAt.toISOString(),
          redemption.usedAt ? redemption.usedAt.toISOString() : null,
        ],
      );
      return result.rows.length > 0;
    },

    async markRedemptionUsed(redemptionId, usedAt) {
      await client.query(
        `UPDATE offer_redemptions
            SET is_used = TRUE,
                used_at = $2
          WHERE redemption_id = $1 AND is_used = FALSE`,
        [redemptionId, usedAt.toISOString()],
      );
      const stored = await findRedemptionById(client, redemptionId);
      if (!stored) {
        throw new Error(`Redemption ${redemptionId} disappeared while marking it used`);
      }
      return stored;
    },
  };
}

/** Counts redemptions of AI-generated offers on the pool, outside the ledger transaction. */
export function createAiMetrics(db: Queryable): AiMetricsCollaborator {
  return {
    async incrementRedemptionCount(offerId) {
      await db.query(
        `UPDATE ai_offer_metrics
            SET redemptions = redemptions + 1,
                updated_at = NOW()
          WHERE offer_id = $1`,
        [offerId],
      );
    },
  };
}

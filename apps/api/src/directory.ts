import {
  WalletNotFoundError,
  generateId,
  type Business,
  type BusinessCategory,
  type BusinessConfig,
  type Wallet,
} from '@pointwell/core';
import type { PoolClient } from 'pg';
import { DEFAULT_POINT_VALUE, DEFAULT_POINTS_PER_CURRENCY } from './config.js';
import {
  findWalletById,
  toBusiness,
  toBusinessConfig,
  type BusinessConfigRow,
  type BusinessRow,
  type Queryable,
} from './store.js';
import { NotFoundError, nextFreeSlug, slugify } from './utils.js';

/** Deactivated businesses do not resolve. */
export async function findBusiness(db: Queryable, idOrSlug: string): Promise<Business | null> {
  const result = await db.query<BusinessRow>(
    `SELECT * FROM businesses WHERE (business_id = $1 OR slug = $1) AND is_active = TRUE`,
    [idOrSlug],
  );
  return result.rowCount === 0 ? null : toBusiness(result.rows[0]);
}

export async function requireBusiness(db: Queryable, idOrSlug: string): Promise<Business> {
  const business = await findBusiness(db, idOrSlug);
  if (!business) {
    throw new NotFoundError('Business');
  }
  return business;
}

/**
 * Loads a wallet by id. Wallets of a deactivated business are reported
 * missing, so no ledger operation reaches them.
 */
export async function requireOpenWallet(
  db: Queryable,
  walletId: string,
  options: { lock?: boolean } = {},
): Promise<Wallet> {
  const wallet = await findWalletById(db, walletId, options);
  if (!wallet || !(await findBusiness(db, wallet.businessId))) {
    throw new WalletNotFoundError(walletId);
  }
  return wallet;
}

export async function getBusinessConfig(db: Queryable, businessId: string): Promise<BusinessConfig> {
  const result = await db.query<BusinessConfigRow>(`SELECT * FROM business_configs WHERE business_id = $1`, [
    businessId,
  ]);
  if (result.rowCount === 0) {
    throw new NotFoundError('Business config');
  }
  return toBusinessConfig(result.rows[0]);
}

export interface NewBusiness {
  name: string;
  email: string;
  category: BusinessCategory;
  pointValue?: number;
  pointsPerCurrency?: number;
}

export async function createBusiness(client: PoolClient, input: NewBusiness): Promise<Business> {
  const base = slugify(input.name);
  const existing = await client.query<{ slug: string }>(
    `SELECT slug FROM businesses WHERE slug = $1 OR slug LIKE $2`,
    [base, `${base}-%`],
  );
  const slug = nextFreeSlug(base, new Set(existing.rows.map((row) => row.slug)));
  const businessId = generateId();

  const inserted = await client.query<BusinessRow>(
    `INSERT INTO businesses (business_id, slug, name, email, category, point_value, points_per_currency)
     VALUES ($1, $2, $3, $4, $5, $6, $7)
     RETURNING *`,
    [
      businessId,
      slug,
      input.name,
      input.email,
      input.category,
      input.pointValue ?? DEFAULT_POINT_VALUE,
      input.pointsPerCurrency ?? DEFAULT_POINTS_PER_CURRENCY,
    ],
  );

  await client.query(`INSERT INTO business_configs (business_id) VALUES ($1)`, [businessId]);

  return toBusiness(inserted.rows[0]);
}

export async function updateBusinessConfig(
  client: PoolClient,
  businessId: string,
  patch: Partial<Omit<BusinessConfig, 'businessId'>>,
): Promise<BusinessConfig> {
  const current = await getBusinessConfig(client, businessId);
  const next: BusinessConfig = {
    businessId,
    enablePointExpiry: patch.enablePointExpiry ?? current.enablePointExpiry,
    pointExpiryDays: patch.pointExpiryDays ?? current.pointExpiryDays,
    enableCrossBusinessRedemption: patch.enableCrossBusinessRedemption ?? current.enableCrossBusinessRedemption,
    crossBusinessConversionRate: patch.crossBusinessConversionRate ?? current.crossBusinessConversionRate,
  };

  const result = await client.query<BusinessConfigRow>(
    `UPDATE business_configs
        SET enable_point_expiry = $2,
            point_expiry_days = $3,
            enable_cross_business_redemption = $4,
            cross_business_conversion_rate = $5,
            updated_at = NOW()
      WHERE business_id = $1
      RETURNING *`,
    [
      businessId,
      next.enablePointExpiry,
      next.pointExpiryDays,
      next.enableCrossBusinessRedemption,
      next.crossBusinessConversionRate,
    ],
  );
  return toBusinessConfig(result.rows[0]);
}

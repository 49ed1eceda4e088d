import { Pool, PoolClient, type PoolConfig } from 'pg';
import type { PrincipalRole } from '@pointwell/core';
import { CONFIG } from './config.js';
import { hashApiKey } from './credentials.js';

const needsSSL = CONFIG.databaseUrl.includes('sslmode=require');

let poolInstance: Pool | null = null;

function createPool(config?: PoolConfig): Pool {
  if (config) {
    return new Pool(config);
  }

  return new Pool({
    connectionString: CONFIG.databaseUrl,
    ssl: needsSSL ? { rejectUnauthorized: false } : undefined,
  });
}

export function getPool(): Pool {
  if (!poolInstance) {
    poolInstance = createPool();
  }
  return poolInstance;
}

export function setPoolForTests(pool: Pool): void {
  poolInstance = pool;
}

export async function closePool(): Promise<void> {
  if (poolInstance) {
    await poolInstance.end();
    poolInstance = null;
  }
}

export type TxFn<T> = (client: PoolClient) => Promise<T>;

export async function withTransaction<T>(fn: TxFn<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/** Row lock suffix for reads that precede a wallet mutation; pg-mem has no row locks. */
export function rowLock(): string {
  return CONFIG.env === 'test' ? '' : ' FOR UPDATE';
}

export async function initDb(): Promise<void> {
  const pool = getPool();

  await pool.query(`
    CREATE TABLE IF NOT EXISTS businesses (
      business_id TEXT PRIMARY KEY,
      slug TEXT NOT NULL UNIQUE,
      name TEXT NOT NULL,
      email TEXT NOT NULL,
      category TEXT NOT NULL DEFAULT 'other',
      point_value NUMERIC(10, 4) NOT NULL DEFAULT 0.01,
      points_per_currency NUMERIC(10, 2) NOT NULL DEFAULT 1,
      is_active BOOLEAN NOT NULL DEFAULT TRUE,
      is_verified BOOLEAN NOT NULL DEFAULT FALSE,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS business_configs (
      business_id TEXT PRIMARY KEY REFERENCES businesses(business_id) ON DELETE CASCADE,
      enable_point_expiry BOOLEAN NOT NULL DEFAULT FALSE,
      point_expiry_days INTEGER NOT NULL DEFAULT 365,
      enable_cross_business_redemption BOOLEAN NOT NULL DEFAULT TRUE,
      cross_business_conversion_rate NUMERIC(5, 2) NOT NULL DEFAULT 1.00,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS loyalty_tiers (
      tier_id TEXT PRIMARY KEY,
      business_id TEXT NOT NULL REFERENCES businesses(business_id) ON DELETE CASCADE,
      name TEXT NOT NULL,
      description TEXT,
      minimum_points INTEGER NOT NULL CHECK (minimum_points >= 0),
      point_multiplier NUMERIC(4, 2) NOT NULL DEFAULT 1.00,
      special_offers BOOLEAN NOT NULL DEFAULT FALSE,
      priority_support BOOLEAN NOT NULL DEFAULT FALSE,
      exclusive_events BOOLEAN NOT NULL DEFAULT FALSE,
      color_code TEXT NOT NULL DEFAULT '#000000',
      UNIQUE (business_id, minimum_points)
    );
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS offers (
      offer_id TEXT PRIMARY KEY,
      business_id TEXT NOT NULL REFERENCES businesses(business_id) ON DELETE CASCADE,
      title TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      offer_type TEXT NOT NULL,
      points_required INTEGER NOT NULL DEFAULT 0 CHECK (points_required >= 0),
      discount_percentage INTEGER,
      discount_amount NUMERIC(10, 2),
      points_multiplier NUMERIC(4, 2),
      free_item_description TEXT,
      is_active BOOLEAN NOT NULL DEFAULT TRUE,
      valid_from TIMESTAMPTZ NOT NULL,
      valid_until TIMESTAMPTZ,
      specific_tier_id TEXT,
      is_ai_generated BOOLEAN NOT NULL DEFAULT FALSE,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS wallets (
      wallet_id TEXT PRIMARY KEY,
      customer_id TEXT NOT NULL,
      business_id TEXT NOT NULL REFERENCES businesses(business_id) ON DELETE CASCADE,
      points_balance INTEGER NOT NULL DEFAULT 0 CHECK (points_balance >= 0),
      lifetime_points INTEGER NOT NULL DEFAULT 0 CHECK (lifetime_points >= 0),
      current_tier_id TEXT,
      oldest_active_points TIMESTAMPTZ,
      last_activity TIMESTAMPTZ NOT NULL,
      created_at TIMESTAMPTZ NOT NULL,
      UNIQUE (customer_id, business_id)
    );
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS wallet_transactions (
      transaction_id TEXT PRIMARY KEY,
      wallet_id TEXT NOT NULL REFERENCES wallets(wallet_id) ON DELETE CASCADE,
      points INTEGER NOT NULL,
      kind TEXT NOT NULL,
      description TEXT NOT NULL,
      reference TEXT,
      created_at TIMESTAMPTZ NOT NULL
    );
  `);

  await pool.query(`
    CREATE INDEX IF NOT EXISTS idx_wallet_transactions_wallet
      ON wallet_transactions(wallet_id, created_at);
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS offer_redemptions (
      redemption_id TEXT PRIMARY KEY,
      wallet_id TEXT NOT NULL REFERENCES wallets(wallet_id) ON DELETE CASCADE,
      offer_id TEXT NOT NULL REFERENCES offers(offer_id) ON DELETE CASCADE,
      points_used INTEGER NOT NULL,
      code TEXT NOT NULL UNIQUE,
      is_used BOOLEAN NOT NULL DEFAULT FALSE,
      redeemed_at TIMESTAMPTZ NOT NULL,
      used_at TIMESTAMPTZ
    );
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS ai_offer_metrics (
      offer_id TEXT PRIMARY KEY REFERENCES offers(offer_id) ON DELETE CASCADE,
      impressions INTEGER NOT NULL DEFAULT 0,
      clicks INTEGER NOT NULL DEFAULT 0,
      redemptions INTEGER NOT NULL DEFAULT 0,
      context_factors JSONB,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS churn_predictions (
      prediction_id TEXT PRIMARY KEY,
      wallet_id TEXT NOT NULL REFERENCES wallets(wallet_id) ON DELETE CASCADE,
      churn_risk_score NUMERIC(4, 2) NOT NULL,
      engagement_score NUMERIC(4, 2) NOT NULL,
      days_since_last_activity INTEGER NOT NULL,
      predicted_at TIMESTAMPTZ NOT NULL
    );
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS customer_segments (
      segment_id TEXT PRIMARY KEY,
      business_id TEXT NOT NULL REFERENCES businesses(business_id) ON DELETE CASCADE,
      name TEXT NOT NULL,
      description TEXT NOT NULL,
      segment_type TEXT NOT NULL,
      criteria JSONB NOT NULL,
      customer_count INTEGER NOT NULL DEFAULT 0,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      UNIQUE (business_id, name)
    );
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS insight_jobs (
      job_id TEXT PRIMARY KEY,
      business_id TEXT NOT NULL REFERENCES businesses(business_id) ON DELETE CASCADE,
      job_type TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'pending',
      attempts INTEGER NOT NULL DEFAULT 0,
      last_error TEXT,
      result_summary JSONB,
      completed_at TIMESTAMPTZ,
      available_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await pool.query(`
    CREATE INDEX IF NOT EXISTS idx_insight_jobs_status_available
      ON insight_jobs(status, available_at);
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS api_credentials (
      principal_id TEXT PRIMARY KEY,
      role TEXT NOT NULL,
      business_id TEXT,
      customer_id TEXT,
      api_key_hash BYTEA NOT NULL,
      salt BYTEA NOT NULL,
      active BOOLEAN DEFAULT TRUE,
      created_at TIMESTAMPTZ DEFAULT NOW()
    );
  `);

  if (CONFIG.bootstrapPrincipalId && CONFIG.bootstrapApiKey) {
    await upsertCredential({
      principalId: CONFIG.bootstrapPrincipalId,
      role: 'platform_admin',
      apiKey: CONFIG.bootstrapApiKey,
    });
  }
}

// Hex text input is accepted by Postgres and pg-mem alike.
function byteaLiteral(value: Buffer): string {
  return '\\x' + value.toString('hex');
}

export interface CredentialInput {
  principalId: string;
  role: PrincipalRole;
  apiKey: string;
  businessId?: string;
  customerId?: string;
}

export async function upsertCredential(input: CredentialInput): Promise<void> {
  const { hash, salt } = await hashApiKey(input.apiKey);

  await getPool().query(
    `INSERT INTO api_credentials (principal_id, role, business_id, customer_id, api_key_hash, salt, active)
       VALUES ($1, $2, $3, $4, $5, $6, TRUE)
       ON CONFLICT (principal_id)
       DO UPDATE SET role = EXCLUDED.role,
                     business_id = EXCLUDED.business_id,
                     customer_id = EXCLUDED.customer_id,
                     api_key_hash = EXCLUDED.api_key_hash,
                     salt = EXCLUDED.salt,
                     active = TRUE,
                     created_at = NOW()`,
    [
      input.principalId,
      input.role,
      input.businessId ?? null,
      input.customerId ?? null,
      byteaLiteral(hash),
      byteaLiteral(salt),
    ],
  );
}

import {
  INSIGHT_JOB_TYPES,
  countSegmentMembers,
  generateId,
  ruleBasedInsights,
  type InsightEngine,
  type InsightJobType,
  type SegmentMember,
} from '@pointwell/core';
import type { PoolClient } from 'pg';
import { CONFIG } from './config.js';
import { withTransaction } from './db.js';

const HIGH_RISK_THRESHOLD = 0.7;
const MAX_ERROR_LENGTH = 500;

interface InsightJobRow {
  job_id: string;
  business_id: string;
  job_type: string;
  attempts: number | string;
}

interface WalletActivityRow {
  wallet_id: string;
  points_balance: number | string;
  lifetime_points: number | string;
  last_activity: Date | string;
  created_at: Date | string;
}

interface LatestRiskRow {
  wallet_id: string;
  churn_risk_score: number | string;
}

export type JobSummary = Record<string, number>;

type JobRunner = (client: PoolClient, businessId: string, engine: InsightEngine, now: Date) => Promise<JobSummary>;

const JOB_RUNNERS: Record<InsightJobType, JobRunner> = {
  churn_scan: runChurnScan,
  segments: runSegments,
};

export interface ProcessorOptions {
  engine?: InsightEngine;
  now?: () => Date;
}

function isJobType(value: string): value is InsightJobType {
  return INSIGHT_JOB_TYPES.some((type) => type === value);
}

/**
 * Claims the oldest due job and runs it in its own transaction. A failed run is
 * recorded in a separate transaction so the job's bookkeeping survives the
 * rollback of its work.
 */
export async function processNextJob(options: ProcessorOptions = {}): Promise<boolean> {
  const engine = options.engine ?? ruleBasedInsights;
  const now = options.now ? options.now() : new Date();

  const job = await claimNextJob(now);
  if (!job) {
    return false;
  }

  const attempts = Number(job.attempts) + 1;
  const jobType = job.job_type;
  if (!isJobType(jobType)) {
    await withTransaction((client) => failJob(client, job.job_id, `Unknown insight job type: ${jobType}`, now));
    return true;
  }

  try {
    await withTransaction(async (client) => {
      const summary = await JOB_RUNNERS[jobType](client, job.business_id, engine, now);
      await client.query(
        `UPDATE insight_jobs
            SET status = 'completed',
                completed_at = $2,
                result_summary = $3
          WHERE job_id = $1`,
        [job.job_id, now.toISOString(), summary],
      );
    });
  } catch (error) {
    const errMsg = error instanceof Error ? error.message : String(error);
    console.warn(`[insights] ${jobType} job ${job.job_id} failed on attempt ${attempts}: ${errMsg}`);
    await withTransaction((client) => rescheduleOrFail(client, job.job_id, attempts, errMsg, now));
  }

  return true;
}

async function claimNextJob(now: Date): Promise<InsightJobRow | null> {
  return withTransaction(async (client) => {
    const jobRes = await client.query<InsightJobRow>(createJobSelectSql(), [now.toISOString()]);
    if (jobRes.rowCount === 0) {
      return null;
    }

    const job = jobRes.rows[0];
    await client.query(
      `UPDATE insight_jobs
          SET status = 'processing',
              attempts = attempts + 1,
              last_error = NULL
        WHERE job_id = $1`,
      [job.job_id],
    );
    return job;
  });
}

function createJobSelectSql(): string {
  const base = `SELECT job_id, business_id, job_type, attempts
         FROM insight_jobs
        WHERE status = 'pending' AND available_at <= $1::timestamptz
        ORDER BY available_at, created_at
        LIMIT 1`;

  if (CONFIG.env === 'test') {
    return base;
  }

  return `${base} FOR UPDATE SKIP LOCKED`;
}

async function loadWallets(client: PoolClient, businessId: string): Promise<WalletActivityRow[]> {
  const res = await client.query<WalletActivityRow>(
    `SELECT wallet_id, points_balance, lifetime_points, last_activity, created_at
       FROM wallets
      WHERE business_id = $1`,
    [businessId],
  );
  return res.rows;
}

async function runChurnScan(
  client: PoolClient,
  businessId: string,
  engine: InsightEngine,
  now: Date,
): Promise<JobSummary> {
  const wallets = await loadWallets(client, businessId);
  const scores = wallets.map((row) => ({
    walletId: row.wallet_id,
    score: engine.scoreChurn(
      { pointsBalance: Number(row.points_balance), lastActivity: new Date(row.last_activity) },
      now,
    ),
  }));

  for (const { walletId, score } of scores) {
    await client.query(
      `INSERT INTO churn_predictions (
         prediction_id, wallet_id, churn_risk_score, engagement_score, days_since_last_activity, predicted_at
       ) VALUES ($1, $2, $3, $4, $5, $6)`,
      [
        generateId(),
        walletId,
        score.churnRiskScore,
        score.engagementScore,
        score.daysSinceLastActivity,
        now.toISOString(),
      ],
    );
  }

  return {
    wallets_scored: scores.length,
    high_risk: scores.filter(({ score }) => score.churnRiskScore >= HIGH_RISK_THRESHOLD).length,
  };
}

async function loadSegmentMembers(client: PoolClient, businessId: string): Promise<SegmentMember[]> {
  const wallets = await loadWallets(client, businessId);
  const risks = await client.query<LatestRiskRow>(
    `SELECT p.wallet_id, p.churn_risk_score
       FROM churn_predictions p
       JOIN wallets w ON w.wallet_id = p.wallet_id
      WHERE w.business_id = $1
      ORDER BY p.predicted_at`,
    [businessId],
  );

  // Ordered by time, so the last write per wallet is its latest prediction.
  const latestRisk = new Map<string, number>();
  for (const row of risks.rows) {
    latestRisk.set(row.wallet_id, Number(row.churn_risk_score));
  }

  return wallets.map((row) => ({
    lifetimePoints: Number(row.lifetime_points),
    createdAt: new Date(row.created_at),
    lastActivity: new Date(row.last_activity),
    churnRiskScore: latestRisk.get(row.wallet_id) ?? null,
  }));
}

async function runSegments(
  client: PoolClient,
  businessId: string,
  engine: InsightEngine,
  now: Date,
): Promise<JobSummary> {
  const members = await loadSegmentMembers(client, businessId);
  const definitions = engine.segments();

  for (const definition of definitions) {
    await client.query(
      `INSERT INTO customer_segments (
         segment_id, business_id, name, description, segment_type, criteria, customer_count, updated_at
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (business_id, name)
       DO UPDATE SET description = EXCLUDED.description,
                     segment_type = EXCLUDED.segment_type,
                     criteria = EXCLUDED.criteria,
                     customer_count = EXCLUDED.customer_count,
                     updated_at = EXCLUDED.updated_at`,
      [
        generateId(),
        businessId,
        definition.name,
        definition.description,
        definition.segmentType,
        definition.criteria,
        countSegmentMembers(definition, members, now),
        now.toISOString(),
      ],
    );
  }

  return { segments: definitions.length, customers: members.length };
}

async function rescheduleOrFail(
  client: PoolClient,
  jobId: string,
  attempts: number,
  error: string,
  now: Date,
): Promise<void> {
  if (attempts >= CONFIG.maxAttempts) {
    await failJob(client, jobId, error, now);
    return;
  }

  const delayMs = Math.min(60000, attempts * 5000);
  await client.query(
    `UPDATE insight_jobs
        SET status = 'pending',
            available_at = $2,
            result_summary = NULL,
            last_error = $3
      WHERE job_id = $1`,
    [jobId, new Date(now.getTime() + delayMs).toISOString(), truncateError(error)],
  );
}

async function failJob(client: PoolClient, jobId: string, error: string, now: Date): Promise<void> {
  await client.query(
    `UPDATE insight_jobs
        SET status = 'failed',
            completed_at = $2,
            result_summary = NULL,
            last_error = $3
      WHERE job_id = $1`,
    [jobId, now.toISOString(), truncateError(error)],
  );
}

function truncateError(error: string): string {
  return error.length > MAX_ERROR_LENGTH ? error.slice(0, MAX_ERROR_LENGTH) : error;
}

import {
  authorize,
  baselineTier,
  creditWallet,
  customerOwnership,
  debitWallet,
  generateId,
  pointsForPurchase,
  walletOwnership,
  type Principal,
  type ResourceAction,
  type Wallet,
} from '@pointwell/core';
import type { FastifyInstance } from 'fastify';
import type { PoolClient } from 'pg';
import { ensureAllowed, sendFailure, type RouteContext } from '../context.js';
import { withTransaction } from '../db.js';
import { requireBusiness, requireOpenWallet } from '../directory.js';
import { transactionJson, walletJson } from '../serializers.js';
import {
  createLedgerHelpers,
  listTiers,
  toTransaction,
  toWallet,
  type Queryable,
  type TransactionRow,
  type WalletRow,
} from '../store.js';
import { NotFoundError } from '../utils.js';
import { creditSchema, debitSchema, earnSchema, enrolSchema, historyQuerySchema } from '../validators.js';

interface WalletParams {
  walletId: string;
}

interface ChurnRow {
  churn_risk_score: number | string;
  engagement_score: number | string;
  days_since_last_activity: number | string;
  predicted_at: Date | string;
}

async function loadWallet(
  db: Queryable,
  principal: Principal,
  walletId: string,
  action: ResourceAction,
  options: { lock?: boolean } = {},
): Promise<Wallet> {
  const wallet = await requireOpenWallet(db, walletId, options);
  ensureAllowed(principal, walletOwnership(wallet), action);
  return wallet;
}

async function enrol(client: PoolClient, customerId: string, businessId: string, now: Date) {
  const existing = await client.query<WalletRow>(
    `SELECT * FROM wallets WHERE customer_id = $1 AND business_id = $2`,
    [customerId, businessId],
  );
  if ((existing.rowCount ?? 0) > 0) {
    return { wallet: toWallet(existing.rows[0]), created: false };
  }

  const baseline = baselineTier(await listTiers(client, businessId));
  const inserted = await client.query<WalletRow>(
    `INSERT INTO wallets (wallet_id, customer_id, business_id, current_tier_id, last_activity, created_at)
     VALUES ($1, $2, $3, $4, $5, $5)
     ON CONFLICT (customer_id, business_id) DO NOTHING
     RETURNING *`,
    [generateId(), customerId, businessId, baseline?.id ?? null, now.toISOString()],
  );
  if ((inserted.rowCount ?? 0) > 0) {
    return { wallet: toWallet(inserted.rows[0]), created: true };
  }

  // A concurrent enrolment won the insert.
  const raced = await client.query<WalletRow>(
    `SELECT * FROM wallets WHERE customer_id = $1 AND business_id = $2`,
    [customerId, businessId],
  );
  return { wallet: toWallet(raced.rows[0]), created: false };
}

export async function registerWalletRoutes(app: FastifyInstance, context: RouteContext) {
  app.post<{ Params: { business: string } }>('/v1/businesses/:business/wallets', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    const parsed = enrolSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(422).send({ error: 'Invalid enrolment payload', details: parsed.error.flatten() });
      return;
    }

    const customerId = parsed.data.customer_id;

    try {
      const outcome = await withTransaction(async (client) => {
        const business = await requireBusiness(client, request.params.business);
        ensureAllowed(principal, customerOwnership(customerId, business.id), 'read');
        return enrol(client, customerId, business.id, context.now());
      });

      if (outcome.created) {
        request.log.info({ walletId: outcome.wallet.id, businessId: outcome.wallet.businessId }, 'Wallet enrolled');
      }
      reply.code(outcome.created ? 201 : 200).send(walletJson(outcome.wallet));
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to enrol customer');
    }
  });

  app.get<{ Params: { customerId: string } }>('/v1/customers/:customerId/wallets', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    try {
      const result = await app.db.query<WalletRow>(
        `SELECT w.*
           FROM wallets w
           JOIN businesses b ON b.business_id = w.business_id
          WHERE w.customer_id = $1 AND b.is_active = TRUE
          ORDER BY w.created_at`,
        [request.params.customerId],
      );
      const wallets = result.rows
        .map(toWallet)
        .filter((wallet) => authorize(principal, walletOwnership(wallet), 'read'));

      reply.send({ wallets: wallets.map(walletJson) });
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to list wallets');
    }
  });

  app.get<{ Params: WalletParams }>('/v1/wallets/:walletId', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    try {
      const wallet = await loadWallet(app.db, principal, request.params.walletId, 'read');
      reply.send(walletJson(wallet));
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to fetch wallet');
    }
  });

  app.post<{ Params: WalletParams }>('/v1/wallets/:walletId/credit', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    const parsed = creditSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(422).send({ error: 'Invalid credit payload', details: parsed.error.flatten() });
      return;
    }

    const input = parsed.data;

    try {
      const result = await withTransaction(async (client) => {
        const wallet = await loadWallet(client, principal, request.params.walletId, 'credit', { lock: true });
        return creditWallet(createLedgerHelpers(client, context.now), wallet, input);
      });

      reply.code(201).send({ wallet: walletJson(result.wallet), transaction: transactionJson(result.transaction) });
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to credit wallet');
    }
  });

  app.post<{ Params: WalletParams }>('/v1/wallets/:walletId/debit', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    const parsed = debitSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(422).send({ error: 'Invalid debit payload', details: parsed.error.flatten() });
      return;
    }

    const input = parsed.data;

    try {
      const result = await withTransaction(async (client) => {
        const wallet = await loadWallet(client, principal, request.params.walletId, 'debit', { lock: true });
        return debitWallet(createLedgerHelpers(client, context.now), wallet, input);
      });

      reply.code(201).send({ wallet: walletJson(result.wallet), transaction: transactionJson(result.transaction) });
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to debit wallet');
    }
  });

  app.post<{ Params: WalletParams }>('/v1/wallets/:walletId/earn', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    const parsed = earnSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(422).send({ error: 'Invalid purchase payload', details: parsed.error.flatten() });
      return;
    }

    const { amount, description, reference } = parsed.data;

    try {
      const outcome = await withTransaction(async (client) => {
        const wallet = await loadWallet(client, principal, request.params.walletId, 'credit', { lock: true });
        const business = await requireBusiness(client, wallet.businessId);
        const tiers = await listTiers(client, wallet.businessId);
        const tier = tiers.find((candidate) => candidate.id === wallet.currentTierId) ?? null;
        const earned = pointsForPurchase(amount, business, tier);

        if (earned === 0) {
          return { earned, wallet, transaction: null };
        }

        const result = await creditWallet(createLedgerHelpers(client, context.now), wallet, {
          points: earned,
          kind: 'earn',
          description: description ?? `Points earned on a purchase of ${amount.toFixed(2)}`,
          reference,
        });
        return { earned, wallet: result.wallet, transaction: result.transaction };
      });

      reply.code(outcome.transaction ? 201 : 200).send({
        points_earned: outcome.earned,
        wallet: walletJson(outcome.wallet),
        transaction: outcome.transaction ? transactionJson(outcome.transaction) : null,
      });
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to record purchase');
    }
  });

  app.get<{ Params: WalletParams }>('/v1/wallets/:walletId/transactions', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    const query = historyQuerySchema.safeParse(request.query);
    if (!query.success) {
      reply.code(400).send({ error: 'Invalid query parameters' });
      return;
    }

    try {
      const wallet = await loadWallet(app.db, principal, request.params.walletId, 'read');
      const result = await app.db.query<TransactionRow>(
        `SELECT * FROM wallet_transactions
          WHERE wallet_id = $1
          ORDER BY created_at DESC
          LIMIT $2`,
        [wallet.id, query.data.limit],
      );

      reply.send({ transactions: result.rows.map(toTransaction).map(transactionJson) });
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to fetch transactions');
    }
  });

  app.get<{ Params: WalletParams }>('/v1/wallets/:walletId/churn', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    try {
      const wallet = await loadWallet(app.db, principal, request.params.walletId, 'read');
      const result = await app.db.query<ChurnRow>(
        `SELECT churn_risk_score, engagement_score, days_since_last_activity, predicted_at
           FROM churn_predictions
          WHERE wallet_id = $1
          ORDER BY predicted_at DESC
          LIMIT 1`,
        [wallet.id],
      );
      if (result.rowCount === 0) {
        throw new NotFoundError('Churn prediction');
      }

      const row = result.rows[0];
      reply.send({
        wallet_id: wallet.id,
        churn_risk_score: Number(row.churn_risk_score),
        engagement_score: Number(row.engagement_score),
        days_since_last_activity: Number(row.days_since_last_activity),
        predicted_at: new Date(row.predicted_at).toISOString(),
      });
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to fetch churn prediction');
    }
  });
}

import {
  RedemptionCoordinator,
  customerOwnership,
  markRedemptionUsed,
  walletOwnership,
} from '@pointwell/core';
import type { FastifyInstance } from 'fastify';
import { ensureAllowed, sendFailure, type RouteContext } from '../context.js';
import { withTransaction } from '../db.js';
import { requireBusiness, requireOpenWallet } from '../directory.js';
import { redemptionJson } from '../serializers.js';
import {
  createAiMetrics,
  createLedgerHelpers,
  findRedemptionById,
  toRedemption,
  type RedemptionRow,
} from '../store.js';
import { NotFoundError } from '../utils.js';
import { redeemSchema } from '../validators.js';

export async function registerRedemptionRoutes(app: FastifyInstance, context: RouteContext) {
  const coordinator = new RedemptionCoordinator({
    runInTransaction: (work) => withTransaction((client) => work(createLedgerHelpers(client, context.now))),
    metrics: createAiMetrics(app.db),
    logger: app.log,
    codeAttempts: context.redemptionCodeAttempts,
  });

  app.post<{ Params: { business: string } }>('/v1/businesses/:business/redemptions', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    const parsed = redeemSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(422).send({ error: 'Invalid redemption payload', details: parsed.error.flatten() });
      return;
    }

    const { customer_id, offer_id } = parsed.data;

    try {
      const business = await requireBusiness(app.db, request.params.business);
      ensureAllowed(principal, customerOwnership(customer_id, business.id), 'redeem');

      const receipt = await coordinator.redeem({
        customerId: customer_id,
        businessId: business.id,
        offerId: offer_id,
      });

      reply.code(201).send({
        redemption_id: receipt.redemptionId,
        code: receipt.code,
        points_used: receipt.pointsUsed,
        points_balance: receipt.pointsBalance,
      });
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to redeem offer');
    }
  });

  app.get<{ Params: { walletId: string } }>('/v1/wallets/:walletId/redemptions', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    try {
      const wallet = await requireOpenWallet(app.db, request.params.walletId);
      ensureAllowed(principal, walletOwnership(wallet), 'read');

      const result = await app.db.query<RedemptionRow>(
        `SELECT * FROM offer_redemptions WHERE wallet_id = $1 ORDER BY redeemed_at DESC`,
        [wallet.id],
      );
      reply.send({ redemptions: result.rows.map(toRedemption).map(redemptionJson) });
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to fetch redemptions');
    }
  });

  app.post<{ Params: { redemptionId: string } }>('/v1/redemptions/:redemptionId/use', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    try {
      const redemption = await withTransaction(async (client) => {
        const stored = await findRedemptionById(client, request.params.redemptionId, { lock: true });
        if (!stored) {
          throw new NotFoundError('Redemption');
        }
        const wallet = await requireOpenWallet(client, stored.walletId);
        ensureAllowed(principal, walletOwnership(wallet), 'redeem');
        return markRedemptionUsed(createLedgerHelpers(client, context.now), stored);
      });

      reply.send(redemptionJson(redemption));
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to mark redemption used');
    }
  });
}

import {
  assertBaselineTier,
  businessOwnership,
  generateId,
  reassignTiers,
  type Tier,
} from '@pointwell/core';
import type { FastifyInstance } from 'fastify';
import type { PoolClient } from 'pg';
import { ensureAllowed, sendFailure } from '../context.js';
import { rowLock, withTransaction } from '../db.js';
import { requireBusiness } from '../directory.js';
import { serializeTiers } from '../serializers.js';
import { listTiers, toWallet, type WalletRow } from '../store.js';
import { tierCatalogSchema, type TierInput } from '../validators.js';

interface BusinessParams {
  business: string;
}

async function replaceCatalog(client: PoolClient, businessId: string, inputs: TierInput[]) {
  await client.query(`DELETE FROM loyalty_tiers WHERE business_id = $1`, [businessId]);

  const tiers: Tier[] = [];
  for (const input of inputs) {
    const tier: Tier = {
      id: generateId(),
      businessId,
      name: input.name,
      description: input.description ?? null,
      minimumPoints: input.minimum_points,
      pointMultiplier: input.point_multiplier,
      specialOffers: input.special_offers,
      prioritySupport: input.priority_support,
      exclusiveEvents: input.exclusive_events,
      colorCode: input.color_code,
    };
    await client.query(
      `INSERT INTO loyalty_tiers (
        tier_id, business_id, name, description, minimum_points, point_multiplier,
        special_offers, priority_support, exclusive_events, color_code
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
      [
        tier.id,
        businessId,
        tier.name,
        tier.description,
        tier.minimumPoints,
        tier.pointMultiplier,
        tier.specialOffers,
        tier.prioritySupport,
        tier.exclusiveEvents,
        tier.colorCode,
      ],
    );
    tiers.push(tier);
  }

  const walletRows = await client.query<WalletRow>(
    `SELECT * FROM wallets WHERE business_id = $1${rowLock()}`,
    [businessId],
  );
  const assignments = reassignTiers(tiers, walletRows.rows.map(toWallet));
  for (const assignment of assignments) {
    await client.query(`UPDATE wallets SET current_tier_id = $2 WHERE wallet_id = $1`, [
      assignment.walletId,
      assignment.tierId,
    ]);
  }

  return { tiers, reassigned: assignments.length };
}

export async function registerTierRoutes(app: FastifyInstance) {
  app.get<{ Params: BusinessParams }>('/v1/businesses/:business/tiers', async (request, reply) => {
    try {
      const business = await requireBusiness(app.db, request.params.business);
      const tiers = await listTiers(app.db, business.id);
      reply.send({ tiers: serializeTiers(tiers) });
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to fetch tiers');
    }
  });

  app.put<{ Params: BusinessParams }>('/v1/businesses/:business/tiers', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    const parsed = tierCatalogSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(422).send({ error: 'Invalid tier catalog', details: parsed.error.flatten() });
      return;
    }

    const inputs = parsed.data.tiers;

    try {
      const outcome = await withTransaction(async (client) => {
        const business = await requireBusiness(client, request.params.business);
        ensureAllowed(principal, businessOwnership({ businessId: business.id }), 'manage');
        assertBaselineTier(
          business.id,
          inputs.map((input) => ({ minimumPoints: input.minimum_points })),
        );
        return replaceCatalog(client, business.id, inputs);
      });

      request.log.info({ tiers: outcome.tiers.length, reassigned: outcome.reassigned }, 'Tier catalog replaced');
      reply.send({ tiers: serializeTiers(outcome.tiers), wallets_reassigned: outcome.reassigned });
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to replace tier catalog');
    }
  });
}

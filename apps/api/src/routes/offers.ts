import {
  businessOwnership,
  dayOfWeek,
  generateId,
  isOfferValid,
  timeOfDay,
  type Offer,
} from '@pointwell/core';
import type { FastifyInstance } from 'fastify';
import type { PoolClient } from 'pg';
import { ensureAllowed, sendFailure, type RouteContext } from '../context.js';
import { withTransaction } from '../db.js';
import { requireBusiness } from '../directory.js';
import { offerJson } from '../serializers.js';
import { toOffer, type OfferRow, type Queryable } from '../store.js';
import { HttpError, NotFoundError } from '../utils.js';
import { createOfferSchema, offerListQuerySchema, suggestOfferSchema, updateOfferSchema } from '../validators.js';

interface BusinessParams {
  business: string;
}

interface OfferParams extends BusinessParams {
  offerId: string;
}

async function insertOffer(client: Queryable, offer: Offer): Promise<void> {
  await client.query(
    `INSERT INTO offers (
      offer_id, business_id, title, description, offer_type, points_required,
      discount_percentage, discount_amount, points_multiplier, free_item_description,
      is_active, valid_from, valid_until, specific_tier_id, is_ai_generated
    ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)`,
    [
      offer.id,
      offer.businessId,
      offer.title,
      offer.description,
      offer.type,
      offer.pointsRequired,
      offer.discountPercentage,
      offer.discountAmount,
      offer.pointsMultiplier,
      offer.freeItemDescription,
      offer.isActive,
      offer.validFrom.toISOString(),
      offer.validUntil ? offer.validUntil.toISOString() : null,
      offer.specificTierId,
      offer.isAiGenerated,
    ],
  );
}

async function assertTierBelongs(client: PoolClient, businessId: string, tierId: string | null): Promise<void> {
  if (tierId === null) {
    return;
  }
  const result = await client.query(`SELECT 1 FROM loyalty_tiers WHERE tier_id = $1 AND business_id = $2`, [
    tierId,
    businessId,
  ]);
  if (result.rowCount === 0) {
    throw new HttpError(422, 'specific_tier_id does not belong to this business');
  }
}

export async function registerOfferRoutes(app: FastifyInstance, context: RouteContext) {
  app.get<{ Params: BusinessParams }>('/v1/businesses/:business/offers', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    const query = offerListQuerySchema.safeParse(request.query);
    if (!query.success) {
      reply.code(400).send({ error: 'Invalid query parameters' });
      return;
    }

    try {
      const business = await requireBusiness(app.db, request.params.business);
      const result = await app.db.query<OfferRow>(
        `SELECT * FROM offers WHERE business_id = $1 ORDER BY points_required, title`,
        [business.id],
      );

      // Customers only ever see what they could redeem right now.
      const activeOnly = query.data.active === 'true' || principal.role === 'customer';
      const now = context.now();
      const offers = result.rows.map(toOffer).filter((offer) => !activeOnly || isOfferValid(offer, now));

      reply.send({ offers: offers.map(offerJson) });
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to list offers');
    }
  });

  app.post<{ Params: BusinessParams }>('/v1/businesses/:business/offers', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    const parsed = createOfferSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(422).send({ error: 'Invalid offer payload', details: parsed.error.flatten() });
      return;
    }

    const input = parsed.data;

    try {
      const offer = await withTransaction(async (client) => {
        const business = await requireBusiness(client, request.params.business);
        ensureAllowed(principal, businessOwnership({ businessId: business.id }), 'manage');
        await assertTierBelongs(client, business.id, input.specific_tier_id ?? null);

        const created: Offer = {
          id: generateId(),
          businessId: business.id,
          title: input.title,
          description: input.description,
          type: input.offer_type,
          pointsRequired: input.points_required,
          discountPercentage: input.discount_percentage ?? null,
          discountAmount: input.discount_amount ?? null,
          pointsMultiplier: input.points_multiplier ?? null,
          freeItemDescription: input.free_item_description ?? null,
          isActive: input.is_active,
          validFrom: input.valid_from ?? context.now(),
          validUntil: input.valid_until ?? null,
          specificTierId: input.specific_tier_id ?? null,
          isAiGenerated: false,
        };
        await insertOffer(client, created);
        return created;
      });

      reply.code(201).send(offerJson(offer));
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to create offer');
    }
  });

  app.patch<{ Params: OfferParams }>('/v1/businesses/:business/offers/:offerId', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    const parsed = updateOfferSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(422).send({ error: 'Invalid offer update', details: parsed.error.flatten() });
      return;
    }

    const patch = parsed.data;
    const columns: Array<[string, unknown]> = [];
    if (patch.title !== undefined) columns.push(['title', patch.title]);
    if (patch.description !== undefined) columns.push(['description', patch.description]);
    if (patch.points_required !== undefined) columns.push(['points_required', patch.points_required]);
    if (patch.is_active !== undefined) columns.push(['is_active', patch.is_active]);
    if (patch.valid_until !== undefined) {
      columns.push(['valid_until', patch.valid_until ? patch.valid_until.toISOString() : null]);
    }
    if (patch.discount_percentage !== undefined) columns.push(['discount_percentage', patch.discount_percentage]);
    if (patch.free_item_description !== undefined) {
      columns.push(['free_item_description', patch.free_item_description]);
    }

    try {
      const offer = await withTransaction(async (client) => {
        const business = await requireBusiness(client, request.params.business);
        ensureAllowed(principal, businessOwnership({ businessId: business.id }), 'manage');

        const assignments = columns.map(([column], index) => `${column} = $${index + 3}`).join(', ');
        const result = await client.query<OfferRow>(
          `UPDATE offers SET ${assignments} WHERE business_id = $1 AND offer_id = $2 RETURNING *`,
          [business.id, request.params.offerId, ...columns.map(([, value]) => value)],
        );
        if (result.rowCount === 0) {
          throw new NotFoundError('Offer');
        }
        return toOffer(result.rows[0]);
      });

      reply.send(offerJson(offer));
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to update offer');
    }
  });

  app.post<{ Params: BusinessParams }>('/v1/businesses/:business/offers/suggest', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    if (!context.insightsEnabled) {
      reply.code(503).send({ error: 'AI offer generation is disabled' });
      return;
    }

    const parsed = suggestOfferSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(422).send({ error: 'Invalid suggestion request', details: parsed.error.flatten() });
      return;
    }

    const customerId = parsed.data.customer_id;

    try {
      const offer = await withTransaction(async (client) => {
        const business = await requireBusiness(client, request.params.business);
        ensureAllowed(principal, businessOwnership({ businessId: business.id }), 'manage');

        let pointsBalance = 0;
        if (customerId) {
          const wallet = await client.query<{ points_balance: number | string }>(
            `SELECT points_balance FROM wallets WHERE customer_id = $1 AND business_id = $2`,
            [customerId, business.id],
          );
          pointsBalance = wallet.rowCount === 0 ? 0 : Number(wallet.rows[0].points_balance);
        }

        const now = context.now();
        const draftContext = {
          pointsBalance,
          timeOfDay: timeOfDay(now),
          dayOfWeek: dayOfWeek(now),
          now,
          choose: context.pick,
        };
        const draft = context.insights.draftOffer(draftContext);

        const suggested: Offer = {
          id: generateId(),
          businessId: business.id,
          title: draft.title,
          description: draft.description,
          type: draft.type,
          pointsRequired: draft.pointsRequired,
          discountPercentage: draft.discountPercentage,
          discountAmount: null,
          pointsMultiplier: draft.pointsMultiplier,
          freeItemDescription: draft.freeItemDescription,
          isActive: true,
          validFrom: draft.validFrom,
          validUntil: draft.validUntil,
          specificTierId: null,
          isAiGenerated: true,
        };
        await insertOffer(client, suggested);
        await client.query(
          `INSERT INTO ai_offer_metrics (offer_id, context_factors) VALUES ($1, $2)`,
          [
            suggested.id,
            {
              time_of_day: draftContext.timeOfDay,
              day_of_week: draftContext.dayOfWeek,
              points_balance: pointsBalance,
              engine: context.insights.name,
            },
          ],
        );
        return suggested;
      });

      reply.code(201).send(offerJson(offer));
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to suggest offer');
    }
  });
}

import { businessOwnership } from '@pointwell/core';
import type { FastifyInstance } from 'fastify';
import { ensureAllowed, sendFailure } from '../context.js';
import { withTransaction } from '../db.js';
import { createBusiness, getBusinessConfig, requireBusiness, updateBusinessConfig } from '../directory.js';
import { businessJson, configJson } from '../serializers.js';
import { businessConfigSchema, createBusinessSchema } from '../validators.js';

interface BusinessParams {
  business: string;
}

export async function registerBusinessRoutes(app: FastifyInstance) {
  app.post('/v1/businesses', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    if (principal.role !== 'platform_admin') {
      reply.code(403).send({ error: 'Forbidden' });
      return;
    }

    const parsed = createBusinessSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(422).send({ error: 'Invalid business payload', details: parsed.error.flatten() });
      return;
    }

    const { name, email, category, point_value, points_per_currency } = parsed.data;

    try {
      const business = await withTransaction((client) =>
        createBusiness(client, {
          name,
          email,
          category,
          pointValue: point_value,
          pointsPerCurrency: points_per_currency,
        }),
      );

      request.log.info({ businessId: business.id, slug: business.slug }, 'Business created');
      reply.code(201).send(businessJson(business));
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to create business');
    }
  });

  // Profiles are directory data: any authenticated principal may resolve them.
  app.get<{ Params: BusinessParams }>('/v1/businesses/:business', async (request, reply) => {
    try {
      const business = await requireBusiness(app.db, request.params.business);
      reply.send(businessJson(business));
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to fetch business');
    }
  });

  app.get<{ Params: BusinessParams }>('/v1/businesses/:business/config', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    try {
      const business = await requireBusiness(app.db, request.params.business);
      ensureAllowed(principal, businessOwnership({ businessId: business.id }), 'read');
      const config = await getBusinessConfig(app.db, business.id);
      reply.send(configJson(config));
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to fetch business config');
    }
  });

  app.put<{ Params: BusinessParams }>('/v1/businesses/:business/config', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    const parsed = businessConfigSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(422).send({ error: 'Invalid business config', details: parsed.error.flatten() });
      return;
    }

    const patch = parsed.data;

    try {
      const config = await withTransaction(async (client) => {
        const business = await requireBusiness(client, request.params.business);
        ensureAllowed(principal, businessOwnership({ businessId: business.id }), 'manage');
        return updateBusinessConfig(client, business.id, {
          enablePointExpiry: patch.enable_point_expiry,
          pointExpiryDays: patch.point_expiry_days,
          enableCrossBusinessRedemption: patch.enable_cross_business_redemption,
          crossBusinessConversionRate: patch.cross_business_conversion_rate,
        });
      });

      reply.send(configJson(config));
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to update business config');
    }
  });
}

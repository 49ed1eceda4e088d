import {
  INSIGHTS_DISABLED_REPLY,
  customerOwnership,
  isOfferValid,
  type AssistantContext,
} from '@pointwell/core';
import type { FastifyInstance } from 'fastify';
import { ensureAllowed, sendFailure, type RouteContext } from '../context.js';
import { requireBusiness } from '../directory.js';
import { toOffer, toWallet, type OfferRow, type WalletRow } from '../store.js';
import { assistantSchema } from '../validators.js';

export async function registerAssistantRoutes(app: FastifyInstance, context: RouteContext) {
  app.post<{ Params: { business: string } }>('/v1/businesses/:business/assistant', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    const parsed = assistantSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(422).send({ error: 'Invalid assistant query', details: parsed.error.flatten() });
      return;
    }

    if (!context.insightsEnabled) {
      reply.send({ reply: INSIGHTS_DISABLED_REPLY });
      return;
    }

    // Customers always ask about their own wallet.
    const customerId = principal.role === 'customer' ? principal.customerId : parsed.data.customer_id;

    try {
      const business = await requireBusiness(app.db, request.params.business);

      const assistantContext: AssistantContext = { wallet: null, activeOffers: [] };
      if (customerId) {
        ensureAllowed(principal, customerOwnership(customerId, business.id), 'read');
        const walletResult = await app.db.query<WalletRow>(
          `SELECT * FROM wallets WHERE customer_id = $1 AND business_id = $2`,
          [customerId, business.id],
        );
        assistantContext.wallet = walletResult.rowCount === 0 ? null : toWallet(walletResult.rows[0]);
      }

      const offerResult = await app.db.query<OfferRow>(`SELECT * FROM offers WHERE business_id = $1`, [business.id]);
      const now = context.now();
      assistantContext.activeOffers = offerResult.rows.map(toOffer).filter((offer) => isOfferValid(offer, now));

      reply.send({ reply: context.insights.answer(parsed.data.query, assistantContext) });
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to answer assistant query');
    }
  });
}

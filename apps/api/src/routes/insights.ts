import { businessOwnership, generateId } from '@pointwell/core';
import type { FastifyInstance } from 'fastify';
import { ensureAllowed, sendFailure, type RouteContext } from '../context.js';
import { withTransaction } from '../db.js';
import { requireBusiness } from '../directory.js';
import { insightRefreshSchema } from '../validators.js';

export async function registerInsightRoutes(app: FastifyInstance, context: RouteContext) {
  app.post<{ Params: { business: string } }>('/v1/businesses/:business/insights/refresh', async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      reply.code(500).send({ error: 'Principal context missing' });
      return;
    }

    if (!context.insightsEnabled) {
      reply.code(503).send({ error: 'Insights are disabled' });
      return;
    }

    const parsed = insightRefreshSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(422).send({ error: 'Invalid insight refresh request', details: parsed.error.flatten() });
      return;
    }

    const jobTypes = [...new Set(parsed.data.jobs)];

    try {
      const jobs = await withTransaction(async (client) => {
        const business = await requireBusiness(client, request.params.business);
        ensureAllowed(principal, businessOwnership({ businessId: business.id }), 'manage');

        const queued: Array<{ job_id: string; job_type: string }> = [];
        for (const jobType of jobTypes) {
          const jobId = generateId();
          await client.query(
            `INSERT INTO insight_jobs (job_id, business_id, job_type, available_at)
             VALUES ($1, $2, $3, $4)`,
            [jobId, business.id, jobType, context.now().toISOString()],
          );
          queued.push({ job_id: jobId, job_type: jobType });
        }
        return queued;
      });

      reply.code(202).send({ status: 'queued', jobs });
    } catch (error) {
      sendFailure(app, reply, error, 'Failed to queue insight jobs');
    }
  });
}

import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { Pool } from 'pg';
import type { Principal } from '@pointwell/core';
import { normaliseBytea, verifyApiKey } from '../credentials.js';

const PUBLIC_ROUTES = new Set(['/healthz']);

interface CredentialRow {
  role: string;
  business_id: string | null;
  customer_id: string | null;
  api_key_hash: Buffer | string;
  salt: Buffer | string;
}

function toPrincipal(principalId: string, row: CredentialRow): Principal | null {
  switch (row.role) {
    case 'platform_admin':
      return { role: 'platform_admin', principalId };
    case 'business_admin':
      return row.business_id ? { role: 'business_admin', principalId, businessId: row.business_id } : null;
    case 'customer':
      return row.customer_id ? { role: 'customer', principalId, customerId: row.customer_id } : null;
    default:
      return null;
  }
}

async function resolvePrincipal(db: Pool, principalId: string, apiKey: string): Promise<Principal | null> {
  const result = await db.query<CredentialRow>(
    `SELECT role, business_id, customer_id, api_key_hash, salt
       FROM api_credentials
      WHERE principal_id = $1 AND active = true`,
    [principalId],
  );

  if (result.rowCount === 0) {
    return null;
  }

  const row = result.rows[0];
  const valid = await verifyApiKey(apiKey, normaliseBytea(row.api_key_hash), normaliseBytea(row.salt));
  return valid ? toPrincipal(principalId, row) : null;
}

async function authenticateRequest(request: FastifyRequest, reply: FastifyReply) {
  const routeUrl = request.routeOptions?.url;
  if (routeUrl && PUBLIC_ROUTES.has(routeUrl)) {
    return;
  }

  const principalHeader = request.headers['x-principal-id'];
  const apiKeyHeader = request.headers['x-api-key'];

  if (!principalHeader || !apiKeyHeader) {
    reply.code(401).send({ error: 'Missing credentials' });
    return reply;
  }

  const principal = await resolvePrincipal(request.server.db, String(principalHeader), String(apiKeyHeader));

  if (!principal) {
    reply.code(401).send({ error: 'Invalid credentials' });
    return reply;
  }

  request.principal = principal;
  return;
}

export default fp(async (app: FastifyInstance) => {
  app.addHook('preHandler', authenticateRequest);
});

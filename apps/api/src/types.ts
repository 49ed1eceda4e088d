import 'fastify';
import type { Pool } from 'pg';
import type { Principal } from '@pointwell/core';

declare module 'fastify' {
  interface FastifyInstance {
    db: Pool;
  }

  interface FastifyRequest {
    principal?: Principal;
  }
}

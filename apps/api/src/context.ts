import {
  authorize,
  type InsightEngine,
  type OwnedResource,
  type Principal,
  type ResourceAction,
} from '@pointwell/core';
import type { FastifyInstance, FastifyReply } from 'fastify';
import { ForbiddenError, toErrorResponse } from './utils.js';

export interface RouteContext {
  now: () => Date;
  insights: InsightEngine;
  insightsEnabled: boolean;
  redemptionCodeAttempts: number;
  pick: <T>(options: readonly T[]) => T;
}

export function ensureAllowed(principal: Principal, resource: OwnedResource, action: ResourceAction): void {
  if (!authorize(principal, resource, action)) {
    throw new ForbiddenError();
  }
}

export function sendFailure(app: FastifyInstance, reply: FastifyReply, error: unknown, message: string): void {
  const response = toErrorResponse(error);
  if (response) {
    reply.code(response.statusCode).send(response.body);
    return;
  }
  app.log.error({ err: error }, message);
  reply.code(500).send({ error: message });
}

import Fastify from 'fastify';
import { randomInt } from 'crypto';
import { ruleBasedInsights } from '@pointwell/core';
import { CONFIG } from './config.js';
import type { RouteContext } from './context.js';
import { getPool, initDb, closePool } from './db.js';
import authPlugin from './plugins/auth.js';
import { registerAssistantRoutes } from './routes/assistant.js';
import { registerBusinessRoutes } from './routes/businesses.js';
import { registerInsightRoutes } from './routes/insights.js';
import { registerOfferRoutes } from './routes/offers.js';
import { registerRedemptionRoutes } from './routes/redemptions.js';
import { registerTierRoutes } from './routes/tiers.js';
import { registerWalletRoutes } from './routes/wallets.js';

export type ServerOptions = Partial<RouteContext>;

export async function buildServer(options: ServerOptions = {}) {
  const app = Fastify({ logger: CONFIG.env === 'test' ? false : true });
  const pool = getPool();
  app.decorate('db', pool);

  const context: RouteContext = {
    now: options.now ?? (() => new Date()),
    insights: options.insights ?? ruleBasedInsights,
    insightsEnabled: options.insightsEnabled ?? CONFIG.insightsEnabled,
    redemptionCodeAttempts: options.redemptionCodeAttempts ?? CONFIG.redemptionCodeAttempts,
    pick: options.pick ?? (<T>(choices: readonly T[]): T => choices[randomInt(choices.length)]),
  };

  app.addHook('onClose', async () => {
    await closePool();
  });

  app.get('/healthz', async () => ({ status: 'ok' }));

  await app.register(authPlugin);

  await registerBusinessRoutes(app);
  await registerTierRoutes(app);
  await registerOfferRoutes(app, context);
  await registerWalletRoutes(app, context);
  await registerRedemptionRoutes(app, context);
  await registerAssistantRoutes(app, context);
  await registerInsightRoutes(app, context);

  return app;
}

async function start() {
  await initDb();
  const app = await buildServer();
  const port = CONFIG.port;
  const host = '0.0.0.0';

  try {
    await app.listen({ port, host });
  } catch (err) {
    app.log.error(err, 'Failed to start API');
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  start().catch((err) => {
    console.error('API failed to start', err);
    process.exit(1);
  });
}

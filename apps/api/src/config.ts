import { config as loadEnv } from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';

if (!process.env.DATABASE_URL) {
  const searchPaths = ['.env', '../.env', '../../.env'];
  for (const candidate of searchPaths) {
    const absolute = resolve(process.cwd(), candidate);
    if (!existsSync(absolute)) {
      continue;
    }
    const result = loadEnv({ path: absolute });
    if (result?.parsed?.DATABASE_URL || process.env.DATABASE_URL) {
      break;
    }
  }
}

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  PORT: z.string().optional(),
  DATABASE_URL: z.string().url(),
  BOOTSTRAP_PRINCIPAL_ID: z.string().optional(),
  BOOTSTRAP_API_KEY: z.string().optional(),
  INSIGHTS_ENABLED: z.enum(['true', 'false']).optional(),
  REDEMPTION_CODE_ATTEMPTS: z.string().regex(/^\d+$/).optional(),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  throw new Error(`Invalid environment configuration: ${parsed.error.message}`);
}

const env = parsed.data;

export const CONFIG = Object.freeze({
  env: env.NODE_ENV ?? 'development',
  port: env.PORT ? Number(env.PORT) : 3000,
  databaseUrl: env.DATABASE_URL,
  bootstrapPrincipalId: env.BOOTSTRAP_PRINCIPAL_ID,
  bootstrapApiKey: env.BOOTSTRAP_API_KEY,
  insightsEnabled: env.INSIGHTS_ENABLED !== 'false',
  redemptionCodeAttempts: env.REDEMPTION_CODE_ATTEMPTS ? Number(env.REDEMPTION_CODE_ATTEMPTS) : 5,
});

export const DEFAULT_POINT_VALUE = 0.01;
export const DEFAULT_POINTS_PER_CURRENCY = 1;

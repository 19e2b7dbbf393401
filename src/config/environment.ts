import dotenv from 'dotenv';
import { z } from 'zod';
import { createLogger } from '../utils';

const logger = createLogger('environment-validator');

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

const wholeSeconds = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const environmentSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  NODE_ENV: z.string().trim().min(1).default('development'),
  TICKGRID_COOLDOWN_SECONDS: wholeSeconds(60, 0),
  TICKGRID_TWAP_WINDOW_SECONDS: wholeSeconds(300, 1),
  TICKGRID_KEEPER_INTERVAL_SECONDS: wholeSeconds(30, 1),
});

export interface EnvironmentConfig {
  logLevel: (typeof LOG_LEVELS)[number];
  nodeEnv: string;
  cooldownSeconds: number;
  twapWindowSeconds: number;
  keeperIntervalSeconds: number;
}

/**
 * Reads and validates the process environment. Blank variables count as unset.
 * Throws with every offending variable named when validation fails.
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = environmentSchema.safeParse(present);

  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    logger.error('Environment validation failed', { problems });
    logger.error('See .env.example for reference');
    throw new Error(`Invalid environment: ${problems.join('; ')}`);
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    nodeEnv: parsed.data.NODE_ENV,
    cooldownSeconds: parsed.data.TICKGRID_COOLDOWN_SECONDS,
    twapWindowSeconds: parsed.data.TICKGRID_TWAP_WINDOW_SECONDS,
    keeperIntervalSeconds: parsed.data.TICKGRID_KEEPER_INTERVAL_SECONDS,
  };
}

/** Loads `.env` into process.env, then validates it. */
export function loadDotenvEnvironment(path?: string): EnvironmentConfig {
  dotenv.config(path ? { path } : undefined);
  return loadEnvironment(process.env);
}

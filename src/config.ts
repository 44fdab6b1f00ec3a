/**
 * Runtime configuration
 * Environment variables and explicit overrides, validated with zod.
 */

import { z } from 'zod';
import { ConfigError } from './common/errors';
import { formatIssues } from './events/payload';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

/**
 * Environment variables schema
 */
const envSchema = z.object({
  TETHER_TOKEN_EXPIRATION: z.coerce.number().positive().optional(),
  TETHER_MAX_CHAIN_DEPTH: z.coerce.number().int().positive().optional(),
  TETHER_STATE_MANAGER: z.enum(['memory', 'disk']).optional(),
  TETHER_STATE_DIR: z.string().min(1).optional(),
  TETHER_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

const configSchema = z.object({
  /** Seconds of inactivity before a client's state is dropped. */
  tokenExpiration: z.number().positive().default(3600),
  /** Maximum nesting of follow-up events in one chain. */
  maxChainDepth: z.number().int().positive().default(100),
  stateManager: z.enum(['memory', 'disk']).default('memory'),
  /** Directory of the disk state manager. */
  stateDir: z.string().min(1).default('.states'),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type Config = z.output<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

/**
 * Resolve the configuration: overrides win over environment variables, which
 * win over defaults. Throws ConfigError on invalid values.
 */
export function loadConfig(
  overrides: ConfigInput = {},
  env: Record<string, string | undefined> = process.env
): Config {
  const rawEnv: Record<string, string | undefined> = {};
  for (const key of Object.keys(envSchema.shape)) {
    // Empty variables count as unset.
    rawEnv[key] = env[key] || undefined;
  }
  const parsedEnv = envSchema.safeParse(rawEnv);
  if (!parsedEnv.success) {
    throw new ConfigError(
      `Invalid environment: ${formatIssues(parsedEnv.error)}`
    );
  }
  const fromEnv = parsedEnv.data;

  const result = configSchema.safeParse({
    tokenExpiration:
      overrides.tokenExpiration ?? fromEnv.TETHER_TOKEN_EXPIRATION,
    maxChainDepth: overrides.maxChainDepth ?? fromEnv.TETHER_MAX_CHAIN_DEPTH,
    stateManager: overrides.stateManager ?? fromEnv.TETHER_STATE_MANAGER,
    stateDir: overrides.stateDir ?? fromEnv.TETHER_STATE_DIR,
    logLevel: overrides.logLevel ?? fromEnv.TETHER_LOG_LEVEL,
  });
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration: ${formatIssues(result.error)}`
    );
  }
  return result.data;
}

import { z } from 'zod';
import {
  DEFAULT_LOBBY_IDLE_TIMEOUT_MINUTES,
  DEFAULT_RATING,
  DEFAULT_RATING_LOOKUP_TIMEOUT_MS,
} from '../lol-custom/lol-custom.constants';
import { RIOT_CONFIG } from '../riot/riot.constants';

/** Empty strings in .env files count as unset. */
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

/**
 * Environment variables read through ConfigService.
 * Parsed once at boot; numeric values arrive as numbers.
 */
export const EnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DEBUG: optionalString,

  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  REDIS_URL: z.string().default('redis://localhost:6379'),

  /** The bot stays offline when no token is set. */
  DISCORD_BOT_TOKEN: optionalString,

  RIOT_API_KEY: optionalString,
  RIOT_PLATFORM: z.string().default(RIOT_CONFIG.DEFAULT_PLATFORM),
  RIOT_REGION: z.string().default(RIOT_CONFIG.DEFAULT_REGION),
  RIOT_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(RIOT_CONFIG.DEFAULT_REQUEST_TIMEOUT_MS),

  RATING_LOOKUP_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_RATING_LOOKUP_TIMEOUT_MS),
  LOBBY_DEFAULT_RATING: z.coerce.number().int().default(DEFAULT_RATING),
  LOBBY_IDLE_TIMEOUT_MINUTES: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_LOBBY_IDLE_TIMEOUT_MINUTES),

  SENTRY_DSN: optionalString,
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * ConfigModule `validate` hook. Throws with every failing key listed.
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const parsed = EnvSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}

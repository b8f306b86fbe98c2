/**
 * Platform routing values for platform-scoped endpoints (summoner, league).
 * Short region names map to their routing host prefix.
 */
export const PLATFORM_ROUTING: Record<string, string> = {
  na: 'na1',
  na1: 'na1',
  br: 'br1',
  br1: 'br1',
  lan: 'la1',
  la1: 'la1',
  las: 'la2',
  la2: 'la2',
  oce: 'oc1',
  oc1: 'oc1',
  euw: 'euw1',
  euw1: 'euw1',
  eune: 'eun1',
  eun1: 'eun1',
  tr: 'tr1',
  tr1: 'tr1',
  ru: 'ru',
  kr: 'kr',
  jp: 'jp1',
  jp1: 'jp1',
};

/** Regional routing values for account and match endpoints. */
export const REGIONAL_ROUTING = ['americas', 'europe', 'asia', 'sea'] as const;
export type RegionalRoute = (typeof REGIONAL_ROUTING)[number];

export const RIOT_CONFIG = {
  DEFAULT_PLATFORM: 'na1',
  DEFAULT_REGION: 'americas' satisfies RegionalRoute,
  /** Per-request timeout (ms) */
  DEFAULT_REQUEST_TIMEOUT_MS: 10_000,
  /** Retries after a 429 before giving up */
  MAX_RATE_LIMIT_RETRIES: 2,
  /** Floor for the Retry-After wait (ms) */
  MIN_RETRY_DELAY_MS: 1_000,
  /** Redis TTL for ranked entries (seconds) */
  LEAGUE_CACHE_TTL: 600,
} as const;

export const RANKED_QUEUES = {
  SOLO: 'RANKED_SOLO_5x5',
  FLEX: 'RANKED_FLEX_SR',
} as const;

export function normalizePlatform(platform: string | undefined): string {
  const key = (platform ?? '').trim().toLowerCase();
  if (!key) return RIOT_CONFIG.DEFAULT_PLATFORM;
  return PLATFORM_ROUTING[key] ?? key;
}

export function normalizeRegion(region: string | undefined): RegionalRoute {
  const key = (region ?? '').trim().toLowerCase();
  const match = REGIONAL_ROUTING.find((r) => r === key);
  return match ?? RIOT_CONFIG.DEFAULT_REGION;
}

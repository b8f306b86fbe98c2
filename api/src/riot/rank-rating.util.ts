/**
 * Ranked standing → continuous rating.
 *
 * Each tier spans 400 points, each division 100, and LP is added on top.
 * Apex tiers (Master and above) have no divisions, so their LP is added
 * straight to the tier base.
 */

const TIER_BASES: Record<string, number> = {
  IRON: 0,
  BRONZE: 400,
  SILVER: 800,
  GOLD: 1200,
  PLATINUM: 1600,
  EMERALD: 2000,
  DIAMOND: 2400,
  MASTER: 2800,
  GRANDMASTER: 3200,
  CHALLENGER: 3600,
};

const DIVISION_BONUS: Record<string, number> = {
  IV: 0,
  III: 100,
  II: 200,
  I: 300,
};

const APEX_TIERS = new Set(['MASTER', 'GRANDMASTER', 'CHALLENGER']);

/** Base for tiers Riot adds that we do not know yet. */
const UNKNOWN_TIER_BASE = 1400;

export function rankToRating(
  tier: string | null | undefined,
  division: string | null | undefined,
  leaguePoints: number | null | undefined,
): number {
  const normalizedTier = (tier ?? '').toUpperCase();
  const lp = Number.isFinite(leaguePoints) ? Math.trunc(leaguePoints ?? 0) : 0;
  const base = TIER_BASES[normalizedTier] ?? UNKNOWN_TIER_BASE;

  if (APEX_TIERS.has(normalizedTier)) {
    return base + lp;
  }
  return base + (DIVISION_BONUS[(division ?? 'IV').toUpperCase()] ?? 0) + lp;
}

import type { LaneRole } from '@rift-lobby/contract';

/** Rating used when no ranked standing can be resolved for a player. */
export const DEFAULT_RATING = 1400;

/** Upper bound on a single rating lookup before the default is used. */
export const DEFAULT_RATING_LOOKUP_TIMEOUT_MS = 3_000;

/** Lobbies with no reaction activity for this long are dropped. */
export const DEFAULT_LOBBY_IDLE_TIMEOUT_MINUTES = 240;

/**
 * Emoji / shorthand names accepted for each role (upper-cased).
 * Reactions are matched by emoji name, so custom emojis named `jgl`
 * or `bot` resolve the same as the full role name.
 */
export const ROLE_ALIASES: Record<LaneRole, readonly string[]> = {
  TOP: ['TOP'],
  JUNGLE: ['JUNGLE', 'JGL', 'JG', 'JUNGLER'],
  MID: ['MID', 'MIDDLE'],
  BOTTOM: ['BOTTOM', 'BOT', 'ADC'],
  SUPPORT: ['SUPPORT', 'SUP', 'SUPP', 'UTILITY'],
};

/** Unicode fallbacks when no application emoji exists for a role. */
export const ROLE_UNICODE_EMOJIS: Record<LaneRole, string> = {
  TOP: '\u2B06\uFE0F',
  JUNGLE: '\uD83C\uDF32',
  MID: '\u2194\uFE0F',
  BOTTOM: '\u2B07\uFE0F',
  SUPPORT: '\uD83D\uDEE1\uFE0F',
};

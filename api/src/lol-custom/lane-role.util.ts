import { LANE_ROLES, type LaneRole } from '@rift-lobby/contract';
import { ROLE_ALIASES, ROLE_UNICODE_EMOJIS } from './lol-custom.constants';

const ALIAS_LOOKUP = new Map<string, LaneRole>(
  LANE_ROLES.flatMap((role) =>
    ROLE_ALIASES[role].map((alias): [string, LaneRole] => [alias, role]),
  ),
);

/** Variation selectors are optional on reaction names. */
const stripVariation = (value: string): string => value.replace(/\uFE0F/g, '');

const UNICODE_LOOKUP = new Map<string, LaneRole>(
  LANE_ROLES.map((role): [string, LaneRole] => [
    stripVariation(ROLE_UNICODE_EMOJIS[role]),
    role,
  ]),
);

/**
 * Resolve a reaction emoji name (or typed shorthand) to a lane role.
 * Returns null for anything that is not a role.
 */
export function normalizeRoleName(
  name: string | null | undefined,
): LaneRole | null {
  if (!name) return null;
  const trimmed = name.trim();
  return (
    ALIAS_LOOKUP.get(trimmed.toUpperCase()) ??
    UNICODE_LOOKUP.get(stripVariation(trimmed)) ??
    null
  );
}

/**
 * Sort roles into display order (TOP → SUPPORT).
 */
export function sortRoles(roles: Iterable<LaneRole>): LaneRole[] {
  return [...roles].sort(
    (a, b) => LANE_ROLES.indexOf(a) - LANE_ROLES.indexOf(b),
  );
}

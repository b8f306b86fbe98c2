import {
  LANE_ROLES,
  LOBBY_CAPACITY,
  TEAM_SIZE,
  type LaneRole,
} from '@rift-lobby/contract';

/**
 * A lobby player with a resolved rating, as handed to the solver.
 */
export interface RatedCandidate {
  readonly identity: string;
  readonly desiredRoles: ReadonlySet<LaneRole>;
  readonly rating: number;
}

/** Every role mapped to exactly one player. */
export type TeamRoster = Readonly<Record<LaneRole, RatedCandidate>>;

type PartialRoster = ReadonlyMap<LaneRole, RatedCandidate>;

export interface TeamAssignment {
  teamA: TeamRoster;
  teamB: TeamRoster;
  ratingA: number;
  ratingB: number;
  /** |ratingA - ratingB| */
  ratingGap: number;
  /** Players seated in a role they did not ask for (0..10). */
  preferenceViolations: number;
  /** True when no split satisfied every preference. */
  relaxed: boolean;
}

/**
 * Thrown when the solver is called with anything but ten distinct players.
 * This is a caller bug, never a "no solution" outcome.
 */
export class SolverPreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SolverPreconditionError';
  }
}

interface TeamSplit {
  teamA: RatedCandidate[];
  teamB: RatedCandidate[];
  ratingA: number;
  ratingB: number;
  gap: number;
}

function sumRatings(players: readonly RatedCandidate[]): number {
  return players.reduce((total, p) => total + p.rating, 0);
}

function combinations<T>(items: readonly T[], size: number): T[][] {
  if (size === 0) return [[]];
  const result: T[][] = [];
  items.forEach((item, index) => {
    for (const tail of combinations(items.slice(index + 1), size - 1)) {
      result.push([item, ...tail]);
    }
  });
  return result;
}

function* permutations<T>(items: readonly T[]): Generator<T[]> {
  if (items.length <= 1) {
    yield [...items];
    return;
  }
  for (let i = 0; i < items.length; i++) {
    const rest = [...items.slice(0, i), ...items.slice(i + 1)];
    for (const tail of permutations(rest)) {
      yield [items[i], ...tail];
    }
  }
}

/**
 * All distinct 5/5 splits, lowest rating gap first.
 * The first player is pinned to team A so mirrored splits are not repeated.
 * Array#sort is stable, so equal gaps keep enumeration order.
 */
function enumerateSplits(players: readonly RatedCandidate[]): TeamSplit[] {
  const total = sumRatings(players);
  const [anchor, ...rest] = players;

  return combinations(rest, TEAM_SIZE - 1)
    .map((partners) => {
      const teamA = [anchor, ...partners];
      const inTeamA = new Set(teamA);
      const teamB = players.filter((p) => !inTeamA.has(p));
      const ratingA = sumRatings(teamA);
      const ratingB = total - ratingA;
      return { teamA, teamB, ratingA, ratingB, gap: Math.abs(ratingA - ratingB) };
    })
    .sort((a, b) => a.gap - b.gap);
}

function completeRoster(partial: PartialRoster): TeamRoster | null {
  const TOP = partial.get('TOP');
  const JUNGLE = partial.get('JUNGLE');
  const MID = partial.get('MID');
  const BOTTOM = partial.get('BOTTOM');
  const SUPPORT = partial.get('SUPPORT');
  if (!TOP || !JUNGLE || !MID || !BOTTOM || !SUPPORT) return null;
  return { TOP, JUNGLE, MID, BOTTOM, SUPPORT };
}

/** Seat players in LANE_ROLES order. */
function rosterFromOrdering(ordering: readonly RatedCandidate[]): TeamRoster {
  const [TOP, JUNGLE, MID, BOTTOM, SUPPORT] = ordering;
  return { TOP, JUNGLE, MID, BOTTOM, SUPPORT };
}

export function countViolations(roster: TeamRoster): number {
  return LANE_ROLES.filter((role) => !roster[role].desiredRoles.has(role))
    .length;
}

/**
 * Find a role assignment where every player gets a role they asked for.
 * Scarce roles (fewest willing players) are tried first so dead ends
 * surface early. Each branch gets its own copy of the partial roster.
 */
export function assignRolesStrict(
  team: readonly RatedCandidate[],
): TeamRoster | null {
  const eligible = new Map<LaneRole, RatedCandidate[]>(
    LANE_ROLES.map((role) => [
      role,
      team.filter((p) => p.desiredRoles.has(role)),
    ]),
  );
  const eligibleFor = (role: LaneRole) => eligible.get(role) ?? [];
  const roleOrder = [...LANE_ROLES].sort(
    (a, b) => eligibleFor(a).length - eligibleFor(b).length,
  );

  const search = (
    depth: number,
    partial: PartialRoster,
    seated: ReadonlySet<string>,
  ): TeamRoster | null => {
    if (depth === roleOrder.length) return completeRoster(partial);

    const role = roleOrder[depth];
    for (const player of eligibleFor(role)) {
      if (seated.has(player.identity)) continue;
      const found = search(
        depth + 1,
        new Map(partial).set(role, player),
        new Set([...seated, player.identity]),
      );
      if (found) return found;
    }
    return null;
  };

  return search(0, new Map(), new Set());
}

/**
 * Seat all five players, accepting off-role picks.
 * Returns the bijection with the fewest violations (first found on ties).
 */
export function assignRolesRelaxed(team: readonly RatedCandidate[]): {
  roster: TeamRoster;
  violations: number;
} {
  const initial = rosterFromOrdering(team);
  let best = { roster: initial, violations: countViolations(initial) };

  for (const ordering of permutations(team)) {
    if (best.violations === 0) break;
    const roster = rosterFromOrdering(ordering);
    const violations = countViolations(roster);
    if (violations < best.violations) {
      best = { roster, violations };
    }
  }

  return best;
}

function assertSolvable(players: readonly RatedCandidate[]): void {
  if (players.length !== LOBBY_CAPACITY) {
    throw new SolverPreconditionError(
      `Team balancing needs exactly ${LOBBY_CAPACITY} players, got ${players.length}`,
    );
  }
  const identities = new Set(players.map((p) => p.identity));
  if (identities.size !== players.length) {
    throw new SolverPreconditionError(
      'Team balancing received the same player more than once',
    );
  }
}

function toAssignment(
  split: TeamSplit,
  teamA: TeamRoster,
  teamB: TeamRoster,
  preferenceViolations: number,
  relaxed: boolean,
): TeamAssignment {
  return {
    teamA,
    teamB,
    ratingA: split.ratingA,
    ratingB: split.ratingB,
    ratingGap: split.gap,
    preferenceViolations,
    relaxed,
  };
}

/**
 * Split ten players into two role-filled teams.
 *
 * Priority: zero preference violations first, then the smallest rating gap.
 * Splits are walked in ascending gap order, so the first split where both
 * teams can be seated on-preference is the closest zero-violation result.
 * If no split works strictly, every split is seated with the fewest
 * off-role picks and the (violations, gap) minimum wins.
 *
 * @throws SolverPreconditionError unless given exactly ten distinct players
 */
export function solveTeams(
  players: readonly RatedCandidate[],
): TeamAssignment {
  assertSolvable(players);
  const splits = enumerateSplits(players);

  for (const split of splits) {
    const teamA = assignRolesStrict(split.teamA);
    if (!teamA) continue;
    const teamB = assignRolesStrict(split.teamB);
    if (!teamB) continue;
    return toAssignment(split, teamA, teamB, 0, false);
  }

  let best: TeamAssignment | null = null;
  for (const split of splits) {
    const a = assignRolesRelaxed(split.teamA);
    const b = assignRolesRelaxed(split.teamB);
    const violations = a.violations + b.violations;
    if (
      !best ||
      violations < best.preferenceViolations ||
      (violations === best.preferenceViolations && split.gap < best.ratingGap)
    ) {
      best = toAssignment(split, a.roster, b.roster, violations, true);
    }
  }

  if (!best) {
    // enumerateSplits always yields 126 splits for ten players
    throw new SolverPreconditionError('No team split could be enumerated');
  }
  return best;
}

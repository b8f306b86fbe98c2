import {
  LOBBY_CAPACITY,
  type LaneRole,
  type LobbyState,
  type LobbyStatusDto,
} from '@rift-lobby/contract';
import { sortRoles } from './lane-role.util';
import { DEFAULT_RATING } from './lol-custom.constants';
import type { RatedCandidate } from './team-solver';

interface CandidateEntry {
  identity: string;
  roles: Set<LaneRole>;
  /** null until the rating lookup has resolved */
  rating: number | null;
  riotId: string | null;
}

export interface IntentResult {
  /** Whether the pool changed at all (false for stale or duplicate events). */
  changed: boolean;
  /** Identity moved from the waitlist into the active set, if any. */
  promoted: string | null;
  /** Where the identity ended up after this event. */
  placement: 'active' | 'waitlist' | 'removed' | 'none';
}

/**
 * Thrown when a snapshot is requested before ten players are active.
 */
export class PoolNotReadyError extends Error {
  constructor(count: number) {
    super(
      `Lobby has ${count}/${LOBBY_CAPACITY} active players; teams cannot be balanced yet`,
    );
    this.name = 'PoolNotReadyError';
  }
}

/**
 * Who wants to play what in one lobby.
 *
 * Up to ten players are active; later joiners wait in a FIFO waitlist and
 * are promoted as active players drop out. Mutations are synchronous and
 * never throw: reaction events can arrive replayed or out of order, so
 * anything that does not apply is a no-op.
 *
 * Ratings are not fetched here. The owner reads `unresolvedIdentities()`
 * after a mutation and reports results through `setRating()`.
 */
export class CandidatePool {
  /** Insertion order is join order. */
  private readonly active = new Map<string, CandidateEntry>();
  /** Insertion order is wait order. */
  private readonly waitlist = new Map<string, CandidateEntry>();

  constructor(private readonly defaultRating = DEFAULT_RATING) {}

  registerIntent(
    identity: string,
    role: LaneRole,
    wantsRole: boolean,
  ): IntentResult {
    return wantsRole
      ? this.addRole(identity, role)
      : this.removeRole(identity, role);
  }

  isReady(): boolean {
    return this.active.size === LOBBY_CAPACITY;
  }

  state(): LobbyState {
    return this.isReady() ? 'READY' : 'FILLING';
  }

  get activeCount(): number {
    return this.active.size;
  }

  get waitlistCount(): number {
    return this.waitlist.size;
  }

  hasIdentity(identity: string): boolean {
    return this.active.has(identity) || this.waitlist.has(identity);
  }

  /**
   * The ten active players, with the default rating standing in for any
   * lookup that has not resolved yet.
   *
   * @throws PoolNotReadyError when fewer than ten players are active
   */
  snapshot(): RatedCandidate[] {
    if (!this.isReady()) {
      throw new PoolNotReadyError(this.active.size);
    }
    return [...this.active.values()].map((entry) => ({
      identity: entry.identity,
      desiredRoles: new Set(entry.roles),
      rating: entry.rating ?? this.defaultRating,
    }));
  }

  status(): LobbyStatusDto {
    return {
      state: this.state(),
      count: this.active.size,
      capacity: LOBBY_CAPACITY,
      candidates: [...this.active.values()].map((entry) => ({
        identity: entry.identity,
        roles: sortRoles(entry.roles),
        rating: entry.rating ?? this.defaultRating,
        riotId: entry.riotId,
      })),
      waitlist: [...this.waitlist.keys()],
      waitlistCount: this.waitlist.size,
    };
  }

  /** Active players whose rating has not been resolved yet. */
  unresolvedIdentities(): string[] {
    return [...this.active.values()]
      .filter((entry) => entry.rating === null)
      .map((entry) => entry.identity);
  }

  /**
   * Record a looked-up rating and the Riot ID it came from. The first value
   * wins; ratings are fixed for the lifetime of the lobby. Unknown
   * identities are ignored.
   */
  setRating(
    identity: string,
    rating: number,
    riotId: string | null = null,
  ): void {
    const entry = this.active.get(identity) ?? this.waitlist.get(identity);
    if (!entry || entry.rating !== null) return;
    entry.rating = Math.round(rating);
    entry.riotId = riotId;
  }

  clear(): void {
    this.active.clear();
    this.waitlist.clear();
  }

  private addRole(identity: string, role: LaneRole): IntentResult {
    const existing = this.active.get(identity);
    if (existing) {
      const changed = !existing.roles.has(role);
      existing.roles.add(role);
      return { changed, promoted: null, placement: 'active' };
    }

    const waiting = this.waitlist.get(identity);
    if (waiting) {
      const changed = !waiting.roles.has(role);
      waiting.roles.add(role);
      return { changed, promoted: null, placement: 'waitlist' };
    }

    const entry: CandidateEntry = {
      identity,
      roles: new Set([role]),
      rating: null,
      riotId: null,
    };
    if (this.active.size < LOBBY_CAPACITY) {
      this.active.set(identity, entry);
      return { changed: true, promoted: null, placement: 'active' };
    }
    this.waitlist.set(identity, entry);
    return { changed: true, promoted: null, placement: 'waitlist' };
  }

  private removeRole(identity: string, role: LaneRole): IntentResult {
    const waiting = this.waitlist.get(identity);
    if (waiting) {
      if (!waiting.roles.delete(role)) {
        return { changed: false, promoted: null, placement: 'waitlist' };
      }
      if (waiting.roles.size > 0) {
        return { changed: true, promoted: null, placement: 'waitlist' };
      }
      this.waitlist.delete(identity);
      return { changed: true, promoted: null, placement: 'removed' };
    }

    const entry = this.active.get(identity);
    if (!entry) {
      return { changed: false, promoted: null, placement: 'none' };
    }
    if (!entry.roles.delete(role)) {
      return { changed: false, promoted: null, placement: 'active' };
    }
    if (entry.roles.size > 0) {
      return { changed: true, promoted: null, placement: 'active' };
    }

    this.active.delete(identity);
    return {
      changed: true,
      promoted: this.promoteNext(),
      placement: 'removed',
    };
  }

  private promoteNext(): string | null {
    const next = this.waitlist.values().next();
    if (next.done) return null;
    this.waitlist.delete(next.value.identity);
    this.active.set(next.value.identity, next.value);
    return next.value.identity;
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import type { LobbyStatusDto } from '@rift-lobby/contract';
import { CandidatePool } from './candidate-pool';
import { normalizeRoleName } from './lane-role.util';
import { DEFAULT_LOBBY_IDLE_TIMEOUT_MINUTES } from './lol-custom.constants';
import { RatingService, type PlayerProfile } from './rating.service';
import { solveTeams, type TeamAssignment } from './team-solver';

interface Lobby {
  id: string;
  channelId: string;
  pool: CandidatePool;
  /** Lookups resolved during this lobby, kept across leave/rejoin. */
  profiles: Map<string, PlayerProfile>;
  /** In-flight lookups, so one player is never looked up twice at once. */
  pendingLookups: Map<string, Promise<void>>;
  /** Teams are being posted; reactions are dropped until this settles. */
  posting: boolean;
  lastActivityAt: number;
}

export interface LobbyUpdate {
  lobbyId: string;
  channelId: string;
  changed: boolean;
  status: LobbyStatusDto;
  /** Present whenever the pool is READY after the event. */
  assignment: TeamAssignment | null;
}

/**
 * Owns one candidate pool per open lobby message.
 *
 * Reaction events mutate the pool synchronously in arrival order. Rating
 * lookups run afterwards, outside the mutation, each bounded by the rating
 * service timeout. Whenever the pool is READY the teams are re-solved from
 * scratch.
 */
@Injectable()
export class LobbyManagerService {
  private readonly logger = new Logger(LobbyManagerService.name);
  private readonly lobbies = new Map<string, Lobby>();
  private readonly idleTimeoutMs: number;

  constructor(
    private readonly ratingService: RatingService,
    configService: ConfigService,
  ) {
    this.idleTimeoutMs =
      configService.get<number>(
        'LOBBY_IDLE_TIMEOUT_MINUTES',
        DEFAULT_LOBBY_IDLE_TIMEOUT_MINUTES,
      ) *
      60 *
      1000;
  }

  /**
   * Start tracking a lobby message. Re-opening an existing lobby resets it.
   */
  open(lobbyId: string, channelId: string): LobbyStatusDto {
    const now = Date.now();
    const lobby: Lobby = {
      id: lobbyId,
      channelId,
      pool: new CandidatePool(this.ratingService.getDefaultRating()),
      profiles: new Map(),
      pendingLookups: new Map(),
      posting: false,
      lastActivityAt: now,
    };
    this.lobbies.set(lobbyId, lobby);
    this.logger.log(`Opened lobby ${lobbyId} in channel ${channelId}`);
    return lobby.pool.status();
  }

  isTracked(lobbyId: string): boolean {
    return this.lobbies.has(lobbyId);
  }

  status(lobbyId: string): LobbyStatusDto | null {
    return this.lobbies.get(lobbyId)?.pool.status() ?? null;
  }

  /**
   * Freeze a READY lobby while its teams are posted. Until
   * `finishPosting` runs, `registerIntent` drops every event for it.
   * @returns false if the lobby is not open or is already posting
   */
  beginPosting(lobbyId: string): boolean {
    const lobby = this.lobbies.get(lobbyId);
    if (!lobby || lobby.posting) return false;
    lobby.posting = true;
    return true;
  }

  /**
   * End a posting attempt. A posted lobby is closed; a failed one opens
   * to reactions again, so the next event re-solves and retries.
   */
  finishPosting(lobbyId: string, posted: boolean): void {
    const lobby = this.lobbies.get(lobbyId);
    if (!lobby) return;
    if (posted) {
      this.close(lobbyId);
      return;
    }
    lobby.posting = false;
    this.logger.warn(
      `Lobby ${lobbyId}: posting teams failed, lobby stays open`,
    );
  }

  /**
   * Stop tracking a lobby (teams posted or lobby abandoned).
   * @returns false if the lobby was not open
   */
  close(lobbyId: string): boolean {
    const lobby = this.lobbies.get(lobbyId);
    if (!lobby) return false;
    lobby.pool.clear();
    this.lobbies.delete(lobbyId);
    this.logger.log(`Closed lobby ${lobbyId}`);
    return true;
  }

  /**
   * Apply a role reaction to a lobby.
   *
   * @param roleName emoji name or role shorthand; non-role emojis are ignored
   * @param wantsRole true for a reaction add, false for a removal
   * @returns null when the lobby is not open or is posting teams, the emoji
   *   is not a role, or the lobby closed while ratings were resolving
   */
  async registerIntent(
    lobbyId: string,
    identity: string,
    roleName: string | null,
    wantsRole: boolean,
  ): Promise<LobbyUpdate | null> {
    const lobby = this.lobbies.get(lobbyId);
    if (!lobby || lobby.posting) return null;

    const role = normalizeRoleName(roleName);
    if (!role) return null;

    const result = lobby.pool.registerIntent(identity, role, wantsRole);
    lobby.lastActivityAt = Date.now();

    if (result.promoted) {
      this.logger.log(
        `Lobby ${lobbyId}: promoted ${result.promoted} from the waitlist`,
      );
    }

    await this.resolveRatings(lobby);

    if (this.lobbies.get(lobbyId) !== lobby || lobby.posting) return null;

    return {
      lobbyId,
      channelId: lobby.channelId,
      changed: result.changed,
      status: lobby.pool.status(),
      assignment: lobby.pool.isReady()
        ? solveTeams(lobby.pool.snapshot())
        : null,
    };
  }

  /**
   * Drop lobbies with no activity within the idle timeout.
   * @returns number of lobbies closed
   */
  @Cron(CronExpression.EVERY_MINUTE, { name: 'LobbyManagerService_sweepIdle' })
  sweepIdle(now: number = Date.now()): number {
    let closed = 0;
    for (const lobby of [...this.lobbies.values()]) {
      if (now - lobby.lastActivityAt >= this.idleTimeoutMs) {
        this.close(lobby.id);
        closed++;
      }
    }
    if (closed > 0) {
      this.logger.log(`Closed ${closed} idle lobby(ies)`);
    }
    return closed;
  }

  private async resolveRatings(lobby: Lobby): Promise<void> {
    const lookups = lobby.pool.unresolvedIdentities().map((identity) => {
      const known = lobby.profiles.get(identity);
      if (known) {
        lobby.pool.setRating(identity, known.rating, known.riotId);
        return Promise.resolve();
      }

      let pending = lobby.pendingLookups.get(identity);
      if (!pending) {
        pending = this.ratingService
          .lookupPlayer(identity)
          .then((profile) => {
            lobby.profiles.set(identity, profile);
            lobby.pool.setRating(identity, profile.rating, profile.riotId);
          })
          .finally(() => {
            lobby.pendingLookups.delete(identity);
          });
        lobby.pendingLookups.set(identity, pending);
      }
      return pending;
    });

    await Promise.all(lookups);
  }
}

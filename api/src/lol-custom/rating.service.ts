import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AccountsService } from '../accounts/accounts.service';
import { RiotApiService } from '../riot/riot-api.service';
import { RANKED_QUEUES } from '../riot/riot.constants';
import { rankToRating } from '../riot/rank-rating.util';
import {
  DEFAULT_RATING,
  DEFAULT_RATING_LOOKUP_TIMEOUT_MS,
} from './lol-custom.constants';

export interface PlayerProfile {
  rating: number;
  /** `Name#TAG`, or null when no linked account could be named */
  riotId: string | null;
}

function formatRiotId(
  gameName: string | null | undefined,
  tagLine: string | null | undefined,
): string | null {
  return gameName && tagLine ? `${gameName}#${tagLine}` : null;
}

/**
 * Resolves a Discord user's lobby rating and Riot ID from their linked
 * Riot account.
 *
 * Solo queue is preferred, then flex. No link, no ranked entry, an API
 * error or a slow response all yield the default rating.
 */
@Injectable()
export class RatingService {
  private readonly logger = new Logger(RatingService.name);
  private readonly defaultRating: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly accountsService: AccountsService,
    private readonly riotApi: RiotApiService,
    configService: ConfigService,
  ) {
    this.defaultRating = configService.get<number>(
      'LOBBY_DEFAULT_RATING',
      DEFAULT_RATING,
    );
    this.timeoutMs = configService.get<number>(
      'RATING_LOOKUP_TIMEOUT_MS',
      DEFAULT_RATING_LOOKUP_TIMEOUT_MS,
    );
  }

  getDefaultRating(): number {
    return this.defaultRating;
  }

  /**
   * Never rejects. Resolves to the default rating after `timeoutMs`.
   */
  async lookupPlayer(discordId: string): Promise<PlayerProfile> {
    const fallback: PlayerProfile = { rating: this.defaultRating, riotId: null };

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<PlayerProfile>((resolve) => {
      timer = setTimeout(() => {
        this.logger.warn(
          `Rating lookup for ${discordId} timed out after ${this.timeoutMs}ms, using default`,
        );
        resolve(fallback);
      }, this.timeoutMs);
    });

    const lookup = this.fetchProfile(discordId).catch((error: unknown) => {
      this.logger.warn(
        `Rating lookup for ${discordId} failed, using default: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return fallback;
    });

    try {
      return await Promise.race([lookup, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async fetchProfile(discordId: string): Promise<PlayerProfile> {
    const account = await this.accountsService.latestAccount(discordId);
    if (!account) {
      this.logger.debug(`No linked Riot account for ${discordId}`);
      return { rating: this.defaultRating, riotId: null };
    }

    const stored = formatRiotId(account.gameName, account.tagLine);
    if (!this.riotApi.isConfigured()) {
      return { rating: this.defaultRating, riotId: stored };
    }

    const [riotId, entries] = await Promise.all([
      stored ?? this.fetchRiotId(account.puuid),
      this.riotApi.getLeagueEntriesByPuuid(account.puuid),
    ]);
    const ranked =
      entries.find((e) => e.queueType === RANKED_QUEUES.SOLO) ??
      entries.find((e) => e.queueType === RANKED_QUEUES.FLEX);
    if (!ranked) {
      this.logger.debug(`Riot account for ${discordId} is unranked`);
      return { rating: this.defaultRating, riotId };
    }

    return {
      rating: rankToRating(ranked.tier, ranked.rank, ranked.leaguePoints),
      riotId,
    };
  }

  /** Links made before the Riot ID was stored only carry a PUUID. */
  private async fetchRiotId(puuid: string): Promise<string | null> {
    try {
      const account = await this.riotApi.getAccountByPuuid(puuid);
      return formatRiotId(account.gameName, account.tagLine);
    } catch (error) {
      this.logger.debug(
        `Riot ID lookup failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return null;
    }
  }
}

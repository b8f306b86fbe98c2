import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { REDIS_CLIENT } from '../redis/redis.module';
import {
  RIOT_CONFIG,
  normalizePlatform,
  normalizeRegion,
  type RegionalRoute,
} from './riot.constants';

/** account-v1 AccountDto */
export interface RiotAccount {
  puuid: string;
  gameName?: string;
  tagLine?: string;
}

/** league-v4 LeagueEntryDTO (fields we read) */
export interface RiotLeagueEntry {
  queueType: string;
  tier?: string;
  rank?: string;
  leaguePoints?: number;
  wins?: number;
  losses?: number;
}

/**
 * Raised for any non-2xx response from the Riot API.
 */
export class RiotApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(`Riot API error ${status}: ${message}`);
    this.name = 'RiotApiError';
  }
}

const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Thin client for the Riot Games REST API.
 * Only the endpoints the lobby needs: Riot ID ↔ PUUID and ranked entries.
 */
@Injectable()
export class RiotApiService {
  private readonly logger = new Logger(RiotApiService.name);
  private readonly platform: string;
  private readonly region: RegionalRoute;
  private readonly timeoutMs: number;

  constructor(
    private readonly configService: ConfigService,
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
  ) {
    this.platform = normalizePlatform(
      this.configService.get<string>('RIOT_PLATFORM'),
    );
    this.region = normalizeRegion(
      this.configService.get<string>('RIOT_REGION'),
    );
    this.timeoutMs = this.configService.get<number>(
      'RIOT_REQUEST_TIMEOUT_MS',
      RIOT_CONFIG.DEFAULT_REQUEST_TIMEOUT_MS,
    );
  }

  isConfigured(): boolean {
    return Boolean(this.configService.get<string>('RIOT_API_KEY'));
  }

  async getAccountByRiotId(
    gameName: string,
    tagLine: string,
  ): Promise<RiotAccount> {
    return this.getJson<RiotAccount>(
      `${this.regionBase()}/riot/account/v1/accounts/by-riot-id/${encodeURIComponent(gameName)}/${encodeURIComponent(tagLine)}`,
    );
  }

  async getAccountByPuuid(puuid: string): Promise<RiotAccount> {
    return this.getJson<RiotAccount>(
      `${this.regionBase()}/riot/account/v1/accounts/by-puuid/${encodeURIComponent(puuid)}`,
    );
  }

  /**
   * Ranked entries for a player. Served from Redis for LEAGUE_CACHE_TTL
   * seconds; cache failures fall through to the API.
   */
  async getLeagueEntriesByPuuid(puuid: string): Promise<RiotLeagueEntry[]> {
    const cacheKey = `riot:league:${this.platform}:${puuid}`;

    try {
      const cached = await this.redis.get(cacheKey);
      if (cached) {
        return JSON.parse(cached) as RiotLeagueEntry[];
      }
    } catch (error) {
      this.logger.warn(
        `Redis read failed for ${cacheKey}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }

    const entries = await this.getJson<RiotLeagueEntry[]>(
      `${this.platformBase()}/lol/league/v4/entries/by-puuid/${encodeURIComponent(puuid)}`,
    );

    await this.redis
      .setex(cacheKey, RIOT_CONFIG.LEAGUE_CACHE_TTL, JSON.stringify(entries))
      .catch((error: unknown) => {
        this.logger.warn(
          `Redis write failed for ${cacheKey}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      });

    return entries;
  }

  private platformBase(): string {
    return `https://${this.platform}.api.riotgames.com`;
  }

  private regionBase(): string {
    return `https://${this.region}.api.riotgames.com`;
  }

  /**
   * GET with the API key header. 429s are retried (honoring Retry-After)
   * up to MAX_RATE_LIMIT_RETRIES times.
   * @throws RiotApiError on any other non-2xx response
   */
  private async getJson<T>(url: string): Promise<T> {
    const apiKey = this.configService.get<string>('RIOT_API_KEY');
    if (!apiKey) {
      throw new Error('RIOT_API_KEY is not configured');
    }

    for (let attempt = 0; ; attempt++) {
      const response = await fetch(url, {
        headers: { 'X-Riot-Token': apiKey },
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (
        response.status === 429 &&
        attempt < RIOT_CONFIG.MAX_RATE_LIMIT_RETRIES
      ) {
        const retryAfterSec = Number(response.headers.get('Retry-After'));
        const delay = Math.max(
          RIOT_CONFIG.MIN_RETRY_DELAY_MS,
          Number.isFinite(retryAfterSec) ? retryAfterSec * 1000 : 0,
        );
        this.logger.warn(
          `Riot API rate limited, retrying in ${delay}ms (attempt ${attempt + 1}/${RIOT_CONFIG.MAX_RATE_LIMIT_RETRIES})`,
        );
        await sleep(delay);
        continue;
      }

      if (!response.ok) {
        const errorText = await response.text();
        this.logger.debug(
          `Riot API error: ${response.status} ${errorText}`,
        );
        throw new RiotApiError(response.status, response.statusText);
      }

      return (await response.json()) as T;
    }
  }
}

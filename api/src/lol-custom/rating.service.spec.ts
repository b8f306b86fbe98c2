import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { RatingService } from './rating.service';
import { AccountsService } from '../accounts/accounts.service';
import { RiotApiService, RiotApiError } from '../riot/riot-api.service';

function createConfig(values: Record<string, unknown> = {}) {
  return {
    get: jest.fn((key: string, fallback?: unknown) => values[key] ?? fallback),
  };
}

const linkedAccount = {
  discordId: 'user-1',
  puuid: 'puuid-1',
  gameName: 'Alice',
  tagLine: 'EUW',
  createdAt: '2026-03-01T12:00:00.000Z',
};

describe('RatingService', () => {
  let service: RatingService;
  let mockAccounts: { latestAccount: jest.Mock };
  let mockRiotApi: {
    isConfigured: jest.Mock;
    getLeagueEntriesByPuuid: jest.Mock;
    getAccountByPuuid: jest.Mock;
  };

  async function createService(config = createConfig()): Promise<void> {
    const module = await Test.createTestingModule({
      providers: [
        RatingService,
        { provide: AccountsService, useValue: mockAccounts },
        { provide: RiotApiService, useValue: mockRiotApi },
        { provide: ConfigService, useValue: config },
      ],
    }).compile();

    service = module.get(RatingService);
  }

  beforeEach(async () => {
    mockAccounts = {
      latestAccount: jest.fn().mockResolvedValue(linkedAccount),
    };
    mockRiotApi = {
      isConfigured: jest.fn().mockReturnValue(true),
      getLeagueEntriesByPuuid: jest.fn().mockResolvedValue([]),
      getAccountByPuuid: jest.fn(),
    };
    await createService();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('uses the solo queue rank', async () => {
    mockRiotApi.getLeagueEntriesByPuuid.mockResolvedValue([
      { queueType: 'RANKED_FLEX_SR', tier: 'DIAMOND', rank: 'I', leaguePoints: 0 },
      { queueType: 'RANKED_SOLO_5x5', tier: 'GOLD', rank: 'II', leaguePoints: 45 },
    ]);

    await expect(service.lookupPlayer('user-1')).resolves.toEqual({
      rating: 1445,
      riotId: 'Alice#EUW',
    });
    expect(mockAccounts.latestAccount).toHaveBeenCalledWith('user-1');
    expect(mockRiotApi.getLeagueEntriesByPuuid).toHaveBeenCalledWith('puuid-1');
    expect(mockRiotApi.getAccountByPuuid).not.toHaveBeenCalled();
  });

  it('falls back to flex when there is no solo entry', async () => {
    mockRiotApi.getLeagueEntriesByPuuid.mockResolvedValue([
      { queueType: 'RANKED_FLEX_SR', tier: 'SILVER', rank: 'IV', leaguePoints: 30 },
    ]);

    await expect(service.lookupPlayer('user-1')).resolves.toEqual({
      rating: 830,
      riotId: 'Alice#EUW',
    });
  });

  it('returns the default rating for unranked players', async () => {
    mockRiotApi.getLeagueEntriesByPuuid.mockResolvedValue([
      { queueType: 'CHERRY', tier: 'GOLD', rank: 'I', leaguePoints: 10 },
    ]);

    await expect(service.lookupPlayer('user-1')).resolves.toEqual({
      rating: 1400,
      riotId: 'Alice#EUW',
    });
  });

  it('asks Riot for the name when the link has none stored', async () => {
    mockAccounts.latestAccount.mockResolvedValue({
      ...linkedAccount,
      gameName: null,
      tagLine: null,
    });
    mockRiotApi.getAccountByPuuid.mockResolvedValue({
      puuid: 'puuid-1',
      gameName: 'Renamed',
      tagLine: 'NA1',
    });

    await expect(service.lookupPlayer('user-1')).resolves.toEqual({
      rating: 1400,
      riotId: 'Renamed#NA1',
    });
    expect(mockRiotApi.getAccountByPuuid).toHaveBeenCalledWith('puuid-1');
  });

  it('keeps the rating when only the name lookup fails', async () => {
    mockAccounts.latestAccount.mockResolvedValue({
      ...linkedAccount,
      gameName: null,
      tagLine: null,
    });
    mockRiotApi.getAccountByPuuid.mockRejectedValue(
      new RiotApiError(404, 'Not Found'),
    );
    mockRiotApi.getLeagueEntriesByPuuid.mockResolvedValue([
      { queueType: 'RANKED_SOLO_5x5', tier: 'GOLD', rank: 'IV', leaguePoints: 0 },
    ]);

    await expect(service.lookupPlayer('user-1')).resolves.toEqual({
      rating: 1200,
      riotId: null,
    });
  });

  it('returns the default when no Riot account is linked', async () => {
    mockAccounts.latestAccount.mockResolvedValue(null);

    await expect(service.lookupPlayer('user-1')).resolves.toEqual({
      rating: 1400,
      riotId: null,
    });
    expect(mockRiotApi.getLeagueEntriesByPuuid).not.toHaveBeenCalled();
  });

  it('shows the stored Riot ID when the Riot API is not configured', async () => {
    mockRiotApi.isConfigured.mockReturnValue(false);

    await expect(service.lookupPlayer('user-1')).resolves.toEqual({
      rating: 1400,
      riotId: 'Alice#EUW',
    });
    expect(mockRiotApi.getLeagueEntriesByPuuid).not.toHaveBeenCalled();
  });

  it('returns the default when the Riot API fails', async () => {
    mockRiotApi.getLeagueEntriesByPuuid.mockRejectedValue(
      new RiotApiError(503, 'Service Unavailable'),
    );

    await expect(service.lookupPlayer('user-1')).resolves.toEqual({
      rating: 1400,
      riotId: null,
    });
  });

  it('returns the default when the database fails', async () => {
    mockAccounts.latestAccount.mockRejectedValue(new Error('connection reset'));

    await expect(service.lookupPlayer('user-1')).resolves.toEqual({
      rating: 1400,
      riotId: null,
    });
  });

  it('gives up after the lookup timeout', async () => {
    jest.useFakeTimers();
    mockAccounts.latestAccount.mockReturnValue(new Promise<never>(() => {}));

    const profile = service.lookupPlayer('user-1');
    await jest.advanceTimersByTimeAsync(3000);

    await expect(profile).resolves.toEqual({ rating: 1400, riotId: null });
  });

  it('reads the default rating and timeout from config', async () => {
    jest.useFakeTimers();
    await createService(
      createConfig({ LOBBY_DEFAULT_RATING: 1500, RATING_LOOKUP_TIMEOUT_MS: 50 }),
    );
    mockAccounts.latestAccount.mockReturnValue(new Promise<never>(() => {}));

    const profile = service.lookupPlayer('user-1');
    await jest.advanceTimersByTimeAsync(50);

    await expect(profile).resolves.toEqual({ rating: 1500, riotId: null });
    expect(service.getDefaultRating()).toBe(1500);
  });
});

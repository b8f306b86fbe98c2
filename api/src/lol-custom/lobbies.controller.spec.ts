import { Test } from '@nestjs/testing';
import { NotFoundException } from '@nestjs/common';
import { LobbiesController } from './lobbies.controller';
import { LobbyManagerService } from './lobby-manager.service';

describe('LobbiesController', () => {
  let controller: LobbiesController;
  let mockLobbyManager: { status: jest.Mock };

  beforeEach(async () => {
    mockLobbyManager = { status: jest.fn() };

    const module = await Test.createTestingModule({
      controllers: [LobbiesController],
      providers: [{ provide: LobbyManagerService, useValue: mockLobbyManager }],
    }).compile();

    controller = module.get(LobbiesController);
  });

  it('returns the pool status for an open lobby', () => {
    const status = {
      state: 'FILLING',
      count: 1,
      capacity: 10,
      candidates: [
        { identity: '111', roles: ['MID'], rating: 1400, riotId: null },
      ],
      waitlist: [],
      waitlistCount: 0,
    };
    mockLobbyManager.status.mockReturnValue(status);

    expect(controller.getStatus('msg-1')).toBe(status);
    expect(mockLobbyManager.status).toHaveBeenCalledWith('msg-1');
  });

  it('throws 404 for a lobby that is not open', () => {
    mockLobbyManager.status.mockReturnValue(null);

    expect(() => controller.getStatus('msg-2')).toThrow(NotFoundException);
    expect(() => controller.getStatus('msg-2')).toThrow(
      'Lobby msg-2 is not open',
    );
  });
});

/* eslint-disable @typescript-eslint/unbound-method */
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { REST, Routes } from 'discord.js';
import { RegisterCommandsService } from './register-commands';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { LolCustomCommand } from './lolcustom.command';
import { LolCustomDemoCommand } from './lolcustom-demo.command';
import { LinkCommand } from './link.command';
import { UnlinkCommand } from './unlink.command';

jest.mock('discord.js', () => {
  const actual = jest.requireActual<typeof import('discord.js')>('discord.js');
  return {
    ...actual,
    REST: jest.fn(),
    Routes: {
      applicationCommands: jest.fn().mockReturnValue('/route'),
    },
  };
});

function mockCommand(name: string) {
  return {
    commandName: name,
    getDefinition: jest.fn().mockReturnValue({ name, description: name }),
    handleInteraction: jest.fn(),
  };
}

describe('RegisterCommandsService', () => {
  let service: RegisterCommandsService;
  let clientService: { getClientId: jest.Mock };
  let config: Record<string, string | undefined>;
  let mockRestPut: jest.Mock;
  let mockSetToken: jest.Mock;

  beforeEach(async () => {
    mockRestPut = jest.fn().mockResolvedValue({});
    mockSetToken = jest.fn();
    (REST as unknown as jest.Mock).mockImplementation(() => {
      const rest = { setToken: mockSetToken, put: mockRestPut };
      mockSetToken.mockReturnValue(rest);
      return rest;
    });

    config = { DISCORD_BOT_TOKEN: 'test-token' };
    clientService = { getClientId: jest.fn().mockReturnValue('client-456') };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RegisterCommandsService,
        { provide: DiscordBotClientService, useValue: clientService },
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => config[key]) },
        },
        { provide: LolCustomCommand, useValue: mockCommand('lolcustom') },
        {
          provide: LolCustomDemoCommand,
          useValue: mockCommand('lolcustom-demo'),
        },
        { provide: LinkCommand, useValue: mockCommand('link') },
        { provide: UnlinkCommand, useValue: mockCommand('unlink') },
      ],
    }).compile();

    service = module.get(RegisterCommandsService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('registerCommands', () => {
    it('registers every command globally', async () => {
      await service.registerCommands();

      expect(mockSetToken).toHaveBeenCalledWith('test-token');
      expect(Routes.applicationCommands).toHaveBeenCalledWith('client-456');
      expect(mockRestPut).toHaveBeenCalledWith('/route', {
        body: [
          { name: 'lolcustom', description: 'lolcustom' },
          { name: 'lolcustom-demo', description: 'lolcustom-demo' },
          { name: 'link', description: 'link' },
          { name: 'unlink', description: 'unlink' },
        ],
      });
    });

    it('skips registration without a token', async () => {
      config = {};

      await service.registerCommands();

      expect(REST).not.toHaveBeenCalled();
      expect(mockRestPut).not.toHaveBeenCalled();
    });

    it('skips registration when the client id is unknown', async () => {
      clientService.getClientId.mockReturnValue(null);

      await service.registerCommands();

      expect(mockRestPut).not.toHaveBeenCalled();
    });

    it('logs instead of throwing when Discord rejects the commands', async () => {
      mockRestPut.mockRejectedValue(new Error('Missing Access'));

      await expect(service.registerCommands()).resolves.toBeUndefined();
    });
  });
});

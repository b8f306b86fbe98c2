/* eslint-disable @typescript-eslint/unbound-method */
import { Test, TestingModule } from '@nestjs/testing';
import { InteractionListener } from './interaction.listener';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { GENERIC_COMMAND_ERROR } from '../discord-bot.constants';
import { LolCustomCommand } from '../commands/lolcustom.command';
import { LolCustomDemoCommand } from '../commands/lolcustom-demo.command';
import { LinkCommand } from '../commands/link.command';
import { UnlinkCommand } from '../commands/unlink.command';

type Interaction = Parameters<InteractionListener['handleInteraction']>[0];

function mockCommand(commandName: string) {
  return {
    commandName,
    handleInteraction: jest.fn().mockResolvedValue(undefined),
  };
}

function chatInput(
  commandName: string,
  overrides: Record<string, unknown> = {},
) {
  return {
    isChatInputCommand: () => true,
    commandName,
    replied: false,
    deferred: false,
    reply: jest.fn().mockResolvedValue(undefined),
    followUp: jest.fn().mockResolvedValue(undefined),
    ...overrides,
  };
}

describe('InteractionListener', () => {
  let listener: InteractionListener;
  let mockClient: { on: jest.Mock };
  let clientService: { getClient: jest.Mock };
  let lolCustom: ReturnType<typeof mockCommand>;
  let lolCustomDemo: ReturnType<typeof mockCommand>;
  let link: ReturnType<typeof mockCommand>;
  let unlink: ReturnType<typeof mockCommand>;

  beforeEach(async () => {
    mockClient = { on: jest.fn() };
    clientService = { getClient: jest.fn().mockReturnValue(mockClient) };
    lolCustom = mockCommand('lolcustom');
    lolCustomDemo = mockCommand('lolcustom-demo');
    link = mockCommand('link');
    unlink = mockCommand('unlink');

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        InteractionListener,
        { provide: DiscordBotClientService, useValue: clientService },
        { provide: LolCustomCommand, useValue: lolCustom },
        { provide: LolCustomDemoCommand, useValue: lolCustomDemo },
        { provide: LinkCommand, useValue: link },
        { provide: UnlinkCommand, useValue: unlink },
      ],
    }).compile();

    listener = module.get(InteractionListener);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('attachListener', () => {
    it('registers one interaction handler on the client', () => {
      listener.attachListener();
      listener.attachListener();

      expect(mockClient.on).toHaveBeenCalledTimes(1);
      expect(mockClient.on).toHaveBeenCalledWith(
        'interactionCreate',
        expect.any(Function),
      );
    });

    it('attaches again after a disconnect', () => {
      listener.attachListener();
      listener.detachListener();
      listener.attachListener();

      expect(mockClient.on).toHaveBeenCalledTimes(2);
    });

    it('does nothing without a client', () => {
      clientService.getClient.mockReturnValue(null);

      listener.attachListener();

      expect(mockClient.on).not.toHaveBeenCalled();
    });
  });

  describe('handleInteraction', () => {
    it('routes a command to its handler', async () => {
      const interaction = chatInput('link');

      await listener.handleInteraction(
        interaction as unknown as Interaction,
      );

      expect(link.handleInteraction).toHaveBeenCalledWith(interaction);
      expect(lolCustom.handleInteraction).not.toHaveBeenCalled();
      expect(unlink.handleInteraction).not.toHaveBeenCalled();
    });

    it('ignores interactions that are not slash commands', async () => {
      const interaction = chatInput('lolcustom', {
        isChatInputCommand: () => false,
      });

      await listener.handleInteraction(
        interaction as unknown as Interaction,
      );

      expect(lolCustom.handleInteraction).not.toHaveBeenCalled();
    });

    it('ignores unknown commands', async () => {
      const interaction = chatInput('queue');

      await listener.handleInteraction(
        interaction as unknown as Interaction,
      );

      expect(interaction.reply).not.toHaveBeenCalled();
      expect(lolCustomDemo.handleInteraction).not.toHaveBeenCalled();
    });

    it('replies with a generic error when a handler throws', async () => {
      lolCustom.handleInteraction.mockRejectedValue(new Error('boom'));
      const interaction = chatInput('lolcustom');

      await listener.handleInteraction(
        interaction as unknown as Interaction,
      );

      expect(interaction.reply).toHaveBeenCalledWith({
        content: GENERIC_COMMAND_ERROR,
        ephemeral: true,
      });
      expect(interaction.followUp).not.toHaveBeenCalled();
    });

    it('follows up when the handler already deferred', async () => {
      unlink.handleInteraction.mockRejectedValue(new Error('boom'));
      const interaction = chatInput('unlink', { deferred: true });

      await listener.handleInteraction(
        interaction as unknown as Interaction,
      );

      expect(interaction.followUp).toHaveBeenCalledWith({
        content: GENERIC_COMMAND_ERROR,
        ephemeral: true,
      });
      expect(interaction.reply).not.toHaveBeenCalled();
    });

    it('does not throw when the error reply fails too', async () => {
      link.handleInteraction.mockRejectedValue(new Error('boom'));
      const interaction = chatInput('link', {
        reply: jest.fn().mockRejectedValue(new Error('Unknown interaction')),
      });

      await expect(
        listener.handleInteraction(interaction as unknown as Interaction),
      ).resolves.toBeUndefined();
    });
  });
});

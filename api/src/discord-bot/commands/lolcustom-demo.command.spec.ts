import { Test, TestingModule } from '@nestjs/testing';
import type { APIEmbed } from 'discord.js';
import { LolCustomDemoCommand, buildDemoRoster } from './lolcustom-demo.command';
import {
  LobbyEmbedFactory,
  TEAMS_EMBED_TITLE,
} from '../services/lobby-embed.factory';
import { RoleEmojiService } from '../services/role-emoji.service';

describe('buildDemoRoster', () => {
  it('builds ten players, two per role', () => {
    const roster = buildDemoRoster();

    expect(roster).toHaveLength(10);
    expect(roster[0]).toEqual({
      identity: 'demo1',
      desiredRoles: new Set(['TOP']),
      rating: 1200,
    });
    expect(roster[9]).toEqual({
      identity: 'demo10',
      desiredRoles: new Set(['SUPPORT']),
      rating: 1560,
    });
  });
});

describe('LolCustomDemoCommand', () => {
  let command: LolCustomDemoCommand;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LolCustomDemoCommand,
        LobbyEmbedFactory,
        { provide: RoleEmojiService, useValue: { getDisplay: jest.fn() } },
      ],
    }).compile();

    command = module.get(LolCustomDemoCommand);
  });

  it('is named "lolcustom-demo"', () => {
    expect(command.getDefinition().name).toBe('lolcustom-demo');
  });

  it('replies privately with balanced demo teams', async () => {
    const interaction = { reply: jest.fn().mockResolvedValue(undefined) };

    await command.handleInteraction(
      interaction as unknown as Parameters<
        typeof command.handleInteraction
      >[0],
    );

    expect(interaction.reply).toHaveBeenCalledTimes(1);
    const [{ embeds, ephemeral }] = interaction.reply.mock.calls[0] as [
      { embeds: Array<{ toJSON(): APIEmbed }>; ephemeral: boolean },
    ];
    const embed = embeds[0].toJSON();
    expect(ephemeral).toBe(true);
    expect(embed.title).toBe(TEAMS_EMBED_TITLE);
    // Each role pair differs by 200, and five pairs cannot cancel out
    expect(embed.description?.split('\n').pop()).toBe('Rating gap: 200');
    expect(embed.description?.split('\n')[1]).toBe('- TOP: `demo1` (1200)');
  });
});

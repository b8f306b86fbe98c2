import { Injectable, Logger } from '@nestjs/common';
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { LANE_ROLES, LOBBY_CAPACITY } from '@rift-lobby/contract';
import { LobbyManagerService } from '../../lol-custom/lobby-manager.service';
import { LobbyEmbedFactory } from '../services/lobby-embed.factory';
import { RoleEmojiService } from '../services/role-emoji.service';
import type { SlashCommandHandler } from './register-commands';
import type { CommandInteractionHandler } from '../listeners/interaction.listener';

/**
 * /lolcustom: post a lobby message that players join by reacting with roles.
 */
@Injectable()
export class LolCustomCommand
  implements SlashCommandHandler, CommandInteractionHandler
{
  readonly commandName = 'lolcustom';
  private readonly logger = new Logger(LolCustomCommand.name);

  constructor(
    private readonly lobbyManager: LobbyManagerService,
    private readonly embedFactory: LobbyEmbedFactory,
    private readonly roleEmojiService: RoleEmojiService,
  ) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName(this.commandName)
      .setDescription('Start a 5v5 custom game lobby with balanced teams')
      .setDMPermission(false)
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    if (!interaction.guildId) {
      await interaction.reply({
        content: 'This command can only be used in a server.',
        ephemeral: true,
      });
      return;
    }

    // The pool is keyed by message id, so the first render is built by hand
    const embed = this.embedFactory.buildLobbyEmbed({
      state: 'FILLING',
      count: 0,
      capacity: LOBBY_CAPACITY,
      candidates: [],
      waitlist: [],
      waitlistCount: 0,
    });

    await interaction.reply({ embeds: [embed] });
    const message = await interaction.fetchReply();

    this.lobbyManager.open(message.id, message.channelId);

    for (const role of LANE_ROLES) {
      const emoji = this.roleEmojiService.getReactionEmoji(role);
      try {
        await message.react(emoji);
      } catch (error) {
        this.logger.warn(
          `Failed to add ${role} reaction to lobby ${message.id}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      }
    }
  }
}

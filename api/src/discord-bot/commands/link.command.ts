import { Injectable, Logger } from '@nestjs/common';
import {
  SlashCommandBuilder,
  EmbedBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { RiotIdSchema } from '@rift-lobby/contract';
import { AccountsService } from '../../accounts/accounts.service';
import { RiotApiError, RiotApiService } from '../../riot/riot-api.service';
import { EMBED_COLORS } from '../discord-bot.constants';
import type { SlashCommandHandler } from './register-commands';
import type { CommandInteractionHandler } from '../listeners/interaction.listener';

@Injectable()
export class LinkCommand
  implements SlashCommandHandler, CommandInteractionHandler
{
  readonly commandName = 'link';
  private readonly logger = new Logger(LinkCommand.name);

  constructor(
    private readonly accountsService: AccountsService,
    private readonly riotApi: RiotApiService,
  ) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName(this.commandName)
      .setDescription('Link your Riot account so lobbies use your rank')
      .addStringOption((opt) =>
        opt
          .setName('riot_id')
          .setDescription('Your Riot ID, e.g. Name#TAG')
          .setRequired(true),
      )
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    await interaction.deferReply({ ephemeral: true });

    const parsed = RiotIdSchema.safeParse(
      interaction.options.getString('riot_id', true),
    );
    if (!parsed.success) {
      await interaction.editReply(
        'Riot ID must look like **Name#TAG** (3-16 character name, 3-5 character tag).',
      );
      return;
    }
    const { gameName, tagLine } = parsed.data;

    if (!this.riotApi.isConfigured()) {
      await interaction.editReply(
        'Riot account linking is not available on this bot.',
      );
      return;
    }

    let puuid: string;
    let resolvedName: string;
    let resolvedTag: string;
    try {
      const account = await this.riotApi.getAccountByRiotId(gameName, tagLine);
      puuid = account.puuid;
      resolvedName = account.gameName ?? gameName;
      resolvedTag = account.tagLine ?? tagLine;
    } catch (error) {
      if (error instanceof RiotApiError && error.status === 404) {
        await interaction.editReply(
          `Riot account not found: **${gameName}#${tagLine}**`,
        );
        return;
      }
      this.logger.error(
        `Riot lookup failed for ${gameName}#${tagLine}:`,
        error,
      );
      await interaction.editReply(
        'Failed to look up that Riot account. Please try again.',
      );
      return;
    }

    await this.accountsService.link({
      discordId: interaction.user.id,
      puuid,
      gameName: resolvedName,
      tagLine: resolvedTag,
    });

    const embed = new EmbedBuilder()
      .setColor(EMBED_COLORS.ACCOUNT)
      .setTitle('Riot Account Linked')
      .setDescription(
        `Linked **${resolvedName}#${resolvedTag}** to <@${interaction.user.id}>.`,
      );
    await interaction.editReply({ embeds: [embed] });
  }
}

import { Injectable } from '@nestjs/common';
import {
  SlashCommandBuilder,
  EmbedBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { RiotIdSchema } from '@rift-lobby/contract';
import { AccountsService } from '../../accounts/accounts.service';
import { EMBED_COLORS } from '../discord-bot.constants';
import type { SlashCommandHandler } from './register-commands';
import type { CommandInteractionHandler } from '../listeners/interaction.listener';

@Injectable()
export class UnlinkCommand
  implements SlashCommandHandler, CommandInteractionHandler
{
  readonly commandName = 'unlink';

  constructor(private readonly accountsService: AccountsService) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName(this.commandName)
      .setDescription('Unlink one or all of your Riot accounts')
      .addStringOption((opt) =>
        opt
          .setName('riot_id')
          .setDescription('Riot ID to unlink (leave empty to unlink all)'),
      )
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    await interaction.deferReply({ ephemeral: true });

    const discordId = interaction.user.id;
    const riotIdValue = interaction.options.getString('riot_id');

    if (!riotIdValue) {
      const removed = await this.accountsService.unlink(discordId);
      if (removed === 0) {
        await interaction.editReply('You have no linked Riot accounts.');
        return;
      }
      await interaction.editReply({
        embeds: [this.buildEmbed(`Removed ${removed} linked Riot account(s).`)],
      });
      return;
    }

    const parsed = RiotIdSchema.safeParse(riotIdValue);
    if (!parsed.success) {
      await interaction.editReply('Riot ID must look like **Name#TAG**.');
      return;
    }
    const { gameName, tagLine } = parsed.data;

    // Stored names keep Riot's casing; players rarely type it exactly
    const linked = await this.accountsService.listForDiscordUser(discordId);
    const match = linked.find(
      (account) =>
        account.gameName?.toLowerCase() === gameName.toLowerCase() &&
        account.tagLine?.toLowerCase() === tagLine.toLowerCase(),
    );
    if (!match) {
      await interaction.editReply(
        `No linked account matches **${gameName}#${tagLine}**.`,
      );
      return;
    }

    await this.accountsService.unlink(discordId, match.puuid);
    await interaction.editReply({
      embeds: [this.buildEmbed(`Unlinked **${match.gameName}#${match.tagLine}**.`)],
    });
  }

  private buildEmbed(description: string): EmbedBuilder {
    return new EmbedBuilder()
      .setColor(EMBED_COLORS.ERROR)
      .setTitle('Riot Account Unlinked')
      .setDescription(description);
  }
}

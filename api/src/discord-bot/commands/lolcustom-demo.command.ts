import { Injectable } from '@nestjs/common';
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { LANE_ROLES, LOBBY_CAPACITY } from '@rift-lobby/contract';
import {
  solveTeams,
  type RatedCandidate,
} from '../../lol-custom/team-solver';
import { LobbyEmbedFactory } from '../services/lobby-embed.factory';
import type { SlashCommandHandler } from './register-commands';
import type { CommandInteractionHandler } from '../listeners/interaction.listener';

/**
 * Ten synthetic players, two per role, rated 1200 to 1560 in steps of 40.
 */
export function buildDemoRoster(): RatedCandidate[] {
  return Array.from({ length: LOBBY_CAPACITY }, (_, i) => ({
    identity: `demo${i + 1}`,
    desiredRoles: new Set([LANE_ROLES[i % LANE_ROLES.length]]),
    rating: 1200 + i * 40,
  }));
}

/**
 * /lolcustom-demo: balance a fixed roster so admins can see the output
 * without gathering ten people.
 */
@Injectable()
export class LolCustomDemoCommand
  implements SlashCommandHandler, CommandInteractionHandler
{
  readonly commandName = 'lolcustom-demo';

  constructor(private readonly embedFactory: LobbyEmbedFactory) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName(this.commandName)
      .setDescription('Preview team balancing with a demo roster')
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const assignment = solveTeams(buildDemoRoster());
    const embed = this.embedFactory.buildTeamsEmbed(
      assignment,
      (identity) => `\`${identity}\``,
    );
    await interaction.reply({ embeds: [embed], ephemeral: true });
  }
}

import { Injectable } from '@nestjs/common';
import { EmbedBuilder } from 'discord.js';
import { LANE_ROLES, type LobbyStatusDto } from '@rift-lobby/contract';
import type { TeamAssignment, TeamRoster } from '../../lol-custom/team-solver';
import { EMBED_COLORS } from '../discord-bot.constants';
import { RoleEmojiService } from './role-emoji.service';

export const LOBBY_EMBED_TITLE = 'LoL Custom Queue';
export const TEAMS_EMBED_TITLE = 'LoL Custom Teams';

/** Discord rejects empty field values. */
const column = (rows: string[]): string => rows.join('\n') || '-';

/** How a player identity is written into embed text. */
export type PlayerFormatter = (identity: string) => string;

export const mentionPlayer: PlayerFormatter = (identity) => `<@${identity}>`;

/**
 * Builds the two embeds a lobby message cycles through: the waiting
 * embed while players react, then the teams embed once ten are in.
 */
@Injectable()
export class LobbyEmbedFactory {
  constructor(private readonly roleEmojiService: RoleEmojiService) {}

  buildLobbyEmbed(status: LobbyStatusDto): EmbedBuilder {
    const players = status.candidates.map((c) => mentionPlayer(c.identity));
    const ratings = status.candidates.map((c) =>
      c.riotId ? `${c.riotId} (${c.rating})` : String(c.rating),
    );
    const roles = status.candidates.map((c) =>
      c.roles.map((role) => this.roleEmojiService.getDisplay(role)).join(''),
    );

    const embed = new EmbedBuilder()
      .setColor(EMBED_COLORS.LOBBY)
      .setTitle(LOBBY_EMBED_TITLE)
      .setDescription(
        [
          'React with every role you are willing to play.',
          `Players: ${status.count}/${status.capacity}`,
        ].join('\n'),
      )
      .addFields(
        { name: 'Player', value: column(players), inline: true },
        { name: 'Riot ID (Rating)', value: column(ratings), inline: true },
        { name: 'Roles', value: column(roles), inline: true },
      );

    if (status.waitlistCount > 0) {
      embed.setFooter({ text: `Waitlist: ${status.waitlistCount}` });
    }

    return embed;
  }

  buildTeamsEmbed(
    assignment: TeamAssignment,
    formatPlayer: PlayerFormatter = mentionPlayer,
  ): EmbedBuilder {
    const { teamA, teamB, ratingA, ratingB } = assignment;
    const lines = [
      ...this.teamLines('Team A', teamA, ratingA, formatPlayer),
      '',
      ...this.teamLines('Team B', teamB, ratingB, formatPlayer),
      '',
      `Rating gap: ${assignment.ratingGap}`,
    ];
    if (assignment.preferenceViolations > 0) {
      lines.push(
        `Note: ${assignment.preferenceViolations} role preference violation(s) to make teams valid.`,
      );
    }

    return new EmbedBuilder()
      .setColor(EMBED_COLORS.TEAMS)
      .setTitle(TEAMS_EMBED_TITLE)
      .setDescription(lines.join('\n'));
  }

  private teamLines(
    label: string,
    roster: TeamRoster,
    total: number,
    formatPlayer: PlayerFormatter,
  ): string[] {
    return [
      `**${label}** (total ${total})`,
      ...LANE_ROLES.map((role) => {
        const player = roster[role];
        return `- ${role}: ${formatPlayer(player.identity)} (${player.rating})`;
      }),
    ];
  }
}

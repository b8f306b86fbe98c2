import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  Events,
  type MessageReaction,
  type PartialMessageReaction,
  type PartialUser,
  type User,
} from 'discord.js';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { DISCORD_BOT_EVENTS } from '../discord-bot.constants';
import { LobbyManagerService } from '../../lol-custom/lobby-manager.service';
import { LobbyEmbedFactory } from '../services/lobby-embed.factory';

type AnyReaction = MessageReaction | PartialMessageReaction;
type AnyUser = User | PartialUser;

/**
 * Turns role reactions on lobby messages into pool intents and keeps the
 * lobby message in sync with the result.
 */
@Injectable()
export class ReactionListener {
  private readonly logger = new Logger(ReactionListener.name);
  private listenerAttached = false;

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly lobbyManager: LobbyManagerService,
    private readonly embedFactory: LobbyEmbedFactory,
  ) {}

  @OnEvent(DISCORD_BOT_EVENTS.CONNECTED)
  attachListener(): void {
    const client = this.clientService.getClient();
    if (!client || this.listenerAttached) return;

    client.on(Events.MessageReactionAdd, (reaction, user) => {
      this.handleReaction(reaction, user, true).catch((err: unknown) => {
        this.logger.error('Unhandled error in reaction add handler:', err);
      });
    });
    client.on(Events.MessageReactionRemove, (reaction, user) => {
      this.handleReaction(reaction, user, false).catch((err: unknown) => {
        this.logger.error('Unhandled error in reaction remove handler:', err);
      });
    });

    this.listenerAttached = true;
    this.logger.log('Reaction listener attached');
  }

  @OnEvent(DISCORD_BOT_EVENTS.DISCONNECTED)
  detachListener(): void {
    this.listenerAttached = false;
  }

  /**
   * @param wantsRole true for a reaction add, false for a removal
   */
  async handleReaction(
    reaction: AnyReaction,
    user: AnyUser,
    wantsRole: boolean,
  ): Promise<void> {
    const lobbyId = reaction.message.id;
    if (!this.lobbyManager.isTracked(lobbyId)) return;
    if (user.id === this.clientService.getClientId()) return;

    const fullUser = user.partial ? await user.fetch() : user;
    if (fullUser.bot) return;

    const update = await this.lobbyManager.registerIntent(
      lobbyId,
      fullUser.id,
      reaction.emoji.name,
      wantsRole,
    );
    if (!update) return;

    if (update.assignment) {
      // Only one event posts the teams; the rest are dropped meanwhile
      if (!this.lobbyManager.beginPosting(lobbyId)) return;
      try {
        await this.clientService.editEmbed(
          update.channelId,
          lobbyId,
          this.embedFactory.buildTeamsEmbed(update.assignment),
        );
      } catch (error) {
        this.lobbyManager.finishPosting(lobbyId, false);
        throw error;
      }
      this.lobbyManager.finishPosting(lobbyId, true);
      this.logger.log(
        `Lobby ${lobbyId}: teams posted (gap ${update.assignment.ratingGap}, ${update.assignment.preferenceViolations} violation(s))`,
      );
      return;
    }

    if (!update.changed || !this.lobbyManager.isTracked(lobbyId)) return;

    await this.clientService.editEmbed(
      update.channelId,
      lobbyId,
      this.embedFactory.buildLobbyEmbed(update.status),
    );
  }
}

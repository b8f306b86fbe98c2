import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  Events,
  type Interaction,
  type ChatInputCommandInteraction,
} from 'discord.js';
import { DiscordBotClientService } from '../discord-bot-client.service';
import {
  DISCORD_BOT_EVENTS,
  GENERIC_COMMAND_ERROR,
} from '../discord-bot.constants';
import { LolCustomCommand } from '../commands/lolcustom.command';
import { LolCustomDemoCommand } from '../commands/lolcustom-demo.command';
import { LinkCommand } from '../commands/link.command';
import { UnlinkCommand } from '../commands/unlink.command';

/**
 * Describes a command that can handle slash command interactions.
 */
export interface CommandInteractionHandler {
  readonly commandName: string;
  handleInteraction(interaction: ChatInputCommandInteraction): Promise<void>;
}

/**
 * Listens for slash command interactions and routes them to the
 * matching command handler.
 */
@Injectable()
export class InteractionListener {
  private readonly logger = new Logger(InteractionListener.name);
  private listenerAttached = false;

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly lolCustomCommand: LolCustomCommand,
    private readonly lolCustomDemoCommand: LolCustomDemoCommand,
    private readonly linkCommand: LinkCommand,
    private readonly unlinkCommand: UnlinkCommand,
  ) {}

  private getHandlers(): CommandInteractionHandler[] {
    return [
      this.lolCustomCommand,
      this.lolCustomDemoCommand,
      this.linkCommand,
      this.unlinkCommand,
    ];
  }

  /**
   * Attach the interaction listener when the bot connects.
   */
  @OnEvent(DISCORD_BOT_EVENTS.CONNECTED)
  attachListener(): void {
    const client = this.clientService.getClient();
    if (!client || this.listenerAttached) return;

    client.on(Events.InteractionCreate, (interaction: Interaction) => {
      this.handleInteraction(interaction).catch((err: unknown) => {
        this.logger.error('Unhandled error in interaction handler:', err);
      });
    });

    this.listenerAttached = true;
    this.logger.log('Interaction listener attached');
  }

  /**
   * Reset listener state when bot disconnects (will re-attach on reconnect).
   */
  @OnEvent(DISCORD_BOT_EVENTS.DISCONNECTED)
  detachListener(): void {
    this.listenerAttached = false;
  }

  async handleInteraction(interaction: Interaction): Promise<void> {
    if (!interaction.isChatInputCommand()) return;

    const handler = this.getHandlers().find(
      (h) => h.commandName === interaction.commandName,
    );

    if (!handler) {
      this.logger.warn(`No handler for command: ${interaction.commandName}`);
      return;
    }

    try {
      await handler.handleInteraction(interaction);
    } catch (error) {
      this.logger.error(`Error handling /${interaction.commandName}:`, error);

      const reply = { content: GENERIC_COMMAND_ERROR, ephemeral: true };
      try {
        if (interaction.replied || interaction.deferred) {
          await interaction.followUp(reply);
        } else {
          await interaction.reply(reply);
        }
      } catch (replyError) {
        this.logger.warn(
          `Could not send error reply for /${interaction.commandName}: ${replyError instanceof Error ? replyError.message : 'Unknown error'}`,
        );
      }
    }
  }
}

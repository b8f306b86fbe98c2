import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  Client,
  GatewayIntentBits,
  Events,
  Partials,
  type EmbedBuilder,
  type Message,
} from 'discord.js';
import {
  DISCORD_BOT_EVENTS,
  friendlyDiscordErrorMessage,
} from './discord-bot.constants';

export interface ApplicationEmoji {
  id: string;
  name: string;
  /** Mention form, e.g. `<:top:123>` */
  formatted: string;
}

@Injectable()
export class DiscordBotClientService {
  private readonly logger = new Logger(DiscordBotClientService.name);
  private client: Client | null = null;
  private connecting = false;

  constructor(private readonly eventEmitter: EventEmitter2) {}

  async connect(token: string): Promise<void> {
    // Disconnect any existing client first
    if (this.client) {
      await this.disconnect();
    }

    const client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.GuildMessageReactions,
      ],
      // Reactions on lobby messages posted before a restart arrive uncached
      partials: [
        Partials.Message,
        Partials.Channel,
        Partials.Reaction,
        Partials.User,
      ],
    });
    this.client = client;
    this.connecting = true;

    return new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.connecting = false;
        reject(new Error('Discord bot connection timed out after 15s'));
      }, 15_000);

      client.once(Events.ClientReady, () => {
        clearTimeout(timeout);
        this.connecting = false;
        this.logger.log(`Discord bot connected as ${client.user?.tag}`);

        // emitAsync so async @OnEvent(CONNECTED) handlers (command
        // registration, emoji sync) finish before connect() resolves.
        this.eventEmitter
          .emitAsync(DISCORD_BOT_EVENTS.CONNECTED)
          .catch((err: unknown) => {
            this.logger.error(
              'Error in CONNECTED event handlers:',
              err instanceof Error ? err.message : err,
            );
          })
          .finally(() => {
            resolve();
          });
      });

      client.once(Events.Error, (error: Error) => {
        clearTimeout(timeout);
        this.connecting = false;
        const message = friendlyDiscordErrorMessage(error);
        this.logger.error('Discord bot connection error:', message);
        this.eventEmitter.emit(DISCORD_BOT_EVENTS.ERROR, error);
        reject(new Error(message));
      });

      client.login(token).catch((err: unknown) => {
        clearTimeout(timeout);
        this.connecting = false;
        const message = friendlyDiscordErrorMessage(err);
        this.logger.error('Discord bot login failed:', message);
        this.client = null;
        reject(new Error(message));
      });
    });
  }

  async disconnect(): Promise<void> {
    this.connecting = false;

    if (!this.client) return;

    try {
      await this.client.destroy();
      this.logger.log('Discord bot disconnected');
      this.eventEmitter.emit(DISCORD_BOT_EVENTS.DISCONNECTED);
    } catch (error) {
      this.logger.error('Error disconnecting Discord bot:', error);
    } finally {
      this.client = null;
    }
  }

  isConnected(): boolean {
    return this.client?.isReady() ?? false;
  }

  isConnecting(): boolean {
    return this.connecting;
  }

  /**
   * Get the underlying Discord.js Client instance.
   * Used by listeners to register gateway event handlers.
   */
  getClient(): Client | null {
    return this.client;
  }

  /**
   * Get the bot's application/client ID.
   * Used for slash command registration.
   */
  getClientId(): string | null {
    if (!this.client?.isReady()) return null;
    return this.client.user?.id ?? null;
  }

  /**
   * Replace the embed on an existing message.
   */
  async editEmbed(
    channelId: string,
    messageId: string,
    embed: EmbedBuilder,
  ): Promise<Message> {
    if (!this.client?.isReady()) {
      throw new Error('Discord bot is not connected');
    }

    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !('messages' in channel)) {
      throw new Error(`Channel ${channelId} not found or not a text channel`);
    }

    const message = await channel.messages.fetch(messageId);
    return message.edit({ embeds: [embed] });
  }

  /**
   * Emojis uploaded to the bot application (not a guild).
   */
  async fetchApplicationEmojis(): Promise<ApplicationEmoji[]> {
    const application = this.client?.isReady() ? this.client.application : null;
    if (!application) return [];

    const emojis = await application.emojis.fetch();
    return emojis
      .filter((emoji) => emoji.name !== null)
      .map((emoji) => ({
        id: emoji.id,
        name: emoji.name ?? '',
        formatted: emoji.toString(),
      }));
  }
}

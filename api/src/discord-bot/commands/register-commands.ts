import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OnEvent } from '@nestjs/event-emitter';
import {
  REST,
  Routes,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { DISCORD_BOT_EVENTS } from '../discord-bot.constants';
import { LolCustomCommand } from './lolcustom.command';
import { LolCustomDemoCommand } from './lolcustom-demo.command';
import { LinkCommand } from './link.command';
import { UnlinkCommand } from './unlink.command';

/**
 * Describes a slash command handler that can be registered with Discord.
 */
export interface SlashCommandHandler {
  /** The command definition for Discord API registration */
  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody;
}

/**
 * Registers all slash commands with Discord API on bot startup.
 */
@Injectable()
export class RegisterCommandsService {
  private readonly logger = new Logger(RegisterCommandsService.name);

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly configService: ConfigService,
    private readonly lolCustomCommand: LolCustomCommand,
    private readonly lolCustomDemoCommand: LolCustomDemoCommand,
    private readonly linkCommand: LinkCommand,
    private readonly unlinkCommand: UnlinkCommand,
  ) {}

  /**
   * Collect all command definitions from registered handlers.
   */
  private getCommandHandlers(): SlashCommandHandler[] {
    return [
      this.lolCustomCommand,
      this.lolCustomDemoCommand,
      this.linkCommand,
      this.unlinkCommand,
    ];
  }

  /**
   * Register all slash commands when the bot connects.
   */
  @OnEvent(DISCORD_BOT_EVENTS.CONNECTED)
  async registerCommands(): Promise<void> {
    const token = this.configService.get<string>('DISCORD_BOT_TOKEN');
    if (!token) {
      this.logger.warn(
        'No bot token configured, skipping slash command registration',
      );
      return;
    }

    const commands = this.getCommandHandlers().map((h) => h.getDefinition());

    try {
      const clientId = this.clientService.getClientId();
      if (!clientId) {
        this.logger.warn(
          'Cannot determine bot client ID, skipping command registration',
        );
        return;
      }

      const rest = new REST({ version: '10' }).setToken(token);

      // Global registration; propagation can take a few minutes
      await rest.put(Routes.applicationCommands(clientId), {
        body: commands,
      });

      this.logger.log(
        `Registered ${commands.length} global slash command(s)`,
      );
    } catch (error) {
      this.logger.error('Failed to register slash commands:', error);
    }
  }
}

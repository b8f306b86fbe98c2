import {
  Injectable,
  Logger,
  OnModuleInit,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DiscordBotClientService } from './discord-bot-client.service';

export interface DiscordBotStatus {
  configured: boolean;
  connected: boolean;
  connecting: boolean;
}

@Injectable()
export class DiscordBotService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DiscordBotService.name);

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Auto-connect on startup if a token is configured.
   */
  async onModuleInit(): Promise<void> {
    const token = this.configService.get<string>('DISCORD_BOT_TOKEN');
    if (!token) {
      this.logger.warn('DISCORD_BOT_TOKEN is not set, bot stays offline');
      return;
    }

    try {
      this.logger.log('Discord bot token found, connecting...');
      await this.clientService.connect(token);
    } catch (error) {
      this.logger.error(
        'Failed to auto-connect Discord bot on startup:',
        error instanceof Error ? error.message : error,
      );
    }
  }

  /**
   * Graceful shutdown.
   */
  async onModuleDestroy(): Promise<void> {
    await this.clientService.disconnect();
  }

  getStatus(): DiscordBotStatus {
    return {
      configured: Boolean(this.configService.get<string>('DISCORD_BOT_TOKEN')),
      connected: this.clientService.isConnected(),
      connecting: this.clientService.isConnecting(),
    };
  }
}

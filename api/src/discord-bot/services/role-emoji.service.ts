import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { LANE_ROLES, type LaneRole } from '@rift-lobby/contract';
import {
  DiscordBotClientService,
  type ApplicationEmoji,
} from '../discord-bot-client.service';
import { DISCORD_BOT_EVENTS } from '../discord-bot.constants';
import { normalizeRoleName } from '../../lol-custom/lane-role.util';
import { ROLE_UNICODE_EMOJIS } from '../../lol-custom/lol-custom.constants';

/**
 * Resolves the emoji shown for each lane role.
 *
 * Application emojis named after a role (`top`, `jgl`, `support`, ...) are
 * preferred; anything missing falls back to a unicode emoji.
 */
@Injectable()
export class RoleEmojiService {
  private readonly logger = new Logger(RoleEmojiService.name);

  /** In-memory cache: role -> application emoji */
  private emojiCache = new Map<LaneRole, ApplicationEmoji>();

  constructor(private readonly clientService: DiscordBotClientService) {}

  @OnEvent(DISCORD_BOT_EVENTS.CONNECTED)
  async onBotConnected(): Promise<void> {
    try {
      await this.syncRoleEmojis();
    } catch (error) {
      this.logger.warn(
        `Failed to fetch application emojis, falling back to Unicode: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      this.emojiCache.clear();
    }
  }

  @OnEvent(DISCORD_BOT_EVENTS.DISCONNECTED)
  onBotDisconnected(): void {
    this.emojiCache.clear();
  }

  async syncRoleEmojis(): Promise<void> {
    const emojis = await this.clientService.fetchApplicationEmojis();
    const cache = new Map<LaneRole, ApplicationEmoji>();
    for (const emoji of emojis) {
      const role = normalizeRoleName(emoji.name);
      // First emoji per role wins
      if (role && !cache.has(role)) {
        cache.set(role, emoji);
      }
    }
    this.emojiCache = cache;
    this.logger.log(
      `Resolved ${cache.size}/${LANE_ROLES.length} role emojis from the application`,
    );
  }

  /** Value accepted by `Message.react()`: emoji id or unicode. */
  getReactionEmoji(role: LaneRole): string {
    return this.emojiCache.get(role)?.id ?? ROLE_UNICODE_EMOJIS[role];
  }

  /** Inline form for embed text. */
  getDisplay(role: LaneRole): string {
    return this.emojiCache.get(role)?.formatted ?? ROLE_UNICODE_EMOJIS[role];
  }
}

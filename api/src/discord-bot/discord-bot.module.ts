import { Module } from '@nestjs/common';
import { AccountsModule } from '../accounts/accounts.module';
import { LolCustomModule } from '../lol-custom/lol-custom.module';
import { RiotModule } from '../riot/riot.module';
import { DiscordBotService } from './discord-bot.service';
import { DiscordBotClientService } from './discord-bot-client.service';
import { RoleEmojiService } from './services/role-emoji.service';
import { LobbyEmbedFactory } from './services/lobby-embed.factory';
import { InteractionListener } from './listeners/interaction.listener';
import { ReactionListener } from './listeners/reaction.listener';
import { RegisterCommandsService } from './commands/register-commands';
import { LolCustomCommand } from './commands/lolcustom.command';
import { LolCustomDemoCommand } from './commands/lolcustom-demo.command';
import { LinkCommand } from './commands/link.command';
import { UnlinkCommand } from './commands/unlink.command';

@Module({
  imports: [AccountsModule, RiotModule, LolCustomModule],
  providers: [
    DiscordBotService,
    DiscordBotClientService,
    RoleEmojiService,
    LobbyEmbedFactory,
    InteractionListener,
    ReactionListener,
    RegisterCommandsService,
    LolCustomCommand,
    LolCustomDemoCommand,
    LinkCommand,
    UnlinkCommand,
  ],
  exports: [DiscordBotService],
})
export class DiscordBotModule {}

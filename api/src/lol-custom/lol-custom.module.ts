import { Module } from '@nestjs/common';
import { AccountsModule } from '../accounts/accounts.module';
import { RiotModule } from '../riot/riot.module';
import { LobbiesController } from './lobbies.controller';
import { LobbyManagerService } from './lobby-manager.service';
import { RatingService } from './rating.service';

@Module({
  imports: [AccountsModule, RiotModule],
  controllers: [LobbiesController],
  providers: [RatingService, LobbyManagerService],
  exports: [LobbyManagerService, RatingService],
})
export class LolCustomModule {}

import { Controller, Get, NotFoundException, Param } from '@nestjs/common';
import type { LobbyStatusDto } from '@rift-lobby/contract';
import { LobbyManagerService } from './lobby-manager.service';

@Controller('lobbies')
export class LobbiesController {
  constructor(private readonly lobbyManager: LobbyManagerService) {}

  /**
   * Current pool for an open lobby, keyed by its Discord message ID.
   */
  @Get(':lobbyId')
  getStatus(@Param('lobbyId') lobbyId: string): LobbyStatusDto {
    const status = this.lobbyManager.status(lobbyId);
    if (!status) {
      throw new NotFoundException(`Lobby ${lobbyId} is not open`);
    }
    return status;
  }
}

import { Controller, Get, Res } from '@nestjs/common';
import type { Response } from 'express';
import type { HealthCheckDto } from '@rift-lobby/contract';
import { AppService } from './app.service';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  getRoot(): HealthCheckDto {
    return { status: 'ok', timestamp: new Date().toISOString() };
  }

  @Get('health')
  async getHealth(@Res() res: Response): Promise<void> {
    const [dbHealth, redisHealth] = await Promise.all([
      this.appService.checkDatabaseHealth(),
      this.appService.checkRedisHealth(),
    ]);

    const allHealthy = dbHealth.connected && redisHealth.connected;

    const health = {
      status: allHealthy ? 'ok' : 'unhealthy',
      timestamp: new Date().toISOString(),
      db: {
        connected: dbHealth.connected,
        latencyMs: dbHealth.latencyMs,
      },
      redis: {
        connected: redisHealth.connected,
        latencyMs: redisHealth.latencyMs,
      },
      // Informational only; a bot without a token is a valid deployment
      discord: this.appService.getDiscordStatus(),
    };

    res.status(allHealthy ? 200 : 503).json(health);
  }
}

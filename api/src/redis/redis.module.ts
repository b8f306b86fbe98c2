import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';

export const REDIS_CLIENT = 'REDIS_CLIENT';

/**
 * Global Redis module. Caches Riot API responses so repeated lobbies
 * do not spend rate limit on the same ranked lookups.
 */
@Global()
@Module({
  providers: [
    {
      provide: REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const url = configService.get<string>(
          'REDIS_URL',
          'redis://localhost:6379',
        );
        // Unix socket path (e.g. /tmp/redis.sock) vs TCP URL
        const client = url.startsWith('/')
          ? new Redis({ path: url, lazyConnect: true })
          : new Redis(url, { lazyConnect: true });
        return client;
      },
    },
  ],
  exports: [REDIS_CLIENT],
})
export class RedisModule {}

import { BullModule } from '@nestjs/bullmq';
import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { ConnectionOptions } from 'bullmq';

/**
 * Translates REDIS_URL into BullMQ connection options. `rediss://` turns on
 * TLS and a path segment selects the logical database.
 */
export function redisConnectionFromUrl(redisUrl: string | undefined): ConnectionOptions {
  if (!redisUrl) {
    return { host: 'localhost', port: 6379 };
  }

  const url = new URL(redisUrl);
  const db = parseInt(url.pathname.replace('/', ''), 10);
  return {
    host: url.hostname,
    port: parseInt(url.port, 10) || 6379,
    password: url.password ? decodeURIComponent(url.password) : undefined,
    username: url.username ? decodeURIComponent(url.username) : undefined,
    ...(Number.isNaN(db) ? {} : { db }),
    ...(url.protocol === 'rediss:' ? { tls: {} } : {}),
  };
}

/**
 * Redis-backed BullMQ root connection, imported only when tickets are queued
 * through BullMQ.
 */
@Global()
@Module({
  imports: [
    BullModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        connection: redisConnectionFromUrl(configService.get<string>('REDIS_URL')),
      }),
    }),
  ],
  exports: [BullModule],
})
export class QueueModule {}

import { ExecutionContext, Module } from '@nestjs/common';
import {
  ThrottlerGuard,
  ThrottlerModule,
  ThrottlerOptions,
} from '@nestjs/throttler';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD, Reflector } from '@nestjs/core';
import { INGESTION_ROUTE } from './ingestion-route.decorator';

const reflector = new Reflector();

function isIngestionRoute(context: ExecutionContext): boolean {
  return (
    reflector.get<boolean | undefined>(INGESTION_ROUTE, context.getHandler()) ===
    true
  );
}

// ttl values are milliseconds
export function throttlerOptions(configService: ConfigService): {
  throttlers: ThrottlerOptions[];
} {
  return {
    throttlers: [
      {
        name: 'default',
        ttl: Number(configService.get('THROTTLE_TTL', 60000)),
        limit: Number(configService.get('THROTTLE_LIMIT', 30)),
      },
      {
        name: 'ingest',
        ttl: Number(configService.get('THROTTLE_TTL', 60000)),
        limit: Number(configService.get('THROTTLE_INGEST_LIMIT', 5)),
        skipIf: (context) => !isIngestionRoute(context),
      },
    ],
  };
}

@Module({
  imports: [
    ThrottlerModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: throttlerOptions,
      inject: [ConfigService],
    }),
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class RateLimitModule {}

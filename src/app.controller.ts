import { Controller, Get } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { RedisService } from './modules/redis/redis.service';

@Controller()
@SkipThrottle()
export class AppController {
  constructor(private readonly redisService: RedisService) {}

  @Get('/health')
  async healthCheck() {
    let redisOk = false;
    try {
      redisOk = (await this.redisService.ping()) === 'PONG';
    } catch {
      redisOk = false;
    }

    return {
      status: redisOk ? 'healthy' : 'degraded',
      redis: redisOk,
      uptime: process.uptime(),
      memory: process.memoryUsage(),
    };
  }
}

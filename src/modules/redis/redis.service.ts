import {
  ConflictException,
  Injectable,
  Logger,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { QUIZ_CONFIG } from '../../common/constants/quiz.constants';

const LOCK_RETRY_MS = 25;

// Deletes the lock only if we still own it
const RELEASE_LOCK_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  public readonly client: Redis;
  private readonly lockTtlMs: number;
  private readonly lockWaitMs: number;

  constructor(private readonly configService: ConfigService) {
    const redisUrl = this.configService.get<string>(
      'REDIS_URL',
      'redis://localhost:6379',
    );

    this.client = new Redis(redisUrl);
    this.lockTtlMs = Number(
      this.configService.get('LOCK_TTL_MS', QUIZ_CONFIG.LOCK_TTL_MS),
    );
    this.lockWaitMs = Number(
      this.configService.get('LOCK_WAIT_MS', QUIZ_CONFIG.LOCK_WAIT_MS),
    );

    this.client.on('error', (error: Error) => {
      this.logger.error(`Redis connection error: ${error.message}`);
    });
  }

  // JSON helpers
  async getJson<T>(key: string): Promise<T | null> {
    const data = await this.client.get(key);
    if (!data) return null;
    const value: T = JSON.parse(data);
    return value;
  }

  async getJsonMany<T>(keys: string[]): Promise<T[]> {
    if (keys.length === 0) return [];

    const rows = await this.client.mget(...keys);
    const values: T[] = [];
    for (const row of rows) {
      if (row) values.push(JSON.parse(row));
    }
    return values;
  }

  /**
   * Serializes work on `key` across every instance sharing this Redis.
   */
  async withLock<T>(key: string, task: () => Promise<T>): Promise<T> {
    const lockKey = `lock:${key}`;
    const token = uuidv4();
    const deadline = Date.now() + this.lockWaitMs;

    for (;;) {
      const acquired = await this.client.set(
        lockKey,
        token,
        'PX',
        this.lockTtlMs,
        'NX',
      );
      if (acquired === 'OK') break;

      if (Date.now() >= deadline) {
        this.logger.warn(`Timed out waiting for ${lockKey}`);
        throw new ConflictException('Resource is busy, try again');
      }
      await new Promise((resolve) => setTimeout(resolve, LOCK_RETRY_MS));
    }

    try {
      return await task();
    } finally {
      await this.client.eval(RELEASE_LOCK_SCRIPT, 1, lockKey, token);
    }
  }

  // Connection health check
  async ping(): Promise<string> {
    return await this.client.ping();
  }

  onModuleDestroy() {
    this.client.disconnect();
  }
}

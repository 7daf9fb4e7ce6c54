import { Module } from '@nestjs/common';
import { RedisModule } from '../redis/redis.module';
import { QuizStore } from './quiz.store';
import { RedisQuizStore } from './redis-quiz.store';

@Module({
  imports: [RedisModule],
  providers: [{ provide: QuizStore, useClass: RedisQuizStore }],
  exports: [QuizStore],
})
export class StoreModule {}

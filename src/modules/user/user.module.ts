import { Module } from '@nestjs/common';
import { UserService } from './user.service';
import { RedisModule } from '../redis/redis.module';

@Module({
  imports: [RedisModule],
  providers: [UserService],
  exports: [UserService],
})
export class UserModule {}

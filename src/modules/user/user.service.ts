import {
  ConflictException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { RedisService } from '../redis/redis.service';
import { PublicUser, User } from './interfaces/user.interface';

const usernameKey = (username: string) =>
  `user:username:${username.toLowerCase()}`;

@Injectable()
export class UserService {
  constructor(private readonly redisService: RedisService) {}

  async create(data: {
    username: string;
    passwordHash: string;
    displayName: string;
  }): Promise<User> {
    const user: User = {
      id: uuidv4(),
      username: data.username,
      passwordHash: data.passwordHash,
      displayName: data.displayName,
      createdAt: Date.now(),
      lastLoginAt: null,
    };

    // NX: the index decides which of two concurrent registrations wins
    const claimed = await this.redisService.client.set(
      usernameKey(user.username),
      user.id,
      'NX',
    );
    if (claimed === null) {
      throw new ConflictException('Username already taken');
    }

    await this.redisService.client.set(`user:${user.id}`, JSON.stringify(user));
    return user;
  }

  async findById(userId: string): Promise<User | null> {
    return this.redisService.getJson<User>(`user:${userId}`);
  }

  async findByUsername(username: string): Promise<User | null> {
    const userId = await this.redisService.client.get(usernameKey(username));
    if (!userId) return null;
    return this.findById(userId);
  }

  async updateLastLogin(userId: string): Promise<void> {
    const user = await this.findById(userId);
    if (!user) throw new NotFoundException('User not found');

    user.lastLoginAt = Date.now();
    await this.redisService.client.set(`user:${userId}`, JSON.stringify(user));
  }

  toPublic(user: User): PublicUser {
    const { passwordHash: _passwordHash, ...profile } = user;
    return profile;
  }
}

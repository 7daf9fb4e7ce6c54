import { ConflictException, Logger, UnauthorizedException } from '@nestjs/common';
import { JwtModule, JwtService } from '@nestjs/jwt';
import { Test } from '@nestjs/testing';
import { AuthService } from './auth.service';
import { UserService } from '../user/user.service';
import { PublicUser, User } from '../user/interfaces/user.interface';

class FakeUserService {
  readonly users = new Map<string, User>();

  async create(data: {
    username: string;
    passwordHash: string;
    displayName: string;
  }): Promise<User> {
    const user: User = {
      id: `user-${this.users.size + 1}`,
      ...data,
      createdAt: 0,
      lastLoginAt: null,
    };
    this.users.set(user.id, user);
    return user;
  }

  async findById(userId: string): Promise<User | null> {
    return this.users.get(userId) ?? null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const lower = username.toLowerCase();
    return (
      [...this.users.values()].find(
        (user) => user.username.toLowerCase() === lower,
      ) ?? null
    );
  }

  async updateLastLogin(userId: string): Promise<void> {
    const user = this.users.get(userId);
    if (user) user.lastLoginAt = 1;
  }

  toPublic(user: User): PublicUser {
    const { passwordHash: _passwordHash, ...profile } = user;
    return profile;
  }
}

describe('AuthService', () => {
  let service: AuthService;
  let jwtService: JwtService;
  let users: FakeUserService;

  beforeEach(async () => {
    users = new FakeUserService();

    const module = await Test.createTestingModule({
      imports: [
        JwtModule.register({
          secret: 'test-secret',
          signOptions: { expiresIn: '15m' },
        }),
      ],
      providers: [AuthService, { provide: UserService, useValue: users }],
    }).compile();

    service = module.get(AuthService);
    jwtService = module.get(JwtService);
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should register a user without exposing the password hash', async () => {
    const registered = await service.register('alice', 'password-1', 'Alice');

    expect(registered.user).toEqual({
      id: 'user-1',
      username: 'alice',
      displayName: 'Alice',
      createdAt: 0,
      lastLoginAt: null,
    });
    expect(users.users.get('user-1')?.passwordHash).not.toBe('password-1');
    expect(service.verifyToken(registered.access_token)).toMatchObject({
      sub: 'user-1',
      username: 'alice',
      typ: 'access',
    });
  });

  it('should default the display name to the username', async () => {
    const registered = await service.register('bob', 'password-2');

    expect(registered.user.displayName).toBe('bob');
  });

  it('should refuse a taken username regardless of case', async () => {
    await service.register('alice', 'password-1');

    await expect(
      service.register('ALICE', 'password-2'),
    ).rejects.toBeInstanceOf(ConflictException);
  });

  it('should log in with the right password only', async () => {
    await service.register('alice', 'password-1');

    const loggedIn = await service.login('alice', 'password-1');
    expect(loggedIn.user.id).toBe('user-1');
    expect(users.users.get('user-1')?.lastLoginAt).toBe(1);

    await expect(
      service.login('alice', 'wrong-password'),
    ).rejects.toBeInstanceOf(UnauthorizedException);
    await expect(
      service.login('nobody', 'password-1'),
    ).rejects.toBeInstanceOf(UnauthorizedException);
  });

  it('should refresh only with a refresh token', async () => {
    const registered = await service.register('alice', 'password-1');

    const refreshed = await service.refreshToken(registered.refresh_token);
    expect(service.verifyToken(refreshed.access_token).sub).toBe('user-1');

    await expect(
      service.refreshToken(registered.access_token),
    ).rejects.toBeInstanceOf(UnauthorizedException);
  });

  it('should reject malformed or foreign tokens', async () => {
    const foreign = await jwtService.signAsync({ sub: 'user-1' });

    expect(() => service.verifyToken('not-a-token')).toThrow(
      UnauthorizedException,
    );
    expect(() => service.verifyToken(foreign)).toThrow(UnauthorizedException);
  });
});

import {
  ConflictException,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcrypt';
import { UserService } from '../user/user.service';
import { PublicUser, User } from '../user/interfaces/user.interface';
import {
  JwtPayload,
  TokenType,
  isJwtPayload,
} from './interfaces/authenticated-user.interface';

const BCRYPT_ROUNDS = 10;
const REFRESH_TOKEN_TTL = '7d';

export interface AuthTokens {
  access_token: string;
  refresh_token: string;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly userService: UserService,
    private readonly jwtService: JwtService,
  ) {}

  async register(
    username: string,
    password: string,
    displayName?: string,
  ): Promise<{ user: PublicUser } & AuthTokens> {
    const existing = await this.userService.findByUsername(username);
    if (existing) {
      throw new ConflictException('Username already taken');
    }

    const passwordHash = await bcrypt.hash(password, BCRYPT_ROUNDS);
    const user = await this.userService.create({
      username,
      passwordHash,
      displayName: displayName ?? username,
    });
    this.logger.log(`Registered user ${user.id} (${user.username})`);

    return {
      user: this.userService.toPublic(user),
      ...(await this.generateTokens(user)),
    };
  }

  async login(
    username: string,
    password: string,
  ): Promise<{ user: PublicUser } & AuthTokens> {
    const user = await this.userService.findByUsername(username);
    if (!user) {
      throw new UnauthorizedException('Invalid credentials');
    }

    const isPasswordValid = await bcrypt.compare(password, user.passwordHash);
    if (!isPasswordValid) {
      throw new UnauthorizedException('Invalid credentials');
    }

    await this.userService.updateLastLogin(user.id);

    return {
      user: this.userService.toPublic(user),
      ...(await this.generateTokens(user)),
    };
  }

  async refreshToken(refreshToken: string): Promise<AuthTokens> {
    const payload = this.verifyToken(refreshToken, 'refresh');
    const user = await this.userService.findById(payload.sub);
    if (!user) {
      throw new UnauthorizedException('Invalid refresh token');
    }
    return this.generateTokens(user);
  }

  async validateUser(userId: string): Promise<User | null> {
    return this.userService.findById(userId);
  }

  /** Throws UnauthorizedException unless `token` is a valid token of `type`. */
  verifyToken(token: string, type: TokenType = 'access'): JwtPayload {
    let decoded: object;
    try {
      decoded = this.jwtService.verify<object>(token);
    } catch {
      throw new UnauthorizedException('Invalid token');
    }

    if (!isJwtPayload(decoded) || decoded.typ !== type) {
      throw new UnauthorizedException('Invalid token');
    }
    return decoded;
  }

  private async generateTokens(user: User): Promise<AuthTokens> {
    const claims = { sub: user.id, username: user.username };

    const [accessToken, refreshToken] = await Promise.all([
      this.jwtService.signAsync({ ...claims, typ: 'access' }),
      this.jwtService.signAsync(
        { ...claims, typ: 'refresh' },
        { expiresIn: REFRESH_TOKEN_TTL },
      ),
    ]);

    return {
      access_token: accessToken,
      refresh_token: refreshToken,
    };
  }
}

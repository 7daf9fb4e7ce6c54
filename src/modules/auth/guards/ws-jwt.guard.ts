import { Injectable, CanActivate, ExecutionContext } from '@nestjs/common';
import { WsException } from '@nestjs/websockets';
import { Socket } from 'socket.io';
import { AuthService } from '../auth.service';
import {
  AuthenticatedUser,
  JwtPayload,
  isAuthenticatedUser,
} from '../interfaces/authenticated-user.interface';

/** Reads the user a WsJwtGuard attached to the socket. */
export function getSocketUser(client: Socket): AuthenticatedUser {
  const user: unknown = client.data.user;
  if (!isAuthenticatedUser(user)) {
    throw new WsException('Unauthorized - No user on socket');
  }
  return user;
}

@Injectable()
export class WsJwtGuard implements CanActivate {
  constructor(private readonly authService: AuthService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const client: Socket = context.switchToWs().getClient();

    // Already authenticated on an earlier message
    if (isAuthenticatedUser(client.data.user)) return true;

    const token = this.extractToken(client);
    if (!token) {
      throw new WsException('Unauthorized - No token provided');
    }

    let payload: JwtPayload;
    try {
      payload = this.authService.verifyToken(token);
    } catch {
      throw new WsException('Unauthorized - Invalid token');
    }

    const user = await this.authService.validateUser(payload.sub);
    if (!user) {
      throw new WsException('Unauthorized - Invalid token');
    }

    const authenticated: AuthenticatedUser = {
      userId: user.id,
      username: user.username,
    };
    client.data.user = authenticated;
    return true;
  }

  private extractToken(client: Socket): string | undefined {
    const authHeader = client.handshake.headers.authorization;
    if (authHeader) {
      const [type, tokenValue] = authHeader.split(' ');
      return type === 'Bearer' ? tokenValue : undefined;
    }

    const token: unknown = client.handshake.auth.token;
    return typeof token === 'string' ? token : undefined;
  }
}

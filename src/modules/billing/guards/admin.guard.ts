import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { extractUser } from '../../../common/decorators/current-user.decorator';

/** Lets through only user ids listed in ADMIN_USER_IDS (comma separated). */
@Injectable()
export class AdminGuard implements CanActivate {
  private readonly adminIds: Set<string>;

  constructor(configService: ConfigService) {
    const raw = configService.get<string>('ADMIN_USER_IDS', '');
    this.adminIds = new Set(
      raw
        .split(',')
        .map((id) => id.trim())
        .filter((id) => id.length > 0),
    );
  }

  canActivate(context: ExecutionContext): boolean {
    const user = extractUser(context.switchToHttp().getRequest<Request>());
    if (!this.adminIds.has(user.userId)) {
      throw new ForbiddenException('Admin access required');
    }
    return true;
  }
}

import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import { Request } from 'express';
import {
  AuthenticatedUser,
  isAuthenticatedUser,
} from '../../modules/auth/interfaces/authenticated-user.interface';

export function extractUser(request: Request): AuthenticatedUser {
  if (!isAuthenticatedUser(request.user)) {
    throw new UnauthorizedException('Missing authenticated user');
  }
  return request.user;
}

export const CurrentUser = createParamDecorator(
  (_data: unknown, context: ExecutionContext): AuthenticatedUser =>
    extractUser(context.switchToHttp().getRequest<Request>()),
);

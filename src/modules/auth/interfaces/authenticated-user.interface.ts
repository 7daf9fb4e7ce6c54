export type TokenType = 'access' | 'refresh';

export interface JwtPayload {
  sub: string;
  username: string;
  typ: TokenType;
}

/** Shape attached to `request.user` and `socket.data.user`. */
export interface AuthenticatedUser {
  userId: string;
  username: string;
}

export function isAuthenticatedUser(
  value: unknown,
): value is AuthenticatedUser {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'userId' in value &&
    typeof value.userId === 'string' &&
    'username' in value &&
    typeof value.username === 'string'
  );
}

export function isJwtPayload(value: unknown): value is JwtPayload {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'sub' in value &&
    typeof value.sub === 'string' &&
    'username' in value &&
    typeof value.username === 'string' &&
    'typ' in value &&
    (value.typ === 'access' || value.typ === 'refresh')
  );
}

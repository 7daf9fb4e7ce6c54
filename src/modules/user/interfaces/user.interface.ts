export interface User {
  id: string;
  username: string;
  passwordHash: string;
  displayName: string;
  createdAt: number;
  lastLoginAt: number | null;
}

export type PublicUser = Omit<User, 'passwordHash'>;

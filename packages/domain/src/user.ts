export type UserStatus = 'online' | 'away' | 'busy' | 'offline';

export interface User {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  firstName: string | null;
  lastName: string | null;
  avatarUrl: string | null;
  status: UserStatus;
  tokenVersion: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface UserSummary {
  id: string;
  username: string;
  displayName: string;
  avatarUrl: string | null;
}

export function displayName(user: Pick<User, 'username' | 'firstName' | 'lastName'>): string {
  const full = [user.firstName, user.lastName]
    .filter((part): part is string => !!part && part.trim().length > 0)
    .join(' ')
    .trim();
  return full.length > 0 ? full : user.username;
}

export function toUserSummary(user: User): UserSummary {
  return {
    id: user.id,
    username: user.username,
    displayName: displayName(user),
    avatarUrl: user.avatarUrl,
  };
}

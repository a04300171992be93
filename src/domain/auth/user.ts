export const DEFAULT_ROLES: readonly string[] = ['player'];

export const NICKNAME_MIN_LENGTH = 3;
export const NICKNAME_MAX_LENGTH = 32;

/**
 * Player account as stored. The password hash never leaves the service;
 * use {@link toProfile} for anything returned to a caller.
 */
export interface User {
  readonly id: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly nickname: string;
  readonly avatarUrl: string | null;
  readonly roles: readonly string[];
  readonly isActive: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/** A user before the store has assigned it an id. */
export type NewUser = Omit<User, 'id'>;

export interface Profile {
  readonly id: string;
  readonly email: string;
  readonly nickname: string;
  readonly avatarUrl: string | null;
  readonly roles: readonly string[];
}

export interface NewPlayerInput {
  email: string;
  passwordHash: string;
  nickname: string;
  avatarUrl?: string | null;
}

/**
 * Lower-case the domain of an address, keeping the local part as given.
 * Mailbox names may be case-sensitive; domains never are.
 */
export function normalizeEmail(email: string): string {
  const at = email.lastIndexOf('@');
  if (at < 0) {
    return email;
  }
  return email.slice(0, at) + email.slice(at).toLowerCase();
}

/** Length in code points, as the database's char_length counts it. */
export function nicknameLength(nickname: string): number {
  return [...nickname].length;
}

export function newPlayer(input: NewPlayerInput, now: Date): NewUser {
  return {
    email: input.email,
    passwordHash: input.passwordHash,
    nickname: input.nickname,
    avatarUrl: input.avatarUrl ?? null,
    roles: [...DEFAULT_ROLES],
    isActive: true,
    createdAt: now,
    updatedAt: now,
  };
}

// Built field by field so that fields added to User later are not exposed by accident.
export function toProfile(user: User): Profile {
  return {
    id: user.id,
    email: user.email,
    nickname: user.nickname,
    avatarUrl: user.avatarUrl,
    roles: user.roles.length > 0 ? [...user.roles] : [...DEFAULT_ROLES],
  };
}

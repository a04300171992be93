import { describe, it, expect } from 'vitest';
import { newPlayer, nicknameLength, normalizeEmail, toProfile, type User } from '../user.js';

const NOW = new Date('2026-01-01T00:00:00Z');

describe('newPlayer', () => {
  it('applies the default role and activity flag', () => {
    const user = newPlayer(
      { email: 'a@x.com', passwordHash: 'hash', nickname: 'Alice' },
      NOW
    );

    expect(user).toEqual({
      email: 'a@x.com',
      passwordHash: 'hash',
      nickname: 'Alice',
      avatarUrl: null,
      roles: ['player'],
      isActive: true,
      createdAt: NOW,
      updatedAt: NOW,
    });
  });

  it('keeps the avatar when one is given', () => {
    const user = newPlayer(
      {
        email: 'a@x.com',
        passwordHash: 'hash',
        nickname: 'Alice',
        avatarUrl: 'https://cdn.example.com/a.png',
      },
      NOW
    );

    expect(user.avatarUrl).toBe('https://cdn.example.com/a.png');
  });
});

describe('toProfile', () => {
  const user: User = {
    id: 'u-1',
    email: 'a@x.com',
    passwordHash: '$argon2id$secret',
    nickname: 'Alice',
    avatarUrl: null,
    roles: ['player', 'moderator'],
    isActive: false,
    createdAt: NOW,
    updatedAt: NOW,
  };

  it('projects only the public fields', () => {
    expect(toProfile(user)).toEqual({
      id: 'u-1',
      email: 'a@x.com',
      nickname: 'Alice',
      avatarUrl: null,
      roles: ['player', 'moderator'],
    });
  });

  it('never includes the password hash', () => {
    const profile = toProfile(user);

    expect(profile).not.toHaveProperty('passwordHash');
    expect(Object.values(profile)).not.toContain('$argon2id$secret');
  });

  it('falls back to the default role when none are stored', () => {
    expect(toProfile({ ...user, roles: [] }).roles).toEqual(['player']);
  });
});

describe('normalizeEmail', () => {
  it('lower-cases the domain and keeps the local part', () => {
    expect(normalizeEmail('Alice.Smith@Example.COM')).toBe('Alice.Smith@example.com');
    expect(normalizeEmail('a@x.com')).toBe('a@x.com');
  });

  it('splits on the last @', () => {
    expect(normalizeEmail('"A@B"@X.Com')).toBe('"A@B"@x.com');
  });

  it('leaves a string without @ alone', () => {
    expect(normalizeEmail('NoAtSign')).toBe('NoAtSign');
  });
});

describe('nicknameLength', () => {
  it('counts code points, not UTF-16 units', () => {
    expect(nicknameLength('Alice')).toBe(5);
    expect(nicknameLength('\u{1F3AE}'.repeat(20))).toBe(20);
  });
});

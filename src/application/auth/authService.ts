import type { PasswordHasher } from '../../domain/auth/password.js';
import type { TokenCodec } from '../../domain/auth/token.js';
import { newPlayer, normalizeEmail, toProfile, type Profile } from '../../domain/auth/user.js';
import type { UserStore } from '../../domain/auth/userStore.js';
import {
  DuplicateEmailError,
  InvalidCredentialsError,
  InvalidTokenError,
  UserNotFoundError,
} from '../errors.js';

export interface RegisterCommand {
  email: string;
  password: string;
  nickname: string;
  avatarUrl?: string | null;
}

export interface LoginCommand {
  email: string;
  password: string;
}

export interface AccessToken {
  accessToken: string;
  tokenType: 'bearer';
}

/**
 * Registration, login and token-to-profile resolution.
 *
 * Holds no mutable state; one instance serves every request.
 */
export class AuthService {
  constructor(
    private readonly userStore: UserStore,
    private readonly hasher: PasswordHasher,
    private readonly tokens: TokenCodec,
    private readonly now: () => Date = () => new Date()
  ) {}

  async register(command: RegisterCommand): Promise<AccessToken> {
    const email = normalizeEmail(command.email);
    const existing = await this.userStore.findByEmail(email);
    if (existing) {
      throw new DuplicateEmailError();
    }

    const passwordHash = await this.hasher.hash(command.password);
    const user = newPlayer(
      {
        email,
        passwordHash,
        nickname: command.nickname,
        avatarUrl: command.avatarUrl,
      },
      this.now()
    );

    // A concurrent registration may have taken the email since the check above
    const result = await this.userStore.insert(user);
    if (result.status === 'conflict') {
      throw new DuplicateEmailError();
    }

    return this.grant(result.user.email);
  }

  async login(command: LoginCommand): Promise<AccessToken> {
    const user = await this.userStore.findByEmail(normalizeEmail(command.email));
    if (!user) {
      await this.hasher.verifyDecoy(command.password);
      throw new InvalidCredentialsError();
    }

    const isValid = await this.hasher.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new InvalidCredentialsError();
    }

    return this.grant(user.email);
  }

  async resolveProfile(token: string): Promise<Profile> {
    const email = this.tokens.verify(token);
    if (email === null) {
      throw new InvalidTokenError();
    }

    const user = await this.userStore.findByEmail(email);
    if (!user) {
      throw new UserNotFoundError();
    }

    return toProfile(user);
  }

  private grant(email: string): AccessToken {
    return {
      accessToken: this.tokens.issue(email),
      tokenType: 'bearer',
    };
  }
}

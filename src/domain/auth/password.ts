import { argon2id, hash, verify } from 'argon2';
import type { HashingConfig } from '../../infra/config.js';

/**
 * Password hashing using Argon2id. Hashes are PHC strings with the salt and
 * cost parameters embedded, so verification needs nothing but the string.
 */
export class PasswordHasher {
  private decoy: Promise<string> | undefined;

  constructor(private readonly config: HashingConfig) {}

  /**
   * Hash a plain text password. A fresh random salt is used on every call.
   */
  async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword, {
      type: argon2id,
      memoryCost: this.config.memoryCost,
      timeCost: this.config.timeCost,
      parallelism: this.config.parallelism,
    });
  }

  /**
   * Verify a plain password against a hash. A malformed hash verifies as false.
   */
  async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }

  /**
   * Spend the same work as {@link verify} when there is no stored hash to
   * check against, so a missing account cannot be told apart by latency.
   */
  async verifyDecoy(plainPassword: string): Promise<false> {
    this.decoy ??= this.hash('decoy-password-never-matches');
    await this.verify(plainPassword, await this.decoy);
    return false;
  }
}

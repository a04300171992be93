import jwt, { type JwtPayload } from 'jsonwebtoken';
import type { TokenConfig } from '../../infra/config.js';

const ALGORITHM = 'HS256';

export interface TokenClaims {
  sub: string;
  iat: number;
  exp?: number;
}

/**
 * Signs and checks bearer tokens carrying the player's email as `sub`.
 */
export class TokenCodec {
  constructor(
    private readonly config: Pick<TokenConfig, 'secret' | 'ttlSeconds'>,
    private readonly clock: () => number = Date.now
  ) {}

  issue(subjectEmail: string): string {
    const iat = this.nowSeconds();
    const claims: TokenClaims = { sub: subjectEmail, iat };
    if (this.config.ttlSeconds > 0) {
      claims.exp = iat + this.config.ttlSeconds;
    }

    return jwt.sign(claims, this.config.secret, { algorithm: ALGORITHM });
  }

  /**
   * Returns the subject email, or null when the token is malformed, was
   * signed with another key or algorithm, or has expired.
   */
  verify(token: string): string | null {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.config.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: this.nowSeconds(),
      });
    } catch {
      return null;
    }

    if (typeof decoded === 'string') {
      return null;
    }
    const { sub } = decoded;
    if (typeof sub !== 'string' || sub.length === 0) {
      return null;
    }
    return sub;
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000);
  }
}

import * as jose from 'jose';
import { v4 as uuidv4 } from 'uuid';
import { Clock, systemClock, toEpochSeconds } from '../shared/clock';
import { TokenConfig } from '../shared/config';
import { Role, isRole } from '../shared/types';

export class TokenIssuer {
  private readonly secret: Uint8Array;

  constructor(
    private readonly config: TokenConfig,
    private readonly clock: Clock = systemClock
  ) {
    this.secret = new TextEncoder().encode(config.secret);
  }

  get expiresInSeconds(): number {
    return this.config.ttlMinutes * 60;
  }

  /**
   * Signs an access token for the account. The token is self-contained:
   * verifying it later needs only the same secret and algorithm.
   */
  async issue(username: string, role: Role): Promise<string> {
    if (!username) {
      throw new Error('Token subject must be a non-empty username');
    }
    if (!isRole(role)) {
      throw new Error(`Unknown role: ${String(role)}`);
    }

    const issuedAt = toEpochSeconds(this.clock());

    return new jose.SignJWT({ role })
      .setProtectedHeader({ alg: this.config.algorithm, typ: 'JWT' })
      .setSubject(username)
      .setJti(uuidv4())
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + this.expiresInSeconds)
      .sign(this.secret);
  }
}

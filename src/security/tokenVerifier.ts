import * as jose from 'jose';
import { Clock, systemClock } from '../shared/clock';
import { TokenConfig } from '../shared/config';
import { ExpiredTokenError, MalformedTokenError, UnknownAlgorithmError } from '../shared/errors';
import { Principal, isRole } from '../shared/types';

export class TokenVerifier {
  private readonly secret: Uint8Array;

  constructor(
    private readonly config: TokenConfig,
    private readonly clock: Clock = systemClock
  ) {
    this.secret = new TextEncoder().encode(config.secret);
  }

  /**
   * Checks algorithm, signature and expiry, then decodes the claims.
   * The account store is not consulted: a token stays valid until it
   * expires even if its account is removed.
   */
  async verify(token: string): Promise<Principal> {
    if (token.split('.').length !== 3) {
      throw new MalformedTokenError('Invalid token format');
    }

    // Check the algorithm before touching the signature so that alg=none and
    // algorithm substitution never reach verification
    let header: jose.ProtectedHeaderParameters;
    try {
      header = jose.decodeProtectedHeader(token);
    } catch {
      throw new MalformedTokenError('Invalid token header');
    }

    if (header.alg !== this.config.algorithm) {
      throw new UnknownAlgorithmError(header.alg);
    }

    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(token, this.secret, {
        algorithms: [this.config.algorithm],
        currentDate: this.clock(),
        requiredClaims: ['sub', 'exp', 'iat'],
      }));
    } catch (error) {
      if (error instanceof jose.errors.JWTExpired) {
        throw new ExpiredTokenError();
      }
      if (error instanceof jose.errors.JOSEAlgNotAllowed) {
        throw new UnknownAlgorithmError(header.alg);
      }
      if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
        throw new MalformedTokenError('Invalid signature');
      }
      throw new MalformedTokenError();
    }

    const { sub, role } = payload;
    if (typeof sub !== 'string' || !sub) {
      throw new MalformedTokenError('Missing required claim: sub');
    }
    if (!isRole(role)) {
      throw new MalformedTokenError('Missing required claim: role');
    }

    return { username: sub, role };
  }
}

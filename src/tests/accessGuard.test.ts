import { AccessGuard, extractBearerToken, roleSatisfies } from '../security/accessGuard';
import { TokenIssuer } from '../security/tokenIssuer';
import { TokenVerifier } from '../security/tokenVerifier';
import { createTestClock } from '../shared/clock';
import {
  ExpiredTokenError,
  InsufficientPermissionError,
  MalformedTokenError,
  MissingCredentialsError,
  UnknownAlgorithmError,
} from '../shared/errors';
import { Principal } from '../shared/types';
import { TEST_NOW, TOKEN_CONFIG, TTL_MS, createAlgNoneToken, tamperSignature } from './helpers';

function setup() {
  const clock = createTestClock(TEST_NOW);
  const issuer = new TokenIssuer(TOKEN_CONFIG, clock.now);
  const guard = new AccessGuard(new TokenVerifier(TOKEN_CONFIG, clock.now));
  return { clock, issuer, guard };
}

function withAuthorization(value?: string) {
  return { headers: value === undefined ? {} : { authorization: value } };
}

describe('A) extractBearerToken', () => {
  test('1. returns the token after the Bearer scheme', () => {
    expect(extractBearerToken('Bearer abc.def.ghi')).toBe('abc.def.ghi');
    expect(extractBearerToken('bearer   abc.def.ghi  ')).toBe('abc.def.ghi');
  });

  test('2. returns null for anything else', () => {
    expect(extractBearerToken(undefined)).toBeNull();
    expect(extractBearerToken('')).toBeNull();
    expect(extractBearerToken('Bearer')).toBeNull();
    expect(extractBearerToken('Bearer    ')).toBeNull();
    expect(extractBearerToken('Basic dXNlcjpwYXNz')).toBeNull();
    expect(extractBearerToken(['Bearer abc'])).toBeNull();
  });
});

describe('B) authenticate', () => {
  test('3. missing header is MissingCredentialsError', async () => {
    const { guard } = setup();
    await expect(guard.authenticate(withAuthorization())).rejects.toThrow(MissingCredentialsError);
  });

  test('4. other schemes and empty tokens are MissingCredentialsError', async () => {
    const { guard } = setup();
    for (const value of ['Basic dXNlcjpwYXNz', 'Bearer ', 'Token abc']) {
      await expect(guard.authenticate(withAuthorization(value))).rejects.toThrow(MissingCredentialsError);
    }
  });

  test('5. a valid bearer token resolves to its principal', async () => {
    const { issuer, guard } = setup();
    const token = await issuer.issue('alice', 'STANDARD');

    await expect(guard.authenticate(withAuthorization(`Bearer ${token}`))).resolves.toEqual({
      username: 'alice',
      role: 'STANDARD',
    });
  });

  test('6. verifier failures propagate unchanged', async () => {
    const { clock, issuer, guard } = setup();
    const token = await issuer.issue('alice', 'STANDARD');

    await expect(guard.authenticate(withAuthorization(`Bearer ${tamperSignature(token)}`))).rejects.toThrow(
      MalformedTokenError
    );
    await expect(guard.authenticate(withAuthorization(`Bearer ${createAlgNoneToken()}`))).rejects.toThrow(
      UnknownAlgorithmError
    );

    clock.advance(TTL_MS);
    await expect(guard.authenticate(withAuthorization(`Bearer ${token}`))).rejects.toThrow(ExpiredTokenError);
  });
});

describe('C) authorize', () => {
  const admin: Principal = { username: 'root', role: 'ADMIN' };
  const standard: Principal = { username: 'alice', role: 'STANDARD' };

  test('7. ADMIN-only operations reject STANDARD principals', () => {
    const { guard } = setup();
    expect(() => guard.authorize(standard, 'ADMIN')).toThrow(InsufficientPermissionError);
  });

  test('8. ADMIN-only operations accept ADMIN principals', () => {
    const { guard } = setup();
    expect(() => guard.authorize(admin, 'ADMIN')).not.toThrow();
  });

  test('9. matching is exact: ADMIN does not imply STANDARD', () => {
    const { guard } = setup();
    expect(() => guard.authorize(standard, 'STANDARD')).not.toThrow();
    expect(() => guard.authorize(admin, 'STANDARD')).toThrow(InsufficientPermissionError);
  });

  test('10. roleSatisfies truth table', () => {
    expect(roleSatisfies('ADMIN', 'ADMIN')).toBe(true);
    expect(roleSatisfies('STANDARD', 'ADMIN')).toBe(false);
    expect(roleSatisfies('STANDARD', 'STANDARD')).toBe(true);
    expect(roleSatisfies('ADMIN', 'STANDARD')).toBe(false);
  });
});

import * as jose from 'jose';
import { v4 as uuidv4 } from 'uuid';
import { ScryptPasswordHasher } from '../security/passwordHasher';
import { toEpochSeconds } from '../shared/clock';
import { TokenConfig } from '../shared/config';

export const TEST_NOW = new Date('2025-01-15T12:00:00.000Z');

export const TOKEN_CONFIG: TokenConfig = {
  secret: 'test-secret',
  algorithm: 'HS256',
  ttlMinutes: 30,
};

export const TTL_MS = TOKEN_CONFIG.ttlMinutes * 60 * 1000;

// Cheap scrypt parameters so tests do not pay the production cost
export function createFastHasher(): ScryptPasswordHasher {
  return new ScryptPasswordHasher({ N: 1024, r: 8, p: 1, keylen: 32 });
}

export interface TokenOptions {
  sub?: string;
  role?: unknown;
  iat?: number;
  exp?: number;
  alg?: string;
  secret?: string;
}

// Signs arbitrary claims, bypassing TokenIssuer's checks
export async function createTestToken(options: TokenOptions = {}): Promise<string> {
  const now = toEpochSeconds(TEST_NOW);
  const payload: jose.JWTPayload = {
    role: options.role ?? 'STANDARD',
    jti: uuidv4(),
  };
  if (options.sub !== '') {
    payload.sub = options.sub ?? 'alice';
  }

  return new jose.SignJWT(payload)
    .setProtectedHeader({ alg: options.alg ?? 'HS256' })
    .setIssuedAt(options.iat ?? now)
    .setExpirationTime(options.exp ?? now + 1800)
    .sign(new TextEncoder().encode(options.secret ?? TOKEN_CONFIG.secret));
}

export function createAlgNoneToken(options: TokenOptions = {}): string {
  const now = toEpochSeconds(TEST_NOW);

  const header = { alg: 'none', typ: 'JWT' };
  const payload = {
    sub: options.sub ?? 'alice',
    role: options.role ?? 'ADMIN',
    iat: options.iat ?? now,
    exp: options.exp ?? now + 1800,
  };

  const encodedHeader = Buffer.from(JSON.stringify(header)).toString('base64url');
  const encodedPayload = Buffer.from(JSON.stringify(payload)).toString('base64url');

  return `${encodedHeader}.${encodedPayload}.`;
}

// Replaces one character in the middle of the signature segment
export function tamperSignature(token: string): string {
  const [header, payload, signature] = token.split('.');
  const index = 5;
  const replacement = signature[index] === 'A' ? 'B' : 'A';
  const altered = signature.slice(0, index) + replacement + signature.slice(index + 1);
  return `${header}.${payload}.${altered}`;
}

export async function catchError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

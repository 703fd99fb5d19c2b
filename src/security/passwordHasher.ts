import { randomBytes, scrypt, timingSafeEqual } from 'crypto';
import { HashingError } from '../shared/errors';

export interface PasswordHasher {
  hash(plaintext: string): Promise<string>;
  verify(plaintext: string, hashed: string): Promise<boolean>;
}

export interface ScryptParams {
  N: number;
  r: number;
  p: number;
  keylen: number;
}

// Interactive-login cost: N=2^14, r=8 takes 16 MiB per derivation
export const DEFAULT_SCRYPT_PARAMS: ScryptParams = {
  N: 16384,
  r: 8,
  p: 1,
  keylen: 64,
};

const SALT_BYTES = 16;
const FORMAT_VERSION = '1';

interface ParsedHash {
  params: ScryptParams;
  salt: Buffer;
  hash: Buffer;
}

function deriveKey(plaintext: string, salt: Buffer, params: ScryptParams): Promise<Buffer> {
  // maxmem must cover 128 * N * r bytes or scrypt refuses large N
  const maxmem = 256 * params.N * params.r;
  return new Promise((resolve, reject) => {
    try {
      scrypt(plaintext, salt, params.keylen, { N: params.N, r: params.r, p: params.p, maxmem }, (err, key) => {
        if (err) {
          reject(new HashingError(err));
          return;
        }
        resolve(key);
      });
    } catch (error) {
      // Invalid cost parameters are rejected synchronously
      reject(new HashingError(error));
    }
  });
}

// Format: scrypt$1$N$r$p$salt$hash (salt and hash base64url)
function parseHash(encoded: string): ParsedHash | null {
  const parts = encoded.split('$');
  if (parts.length !== 7) return null;

  const [kind, version, rawN, rawR, rawP, saltB64, hashB64] = parts;
  if (kind !== 'scrypt' || version !== FORMAT_VERSION) return null;

  const N = Number(rawN);
  const r = Number(rawR);
  const p = Number(rawP);
  if (!Number.isInteger(N) || !Number.isInteger(r) || !Number.isInteger(p)) return null;
  // N must be a power of two greater than one
  if (N <= 1 || (N & (N - 1)) !== 0 || r <= 0 || p <= 0) return null;

  const salt = Buffer.from(saltB64, 'base64url');
  const hash = Buffer.from(hashB64, 'base64url');
  if (salt.length < 8 || hash.length < 16) return null;

  return { params: { N, r, p, keylen: hash.length }, salt, hash };
}

/**
 * Salted scrypt hashing. Each call to `hash` draws a fresh salt; the cost
 * parameters travel inside the encoded value so older hashes keep verifying
 * after the defaults change.
 */
export class ScryptPasswordHasher implements PasswordHasher {
  private readonly params: ScryptParams;

  constructor(params: Partial<ScryptParams> = {}) {
    this.params = { ...DEFAULT_SCRYPT_PARAMS, ...params };
  }

  async hash(plaintext: string): Promise<string> {
    const { N, r, p } = this.params;
    const salt = randomBytes(SALT_BYTES);
    const derived = await deriveKey(plaintext, salt, this.params);
    return `scrypt$${FORMAT_VERSION}$${N}$${r}$${p}$${salt.toString('base64url')}$${derived.toString('base64url')}`;
  }

  async verify(plaintext: string, hashed: string): Promise<boolean> {
    const parsed = parseHash(hashed);
    if (!parsed) return false;

    const derived = await deriveKey(plaintext, parsed.salt, parsed.params);
    if (derived.length !== parsed.hash.length) return false;
    return timingSafeEqual(derived, parsed.hash);
  }
}

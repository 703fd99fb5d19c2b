import { InsufficientPermissionError, MissingCredentialsError } from '../shared/errors';
import { Principal, Role } from '../shared/types';
import { TokenVerifier } from './tokenVerifier';

// Only the header matters, so plain objects work as well as Express requests
export interface CredentialSource {
  headers: { authorization?: string };
}

export function extractBearerToken(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const match = /^Bearer\s+(.+)$/i.exec(value.trim());
  if (!match) return null;
  const token = match[1].trim();
  return token ? token : null;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled role: ${String(value)}`);
}

/**
 * Exact-match policy: an operation that requires ADMIN accepts only ADMIN.
 * ADMIN does not imply STANDARD.
 */
export function roleSatisfies(actual: Role, required: Role): boolean {
  switch (required) {
    case 'ADMIN':
      return actual === 'ADMIN';
    case 'STANDARD':
      return actual === 'STANDARD';
    default:
      return assertNever(required);
  }
}

export class AccessGuard {
  constructor(private readonly verifier: TokenVerifier) {}

  async authenticate(request: CredentialSource): Promise<Principal> {
    const token = extractBearerToken(request.headers.authorization);
    if (!token) {
      throw new MissingCredentialsError();
    }
    return this.verifier.verify(token);
  }

  authorize(principal: Principal, requiredRole: Role): void {
    if (!roleSatisfies(principal.role, requiredRole)) {
      throw new InsufficientPermissionError(requiredRole);
    }
  }
}

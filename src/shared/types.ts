export const ROLES = ['ADMIN', 'STANDARD'] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: unknown): value is Role {
  return ROLES.some(role => role === value);
}

export interface Account {
  id: string;
  username: string; // unique, immutable; used as the token subject
  passwordHash: string;
  role: Role;
  createdAt: string;
}

// Account as exposed over HTTP - never carries the password hash
export type PublicAccount = Omit<Account, 'passwordHash'>;

export function toPublicAccount(account: Account): PublicAccount {
  return {
    id: account.id,
    username: account.username,
    role: account.role,
    createdAt: account.createdAt,
  };
}

export interface AccessTokenPayload {
  sub: string;
  role: Role;
  iat: number;
  exp: number;
  jti: string;
}

export interface Principal {
  username: string;
  role: Role;
}

export interface TokenResponse {
  accessToken: string;
  tokenType: 'bearer';
  expiresIn: number; // seconds
}

export interface Page {
  offset: number;
  limit: number;
}

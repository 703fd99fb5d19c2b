import { PasswordHasher } from '../../security/passwordHasher';
import { TokenIssuer } from '../../security/tokenIssuer';
import { InvalidCredentialsError, NotFoundError } from '../../shared/errors';
import { logger } from '../../shared/logger';
import {
  Account,
  Page,
  Principal,
  PublicAccount,
  Role,
  TokenResponse,
  toPublicAccount,
} from '../../shared/types';
import { AccountStore } from '../store/accountStore';

export class AuthService {
  // Verified against when the username is unknown, so both login failures cost one derivation
  private dummyHash: Promise<string> | null = null;

  constructor(
    private readonly store: AccountStore,
    private readonly hasher: PasswordHasher,
    private readonly issuer: TokenIssuer
  ) {}

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      // A failed attempt is not cached; the next unknown-user login retries
      this.dummyHash = this.hasher.hash('timing-equalizer').catch((error: unknown) => {
        this.dummyHash = null;
        throw error;
      });
    }
    return this.dummyHash;
  }

  private async tokenFor(account: Account): Promise<TokenResponse> {
    const accessToken = await this.issuer.issue(account.username, account.role);
    return {
      accessToken,
      tokenType: 'bearer',
      expiresIn: this.issuer.expiresInSeconds,
    };
  }

  async register(username: string, password: string): Promise<PublicAccount> {
    const passwordHash = await this.hasher.hash(password);
    const account = await this.store.create({ username, passwordHash, role: 'STANDARD' });
    logger.info('Account registered', { username: account.username, role: account.role });
    return toPublicAccount(account);
  }

  async login(username: string, password: string): Promise<TokenResponse> {
    const account = await this.store.findByUsername(username);

    if (!account) {
      await this.hasher.verify(password, await this.getDummyHash());
      throw new InvalidCredentialsError();
    }

    const valid = await this.hasher.verify(password, account.passwordHash);
    if (!valid) {
      throw new InvalidCredentialsError();
    }

    logger.debug('Login succeeded', { username: account.username });
    return this.tokenFor(account);
  }

  // Re-reads the account so the new token carries its current role
  async refresh(principal: Principal): Promise<TokenResponse> {
    const account = await this.store.findByUsername(principal.username);
    if (!account) {
      throw new InvalidCredentialsError();
    }
    return this.tokenFor(account);
  }

  async changePassword(principal: Principal, currentPassword: string, newPassword: string): Promise<void> {
    const account = await this.store.findByUsername(principal.username);
    if (!account || !(await this.hasher.verify(currentPassword, account.passwordHash))) {
      throw new InvalidCredentialsError();
    }

    const passwordHash = await this.hasher.hash(newPassword);
    const updated = await this.store.updatePasswordHash(account.username, passwordHash);
    if (!updated) {
      throw new InvalidCredentialsError();
    }
    logger.info('Password changed', { username: account.username });
  }

  async getAccount(username: string): Promise<PublicAccount> {
    const account = await this.store.findByUsername(username);
    if (!account) {
      throw new NotFoundError('Account', username);
    }
    return toPublicAccount(account);
  }

  async listAccounts(page: Page): Promise<PublicAccount[]> {
    const accounts = await this.store.list(page);
    return accounts.map(toPublicAccount);
  }

  async setRole(username: string, role: Role): Promise<PublicAccount> {
    const account = await this.store.updateRole(username, role);
    if (!account) {
      throw new NotFoundError('Account', username);
    }
    logger.info('Account role changed', { username, role });
    return toPublicAccount(account);
  }

  /**
   * Creates the first administrator. Returns false when the username is
   * already present; its password and role are left untouched.
   */
  async seedAdmin(username: string, password: string): Promise<boolean> {
    const existing = await this.store.findByUsername(username);
    if (existing) {
      if (existing.role !== 'ADMIN') {
        logger.warn('Configured admin username belongs to a non-admin account', {
          username,
          role: existing.role,
        });
      }
      return false;
    }
    const passwordHash = await this.hasher.hash(password);
    await this.store.create({ username, passwordHash, role: 'ADMIN' });
    logger.info('Admin account seeded', { username });
    return true;
  }
}

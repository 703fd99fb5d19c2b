import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { Clock, systemClock } from '../../shared/clock';
import { AppConfig } from '../../shared/config';
import { ConflictError } from '../../shared/errors';
import { Account, Page, ROLES, Role } from '../../shared/types';

export interface NewAccount {
  username: string;
  passwordHash: string;
  role: Role;
}

export interface AccountStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  findByUsername(username: string): Promise<Account | null>;
  // Throws ConflictError when the username is taken
  create(data: NewAccount): Promise<Account>;
  updatePasswordHash(username: string, passwordHash: string): Promise<boolean>;
  updateRole(username: string, role: Role): Promise<Account | null>;
  // Creation order
  list(page: Page): Promise<Account[]>;
}

function usernameTaken(username: string): ConflictError {
  return new ConflictError(`Username '${username}' already exists`);
}

export class InMemoryAccountStore implements AccountStore {
  // Map iteration order is insertion order, which is creation order here
  private accounts: Map<string, Account> = new Map();

  constructor(private readonly clock: Clock = systemClock) {}

  async connect(): Promise<void> {
    // No-op for in-memory store
  }

  async disconnect(): Promise<void> {
    this.accounts.clear();
  }

  async findByUsername(username: string): Promise<Account | null> {
    const account = this.accounts.get(username);
    return account ? { ...account } : null;
  }

  async create(data: NewAccount): Promise<Account> {
    if (this.accounts.has(data.username)) {
      throw usernameTaken(data.username);
    }

    const account: Account = {
      id: uuidv4(),
      username: data.username,
      passwordHash: data.passwordHash,
      role: data.role,
      createdAt: this.clock().toISOString(),
    };
    this.accounts.set(account.username, account);

    return { ...account };
  }

  async updatePasswordHash(username: string, passwordHash: string): Promise<boolean> {
    const account = this.accounts.get(username);
    if (!account) return false;

    account.passwordHash = passwordHash;
    return true;
  }

  async updateRole(username: string, role: Role): Promise<Account | null> {
    const account = this.accounts.get(username);
    if (!account) return null;

    account.role = role;
    return { ...account };
  }

  async list(page: Page): Promise<Account[]> {
    return Array.from(this.accounts.values())
      .slice(page.offset, page.offset + page.limit)
      .map(account => ({ ...account }));
  }
}

const storedAccountSchema = z.object({
  id: z.string(),
  username: z.string(),
  passwordHash: z.string(),
  role: z.enum(ROLES),
  createdAt: z.string(),
});

const ACCOUNT_INDEX_KEY = 'accounts:by-created';

function accountKey(username: string): string {
  return `account:${username}`;
}

export type RedisClientFactory = (redisUrl: string) => Redis;

const defaultClientFactory: RedisClientFactory = (redisUrl) =>
  new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    retryStrategy: (times) => {
      if (times > 3) return null;
      return Math.min(times * 100, 1000);
    },
  });

/**
 * Each account is a hash under `account:<username>`, with a sorted set
 * scored by creation time for paging. Updates write a single field, so a
 * role change and a password change on the same account never overwrite
 * each other.
 */
export class RedisAccountStore implements AccountStore {
  private client: Redis | null = null;

  constructor(
    private readonly redisUrl: string,
    private readonly clock: Clock = systemClock,
    private readonly createClient: RedisClientFactory = defaultClientFactory
  ) {}

  private requireClient(): Redis {
    if (!this.client) throw new Error('Redis not connected');
    return this.client;
  }

  // HGETALL answers {} for a missing key
  private parse(record: unknown): Account | null {
    if (typeof record !== 'object' || record === null || Object.keys(record).length === 0) {
      return null;
    }
    return storedAccountSchema.parse(record);
  }

  async connect(): Promise<void> {
    this.client = this.createClient(this.redisUrl);
    await this.client.ping();
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
  }

  async findByUsername(username: string): Promise<Account | null> {
    const client = this.requireClient();
    return this.parse(await client.hgetall(accountKey(username)));
  }

  async create(data: NewAccount): Promise<Account> {
    const client = this.requireClient();
    const createdAt = this.clock();
    const key = accountKey(data.username);

    const account: Account = {
      id: uuidv4(),
      username: data.username,
      passwordHash: data.passwordHash,
      role: data.role,
      createdAt: createdAt.toISOString(),
    };

    // One transaction: every field is set only if absent, and the index
    // entry keeps its original score, so a taken username changes nothing
    const results = await client
      .multi()
      .hsetnx(key, 'username', account.username)
      .hsetnx(key, 'id', account.id)
      .hsetnx(key, 'passwordHash', account.passwordHash)
      .hsetnx(key, 'role', account.role)
      .hsetnx(key, 'createdAt', account.createdAt)
      .zadd(ACCOUNT_INDEX_KEY, 'NX', createdAt.getTime(), account.username)
      .exec();

    if (!results) {
      throw new Error('Redis transaction aborted');
    }
    for (const [error] of results) {
      if (error) throw error;
    }
    const [, claimed] = results[0];
    if (claimed !== 1) {
      throw usernameTaken(account.username);
    }

    return account;
  }

  // Accounts are never deleted, so existence checked first still holds at the write
  async updatePasswordHash(username: string, passwordHash: string): Promise<boolean> {
    const client = this.requireClient();
    const key = accountKey(username);
    if (!(await client.hexists(key, 'username'))) return false;

    await client.hset(key, 'passwordHash', passwordHash);
    return true;
  }

  async updateRole(username: string, role: Role): Promise<Account | null> {
    const client = this.requireClient();
    const key = accountKey(username);
    if (!(await client.hexists(key, 'username'))) return null;

    await client.hset(key, 'role', role);
    return this.findByUsername(username);
  }

  async list(page: Page): Promise<Account[]> {
    const client = this.requireClient();
    if (page.limit <= 0) return [];

    const usernames = await client.zrange(ACCOUNT_INDEX_KEY, page.offset, page.offset + page.limit - 1);
    if (usernames.length === 0) return [];

    const pipeline = client.pipeline();
    for (const username of usernames) {
      pipeline.hgetall(accountKey(username));
    }
    const results = (await pipeline.exec()) ?? [];

    const accounts: Account[] = [];
    for (const [error, record] of results) {
      if (error) throw error;
      const account = this.parse(record);
      if (account) accounts.push(account);
    }
    return accounts;
  }
}

export function createAccountStore(config: AppConfig, clock: Clock = systemClock): AccountStore {
  if (config.store.kind === 'redis') {
    return new RedisAccountStore(config.store.redisUrl, clock);
  }
  return new InMemoryAccountStore(clock);
}

/**
 * Built-in store implementations for common backends.
 *
 * For production with multiple server instances, use RedisChallengeStore
 * (or implement ChallengeStore with another shared backend) and a UserStore
 * backed by your database.
 */

import { readFile, writeFile } from 'fs/promises';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import type { CallOptions, ChallengeStore, NewUser, User, UserStore } from './types.js';

// ============================================================
// Async Mutex: serializes read-modify-write file operations
// ============================================================

/**
 * @ai_context Prevents async interleaving of read-modify-write file operations
 * without blocking the Node.js event loop.
 *
 * Each file store instance owns its own AsyncMutex. When a method acquires the
 * lock, all other callers queue behind it until the holder releases. This turns
 * concurrent `load() → mutate → persist()` sequences into a serial pipeline,
 * which is what makes FileChallengeStore.takeAndDelete atomic within a process.
 */
export class AsyncMutex {
  private queue: Array<() => void> = [];
  private locked = false;

  acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // Hand the lock directly to the next waiter (stays locked)
      next();
    } else {
      this.locked = false;
    }
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

interface StoredEntry {
  value: string;
  /** ms since epoch */
  expiresAt: number;
}

export interface StoreClockOptions {
  /** Clock in ms since epoch. Defaults to `Date.now` */
  now?: () => number;
}

// ============================================================
// In-Memory Stores (good for development and single-process)
// ============================================================

export class MemoryChallengeStore implements ChallengeStore {
  private entries = new Map<string, StoredEntry>();
  private now: () => number;

  constructor(options?: StoreClockOptions) {
    this.now = options?.now ?? Date.now;
  }

  async put(key: string, value: string, ttlSeconds: number, options?: CallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    const now = this.now();
    // Expired entries are dropped lazily on every write
    for (const [k, entry] of this.entries) {
      if (now >= entry.expiresAt) this.entries.delete(k);
    }
    this.entries.set(key, { value, expiresAt: now + ttlSeconds * 1000 });
  }

  async takeAndDelete(key: string, options?: CallOptions): Promise<string | null> {
    options?.signal?.throwIfAborted();
    const entry = this.entries.get(key);
    if (!entry) return null;
    this.entries.delete(key);
    if (this.now() >= entry.expiresAt) return null;
    return entry.value;
  }

  /** Number of stored (possibly expired) entries */
  get size(): number {
    return this.entries.size;
  }
}

export class MemoryUserStore implements UserStore {
  private users = new Map<string, User>();
  private nextId = 1;

  async findByUsername(username: string, options?: CallOptions): Promise<User | null> {
    options?.signal?.throwIfAborted();
    const user = this.users.get(username);
    return user ? { ...user } : null;
  }

  async create(user: NewUser, options?: CallOptions): Promise<number> {
    options?.signal?.throwIfAborted();
    if (this.users.has(user.username)) {
      throw new Error(`username already taken: ${user.username}`);
    }
    const id = this.nextId++;
    this.users.set(user.username, { ...user, id });
    return id;
  }
}

// ============================================================
// File-Based Stores (good for single-server, persistent)
// ============================================================

// An array, not an object keyed by username: usernames such as
// `constructor` or `__proto__` must not hit Object.prototype
const entryFileSchema = z.array(
  z.object({ key: z.string(), value: z.string(), expiresAt: z.number() }),
);

const userFileSchema = z.array(
  z.object({
    id: z.number().int(),
    username: z.string(),
    passwordHash: z.string(),
    salt: z.string(),
    email: z.string(),
  }),
);

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function loadJson<T>(filePath: string, schema: z.ZodType<T>, empty: T, signal?: AbortSignal): Promise<T> {
  let raw: string;
  try {
    raw = await readFile(filePath, { encoding: 'utf-8', signal });
  } catch (err) {
    // File not yet created: valid initial state
    if (isMissingFile(err)) return empty;
    throw err;
  }
  // Corrupted JSON or an unexpected shape must surface, not reset the store
  return schema.parse(JSON.parse(raw));
}

function ensureDir(filePath: string): void {
  const dir = dirname(filePath);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
}

/**
 * File-based challenge store. Challenges are stored as a JSON array of
 * `{ key, value, expiresAt }` entries. Auto-cleans expired challenges on
 * every write.
 *
 * Uses an internal async mutex to serialize concurrent read-modify-write
 * operations within the same process. Not suitable for multi-process servers.
 */
export class FileChallengeStore implements ChallengeStore {
  private filePath: string;
  private mutex = new AsyncMutex();
  private now: () => number;

  constructor(filePath: string, options?: StoreClockOptions) {
    this.filePath = filePath;
    this.now = options?.now ?? Date.now;
    ensureDir(filePath);
  }

  private async load(signal?: AbortSignal): Promise<Map<string, StoredEntry>> {
    const entries = await loadJson(this.filePath, entryFileSchema, [], signal);
    return new Map(entries.map(({ key, value, expiresAt }) => [key, { value, expiresAt }]));
  }

  private async persist(data: Map<string, StoredEntry>, signal?: AbortSignal): Promise<void> {
    const now = this.now();
    const entries = [...data]
      .filter(([, entry]) => now < entry.expiresAt)
      .map(([key, entry]) => ({ key, ...entry }));
    await writeFile(this.filePath, JSON.stringify(entries, null, 2), { signal });
  }

  async put(key: string, value: string, ttlSeconds: number, options?: CallOptions): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const data = await this.load(options?.signal);
      data.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
      await this.persist(data, options?.signal);
    });
  }

  async takeAndDelete(key: string, options?: CallOptions): Promise<string | null> {
    return this.mutex.runExclusive(async () => {
      const data = await this.load(options?.signal);
      const entry = data.get(key);
      if (!entry) return null;
      data.delete(key);
      await this.persist(data, options?.signal);
      if (this.now() >= entry.expiresAt) return null;
      return entry.value;
    });
  }
}

/**
 * File-based user store. Users stored in a JSON array file; IDs are
 * assigned as max(id) + 1.
 *
 * Read-only operations also acquire the lock to prevent reading a
 * partially-written file from a concurrent persist().
 */
export class FileUserStore implements UserStore {
  private filePath: string;
  private mutex = new AsyncMutex();

  constructor(filePath: string) {
    this.filePath = filePath;
    ensureDir(filePath);
  }

  async findByUsername(username: string, options?: CallOptions): Promise<User | null> {
    return this.mutex.runExclusive(async () => {
      const users = await loadJson(this.filePath, userFileSchema, [], options?.signal);
      return users.find(u => u.username === username) ?? null;
    });
  }

  async create(user: NewUser, options?: CallOptions): Promise<number> {
    return this.mutex.runExclusive(async () => {
      const users = await loadJson(this.filePath, userFileSchema, [], options?.signal);
      if (users.some(u => u.username === user.username)) {
        throw new Error(`username already taken: ${user.username}`);
      }
      const id = users.reduce((max, u) => Math.max(max, u.id), 0) + 1;
      users.push({ ...user, id });
      await writeFile(this.filePath, JSON.stringify(users, null, 2), { signal: options?.signal });
      return id;
    });
  }
}

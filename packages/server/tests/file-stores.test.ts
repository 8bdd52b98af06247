import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileChallengeStore, FileUserStore } from '../src/stores.js';
import type { NewUser } from '../src/types.js';

const NOW = 1_700_000_000_000;

let tmpDir: string;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'handshake-kit-'));
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('FileChallengeStore', () => {
  let now: number;
  let file: string;
  let store: FileChallengeStore;

  beforeEach(() => {
    now = NOW;
    file = join(tmpDir, 'challenges.json');
    store = new FileChallengeStore(file, { now: () => now });
  });

  it('put and takeAndDelete round-trips', async () => {
    await store.put('alice', 'file-challenge', 120);
    expect(await store.takeAndDelete('alice')).toBe('file-challenge');
  });

  it('takeAndDelete returns null for missing key', async () => {
    expect(await store.takeAndDelete('nonexistent')).toBeNull();
  });

  it('takeAndDelete deletes the value (one-time use)', async () => {
    await store.put('alice', 'file-challenge', 120);
    await store.takeAndDelete('alice');
    expect(await store.takeAndDelete('alice')).toBeNull();
  });

  it('returns null for expired values', async () => {
    await store.put('alice', 'file-challenge', 120);
    now = NOW + 120_000;
    expect(await store.takeAndDelete('alice')).toBeNull();
  });

  it('returns null for usernames named like Object.prototype members', async () => {
    await store.put('alice', 'file-challenge', 120);
    for (const key of ['constructor', 'toString', 'hasOwnProperty', '__proto__']) {
      expect(await store.takeAndDelete(key)).toBeNull();
    }
  });

  it('stores a challenge for the username __proto__', async () => {
    await store.put('__proto__', 'proto-challenge', 120);
    const reopened = new FileChallengeStore(file, { now: () => now });
    expect(await reopened.takeAndDelete('__proto__')).toBe('proto-challenge');
    expect(await reopened.takeAndDelete('__proto__')).toBeNull();
  });

  it('handles multiple keys', async () => {
    await store.put('alice', 'first', 120);
    await store.put('bob', 'second', 120);
    expect(await store.takeAndDelete('alice')).toBe('first');
    expect(await store.takeAndDelete('bob')).toBe('second');
  });

  it('overwrites existing key', async () => {
    await store.put('alice', 'first', 120);
    await store.put('alice', 'updated', 120);
    expect(await store.takeAndDelete('alice')).toBe('updated');
  });

  it('persists across instances', async () => {
    await store.put('alice', 'durable', 120);
    const reopened = new FileChallengeStore(file, { now: () => now });
    expect(await reopened.takeAndDelete('alice')).toBe('durable');
  });

  it('removes expired entries from the file on write', async () => {
    await store.put('alice', 'old', 10);
    now = NOW + 11_000;
    await store.put('bob', 'new', 10);
    const entries: Array<{ key: string }> = JSON.parse(readFileSync(file, 'utf-8'));
    expect(entries.map(e => e.key)).toEqual(['bob']);
  });

  it('only one of two concurrent takes receives the value', async () => {
    await store.put('alice', 'once', 120);
    const results = await Promise.all([store.takeAndDelete('alice'), store.takeAndDelete('alice')]);
    expect(results.sort()).toEqual(['once', null].sort());
  });

  it('creates parent directory if it does not exist', () => {
    const nestedPath = join(tmpDir, 'nested', 'deep', 'challenges.json');
    expect(() => new FileChallengeStore(nestedPath)).not.toThrow();
  });

  it('throws on corrupted JSON instead of silently resetting', async () => {
    writeFileSync(file, '{{not valid json!!!');
    await expect(store.put('alice', 'x', 120)).rejects.toThrow();
  });

  it('throws on an unexpected file shape', async () => {
    writeFileSync(file, JSON.stringify({ alice: 'not-an-entry' }));
    await expect(store.takeAndDelete('alice')).rejects.toThrow();
  });
});

describe('FileUserStore', () => {
  let file: string;
  let store: FileUserStore;

  const alice: NewUser = {
    username: 'alice',
    passwordHash: 'h1',
    salt: 's1',
    email: 'a@x.com',
  };

  beforeEach(() => {
    file = join(tmpDir, 'users.json');
    store = new FileUserStore(file);
  });

  it('create assigns max(id) + 1', async () => {
    expect(await store.create(alice)).toBe(1);
    expect(await store.create({ ...alice, username: 'bob' })).toBe(2);
  });

  it('continues numbering from existing records', async () => {
    writeFileSync(file, JSON.stringify([{ ...alice, id: 41 }]));
    expect(await store.create({ ...alice, username: 'bob' })).toBe(42);
  });

  it('findByUsername returns the stored record', async () => {
    await store.create(alice);
    expect(await store.findByUsername('alice')).toEqual({ ...alice, id: 1 });
  });

  it('findByUsername returns null when the file does not exist yet', async () => {
    expect(await store.findByUsername('alice')).toBeNull();
  });

  it('rejects a duplicate username', async () => {
    await store.create(alice);
    await expect(store.create(alice)).rejects.toThrow('username already taken: alice');
  });

  it('serializes concurrent creates', async () => {
    const ids = await Promise.all([
      store.create({ ...alice, username: 'u1' }),
      store.create({ ...alice, username: 'u2' }),
      store.create({ ...alice, username: 'u3' }),
    ]);
    expect(ids.sort()).toEqual([1, 2, 3]);
    expect(JSON.parse(readFileSync(file, 'utf-8'))).toHaveLength(3);
  });

  it('throws on corrupted JSON', async () => {
    writeFileSync(file, '[oops');
    await expect(store.findByUsername('alice')).rejects.toThrow();
  });
});

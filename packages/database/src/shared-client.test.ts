import { afterEach, describe, expect, it, vi } from 'vitest';

vi.mock('pg', () => ({
  Pool: vi.fn().mockImplementation(function () {
    return { query: vi.fn(), end: vi.fn(async () => undefined) };
  })
}));

import { clearCachedClient, getSharedDatabaseClient } from './shared-client';

describe('getSharedDatabaseClient', () => {
  afterEach(() => {
    clearCachedClient();
  });

  it('reuses the client while the connection target is unchanged', () => {
    const a = getSharedDatabaseClient({ host: 'db.local', database: 'docpipe', password: 'test-secret' });
    const b = getSharedDatabaseClient({ host: 'db.local', database: 'docpipe', password: 'rotated-secret' });
    expect(b).toBe(a);
  });

  it('replaces the client when the target changes', () => {
    const a = getSharedDatabaseClient({ host: 'db.local', database: 'docpipe' });
    const b = getSharedDatabaseClient({ host: 'db.local', database: 'other' });
    expect(b).not.toBe(a);
  });
});

/**
 * Database Package Tests
 *
 * Exercises the Postgres job store against a mocked `pg` pool: issued SQL,
 * row mapping, compare-and-set outcomes and driver error wrapping.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  InvalidTransitionError,
  NotFoundError,
  StaleTransitionError,
  StoreUnavailableError
} from '@docpipe/shared';

const pg = vi.hoisted(() => ({
  query: vi.fn(),
  end: vi.fn(async () => undefined),
  poolConfigs: [] as unknown[]
}));

vi.mock('pg', () => ({
  Pool: vi.fn().mockImplementation(function (config: unknown) {
    pg.poolConfigs.push(config);
    return { query: pg.query, end: pg.end };
  })
}));

import { DATABASE_VERSION, DatabaseClient, withDatabaseClient } from './index';

function row(overrides: Record<string, unknown> = {}) {
  return {
    id: '11111111-1111-4111-8111-111111111111',
    owner: 'key-1',
    stage: 'QUEUED',
    input_ref: 'jobs/j/input/a',
    spec_ref: 'specs/s',
    template_ref: 'templates/t',
    structured_data_ref: null,
    output_ref: null,
    extraction_attempts: 0,
    generation_attempts: 0,
    last_error: null,
    version: 2,
    created_at: new Date('2025-01-01T00:00:00.000Z'),
    updated_at: '2025-01-01T00:01:00.000Z',
    ...overrides
  };
}

const JOB_ID = '11111111-1111-4111-8111-111111111111';

describe('Database Package', () => {
  beforeEach(() => {
    pg.query.mockReset();
    pg.end.mockClear();
    pg.poolConfigs.length = 0;
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('should export the database version', () => {
    expect(DATABASE_VERSION).toBe('2.0.0');
  });

  it('configures the pool from a connection string', () => {
    new DatabaseClient({ connectionString: 'postgres://localhost/docpipe', ssl: false });
    expect(pg.poolConfigs[0]).toEqual({
      connectionString: 'postgres://localhost/docpipe',
      ssl: false,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
      allowExitOnIdle: true
    });
  });

  it('creates a job in UPLOADED and maps the row', async () => {
    pg.query.mockResolvedValueOnce({ rowCount: 1, rows: [row({ stage: 'UPLOADED', version: 1 })] });
    const db = new DatabaseClient();

    const job = await db.create({ owner: 'key-1', inputRef: 'jobs/j/input/a', specRef: 'specs/s', templateRef: 'templates/t' });

    const [sql, values] = pg.query.mock.calls[0] ?? [];
    expect(sql).toContain("VALUES ($1, 'UPLOADED', $2, $3, $4)");
    expect(values).toEqual(['key-1', 'jobs/j/input/a', 'specs/s', 'templates/t']);
    expect(job).toEqual({
      id: JOB_ID,
      owner: 'key-1',
      stage: 'UPLOADED',
      inputRef: 'jobs/j/input/a',
      specRef: 'specs/s',
      templateRef: 'templates/t',
      structuredDataRef: null,
      outputRef: null,
      attempts: { extraction: 0, generation: 0 },
      lastError: null,
      version: 1,
      createdAt: new Date('2025-01-01T00:00:00.000Z'),
      updatedAt: new Date('2025-01-01T00:01:00.000Z')
    });
  });

  it('throws NotFoundError for a missing job', async () => {
    pg.query.mockResolvedValueOnce({ rowCount: 0, rows: [] });
    await expect(new DatabaseClient().get(JOB_ID)).rejects.toBeInstanceOf(NotFoundError);
  });

  describe('transition', () => {
    it('guards the update with the expected stage and applies mutations', async () => {
      pg.query.mockResolvedValueOnce({
        rowCount: 1,
        rows: [row({ stage: 'EXTRACTED', structured_data_ref: 'sd', version: 4 })]
      });
      const db = new DatabaseClient();

      const job = await db.transition(JOB_ID, 'EXTRACTING', 'EXTRACTED', { structuredDataRef: 'sd', lastError: null });

      const [sql, values] = pg.query.mock.calls[0] ?? [];
      expect(sql).toContain('SET stage = $3, version = version + 1, structured_data_ref = $4, last_error = $5');
      expect(sql).toContain('WHERE id = $1 AND stage = $2');
      expect(values).toEqual([JOB_ID, 'EXTRACTING', 'EXTRACTED', 'sd', null]);
      expect(job.stage).toBe('EXTRACTED');
      expect(job.structuredDataRef).toBe('sd');
    });

    it('clears both references when entering a failure terminal', async () => {
      pg.query.mockResolvedValueOnce({ rowCount: 1, rows: [row({ stage: 'FAILED', last_error: 'boom' })] });

      await new DatabaseClient().transition(JOB_ID, 'GENERATING', 'FAILED', { lastError: 'boom' });

      const [sql, values] = pg.query.mock.calls[0] ?? [];
      expect(sql).toContain('structured_data_ref = $4, output_ref = $5, last_error = $6');
      expect(values).toEqual([JOB_ID, 'GENERATING', 'FAILED', null, null, 'boom']);
    });

    it('reports a stage mismatch as StaleTransitionError with the actual stage', async () => {
      pg.query
        .mockResolvedValueOnce({ rowCount: 0, rows: [] })
        .mockResolvedValueOnce({ rowCount: 1, rows: [{ stage: 'EXTRACTING' }] });

      const err = await new DatabaseClient().transition(JOB_ID, 'QUEUED', 'EXTRACTING').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(StaleTransitionError);
      if (err instanceof StaleTransitionError) {
        expect(err.expected).toBe('QUEUED');
        expect(err.actual).toBe('EXTRACTING');
      }
    });

    it('reports a missing row as NotFoundError', async () => {
      pg.query.mockResolvedValueOnce({ rowCount: 0, rows: [] }).mockResolvedValueOnce({ rowCount: 0, rows: [] });
      await expect(new DatabaseClient().transition(JOB_ID, 'QUEUED', 'EXTRACTING')).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it('rejects edges outside the stage table without querying', async () => {
      await expect(new DatabaseClient().transition(JOB_ID, 'COMPLETE', 'QUEUED')).rejects.toBeInstanceOf(
        InvalidTransitionError
      );
      expect(pg.query).not.toHaveBeenCalled();
    });
  });

  it('increments the attempt column for the given stage', async () => {
    pg.query.mockResolvedValueOnce({ rowCount: 1, rows: [{ attempts: 2 }] });

    const count = await new DatabaseClient().incrementAttempt(JOB_ID, 'generation');

    const [sql, values] = pg.query.mock.calls[0] ?? [];
    expect(sql).toContain('SET generation_attempts = generation_attempts + 1, version = version + 1');
    expect(values).toEqual([JOB_ID]);
    expect(count).toBe(2);
  });

  it('lists by owner with a stage filter and parameterized limit', async () => {
    pg.query.mockResolvedValueOnce({ rowCount: 1, rows: [row()] });

    const jobs = await new DatabaseClient().listByOwner('key-1', { stage: 'QUEUED', limit: 5 });

    const [sql, values] = pg.query.mock.calls[0] ?? [];
    expect(sql).toContain('WHERE owner = $1 AND stage = $2');
    expect(sql).toContain('LIMIT $3');
    expect(values).toEqual(['key-1', 'QUEUED', 5]);
    expect(jobs).toHaveLength(1);
  });

  it('wraps driver failures as StoreUnavailableError', async () => {
    pg.query.mockRejectedValueOnce(Object.assign(new Error('connection terminated'), { code: '57P01' }));
    const err = await new DatabaseClient().get(JOB_ID).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StoreUnavailableError);
    if (err instanceof StoreUnavailableError) expect(err.causeMessage).toBe('connection terminated');
  });

  it('rethrows integrity violations untouched', async () => {
    const violation = Object.assign(new Error('violates check constraint'), { code: '23514' });
    pg.query.mockRejectedValueOnce(violation);
    await expect(new DatabaseClient().get(JOB_ID)).rejects.toBe(violation);
  });

  it('reports health from SELECT 1', async () => {
    pg.query.mockResolvedValueOnce({ rowCount: 1, rows: [{ '?column?': 1 }] });
    expect(await new DatabaseClient().healthCheck()).toBe(true);
    pg.query.mockRejectedValueOnce(new Error('down'));
    expect(await new DatabaseClient().healthCheck()).toBe(false);
  });

  it('closes the pool after withDatabaseClient', async () => {
    pg.query.mockResolvedValueOnce({ rowCount: 1, rows: [row()] });
    const job = await withDatabaseClient(undefined, (db) => db.get(JOB_ID));
    expect(job.stage).toBe('QUEUED');
    expect(pg.end).toHaveBeenCalledTimes(1);
  });
});

import { beforeEach, describe, expect, it, vi } from 'vitest';

const pg = vi.hoisted(() => ({
  connect: vi.fn(async () => undefined),
  query: vi.fn(async () => ({ rows: [] })),
  end: vi.fn(async () => undefined),
  configs: [] as unknown[]
}));

vi.mock('pg', () => ({
  Client: vi.fn().mockImplementation(function (config: unknown) {
    pg.configs.push(config);
    return { connect: pg.connect, query: pg.query, end: pg.end };
  })
}));

import { runSchemaMigration, schemaSql } from './run-schema';

describe('runSchemaMigration', () => {
  beforeEach(() => {
    pg.connect.mockClear();
    pg.query.mockClear();
    pg.end.mockClear();
    pg.configs.length = 0;
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('runs the schema over one connection and closes it', async () => {
    const result = await runSchemaMigration({ host: 'db.local', database: 'docpipe', user: 'app', password: 'test-secret' });

    expect(result).toEqual({ status: 'ok', message: 'Schema migration completed successfully' });
    expect(pg.configs[0]).toMatchObject({ host: 'db.local', port: 5432, database: 'docpipe', ssl: { rejectUnauthorized: false } });
    expect(pg.query).toHaveBeenCalledWith(schemaSql);
    expect(pg.end).toHaveBeenCalledTimes(1);
  });

  it('closes the connection and reports the error when the SQL fails', async () => {
    pg.query.mockRejectedValueOnce(new Error('permission denied'));

    const result = await runSchemaMigration({ connectionString: 'postgres://db.local/docpipe' });

    expect(result).toEqual({ status: 'error', message: 'permission denied' });
    expect(pg.end).toHaveBeenCalledTimes(1);
  });

  it('declares the reference invariants as constraints', () => {
    expect(schemaSql).toContain(
      "(structured_data_ref IS NOT NULL) = (stage IN ('EXTRACTED', 'GENERATING', 'COMPLETE'))"
    );
    expect(schemaSql).toContain("CHECK ((output_ref IS NOT NULL) = (stage = 'COMPLETE'))");
  });
});

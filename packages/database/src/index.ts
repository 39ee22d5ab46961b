/**
 * Database Package Entry Point
 *
 * Durable job records for the document pipeline, stored in PostgreSQL and
 * accessed through node-postgres (pg) with plain SQL.
 *
 * Key Features:
 * - Compare-and-set stage transitions (`UPDATE … WHERE id = $1 AND stage = $2`)
 * - Per-stage attempt counters and a monotonic `version` column
 * - Ref invariants enforced twice: by the transition logic and by CHECK constraints
 * - Connection pooling sized for Lambda and long-running workers
 * - Driver errors surfaced as StoreUnavailableError so workers can leave a
 *   message for redelivery instead of failing the job
 *
 * @see ./migrations/run-schema.ts - table definition
 */

import { Pool, type PoolConfig, type QueryResultRow } from 'pg';
import {
  InvalidTransitionError,
  NotFoundError,
  StaleTransitionError,
  StoreUnavailableError,
  canTransition,
  createLogger,
  isJobStage,
  type JobStage
} from '@docpipe/shared';
import { clearsReferences, type AttemptStage, type CreateJobParams, type Job, type JobMutations } from './models/job';
import type { JobStore } from './store';

export const DATABASE_VERSION = '2.0.0';

const log = createLogger('database');

/**
 * Database connection configuration supporting both connection string and discrete parameters.
 *
 * Connection Strategies:
 * - Connection string: external databases (e.g. Supabase pooler) and local development
 * - Discrete parameters: RDS proxy endpoint with credentials from Secrets Manager
 */
export interface DatabaseClientConfig {
  /** Complete PostgreSQL connection string */
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  /** SSL settings (default: true) */
  ssl?: boolean | { rejectUnauthorized: boolean };
  /** Pool size (default: 10) */
  max?: number;
}

type JobRow = {
  id: string;
  owner: string;
  stage: string;
  input_ref: string;
  spec_ref: string;
  template_ref: string;
  structured_data_ref: string | null;
  output_ref: string | null;
  extraction_attempts: number;
  generation_attempts: number;
  last_error: string | null;
  version: number;
  created_at: Date | string;
  updated_at: Date | string;
};

const JOB_COLUMNS = `id, owner, stage, input_ref, spec_ref, template_ref, structured_data_ref, output_ref,
  extraction_attempts, generation_attempts, last_error, version, created_at, updated_at`;

const ATTEMPT_COLUMNS: Record<AttemptStage, string> = {
  extraction: 'extraction_attempts',
  generation: 'generation_attempts'
};

/** Integrity violations (class 23) are programming errors, not outages. */
function isIntegrityViolation(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    typeof err.code === 'string' &&
    err.code.startsWith('23')
  );
}

/**
 * Job store backed by node-postgres connection pooling.
 *
 * Usage Patterns:
 * - Lambda functions: obtain through getSharedDatabaseClient() and never call end()
 * - Workers: one instance per process, end() on shutdown
 * - Tests: mock `pg` and assert on issued SQL
 */
export class DatabaseClient implements JobStore {
  private readonly pool: Pool;

  constructor(config?: DatabaseClientConfig) {
    const shared: PoolConfig = {
      ssl: config?.ssl ?? true,
      max: config?.max ?? 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
      allowExitOnIdle: true
    };
    this.pool = new Pool(
      config?.connectionString
        ? { ...shared, connectionString: config.connectionString }
        : {
            ...shared,
            host: config?.host,
            port: config?.port,
            database: config?.database,
            user: config?.user,
            password: config?.password
          }
    );
  }

  async end(): Promise<void> {
    await this.pool.end();
  }

  /** Executes `SELECT 1`; false when the pool cannot reach the database. */
  async healthCheck(): Promise<boolean> {
    try {
      const result = await this.pool.query('SELECT 1');
      return result.rowCount === 1;
    } catch (err) {
      log.warn('health_check_failed', { error: err });
      return false;
    }
  }

  // ===== JOB OPERATIONS =====

  async create(params: CreateJobParams): Promise<Job> {
    const result = await this.query<JobRow>(
      `INSERT INTO jobs (owner, stage, input_ref, spec_ref, template_ref)
       VALUES ($1, 'UPLOADED', $2, $3, $4)
       RETURNING ${JOB_COLUMNS}`,
      [params.owner, params.inputRef, params.specRef, params.templateRef]
    );
    const row = result.rows[0];
    if (!row) throw new StoreUnavailableError('Job insert returned no row');
    return this.mapJob(row);
  }

  async get(jobId: string): Promise<Job> {
    const result = await this.query<JobRow>(`SELECT ${JOB_COLUMNS} FROM jobs WHERE id = $1`, [jobId]);
    const row = result.rows[0];
    if (!row) throw new NotFoundError(jobId);
    return this.mapJob(row);
  }

  /**
   * Atomic compare-and-set on `stage`. Mutations are applied in the same
   * statement; entering FAILED, DEAD_LETTERED or CANCELLED clears both refs.
   * When no row matches, a follow-up read tells a stale stage from a missing job.
   */
  async transition(jobId: string, expected: JobStage, next: JobStage, mutations: JobMutations = {}): Promise<Job> {
    if (!canTransition(expected, next)) throw new InvalidTransitionError(expected, next);

    const sets = ['stage = $3', 'version = version + 1'];
    const values: unknown[] = [jobId, expected, next];
    const assign = (column: string, value: string | null) => {
      values.push(value);
      sets.push(`${column} = $${values.length}`);
    };
    if (clearsReferences(next)) {
      assign('structured_data_ref', null);
      assign('output_ref', null);
    } else {
      if (mutations.structuredDataRef !== undefined) assign('structured_data_ref', mutations.structuredDataRef);
      if (mutations.outputRef !== undefined) assign('output_ref', mutations.outputRef);
    }
    if (mutations.lastError !== undefined) assign('last_error', mutations.lastError);

    const result = await this.query<JobRow>(
      `UPDATE jobs SET ${sets.join(', ')}
       WHERE id = $1 AND stage = $2
       RETURNING ${JOB_COLUMNS}`,
      values
    );
    const row = result.rows[0];
    if (row) return this.mapJob(row);

    const current = await this.query<Pick<JobRow, 'stage'>>('SELECT stage FROM jobs WHERE id = $1', [jobId]);
    const found = current.rows[0];
    if (!found) throw new NotFoundError(jobId);
    throw new StaleTransitionError(jobId, expected, this.parseStage(found.stage));
  }

  async incrementAttempt(jobId: string, stage: AttemptStage): Promise<number> {
    const column = ATTEMPT_COLUMNS[stage];
    const result = await this.query<{ attempts: number }>(
      `UPDATE jobs SET ${column} = ${column} + 1, version = version + 1
       WHERE id = $1
       RETURNING ${column} AS attempts`,
      [jobId]
    );
    const row = result.rows[0];
    if (!row) throw new NotFoundError(jobId);
    return Number(row.attempts);
  }

  async listByOwner(owner: string, options?: { limit?: number; stage?: JobStage }): Promise<Job[]> {
    const conditions: string[] = ['owner = $1'];
    const values: unknown[] = [owner];
    if (options?.stage) {
      values.push(options.stage);
      conditions.push(`stage = $${values.length}`);
    }
    values.push(options?.limit ?? 50);

    const result = await this.query<JobRow>(
      `SELECT ${JOB_COLUMNS}
       FROM jobs
       WHERE ${conditions.join(' AND ')}
       ORDER BY created_at DESC
       LIMIT $${values.length}`,
      values
    );
    return result.rows.map((r) => this.mapJob(r));
  }

  // ===== PRIVATE UTILITIES =====

  private async query<R extends QueryResultRow>(text: string, values: unknown[]) {
    try {
      return await this.pool.query<R>(text, values);
    } catch (err) {
      if (isIntegrityViolation(err)) throw err;
      log.error('query_failed', { error: err });
      throw new StoreUnavailableError('Job store query failed', err);
    }
  }

  private parseStage(value: string): JobStage {
    if (!isJobStage(value)) throw new Error(`Unknown job stage in database: ${value}`);
    return value;
  }

  /**
   * Map a `jobs` row to the Job model (snake_case to camelCase, timestamp coercion).
   */
  private mapJob(row: JobRow): Job {
    return {
      id: row.id,
      owner: row.owner,
      stage: this.parseStage(row.stage),
      inputRef: row.input_ref,
      specRef: row.spec_ref,
      templateRef: row.template_ref,
      structuredDataRef: row.structured_data_ref ?? null,
      outputRef: row.output_ref ?? null,
      attempts: {
        extraction: Number(row.extraction_attempts),
        generation: Number(row.generation_attempts)
      },
      lastError: row.last_error ?? null,
      version: Number(row.version),
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at)
    };
  }
}

/**
 * Run `fn` with a dedicated client and always close its pool afterwards.
 * Suited to one-off scripts; handlers use getSharedDatabaseClient().
 */
export async function withDatabaseClient<T>(
  config: DatabaseClientConfig | undefined,
  fn: (client: DatabaseClient) => Promise<T>
): Promise<T> {
  const client = new DatabaseClient(config);
  try {
    return await fn(client);
  } finally {
    await client.end();
  }
}

export * from './models/job';
export * from './store';
export * from './memory-store';
export * from './credentials';
export * from './shared-client';

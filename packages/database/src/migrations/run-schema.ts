/**
 * Database Schema Migration
 *
 * Creates the `jobs` table and its supporting types, indexes and triggers.
 * Idempotent: every statement tolerates an already-migrated database, so it is
 * safe to run on every deploy.
 *
 * Schema Components:
 * - job_stage enum: the pipeline stage vocabulary
 * - jobs table: one row per document job, with per-stage attempt counters and
 *   a version column bumped on every write
 * - CHECK constraints mirroring the reference invariants
 * - Indexes for owner listings and for non-terminal stage scans
 * - Trigger for automatic updated_at maintenance
 *
 * Usage:
 * - As a Lambda: invoke `handler` once after deployment
 * - From a script: `await runSchemaMigration(await resolveDatabaseConfig())`
 */
import { Client } from 'pg';
import { createLogger } from '@docpipe/shared';
import { resolveDatabaseConfig } from '../credentials';
import type { DatabaseClientConfig } from '../index';

const log = createLogger('migration');

export const schemaSql = `
-- ============================================================================
-- DOCUMENT PIPELINE - DATABASE SCHEMA
-- ============================================================================
CREATE EXTENSION IF NOT EXISTS "uuid-ossp";

DO $$ BEGIN
    CREATE TYPE job_stage AS ENUM (
        'UPLOADED', 'QUEUED', 'EXTRACTING', 'EXTRACTED', 'GENERATING',
        'COMPLETE', 'FAILED', 'DEAD_LETTERED', 'CANCELLED'
    );
EXCEPTION
    WHEN duplicate_object THEN null;
END $$;

-- ============================================================================
-- JOBS TABLE - stage, artifact references and retry accounting
-- ============================================================================
CREATE TABLE IF NOT EXISTS jobs (
    id UUID PRIMARY KEY DEFAULT uuid_generate_v4(),
    owner VARCHAR(128) NOT NULL,                                       -- Submitting API key id
    stage job_stage NOT NULL DEFAULT 'UPLOADED',
    input_ref TEXT NOT NULL,                                           -- Uploaded document
    spec_ref TEXT NOT NULL,                                            -- Extraction specification
    template_ref TEXT NOT NULL,                                        -- Output template
    structured_data_ref TEXT,                                          -- Set by extraction
    output_ref TEXT,                                                   -- Set by generation
    extraction_attempts INTEGER NOT NULL DEFAULT 0 CHECK (extraction_attempts >= 0),
    generation_attempts INTEGER NOT NULL DEFAULT 0 CHECK (generation_attempts >= 0),
    last_error TEXT,
    version INTEGER NOT NULL DEFAULT 1,                                -- Bumped on every write
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    CONSTRAINT jobs_structured_data_ref_stage CHECK (
        (structured_data_ref IS NOT NULL) = (stage IN ('EXTRACTED', 'GENERATING', 'COMPLETE'))
    ),
    CONSTRAINT jobs_output_ref_stage CHECK ((output_ref IS NOT NULL) = (stage = 'COMPLETE')),
    CONSTRAINT jobs_complete_without_error CHECK (stage <> 'COMPLETE' OR last_error IS NULL)
);

-- ============================================================================
-- PERFORMANCE INDEXES
-- ============================================================================
CREATE INDEX IF NOT EXISTS idx_jobs_owner_created_at ON jobs(owner, created_at DESC);
CREATE INDEX IF NOT EXISTS idx_jobs_active_stage ON jobs(stage)
    WHERE stage NOT IN ('COMPLETE', 'FAILED', 'DEAD_LETTERED', 'CANCELLED');

-- ============================================================================
-- AUTOMATIC TIMESTAMP UPDATES
-- ============================================================================
CREATE OR REPLACE FUNCTION update_updated_at()
RETURNS TRIGGER AS $$
BEGIN
    NEW.updated_at = NOW();
    RETURN NEW;
END;
$$ LANGUAGE plpgsql;

DO $$ BEGIN
    CREATE TRIGGER trigger_jobs_updated_at
        BEFORE UPDATE ON jobs
        FOR EACH ROW
        EXECUTE FUNCTION update_updated_at();
EXCEPTION
    WHEN duplicate_object THEN null;
END $$;`;

export interface MigrationResult {
  status: 'ok' | 'error';
  message: string;
}

/**
 * Execute the schema SQL over a dedicated connection, always closing it.
 */
export async function runSchemaMigration(config: DatabaseClientConfig): Promise<MigrationResult> {
  const client = new Client({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port ?? 5432,
    user: config.user,
    password: config.password,
    database: config.database,
    ssl: config.ssl ?? { rejectUnauthorized: false }
  });

  try {
    await client.connect();
    log.info('migration_connected', { database: config.database ?? null });
    try {
      await client.query(schemaSql);
      log.info('migration_completed');
    } finally {
      await client.end();
    }
    return { status: 'ok', message: 'Schema migration completed successfully' };
  } catch (error) {
    log.error('migration_failed', { error });
    return {
      status: 'error',
      message: error instanceof Error ? error.message : 'Unknown error occurred'
    };
  }
}

/**
 * Lambda Handler - resolves credentials the same way the API does and runs
 * the migration.
 */
export const handler = async (): Promise<MigrationResult> => {
  const config = await resolveDatabaseConfig();
  return runSchemaMigration(config);
};

/**
 * Singleton database client for Lambda function reuse.
 * Maintains a single connection pool across Lambda warm starts.
 *
 * This module prevents connection pool exhaustion by:
 * - Reusing the same DatabaseClient instance across Lambda invocations
 * - Leveraging Lambda container warm starts for connection pooling
 * - Replacing the pool only when the connection target changes
 */

import { createLogger } from '@docpipe/shared';
import { DatabaseClient, type DatabaseClientConfig } from './index';

const log = createLogger('database-shared-client');

let cachedClient: DatabaseClient | null = null;

/** Connection identity of the cached client, without the password */
let cachedConfig: string | null = null;

function closeInBackground(client: DatabaseClient, event: string): void {
  client.end().catch((err: unknown) => {
    log.error(event, { error: err });
  });
}

/**
 * Get or create a singleton DatabaseClient instance.
 *
 * IMPORTANT: Do not call end() on the returned client in handler code.
 * Let the Lambda container lifecycle manage cleanup when the container is recycled.
 *
 * @example
 * ```typescript
 * const db = getSharedDatabaseClient(await resolveDatabaseConfig());
 * const job = await db.get(jobId);
 * ```
 */
export function getSharedDatabaseClient(config: DatabaseClientConfig): DatabaseClient {
  const configHash = JSON.stringify({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user
  });

  if (cachedClient && cachedConfig === configHash) {
    return cachedClient;
  }

  if (cachedClient) {
    closeInBackground(cachedClient, 'close_on_config_change_failed');
  }

  cachedClient = new DatabaseClient(config);
  cachedConfig = configHash;

  return cachedClient;
}

/**
 * Manually clear the cached client. Primarily useful for tests.
 */
export function clearCachedClient(): void {
  if (cachedClient) {
    closeInBackground(cachedClient, 'clear_cached_client_failed');
    cachedClient = null;
    cachedConfig = null;
  }
}

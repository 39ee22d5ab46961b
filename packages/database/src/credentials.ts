/**
 * Resolves database connection settings from the environment.
 *
 * Priority: DATABASE_URL (external database such as Supabase) over an RDS
 * proxy endpoint whose credentials live in AWS Secrets Manager.
 */

import {
  GetSecretValueCommand,
  SecretsManagerClient,
  type GetSecretValueCommandOutput
} from '@aws-sdk/client-secrets-manager';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import { z } from 'zod';
import { createLogger } from '@docpipe/shared';
import type { DatabaseClientConfig } from './index';

const log = createLogger('database-credentials');

const secretSchema = z.object({
  username: z.string().optional(),
  password: z.string().optional()
});

/** The slice of the Secrets Manager client used here. */
export interface SecretsReader {
  send(command: GetSecretValueCommand): Promise<Pick<GetSecretValueCommandOutput, 'SecretString' | 'SecretBinary'>>;
}

export interface DbCredentials {
  user?: string;
  password?: string;
}

/**
 * Fetch `{ username, password }` from the secret named by DATABASE_SECRET_ARN.
 * Missing secret, unreachable service or malformed JSON all yield empty
 * credentials with a warning, so local runs without AWS access keep working.
 */
export async function getDbCredentials(
  env: Record<string, string | undefined> = process.env,
  client?: SecretsReader
): Promise<DbCredentials> {
  const secretArn = env['DATABASE_SECRET_ARN'];
  if (!secretArn) return {};

  const sm: SecretsReader =
    client ??
    new SecretsManagerClient({
      requestHandler: new NodeHttpHandler({ connectionTimeout: 1500, requestTimeout: 3000 })
    });

  let secretString: string;
  try {
    const res = await sm.send(new GetSecretValueCommand({ SecretId: secretArn }));
    secretString = res.SecretString ?? Buffer.from(res.SecretBinary ?? new Uint8Array()).toString('utf8');
  } catch (err) {
    log.warn('secret_unavailable', { secretArn, error: err });
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(secretString || '{}');
  } catch (err) {
    log.warn('secret_malformed', { secretArn, error: err });
    return {};
  }
  const parsed = secretSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn('secret_malformed', { secretArn, issues: parsed.error.issues.length });
    return {};
  }
  const creds: DbCredentials = {};
  if (parsed.data.username) creds.user = parsed.data.username;
  if (parsed.data.password) creds.password = parsed.data.password;
  return creds;
}

/** Build a DatabaseClientConfig from DATABASE_* variables. */
export async function resolveDatabaseConfig(
  env: Record<string, string | undefined> = process.env,
  client?: SecretsReader
): Promise<DatabaseClientConfig> {
  const sslDisabled = env['DATABASE_SSL'] === 'false';
  const url = env['DATABASE_URL']?.trim();
  if (url) {
    return { connectionString: url, ssl: sslDisabled ? false : { rejectUnauthorized: false } };
  }

  const config: DatabaseClientConfig = { ssl: !sslDisabled };
  const host = env['DATABASE_PROXY_ENDPOINT'] ?? env['DB_HOST'];
  const database = env['DATABASE_NAME'] ?? env['DB_NAME'];
  if (host) config.host = host;
  if (database) config.database = database;
  const creds = await getDbCredentials(env, client);
  if (creds.user) config.user = creds.user;
  if (creds.password) config.password = creds.password;
  return config;
}

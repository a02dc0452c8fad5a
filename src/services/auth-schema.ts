import pg from 'pg';
import { SchemaInitError, SupabaseContainerError } from '../errors.js';

export const DEFAULT_AUTH_NAMESPACE = 'auth';

type Escaper = Pick<pg.ClientBase, 'escapeIdentifier' | 'escapeLiteral'>;

export interface AuthSchemaOptions {
  /** Connection string with rights to create roles, e.g. the `postgres` superuser. */
  dbUrl: string;
  /** Password given to `supabase_auth_admin`. */
  authAdminPassword: string;
  namespace?: string;
  /** Receives errors the connection raises outside of a pending query. */
  onError?: (error: unknown) => void;
}

/**
 * Roles and schema GoTrue expects before its own migrations run. Sent as a
 * single simple-protocol query, so Postgres executes it as one batch.
 */
export function buildAuthSchemaSql(escaper: Escaper, namespace: string, authAdminPassword: string): string {
  return [
    'CREATE USER supabase_admin LOGIN CREATEROLE CREATEDB REPLICATION BYPASSRLS;',
    `CREATE USER supabase_auth_admin NOINHERIT CREATEROLE LOGIN NOREPLICATION PASSWORD ${escaper.escapeLiteral(authAdminPassword)};`,
    `CREATE SCHEMA IF NOT EXISTS ${escaper.escapeIdentifier(namespace)} AUTHORIZATION supabase_auth_admin;`,
    'GRANT CREATE ON DATABASE postgres TO supabase_auth_admin;',
    `ALTER USER supabase_auth_admin SET search_path = ${escaper.escapeLiteral(namespace)};`,
  ].join('\n');
}

export async function applyAuthSchema(
  client: pg.ClientBase,
  namespace: string,
  authAdminPassword: string,
): Promise<void> {
  try {
    await client.query(buildAuthSchemaSql(client, namespace, authAdminPassword));
  } catch (err) {
    throw new SchemaInitError('failed to initialize auth database schema', err);
  }
}

export async function initAuthSchema(options: AuthSchemaOptions): Promise<void> {
  if (options.dbUrl.length === 0) {
    throw new SupabaseContainerError('database URL cannot be empty');
  }

  const onError = options.onError ?? ((err: unknown) => {
    console.error('[auth] PostgreSQL connection error:', err);
  });
  const client = new pg.Client({ connectionString: options.dbUrl });
  client.on('error', onError);

  try {
    try {
      await client.connect();
    } catch (err) {
      throw new SchemaInitError(`failed to connect to PostgreSQL at ${options.dbUrl}`, err);
    }
    await applyAuthSchema(client, options.namespace ?? DEFAULT_AUTH_NAMESPACE, options.authAdminPassword);
  } finally {
    await client.end();
  }
}

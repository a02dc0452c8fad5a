import type { EnvVars, ReadyCondition } from '../types.js';
import { SupabaseImage } from '../image/supabase-image.js';

export const GRAPHQL_IMAGE = 'supabase/postgres';
export const GRAPHQL_TAG = '15.8.1.085';
export const GRAPHQL_PORT = 5432;

// POSTGRES_HOST is left unset: it breaks the image's init scripts.
const DEFAULT_ENV: EnvVars = {
  POSTGRES_DB: 'postgres',
  POSTGRES_USER: 'postgres',
  POSTGRES_PASSWORD: 'postgres',
};

/**
 * Supabase's Postgres build, which ships the pg_graphql extension. GraphQL
 * queries go through `graphql.resolve()` over an ordinary SQL connection.
 */
export class GraphQL extends SupabaseImage<GraphQL> {
  readonly name = GRAPHQL_IMAGE;

  constructor(env: EnvVars = {}, tag: string = GRAPHQL_TAG) {
    super({ ...DEFAULT_ENV, ...env }, tag);
  }

  protected derive(env: EnvVars, tag: string): GraphQL {
    return new GraphQL(env, tag);
  }

  readyConditions(): ReadyCondition[] {
    return [{ kind: 'log', stream: 'stderr', message: 'database system is ready to accept connections' }];
  }

  exposedPorts(): number[] {
    return [GRAPHQL_PORT];
  }

  withDatabase(database: string): GraphQL {
    return this.set('POSTGRES_DB', database);
  }

  withUser(user: string): GraphQL {
    return this.set('POSTGRES_USER', user);
  }

  withPassword(password: string): GraphQL {
    return this.set('POSTGRES_PASSWORD', password);
  }

  withHost(host: string): GraphQL {
    return this.set('POSTGRES_HOST', host);
  }

  withPort(port: number): GraphQL {
    return this.set('POSTGRES_PORT', port);
  }

  withHostAuthMethod(method: string): GraphQL {
    return this.set('POSTGRES_HOST_AUTH_METHOD', method);
  }

  withPostgresArgs(args: string): GraphQL {
    return this.set('POSTGRES_INITDB_ARGS', args);
  }

  withJwtSecret(secret: string): GraphQL {
    return this.set('JWT_SECRET', secret);
  }

  /** `postgres://user:password@{host}:{port}/db` with the placeholders left in. */
  connectionStringTemplate(): string {
    const user = this.getEnv('POSTGRES_USER') ?? 'postgres';
    const password = this.getEnv('POSTGRES_PASSWORD') ?? 'postgres';
    const database = this.getEnv('POSTGRES_DB') ?? 'postgres';
    return `postgres://${user}:${password}@{host}:{port}/${database}`;
  }

  connectionString(host: string, port: number): string {
    return this.connectionStringTemplate()
      .replace('{host}', host)
      .replace('{port}', String(port));
  }
}

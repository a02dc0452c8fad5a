import type { EnvVars, ReadyCondition } from '../types.js';
import { SupabaseImage } from '../image/supabase-image.js';

export const POSTGREST_IMAGE = 'postgrest/postgrest';
export const POSTGREST_TAG = 'v12.2.3';
export const POSTGREST_PORT = 3000;

const DEFAULT_ENV: EnvVars = {
  PGRST_DB_SCHEMAS: 'public',
  PGRST_DB_ANON_ROLE: 'anon',
  PGRST_SERVER_PORT: String(POSTGREST_PORT),
  PGRST_SERVER_HOST: '0.0.0.0',
};

export class PostgREST extends SupabaseImage<PostgREST> {
  readonly name = POSTGREST_IMAGE;

  constructor(env: EnvVars = {}, tag: string = POSTGREST_TAG) {
    super({ ...DEFAULT_ENV, ...env }, tag);
  }

  protected derive(env: EnvVars, tag: string): PostgREST {
    return new PostgREST(env, tag);
  }

  readyConditions(): ReadyCondition[] {
    return [{ kind: 'log', stream: 'stderr', message: 'Listening on port' }];
  }

  exposedPorts(): number[] {
    return [POSTGREST_PORT];
  }

  withPostgresConnection(connectionString: string): PostgREST {
    return this.set('PGRST_DB_URI', connectionString);
  }

  /** Comma-separated list of schemas to expose. */
  withDbSchemas(schemas: string): PostgREST {
    return this.set('PGRST_DB_SCHEMAS', schemas);
  }

  withDbAnonRole(role: string): PostgREST {
    return this.set('PGRST_DB_ANON_ROLE', role);
  }

  withJwtSecret(secret: string): PostgREST {
    return this.set('PGRST_JWT_SECRET', secret);
  }

  withJwtRoleClaimKey(key: string): PostgREST {
    return this.set('PGRST_JWT_ROLE_CLAIM_KEY', key);
  }

  /** `follow-privileges`, `ignore-privileges` or `disabled`. */
  withOpenapiMode(mode: string): PostgREST {
    return this.set('PGRST_OPENAPI_MODE', mode);
  }

  withMaxRows(maxRows: number): PostgREST {
    return this.set('PGRST_DB_MAX_ROWS', maxRows);
  }

  withPreRequest(functionName: string): PostgREST {
    return this.set('PGRST_DB_PRE_REQUEST', functionName);
  }

  withLogLevel(level: string): PostgREST {
    return this.set('PGRST_LOG_LEVEL', level);
  }
}

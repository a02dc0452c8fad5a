import type { EnvVars, ReadyCondition } from '../types.js';
import { SupabaseImage } from '../image/supabase-image.js';

export const ANALYTICS_IMAGE = 'supabase/logflare';
export const ANALYTICS_TAG = '1.26.13';
export const ANALYTICS_PORT = 4000;

const DEFAULT_ENV: EnvVars = {
  PHX_HTTP_PORT: String(ANALYTICS_PORT),
  LOGFLARE_NODE_HOST: '127.0.0.1',
  // Self-hosted Logflare only runs single-tenant
  LOGFLARE_SINGLE_TENANT: 'true',
  LOGFLARE_SUPABASE_MODE: 'true',
  DB_SCHEMA: '_analytics',
  POSTGRES_BACKEND_SCHEMA: '_analytics',
  LOGFLARE_FEATURE_FLAG_OVERRIDE: 'multibackend=true',
};

/** Supabase Analytics (Logflare) backed by Postgres. */
export class Analytics extends SupabaseImage<Analytics> {
  readonly name = ANALYTICS_IMAGE;

  constructor(env: EnvVars = {}, tag: string = ANALYTICS_TAG) {
    super({ ...DEFAULT_ENV, ...env }, tag);
  }

  protected derive(env: EnvVars, tag: string): Analytics {
    return new Analytics(env, tag);
  }

  readyConditions(): ReadyCondition[] {
    return [{ kind: 'log', stream: 'stdout', message: 'Starting migration' }];
  }

  exposedPorts(): number[] {
    return [ANALYTICS_PORT];
  }

  withPostgresBackendUrl(url: string): Analytics {
    return this.set('POSTGRES_BACKEND_URL', url);
  }

  withPostgresBackendSchema(schema: string): Analytics {
    return this.set('POSTGRES_BACKEND_SCHEMA', schema);
  }

  withDbHostname(hostname: string): Analytics {
    return this.set('DB_HOSTNAME', hostname);
  }

  withDbPort(port: number): Analytics {
    return this.set('DB_PORT', port);
  }

  withDbUsername(username: string): Analytics {
    return this.set('DB_USERNAME', username);
  }

  withDbPassword(password: string): Analytics {
    return this.set('DB_PASSWORD', password);
  }

  withDbDatabase(database: string): Analytics {
    return this.set('DB_DATABASE', database);
  }

  withDbSchema(schema: string): Analytics {
    return this.set('DB_SCHEMA', schema);
  }

  withPublicAccessToken(token: string): Analytics {
    return this.set('LOGFLARE_PUBLIC_ACCESS_TOKEN', token);
  }

  withPrivateAccessToken(token: string): Analytics {
    return this.set('LOGFLARE_PRIVATE_ACCESS_TOKEN', token);
  }

  /** Base64 key Logflare encrypts stored credentials with. */
  withEncryptionKey(key: string): Analytics {
    return this.set('LOGFLARE_DB_ENCRYPTION_KEY', key);
  }

  withNodeHost(host: string): Analytics {
    return this.set('LOGFLARE_NODE_HOST', host);
  }

  withSingleTenant(enabled: boolean): Analytics {
    return this.set('LOGFLARE_SINGLE_TENANT', enabled);
  }

  withSupabaseMode(enabled: boolean): Analytics {
    return this.set('LOGFLARE_SUPABASE_MODE', enabled);
  }

  /** Comma-separated `flag=value` pairs. */
  withFeatureFlagOverride(flags: string): Analytics {
    return this.set('LOGFLARE_FEATURE_FLAG_OVERRIDE', flags);
  }

  withLogLevel(level: string): Analytics {
    return this.set('LOGFLARE_LOG_LEVEL', level);
  }

  withHttpPort(port: number): Analytics {
    return this.set('PHX_HTTP_PORT', port);
  }
}

import type { EnvVars, ReadyCondition } from '../types.js';
import { SupabaseImage } from '../image/supabase-image.js';

export const REALTIME_IMAGE = 'supabase/realtime';
export const REALTIME_TAG = 'v2.33.58';
export const REALTIME_PORT = 4000;

const DEFAULT_ENV: EnvVars = {
  PORT: String(REALTIME_PORT),
  // Read by the Phoenix runtime config
  APP_NAME: 'realtime',
  SLOT_NAME: 'realtime_rls',
  TEMPORARY_SLOT: 'true',
  SECURE_CHANNELS: 'true',
  REGION: 'local',
  TENANT_ID: 'realtime-dev',
  ERL_AFLAGS: '-proto_dist inet_tcp',
  ENABLE_TAILSCALE: 'false',
  DB_PORT: '5432',
  DB_SSL: 'false',
  // The start script fails without it
  RLIMIT_NOFILE: '10000',
};

/**
 * Supabase Realtime. Needs a Postgres with logical replication
 * (`wal_level=logical`) reachable from the container.
 */
export class Realtime extends SupabaseImage<Realtime> {
  readonly name = REALTIME_IMAGE;

  constructor(env: EnvVars = {}, tag: string = REALTIME_TAG) {
    super({ ...DEFAULT_ENV, ...env }, tag);
  }

  protected derive(env: EnvVars, tag: string): Realtime {
    return new Realtime(env, tag);
  }

  readyConditions(): ReadyCondition[] {
    return [{ kind: 'log', stream: 'stdout', message: 'Realtime has started' }];
  }

  exposedPorts(): number[] {
    return [REALTIME_PORT];
  }

  withPostgresConnection(connectionString: string): Realtime {
    return this.set('DB_URL', connectionString);
  }

  withDbHost(host: string): Realtime {
    return this.set('DB_HOST', host);
  }

  withDbPort(port: number): Realtime {
    return this.set('DB_PORT', port);
  }

  withDbName(name: string): Realtime {
    return this.set('DB_NAME', name);
  }

  withDbUser(user: string): Realtime {
    return this.set('DB_USER', user);
  }

  withDbPassword(password: string): Realtime {
    return this.set('DB_PASSWORD', password);
  }

  withDbSsl(enabled: boolean): Realtime {
    return this.set('DB_SSL', enabled);
  }

  withDbAfterConnectQuery(query: string): Realtime {
    return this.set('DB_AFTER_CONNECT_QUERY', query);
  }

  withJwtSecret(secret: string): Realtime {
    return this.set('JWT_SECRET', secret);
  }

  withApiJwtSecret(secret: string): Realtime {
    return this.set('API_JWT_SECRET', secret);
  }

  /** Phoenix session signing key, at least 64 bytes. */
  withSecretKeyBase(secret: string): Realtime {
    return this.set('SECRET_KEY_BASE', secret);
  }

  withSlotName(name: string): Realtime {
    return this.set('SLOT_NAME', name);
  }

  withTemporarySlot(temporary: boolean): Realtime {
    return this.set('TEMPORARY_SLOT', temporary);
  }

  withMaxRecordBytes(bytes: number): Realtime {
    return this.set('MAX_RECORD_BYTES', bytes);
  }

  withSecureChannels(secure: boolean): Realtime {
    return this.set('SECURE_CHANNELS', secure);
  }

  withRegion(region: string): Realtime {
    return this.set('REGION', region);
  }

  withTenantId(tenantId: string): Realtime {
    return this.set('TENANT_ID', tenantId);
  }

  withErlAflags(flags: string): Realtime {
    return this.set('ERL_AFLAGS', flags);
  }

  withDnsNodes(nodes: string): Realtime {
    return this.set('DNS_NODES', nodes);
  }

  withEnableTailscale(enabled: boolean): Realtime {
    return this.set('ENABLE_TAILSCALE', enabled);
  }

  withPort(port: number): Realtime {
    return this.set('PORT', port);
  }
}

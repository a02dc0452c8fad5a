import type { EnvVars, ReadyCondition } from '../types.js';
import { SupabaseImage } from '../image/supabase-image.js';

export const STORAGE_IMAGE = 'supabase/storage-api';
export const STORAGE_TAG = 'v1.11.1';
export const STORAGE_PORT = 5000;

const DEFAULT_ENV: EnvVars = {
  PORT: String(STORAGE_PORT),
  REGION: 'local',
  STORAGE_BACKEND: 'file',
  FILE_STORAGE_BACKEND_PATH: '/var/lib/storage',
  FILE_SIZE_LIMIT: String(50 * 1024 * 1024),
  GLOBAL_S3_BUCKET: 'storage',
  TENANT_ID: 'default',
  IS_MULTITENANT: 'false',
};

/** Supabase Storage API, storing objects on the container's filesystem by default. */
export class Storage extends SupabaseImage<Storage> {
  readonly name = STORAGE_IMAGE;

  constructor(env: EnvVars = {}, tag: string = STORAGE_TAG) {
    super({ ...DEFAULT_ENV, ...env }, tag);
  }

  protected derive(env: EnvVars, tag: string): Storage {
    return new Storage(env, tag);
  }

  readyConditions(): ReadyCondition[] {
    // Logged as JSON: {"msg":"[Server] Started Successfully",...}
    return [{ kind: 'log', stream: 'stdout', message: '[Server] Started Successfully' }];
  }

  exposedPorts(): number[] {
    return [STORAGE_PORT];
  }

  withDatabaseUrl(url: string): Storage {
    return this.set('DATABASE_URL', url);
  }

  /** `file` or `s3`. */
  withStorageBackend(backend: string): Storage {
    return this.set('STORAGE_BACKEND', backend);
  }

  withAnonKey(key: string): Storage {
    return this.set('ANON_KEY', key);
  }

  withServiceKey(key: string): Storage {
    return this.set('SERVICE_KEY', key);
  }

  withJwtSecret(secret: string): Storage {
    return this.set('PGRST_JWT_SECRET', secret);
  }

  withPostgrestUrl(url: string): Storage {
    return this.set('POSTGREST_URL', url);
  }

  withTenantId(tenantId: string): Storage {
    return this.set('TENANT_ID', tenantId);
  }

  withRegion(region: string): Storage {
    return this.set('REGION', region);
  }

  withGlobalS3Bucket(bucket: string): Storage {
    return this.set('GLOBAL_S3_BUCKET', bucket);
  }

  /** Maximum upload size in bytes. */
  withFileSizeLimit(limit: number): Storage {
    return this.set('FILE_SIZE_LIMIT', limit);
  }

  withFileStoragePath(path: string): Storage {
    return this.set('FILE_STORAGE_BACKEND_PATH', path);
  }

  withUploadSignedUrlExpiration(seconds: number): Storage {
    return this.set('UPLOAD_SIGNED_URL_EXPIRATION_TIME', seconds);
  }

  withMultitenant(enabled: boolean): Storage {
    return this.set('IS_MULTITENANT', enabled);
  }

  withTusUrlPath(path: string): Storage {
    return this.set('TUS_URL_PATH', path);
  }
}

import type { EnvVars, ReadyCondition } from '../types.js';
import { SupabaseImage } from '../image/supabase-image.js';
import { DEFAULT_AUTH_NAMESPACE, initAuthSchema } from './auth-schema.js';

export const AUTH_IMAGE = 'supabase/gotrue';
export const AUTH_TAG = 'v2.183.0';
export const AUTH_PORT = 9999;

const DEFAULT_ENV: EnvVars = {
  GOTRUE_DB_DRIVER: 'postgres',
  DB_NAMESPACE: DEFAULT_AUTH_NAMESPACE,
  GOTRUE_JWT_SECRET: 'super-secret-jwt-token-for-testing-at-least-32-chars',
  GOTRUE_JWT_EXP: '3600',
  GOTRUE_API_HOST: '0.0.0.0',
  PORT: String(AUTH_PORT),
  API_EXTERNAL_URL: `http://localhost:${AUTH_PORT}`,
  GOTRUE_SITE_URL: 'http://localhost:3000',
  GOTRUE_DISABLE_SIGNUP: 'false',
  GOTRUE_EXTERNAL_ANONYMOUS_USERS_ENABLED: 'true',
  // Skip email/SMS verification in tests
  GOTRUE_MAILER_AUTOCONFIRM: 'true',
  GOTRUE_SMS_AUTOCONFIRM: 'true',
  GOTRUE_LOG_LEVEL: 'debug',
};

export interface InitDbSchemaOptions {
  onError?: (error: unknown) => void;
}

/**
 * Supabase Auth (GoTrue). Defaults autoconfirm signups and enable anonymous
 * users; `DATABASE_URL` must be supplied before starting.
 *
 * @example
 * const auth = await Auth.fromConnectionString(`postgres://supabase_auth_admin:secret@${DOCKER_INTERNAL_HOST}:${pgPort}/postgres`)
 *   .withAnonymousUsers(true)
 *   .initDbSchema(`postgres://postgres:postgres@${LOCAL_HOST}:${pgPort}/postgres`, 'secret');
 * const started = await auth.start();
 */
export class Auth extends SupabaseImage<Auth> {
  readonly name = AUTH_IMAGE;

  constructor(env: EnvVars = {}, tag: string = AUTH_TAG) {
    super({ ...DEFAULT_ENV, ...env }, tag);
  }

  static fromConnectionString(url: string): Auth {
    return new Auth().withDbUrl(url);
  }

  protected derive(env: EnvVars, tag: string): Auth {
    return new Auth(env, tag);
  }

  readyConditions(): ReadyCondition[] {
    return [{ kind: 'log', stream: 'stderr', message: 'API started' }];
  }

  exposedPorts(): number[] {
    return [AUTH_PORT];
  }

  withDbUrl(url: string): Auth {
    return this.set('DATABASE_URL', url);
  }

  /** Schema GoTrue creates its tables in. */
  withDbNamespace(namespace: string): Auth {
    return this.set('DB_NAMESPACE', namespace);
  }

  withJwtSecret(secret: string): Auth {
    return this.set('GOTRUE_JWT_SECRET', secret);
  }

  withJwtExpiry(seconds: number): Auth {
    return this.set('GOTRUE_JWT_EXP', seconds);
  }

  withApiExternalUrl(url: string): Auth {
    return this.set('API_EXTERNAL_URL', url);
  }

  withSiteUrl(url: string): Auth {
    return this.set('GOTRUE_SITE_URL', url);
  }

  withSignupDisabled(disabled: boolean): Auth {
    return this.set('GOTRUE_DISABLE_SIGNUP', disabled);
  }

  withAnonymousUsers(enabled: boolean): Auth {
    return this.set('GOTRUE_EXTERNAL_ANONYMOUS_USERS_ENABLED', enabled);
  }

  withMailerAutoconfirm(enabled: boolean): Auth {
    return this.set('GOTRUE_MAILER_AUTOCONFIRM', enabled);
  }

  withSmsAutoconfirm(enabled: boolean): Auth {
    return this.set('GOTRUE_SMS_AUTOCONFIRM', enabled);
  }

  withLogLevel(level: string): Auth {
    return this.set('GOTRUE_LOG_LEVEL', level);
  }

  /** Branch name of the GoTrue release matching the tag, e.g. `release/2.183.0`. */
  gitReleaseVersion(): string {
    return `release/${this.tag.slice(1)}`;
  }

  /**
   * Creates the roles and schema GoTrue needs. Run it against the database
   * before `start()`; `dbUrl` is seen from the host, not from the container.
   */
  async initDbSchema(dbUrl: string, authAdminPassword: string, options: InitDbSchemaOptions = {}): Promise<Auth> {
    await initAuthSchema({
      dbUrl,
      authAdminPassword,
      namespace: this.getEnv('DB_NAMESPACE') ?? DEFAULT_AUTH_NAMESPACE,
      ...(options.onError !== undefined ? { onError: options.onError } : {}),
    });
    return this;
  }
}

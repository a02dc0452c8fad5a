import type { GenericContainer } from 'testcontainers';
import type { EnvVars, ReadyCondition } from '../types.js';
import { SupabaseImage } from '../image/supabase-image.js';

export const FUNCTIONS_IMAGE = 'supabase/edge-runtime';
export const FUNCTIONS_TAG = 'v1.67.4';
export const FUNCTIONS_PORT = 9000;
export const DEFAULT_MAIN_SERVICE_PATH = '/home/deno/functions';

const DEFAULT_ENV: EnvVars = {
  PORT: String(FUNCTIONS_PORT),
  VERIFY_JWT: 'true',
};

/**
 * Supabase Edge Functions runtime. The container is started with
 * `start --main-service <path>`, and the runtime refuses to boot unless that
 * directory holds a main service, so pair it with `withFunctionsDirectory`.
 */
export class Functions extends SupabaseImage<Functions> {
  readonly name = FUNCTIONS_IMAGE;

  constructor(
    env: EnvVars = {},
    tag: string = FUNCTIONS_TAG,
    readonly mainServicePath: string = DEFAULT_MAIN_SERVICE_PATH,
    readonly functionsDirectory?: string,
  ) {
    super({ ...DEFAULT_ENV, ...env }, tag);
  }

  protected derive(env: EnvVars, tag: string): Functions {
    return new Functions(env, tag, this.mainServicePath, this.functionsDirectory);
  }

  readyConditions(): ReadyCondition[] {
    return [{ kind: 'log', stream: 'stdout', message: 'Listening on' }];
  }

  exposedPorts(): number[] {
    return [FUNCTIONS_PORT];
  }

  override command(): string[] {
    return ['start', '--main-service', this.mainServicePath];
  }

  withJwtSecret(secret: string): Functions {
    return this.set('JWT_SECRET', secret);
  }

  withSupabaseUrl(url: string): Functions {
    return this.set('SUPABASE_URL', url);
  }

  withAnonKey(key: string): Functions {
    return this.set('SUPABASE_ANON_KEY', key);
  }

  withServiceRoleKey(key: string): Functions {
    return this.set('SUPABASE_SERVICE_ROLE_KEY', key);
  }

  withDbUrl(url: string): Functions {
    return this.set('SUPABASE_DB_URL', url);
  }

  withVerifyJwt(verify: boolean): Functions {
    return this.set('VERIFY_JWT', verify);
  }

  withPort(port: number): Functions {
    return this.set('PORT', port);
  }

  withWorkerTimeoutMs(timeout: number): Functions {
    return this.set('WORKER_TIMEOUT_MS', timeout);
  }

  withMaxParallelism(max: number): Functions {
    return this.set('MAX_PARALLELISM', max);
  }

  /** Path inside the container the runtime loads its main service from. */
  withMainServicePath(path: string): Functions {
    return new Functions(this.envVars(), this.tag, path, this.functionsDirectory);
  }

  /** Host directory copied to the main service path before the container starts. */
  withFunctionsDirectory(hostPath: string): Functions {
    return new Functions(this.envVars(), this.tag, this.mainServicePath, hostPath);
  }

  protected override configure(container: GenericContainer): GenericContainer {
    if (this.functionsDirectory === undefined) return container;
    return container.withCopyDirectoriesToContainer([
      { source: this.functionsDirectory, target: this.mainServicePath },
    ]);
  }
}

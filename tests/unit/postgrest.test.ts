import { describe, it, expect } from 'vitest';
import { PostgREST, POSTGREST_PORT } from '../../src/services/postgrest.js';

describe('PostgREST defaults', () => {
  const postgrest = new PostgREST();

  it('exposes the public schema to the anon role', () => {
    expect(postgrest.envVars()).toEqual({
      PGRST_DB_ANON_ROLE: 'anon',
      PGRST_DB_SCHEMAS: 'public',
      PGRST_SERVER_HOST: '0.0.0.0',
      PGRST_SERVER_PORT: '3000',
    });
  });

  it('describes the postgrest image', () => {
    expect(postgrest.name).toBe('postgrest/postgrest');
    expect(postgrest.tag).toBe('v12.2.3');
    expect(postgrest.exposedPorts()).toEqual([POSTGREST_PORT]);
    expect(POSTGREST_PORT).toBe(3000);
  });

  it('waits for the listening message on stderr', () => {
    expect(postgrest.readyConditions()).toEqual([{ kind: 'log', stream: 'stderr', message: 'Listening on port' }]);
  });
});

describe('PostgREST builder', () => {
  it('maps every setter onto its variable', () => {
    const postgrest = new PostgREST()
      .withPostgresConnection('postgres://authenticator:testpass@db:5432/postgres')
      .withDbSchemas('api,public')
      .withDbAnonRole('web_anon')
      .withJwtSecret('test-secret')
      .withJwtRoleClaimKey('.app_role')
      .withOpenapiMode('ignore-privileges')
      .withMaxRows(100)
      .withPreRequest('api.check_request')
      .withLogLevel('info');

    expect(postgrest.envVars()).toEqual({
      PGRST_DB_ANON_ROLE: 'web_anon',
      PGRST_DB_MAX_ROWS: '100',
      PGRST_DB_PRE_REQUEST: 'api.check_request',
      PGRST_DB_SCHEMAS: 'api,public',
      PGRST_DB_URI: 'postgres://authenticator:testpass@db:5432/postgres',
      PGRST_JWT_ROLE_CLAIM_KEY: '.app_role',
      PGRST_JWT_SECRET: 'test-secret',
      PGRST_LOG_LEVEL: 'info',
      PGRST_OPENAPI_MODE: 'ignore-privileges',
      PGRST_SERVER_HOST: '0.0.0.0',
      PGRST_SERVER_PORT: '3000',
    });
  });

  it('lays constructor overrides over the defaults', () => {
    const postgrest = new PostgREST({ PGRST_DB_SCHEMAS: 'api' });
    expect(postgrest.getEnv('PGRST_DB_SCHEMAS')).toBe('api');
    expect(postgrest.getEnv('PGRST_DB_ANON_ROLE')).toBe('anon');
  });

  it('withTag overrides the default tag', () => {
    expect(new PostgREST().withTag('v12.0.0').imageName).toBe('postgrest/postgrest:v12.0.0');
  });
});

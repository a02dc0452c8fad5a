import pg from 'pg';
import { SignJWT } from 'jose';
import type { StartedTestContainer } from 'testcontainers';

export const DATABASE_ALIAS = 'db';

export const JWT_SECRET = 'test-secret-with-at-least-32-characters-for-hs256';

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`${name} is not set; did globalSetup run?`);
  }
  return value;
}

/** Superuser connection string as seen from the test process. */
export function hostDatabaseUrl(): string {
  return requireEnv('TEST_DATABASE_URL');
}

/** Connection string as seen from a container on the test network. */
export function containerDatabaseUrl(user: string, password: string): string {
  return `postgres://${user}:${password}@${DATABASE_ALIAS}:5432/postgres`;
}

export function networkName(): string {
  return requireEnv('TEST_NETWORK_NAME');
}

export function createTestPool(): pg.Pool {
  return new pg.Pool({ connectionString: hostDatabaseUrl(), max: 5 });
}

export function serviceUrl(container: StartedTestContainer, port: number): string {
  return `http://${container.getHost()}:${container.getMappedPort(port)}`;
}

export function signTestJwt(role: string, secret: string = JWT_SECRET): Promise<string> {
  return new SignJWT({ role })
    .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
    .setIssuedAt()
    .setExpirationTime('1h')
    .sign(new TextEncoder().encode(secret));
}

/** Roles and extensions the Supabase services expect to find in the database. */
export const SUPABASE_ROLES_SQL = `
CREATE ROLE anon NOLOGIN;
CREATE ROLE authenticated NOLOGIN;
CREATE ROLE service_role NOLOGIN BYPASSRLS;
CREATE ROLE supabase_storage_admin NOLOGIN;
CREATE EXTENSION IF NOT EXISTS "uuid-ossp";
CREATE EXTENSION IF NOT EXISTS pg_trgm;
`;

export async function seedSupabaseRoles(pool: pg.Pool): Promise<void> {
  await pool.query(SUPABASE_ROLES_SQL);
}

export { DOCKER_INTERNAL_HOST, LOCAL_HOST } from './constants.js';
export type { ContainerImage, EnvVars, LogStream, ReadyCondition } from './types.js';
export { SupabaseImage } from './image/supabase-image.js';
export { SupabaseContainerError, SchemaInitError } from './errors.js';

export { Auth, AUTH_PORT } from './services/auth.js';
export type { InitDbSchemaOptions } from './services/auth.js';
export { Analytics, ANALYTICS_PORT } from './services/analytics.js';
export { Functions, FUNCTIONS_PORT } from './services/functions.js';
export { GraphQL, GRAPHQL_PORT } from './services/graphql.js';
export { PostgREST, POSTGREST_PORT } from './services/postgrest.js';
export { Realtime, REALTIME_PORT } from './services/realtime.js';
export { Storage, STORAGE_PORT } from './services/storage.js';

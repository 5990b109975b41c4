// ============================================================================
// Supakit — Entry Point
// One configuration surface for the Supabase PostgREST and Realtime clients
// ============================================================================

export { createClient, SupabaseClient, type ClientOptions } from './client.js';
export {
    SupabaseConfig,
    loadConfigFromEnv,
    DEFAULT_SCHEMA,
    DEFAULT_TIMEOUT_MS,
    type EnvSettings,
    type RealtimeOptions,
} from './config.js';
export {
    SupabaseError,
    InvalidConfigurationError,
    ClientInitError,
    FeatureNotEnabledError,
    RequestTimeoutError,
    type SupabaseErrorCode,
} from './errors.js';
export { fetchWithHeaders, fetchWithTimeout, type Fetch } from './http.js';
export { createLogger, setLogLevel, type Logger, type LogLevel } from './logger.js';
export type {
    AuthProvider,
    StorageProvider,
    StorageObject,
    FunctionsProvider,
    ProviderContext,
    ProviderFactories,
    ProviderName,
} from './providers.js';

// The wrapped clients, for callers who need their types or helpers directly
export * as postgrest from '@supabase/postgrest-js';
export * as realtime from '@supabase/realtime-js';

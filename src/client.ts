import { PostgrestClient } from '@supabase/postgrest-js';
import { RealtimeClient, type RealtimeClientOptions } from '@supabase/realtime-js';
import WebSocket from 'ws';
import { SupabaseConfig, omitHeader } from './config.js';
import { ClientInitError, FeatureNotEnabledError } from './errors.js';
import { fetchWithHeaders, fetchWithTimeout, resolveFetch, type Fetch } from './http.js';
import { createLogger } from './logger.js';
import type {
    AuthProvider,
    FunctionsProvider,
    ProviderContext,
    ProviderFactories,
    ProviderName,
    StorageProvider,
} from './providers.js';

// ============================================================================
// Supakit — Client
// Wires the PostgREST and Realtime clients to one config
// ============================================================================

const log = createLogger('Client');

export interface ClientOptions {
    /** Transport used for every HTTP request; defaults to the global fetch. */
    fetch?: Fetch;
    providers?: ProviderFactories;
}

/**
 * Custom headers first, then the credential pair. `apikey` names the project,
 * `Authorization` the acting principal (the JWT when one is set).
 */
function buildHeaders(config: SupabaseConfig): Record<string, string> {
    const headers: Record<string, string> = {
        ...omitHeader(omitHeader(config.headers, 'apikey'), 'authorization'),
        apikey: config.apiKey,
        Authorization: `Bearer ${config.jwt ?? config.apiKey}`,
    };

    try {
        new Headers(headers);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ClientInitError(`invalid header: ${reason}`, { cause: error });
    }

    return headers;
}

function createRestClient(config: SupabaseConfig, headers: Record<string, string>, transport: Fetch) {
    return new PostgrestClient(config.restUrl(), { headers: { ...headers }, fetch: transport })
        .schema(config.schema);
}

type RestClient = ReturnType<typeof createRestClient>;

function hasNativeWebSocket(): boolean {
    return typeof Reflect.get(globalThis, 'WebSocket') === 'function';
}

/**
 * Options handed to the realtime client. `params.apikey` is always the project
 * key; Node 20 has no global WebSocket, so `ws` is the transport unless the
 * caller picked one.
 */
export function realtimeOptionsFor(config: SupabaseConfig): RealtimeClientOptions {
    const options = config.realtimeOptions;
    return {
        ...options,
        transport: options.transport ?? (hasNativeWebSocket() ? undefined : WebSocket),
        params: { ...options.params, apikey: config.apiKey },
    };
}

/**
 * Database access through PostgREST (`from`, `rpc`), Realtime through
 * `realtime()`, and optional Auth, Storage and Functions providers.
 *
 * ```ts
 * const client = createClient('https://xyz.supabase.co', 'anon-key');
 * const { data, error } = await client.from('users').select('id, name').eq('active', true);
 *
 * // Row-Level Security as the signed-in user
 * const asUser = client.withJwt(session.access_token);
 * ```
 */
export class SupabaseClient {
    readonly config: SupabaseConfig;
    /** fetch carrying this client's headers and timeout, for endpoints with no wrapped client. */
    readonly http: Fetch;

    private readonly options: ClientOptions;
    private readonly headerSet: Readonly<Record<string, string>>;
    private readonly rest: RestClient;
    private realtimeClient: RealtimeClient | undefined;
    private authProvider: AuthProvider | undefined;
    private storageProvider: StorageProvider | undefined;
    private functionsProvider: FunctionsProvider | undefined;

    private constructor(config: SupabaseConfig, options: ClientOptions) {
        this.config = config;
        this.options = options;
        this.headerSet = Object.freeze(buildHeaders(config));

        const transport = fetchWithTimeout(resolveFetch(options.fetch), config.timeoutMs);
        this.http = fetchWithHeaders(transport, this.headerSet);
        this.rest = createRestClient(config, this.headerSet, transport);

        log.debug('Client ready', {
            url: config.url,
            schema: config.schema,
            authenticated: config.jwt !== undefined,
            realtime: config.realtimeEnabled,
        });
    }

    static withConfig(config: SupabaseConfig, options: ClientOptions = {}): SupabaseClient {
        return new SupabaseClient(config, options);
    }

    // ---- Database ----

    /** Query builder for a table or view. */
    from(table: string) {
        return this.rest.from(table);
    }

    /** Call a Postgres function. `args` is sent as the JSON body as-is. */
    rpc(
        fn: string,
        args: Record<string, unknown> = {},
        options?: { head?: boolean; get?: boolean; count?: 'exact' | 'planned' | 'estimated' },
    ) {
        return this.rest.rpc(fn, args, options);
    }

    /** Database client bound to another exposed schema. */
    schema(name: string) {
        return this.rest.schema(name);
    }

    postgrest(): RestClient {
        return this.rest;
    }

    /** Headers sent with every database request. */
    headers(): Record<string, string> {
        return { ...this.headerSet };
    }

    /**
     * Independent client that sends `Authorization: Bearer <token>`, so
     * Row-Level Security policies evaluate as the token's user. `apikey` and
     * everything else stay as they are; this client is left untouched.
     */
    withJwt(token: string): SupabaseClient {
        const derived = new SupabaseClient(this.config.withJwt(token), this.options);
        log.debug('Derived authenticated client', { url: this.config.url });
        return derived;
    }

    // ---- Realtime ----

    /** Built on first use; connecting is up to the caller (`realtime().connect()`). */
    realtime(): RealtimeClient {
        if (!this.config.realtimeEnabled) {
            throw new FeatureNotEnabledError('Realtime', 'enable it with config.withRealtime()');
        }

        if (!this.realtimeClient) {
            this.realtimeClient = new RealtimeClient(this.config.realtimeUrl(), realtimeOptionsFor(this.config));
            log.debug('Realtime client created', { endpoint: this.config.realtimeUrl() });
        }

        return this.realtimeClient;
    }

    realtimeUrl(): string {
        return this.config.realtimeUrl();
    }

    // ---- Providers ----

    auth(): AuthProvider {
        this.authProvider ??= this.buildProvider('auth', 'Auth', this.options.providers?.auth);
        return this.authProvider;
    }

    storage(): StorageProvider {
        this.storageProvider ??= this.buildProvider('storage', 'Storage', this.options.providers?.storage);
        return this.storageProvider;
    }

    functions(): FunctionsProvider {
        this.functionsProvider ??= this.buildProvider('functions', 'Edge Functions', this.options.providers?.functions);
        return this.functionsProvider;
    }

    private buildProvider<P>(
        name: ProviderName,
        feature: string,
        factory: ((ctx: ProviderContext) => P) | undefined,
    ): P {
        if (!factory) {
            throw new FeatureNotEnabledError(feature, `register a factory under providers.${name}`);
        }
        return factory({ config: this.config, http: this.http });
    }

    toString(): string {
        return `SupabaseClient { url: ${this.config.url}, schema: ${this.config.schema} }`;
    }
}

/** Validate `url` and `apiKey`, then build a client with default settings. */
export function createClient(url: string, apiKey: string, options: ClientOptions = {}): SupabaseClient {
    return SupabaseClient.withConfig(SupabaseConfig.create(url, apiKey), options);
}

import { z } from 'zod';
import type { RealtimeClientOptions } from '@supabase/realtime-js';
import { InvalidConfigurationError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

// ============================================================================
// Supakit — Configuration
// Immutable client settings plus the environment loader
// ============================================================================

export const DEFAULT_SCHEMA = 'public';
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Realtime collaborator options; `params.apikey` is always set by the client. */
export type RealtimeOptions = RealtimeClientOptions;

interface ConfigFields {
    url: string;
    apiKey: string;
    schema: string;
    timeoutMs: number;
    headers: Readonly<Record<string, string>>;
    jwt: string | undefined;
    realtimeEnabled: boolean;
    realtimeOptions: Readonly<RealtimeOptions>;
}

function isHttpUrl(value: string): boolean {
    try {
        const { protocol } = new URL(value);
        return protocol === 'http:' || protocol === 'https:';
    } catch {
        return false;
    }
}

function hasNoQueryOrFragment(value: string): boolean {
    return !/[?#]/.test(value);
}

const urlSchema = z.string()
    .min(1, 'URL is required')
    .refine(isHttpUrl, 'URL must be an absolute http(s) URL')
    .refine(hasNoQueryOrFragment, 'URL must not include a query string or fragment');

const apiKeySchema = z.string().min(1, 'API key is required');
const jwtSchema = z.string().min(1, 'JWT is required');
const schemaNameSchema = z.string().min(1, 'schema name is required');
const headerNameSchema = z.string().min(1, 'header name is required');
const timeoutSchema = z.number().int().positive('timeout must be a positive number of milliseconds');

function check<T>(schema: z.ZodType<T>, value: T): T {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new InvalidConfigurationError(result.error.issues[0]?.message ?? 'invalid configuration');
    }
    return result.data;
}

/**
 * Settings shared by every sub-client. Each `with*` call returns a fresh
 * frozen copy, so a config can be handed to several clients at once.
 *
 * ```ts
 * const config = SupabaseConfig.create('https://xyz.supabase.co', 'anon-key')
 *     .withSchema('api')
 *     .withTimeout(10_000)
 *     .withHeader('X-Client', 'reports');
 * ```
 */
export class SupabaseConfig {
    readonly url: string;
    readonly apiKey: string;
    readonly schema: string;
    readonly timeoutMs: number;
    readonly headers: Readonly<Record<string, string>>;
    /** Bearer token sent instead of the API key in `Authorization`. */
    readonly jwt: string | undefined;
    readonly realtimeEnabled: boolean;
    readonly realtimeOptions: Readonly<RealtimeOptions>;

    private constructor(fields: ConfigFields) {
        this.url = fields.url;
        this.apiKey = fields.apiKey;
        this.schema = fields.schema;
        this.timeoutMs = fields.timeoutMs;
        this.headers = Object.freeze({ ...fields.headers });
        this.jwt = fields.jwt;
        this.realtimeEnabled = fields.realtimeEnabled;
        this.realtimeOptions = freezeRealtimeOptions(fields.realtimeOptions);
        Object.freeze(this);
    }

    static create(url: string, apiKey: string): SupabaseConfig {
        const checkedUrl = check(urlSchema, url);
        return new SupabaseConfig({
            url: checkedUrl.replace(/\/+$/, ''),
            apiKey: check(apiKeySchema, apiKey),
            schema: DEFAULT_SCHEMA,
            timeoutMs: DEFAULT_TIMEOUT_MS,
            headers: {},
            jwt: undefined,
            realtimeEnabled: true,
            realtimeOptions: {},
        });
    }

    private with(changes: Partial<ConfigFields>): SupabaseConfig {
        return new SupabaseConfig({
            url: this.url,
            apiKey: this.apiKey,
            schema: this.schema,
            timeoutMs: this.timeoutMs,
            headers: this.headers,
            jwt: this.jwt,
            realtimeEnabled: this.realtimeEnabled,
            realtimeOptions: this.realtimeOptions,
            ...changes,
        });
    }

    withSchema(name: string): SupabaseConfig {
        return this.with({ schema: check(schemaNameSchema, name) });
    }

    withTimeout(ms: number): SupabaseConfig {
        return this.with({ timeoutMs: check(timeoutSchema, ms) });
    }

    /** Header names are case-insensitive: a later call replaces any earlier spelling. */
    withHeader(name: string, value: string): SupabaseConfig {
        check(headerNameSchema, name);
        const headers = omitHeader(this.headers, name);
        headers[name] = value;
        return this.with({ headers });
    }

    withJwt(token: string): SupabaseConfig {
        return this.with({ jwt: check(jwtSchema, token) });
    }

    withRealtime(options: RealtimeOptions = {}): SupabaseConfig {
        return this.with({ realtimeEnabled: true, realtimeOptions: options });
    }

    withoutRealtime(): SupabaseConfig {
        return this.with({ realtimeEnabled: false });
    }

    restUrl(): string {
        return `${this.url}/rest/v1`;
    }

    authUrl(): string {
        return `${this.url}/auth/v1`;
    }

    storageUrl(): string {
        return `${this.url}/storage/v1`;
    }

    functionsUrl(): string {
        return `${this.url}/functions/v1`;
    }

    realtimeUrl(): string {
        return `${this.url.replace(/^http(s?):\/\//i, 'ws$1://')}/realtime/v1`;
    }
}

/** Frozen copy, including the `params` and `headers` maps. */
function freezeRealtimeOptions(options: Readonly<RealtimeOptions>): Readonly<RealtimeOptions> {
    const copy: RealtimeOptions = { ...options };
    if (options.params) copy.params = Object.freeze({ ...options.params });
    if (options.headers) copy.headers = Object.freeze({ ...options.headers });
    return Object.freeze(copy);
}

/** Copy of `headers` without `name`, compared case-insensitively. */
export function omitHeader(headers: Readonly<Record<string, string>>, name: string): Record<string, string> {
    const lower = name.toLowerCase();
    return Object.fromEntries(
        Object.entries(headers).filter(([key]) => key.toLowerCase() !== lower),
    );
}

// ---- Environment ----

const envSchema = z.object({
    SUPABASE_URL: z.string({ required_error: 'SUPABASE_URL is required' })
        .refine(isHttpUrl, 'SUPABASE_URL must be an absolute http(s) URL')
        .refine(hasNoQueryOrFragment, 'SUPABASE_URL must not include a query string or fragment'),
    SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),
    SUPABASE_API_KEY: z.string().optional(),
    SUPABASE_ANON_KEY: z.string().optional(),
    SUPABASE_SCHEMA: z.string().min(1).default(DEFAULT_SCHEMA),
    SUPABASE_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    SUPABASE_REALTIME: z.string().transform(v => v !== 'false').default('true'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface EnvSettings {
    config: SupabaseConfig;
    logLevel: LogLevel;
}

/**
 * Build a config from `SUPABASE_*` variables. The service role key wins over
 * `SUPABASE_API_KEY`, which wins over the anon key.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EnvSettings {
    const result = envSchema.safeParse(env);

    if (!result.success) {
        const details = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new InvalidConfigurationError(`Invalid environment configuration: ${details.join('; ')}`);
    }

    const vars = result.data;
    const apiKey = vars.SUPABASE_SERVICE_ROLE_KEY || vars.SUPABASE_API_KEY || vars.SUPABASE_ANON_KEY;
    if (!apiKey) {
        throw new InvalidConfigurationError(
            'Invalid environment configuration: one of SUPABASE_SERVICE_ROLE_KEY, SUPABASE_API_KEY or SUPABASE_ANON_KEY is required',
        );
    }

    let config = SupabaseConfig.create(vars.SUPABASE_URL, apiKey)
        .withSchema(vars.SUPABASE_SCHEMA)
        .withTimeout(vars.SUPABASE_TIMEOUT_MS);
    if (!vars.SUPABASE_REALTIME) config = config.withoutRealtime();

    return { config, logLevel: vars.LOG_LEVEL };
}

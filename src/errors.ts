// ============================================================================
// Supakit — Errors
// Error kinds raised by this layer. Collaborator errors are never wrapped.
// ============================================================================

export type SupabaseErrorCode =
    | 'INVALID_CONFIGURATION'
    | 'CLIENT_INIT'
    | 'FEATURE_NOT_ENABLED'
    | 'REQUEST_TIMEOUT';

export class SupabaseError extends Error {
    readonly code: SupabaseErrorCode;

    constructor(code: SupabaseErrorCode, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'SupabaseError';
        this.code = code;
    }
}

/** Empty or malformed URL, API key, JWT or option. Fix the input. */
export class InvalidConfigurationError extends SupabaseError {
    constructor(message: string, options?: ErrorOptions) {
        super('INVALID_CONFIGURATION', message, options);
        this.name = 'InvalidConfigurationError';
    }
}

/** The transport could not be built, e.g. a header the Fetch API rejects. */
export class ClientInitError extends SupabaseError {
    constructor(message: string, options?: ErrorOptions) {
        super('CLIENT_INIT', message, options);
        this.name = 'ClientInitError';
    }
}

export class FeatureNotEnabledError extends SupabaseError {
    readonly feature: string;

    constructor(feature: string, hint: string) {
        super('FEATURE_NOT_ENABLED', `${feature} is not available — ${hint}`);
        this.name = 'FeatureNotEnabledError';
        this.feature = feature;
    }
}

export class RequestTimeoutError extends SupabaseError {
    readonly timeoutMs: number;

    constructor(timeoutMs: number) {
        super('REQUEST_TIMEOUT', `Request timed out after ${timeoutMs}ms`);
        this.name = 'RequestTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

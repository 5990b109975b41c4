import type { SupabaseConfig } from './config.js';
import type { Fetch } from './http.js';

// ============================================================================
// Supakit — Service providers
// Capability contracts for Auth, Storage and Edge Functions. None ship here;
// register a factory through `createClient(url, key, { providers })`.
// ============================================================================

export interface AuthProvider<User = unknown, Session = unknown> {
    signUpWithEmail(email: string, password: string): Promise<Session>;
    signInWithEmail(email: string, password: string): Promise<Session>;
    signOut(): Promise<void>;
    getSession(): Promise<Session | null>;
    getUser(): Promise<User | null>;
    refreshSession(): Promise<Session>;
}

export interface StorageObject {
    name: string;
    id?: string;
    updated_at?: string;
    created_at?: string;
    last_accessed_at?: string;
    metadata?: Record<string, unknown>;
}

export interface StorageProvider {
    /** Resolves to the stored object's key. */
    upload(bucket: string, path: string, data: Uint8Array, contentType?: string): Promise<string>;
    download(bucket: string, path: string): Promise<Uint8Array>;
    remove(bucket: string, paths: string[]): Promise<void>;
    list(bucket: string, prefix?: string): Promise<StorageObject[]>;
    getPublicUrl(bucket: string, path: string): string;
    /** @param expiresIn seconds */
    createSignedUrl(bucket: string, path: string, expiresIn: number): Promise<string>;
}

export interface FunctionsProvider {
    invoke<R = unknown>(functionName: string, body?: unknown): Promise<R>;
    invokeRaw(functionName: string, body?: unknown): Promise<Uint8Array>;
}

/** What a provider gets to talk to its service with. */
export interface ProviderContext {
    config: SupabaseConfig;
    /** fetch carrying the client's `apikey`, `Authorization`, custom headers and timeout. */
    http: Fetch;
}

export interface ProviderFactories {
    auth?: (ctx: ProviderContext) => AuthProvider;
    storage?: (ctx: ProviderContext) => StorageProvider;
    functions?: (ctx: ProviderContext) => FunctionsProvider;
}

export type ProviderName = keyof ProviderFactories;

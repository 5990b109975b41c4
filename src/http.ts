import { RequestTimeoutError } from './errors.js';

// ============================================================================
// Supakit — HTTP helpers
// fetch decorators shared by the database client and `client.http`
// ============================================================================

export type Fetch = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

/**
 * Resolve the fetch implementation lazily so a global replaced after the
 * client was built (test doubles, polyfills) is still picked up.
 */
export function resolveFetch(custom?: Fetch): Fetch {
    if (custom) return custom;
    return (input, init) => fetch(input, init);
}

const NULL_BODY_STATUSES = new Set([204, 205, 304]);

/** Rejects with the signal's reason once it aborts. */
function untilAborted(signal: AbortSignal): Promise<never> {
    return new Promise((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    });
}

/**
 * Abort a request that has not been fully received after `timeoutMs`. The body
 * is read under the same deadline and handed back buffered, so a stream that
 * stalls part-way fails instead of hanging. An abort raised by the caller's
 * own signal is forwarded with its original reason.
 */
export function fetchWithTimeout(fetchImpl: Fetch, timeoutMs: number): Fetch {
    return async (input, init) => {
        const controller = new AbortController();
        const aborted = untilAborted(controller.signal);
        const timer = setTimeout(() => controller.abort(new RequestTimeoutError(timeoutMs)), timeoutMs);

        const upstream = init?.signal;
        const forwardAbort = () => controller.abort(upstream?.reason);
        if (upstream) {
            if (upstream.aborted) forwardAbort();
            else upstream.addEventListener('abort', forwardAbort, { once: true });
        }

        try {
            const response = await Promise.race([fetchImpl(input, { ...init, signal: controller.signal }), aborted]);
            const body = NULL_BODY_STATUSES.has(response.status)
                ? null
                : await Promise.race([response.arrayBuffer(), aborted]);
            return new Response(body, {
                status: response.status,
                statusText: response.statusText,
                headers: response.headers,
            });
        } finally {
            clearTimeout(timer);
            upstream?.removeEventListener('abort', forwardAbort);
        }
    };
}

/** Send `defaults` with every request; headers given per request take precedence. */
export function fetchWithHeaders(fetchImpl: Fetch, defaults: Readonly<Record<string, string>>): Fetch {
    return (input, init) => {
        const headers = new Headers(defaults);
        new Headers(init?.headers).forEach((value, key) => headers.set(key, value));
        return fetchImpl(input, { ...init, headers });
    };
}

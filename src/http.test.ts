import { describe, it, expect, vi, afterEach } from 'vitest';
import { RequestTimeoutError } from './errors.js';
import { fetchWithHeaders, fetchWithTimeout, resolveFetch, type Fetch } from './http.js';

// ============================================================================
// HTTP helpers — Unit Tests
// ============================================================================

/** Never settles until its signal aborts, then rejects with the abort reason. */
const hanging = vi.fn<Fetch>((_input, init) => new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    if (signal.aborted) reject(signal.reason);
    else signal.addEventListener('abort', () => reject(signal.reason));
}));

afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
});

describe('fetchWithTimeout', () => {
    it('passes the response through when the request settles in time', async () => {
        const inner = vi.fn<Fetch>(async () => new Response('ok', { status: 200 }));
        const response = await fetchWithTimeout(inner, 1_000)('https://x.supabase.co/rest/v1/users');

        expect(response.status).toBe(200);
        expect(await response.text()).toBe('ok');
    });

    it('aborts with RequestTimeoutError once the deadline passes', async () => {
        const pending = fetchWithTimeout(hanging, 20)('https://x.supabase.co/rest/v1/slow');

        await expect(pending).rejects.toBeInstanceOf(RequestTimeoutError);
        await expect(pending).rejects.toMatchObject({ code: 'REQUEST_TIMEOUT', timeoutMs: 20 });
    });

    it('keeps the deadline while the body is read', async () => {
        const stalled = vi.fn<Fetch>(async () => new Response(new ReadableStream<Uint8Array>({
            start(controller) {
                controller.enqueue(new TextEncoder().encode('[{"id":'));
            },
        }), { status: 200 }));

        await expect(fetchWithTimeout(stalled, 20)('https://x.supabase.co/rest/v1/users'))
            .rejects.toBeInstanceOf(RequestTimeoutError);
    });

    it('hands back the status, headers and buffered body', async () => {
        const inner = vi.fn<Fetch>(async () => new Response('[{"id":1}]', {
            status: 206,
            headers: { 'Content-Range': '0-0/3' },
        }));

        const response = await fetchWithTimeout(inner, 1_000)('https://x.supabase.co/rest/v1/users');

        expect(response.status).toBe(206);
        expect(response.headers.get('content-range')).toBe('0-0/3');
        expect(await response.json()).toEqual([{ id: 1 }]);
    });

    it('forwards an abort from the caller', async () => {
        const caller = new AbortController();
        const pending = fetchWithTimeout(hanging, 1_000)('https://x.supabase.co/rest/v1/slow', { signal: caller.signal });

        caller.abort(new Error('cancelled by caller'));

        await expect(pending).rejects.toThrow('cancelled by caller');
    });

    it('aborts at once when the caller signal is already aborted', async () => {
        const caller = new AbortController();
        caller.abort(new Error('already cancelled'));

        await expect(
            fetchWithTimeout(hanging, 1_000)('https://x.supabase.co/rest/v1/slow', { signal: caller.signal }),
        ).rejects.toThrow('already cancelled');
    });

    it('clears its timer after the request settles', async () => {
        vi.useFakeTimers();
        const inner = vi.fn<Fetch>(async () => new Response(null, { status: 204 }));

        await fetchWithTimeout(inner, 5_000)('https://x.supabase.co/rest/v1/users');

        expect(vi.getTimerCount()).toBe(0);
    });
});

describe('fetchWithHeaders', () => {
    it('merges defaults under per-request headers', async () => {
        const inner = vi.fn<Fetch>(async () => new Response(null, { status: 204 }));
        const send = fetchWithHeaders(inner, { apikey: 'test-key', 'X-Client': 'default' });

        await send('https://x.supabase.co/auth/v1/user', { method: 'GET', headers: { 'X-Client': 'override' } });

        const init = inner.mock.calls[0]?.[1];
        const headers = new Headers(init?.headers);
        expect(init?.method).toBe('GET');
        expect(headers.get('apikey')).toBe('test-key');
        expect(headers.get('x-client')).toBe('override');
    });
});

describe('resolveFetch', () => {
    it('prefers a custom implementation', () => {
        const custom = vi.fn<Fetch>();
        expect(resolveFetch(custom)).toBe(custom);
    });

    it('looks up the global fetch at call time', async () => {
        const send = resolveFetch();
        const replacement = vi.fn<Fetch>(async () => new Response(null, { status: 204 }));
        vi.stubGlobal('fetch', replacement);

        const response = await send('https://x.supabase.co/rest/v1/');

        expect(response.status).toBe(204);
        expect(replacement).toHaveBeenCalledWith('https://x.supabase.co/rest/v1/', undefined);
    });
});

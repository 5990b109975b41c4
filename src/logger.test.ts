import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, redact, setLogLevel } from './logger.js';

// ============================================================================
// Logger — Unit Tests
// ============================================================================

afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
});

describe('createLogger', () => {
    it('prefixes messages with level and component', () => {
        const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        createLogger('Client').info('Client ready');

        expect(out).toHaveBeenCalledTimes(1);
        expect(out.mock.calls[0]?.[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] \[Client\] Client ready$/);
    });

    it('pretty-prints structured data as a second argument', () => {
        const out = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        createLogger('Client').warn('Slow request', { ms: 1200 });

        expect(out.mock.calls[0]?.[1]).toBe('{\n  "ms": 1200\n}');
    });

    it('routes errors to console.error', () => {
        const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        createLogger('Client').error('boom');

        expect(err).toHaveBeenCalledTimes(1);
    });

    it('drops messages below the current level', () => {
        const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const log = createLogger('Client');

        log.debug('hidden');
        setLogLevel('debug');
        log.debug('shown');

        expect(out).toHaveBeenCalledTimes(1);
        expect(out.mock.calls[0]?.[0]).toContain('[DEBUG] [Client] shown');
    });

    it('masks credentials in structured data', () => {
        const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        createLogger('Client').info('Request', { apikey: 'test-key', status: 200 });

        expect(out.mock.calls[0]?.[1]).toBe('{\n  "apikey": "[redacted]",\n  "status": 200\n}');
    });
});

describe('redact', () => {
    it('masks secret-looking keys at any depth and leaves the input alone', () => {
        const data = {
            url: 'https://example.supabase.co',
            headers: { Authorization: 'Bearer test-jwt', 'X-Trace': '1' },
            access_token: 'test-token',
            authenticated: true,
        };

        expect(redact(data)).toEqual({
            url: 'https://example.supabase.co',
            headers: { Authorization: '[redacted]', 'X-Trace': '1' },
            access_token: '[redacted]',
            authenticated: true,
        });
        expect(data.headers.Authorization).toBe('Bearer test-jwt');
    });
});

// ============================================================================
// Supakit — Logger
// Component-scoped console logger with a process-wide level. Credentials never
// reach the console: values under secret-looking keys are masked.
// ============================================================================

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export type LogData = Record<string, unknown>;

export interface Logger {
    debug: (msg: string, data?: LogData) => void;
    info: (msg: string, data?: LogData) => void;
    warn: (msg: string, data?: LogData) => void;
    error: (msg: string, data?: LogData) => void;
}

const REDACTED = '[redacted]';
const SECRET_KEY = /^(api[-_]?key|authorization|jwt|password|.*token|.*secret)$/i;

let threshold = LOG_LEVELS.indexOf('info');

export function setLogLevel(level: LogLevel) {
    threshold = LOG_LEVELS.indexOf(level);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

/** Copy of `data` with secret values masked, nested objects included. */
export function redact(data: LogData): LogData {
    const out: LogData = {};
    for (const [key, value] of Object.entries(data)) {
        if (SECRET_KEY.test(key)) out[key] = REDACTED;
        else if (isPlainObject(value)) out[key] = redact(value);
        else out[key] = value;
    }
    return out;
}

function sinkFor(level: LogLevel): (...args: unknown[]) => void {
    switch (level) {
        case 'error': return console.error;
        case 'warn': return console.warn;
        default: return console.log;
    }
}

export function createLogger(component: string): Logger {
    const emit = (level: LogLevel) => (msg: string, data?: LogData) => {
        if (LOG_LEVELS.indexOf(level) < threshold) return;

        const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${component}] ${msg}`;
        if (data) sinkFor(level)(line, JSON.stringify(redact(data), null, 2));
        else sinkFor(level)(line);
    };

    return {
        debug: emit('debug'),
        info: emit('info'),
        warn: emit('warn'),
        error: emit('error'),
    };
}

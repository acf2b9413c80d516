type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMetadata = Record<string, unknown>;

const getMode = (): 'production' | 'development' => {
    if (typeof process !== 'undefined' && process.env.NODE_ENV === 'production') {
        return 'production';
    }
    return 'development';
};

const isProduction = (): boolean => getMode() === 'production';

export const isProductionMode = (): boolean => isProduction();

// Clinical free text never reaches the log sink.
const REDACT_KEYS = [/text$/i, /content/i, /context/i, /snippet/i, /statement/i];

export const redactValue = (value: unknown): unknown => {
    if (typeof value === 'string') {
        // Labels and ids pass; anything that looks like a note excerpt does not.
        if (value.length > 120 || value.includes('\n')) {
            return '[REDACTED]';
        }
        return value;
    }

    if (value && typeof value === 'object') {
        if (Array.isArray(value)) {
            return value.map((v) => redactValue(v));
        }

        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(value)) {
            if (REDACT_KEYS.some((re) => re.test(k))) {
                out[k] = '[REDACTED]';
            } else {
                out[k] = redactValue(v);
            }
        }
        return out;
    }

    return value;
};

const shouldLog = (level: LogLevel): boolean => {
    if (!isProduction()) return true;
    return level === 'warn' || level === 'error';
};

export const emit = (level: LogLevel, message: string, metadata?: LogMetadata): void => {
    if (!shouldLog(level)) return;

    const entry = {
        timestamp: new Date().toISOString(),
        level,
        message: redactValue(message),
        ...(metadata ? toMetadata(redactValue(metadata)) : {}),
    };

    if (level === 'error') {
        console.error(JSON.stringify(entry));
    } else if (level === 'warn') {
        console.warn(JSON.stringify(entry));
    } else if (level === 'info') {
        console.info(JSON.stringify(entry));
    } else {
        console.log(JSON.stringify(entry));
    }
};

const toMetadata = (value: unknown): LogMetadata =>
    value && typeof value === 'object' && !Array.isArray(value) ? { ...value } : {};

export const appLogger = {
    debug(message: string, metadata?: LogMetadata) {
        emit('debug', message, metadata);
    },
    info(message: string, metadata?: LogMetadata) {
        emit('info', message, metadata);
    },
    warn(message: string, metadata?: LogMetadata) {
        emit('warn', message, metadata);
    },
    error(message: string, metadata?: LogMetadata) {
        emit('error', message, metadata);
    },
};

export type { LogLevel, LogMetadata };

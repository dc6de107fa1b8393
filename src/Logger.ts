// Console logging with a LOG_LEVEL threshold and per-component context.
// LOG_FORMAT=json prints one JSON object per line, otherwise a readable line.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
    [key: string]: unknown;
}

const LOG_LEVELS: Record<LogLevel | 'silent', number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

function isThreshold(value: string): value is LogLevel | 'silent' {
    return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function thresholdFromEnv(): number {
    const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
    return isThreshold(raw) ? LOG_LEVELS[raw] : LOG_LEVELS.info;
}

function format(level: LogLevel, message: string, context: LogContext): string {
    const timestamp = new Date().toISOString();
    if (process.env.LOG_FORMAT === 'json') {
        return JSON.stringify({ timestamp, level, message, ...context });
    }
    let line = `${timestamp} ${level.toUpperCase().padEnd(5)} ${message}`;
    if (Object.keys(context).length > 0) {
        line += ` ${JSON.stringify(context)}`;
    }
    return line;
}

export class Logger {
    private readonly context: LogContext;

    constructor(context: LogContext = {}) {
        this.context = context;
    }

    child(context: LogContext): Logger {
        return new Logger({ ...this.context, ...context });
    }

    debug(message: string, context?: LogContext): void {
        this.write('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.write('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.write('warn', message, context);
    }

    error(message: string, context?: LogContext): void {
        this.write('error', message, context);
    }

    private write(level: LogLevel, message: string, context?: LogContext): void {
        if (LOG_LEVELS[level] < thresholdFromEnv()) return;

        const line = format(level, message, { ...this.context, ...(context ?? {}) });
        switch (level) {
            case 'error':
                console.error(line);
                break;
            case 'warn':
                console.warn(line);
                break;
            default:
                console.log(line);
        }
    }
}

export const logger = new Logger();

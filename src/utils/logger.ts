export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export type LogContext = Record<string, unknown>;

export interface LoggerIdentity {
    service: string;
    version: string;
}

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

const SEVERITY: Record<LogLevel, string> = {
    error: 'ERROR',
    warn: 'WARNING',
    info: 'INFO',
    debug: 'DEBUG'
};

const isLogLevel = (value: string): value is LogLevel =>
    LEVELS.some(level => level === value);

// Cloud Logging parses one JSON object per line; locally the bracketed format is easier to read.
const useStructuredOutput = (): boolean =>
    process.env.NODE_ENV === 'production' || Boolean(process.env.K_SERVICE);

const serializeError = (error: unknown): LogContext | undefined => {
    if (error === undefined || error === null) {
        return undefined;
    }
    if (error instanceof Error) {
        return { name: error.name, message: error.message, stack: error.stack };
    }
    return { message: String(error) };
};

export class Logger {
    private readonly level: LogLevel;

    constructor(
        level: string,
        private readonly identity: LoggerIdentity,
        private readonly bindings: LogContext = {}
    ) {
        this.level = isLogLevel(level) ? level : 'info';
    }

    public child(bindings: LogContext): Logger {
        return new Logger(this.level, this.identity, { ...this.bindings, ...bindings });
    }

    private shouldLog(level: LogLevel): boolean {
        return LEVELS.indexOf(level) <= LEVELS.indexOf(this.level);
    }

    private write(level: LogLevel, message: string, context?: LogContext, error?: unknown): void {
        if (!this.shouldLog(level)) {
            return;
        }

        const { traceId, ...rest } = { ...this.bindings, ...context };
        const errorInfo = serializeError(error);

        if (useStructuredOutput()) {
            const entry = {
                severity: SEVERITY[level],
                message,
                timestamp: new Date().toISOString(),
                service: this.identity.service,
                version: this.identity.version,
                ...(traceId ? { traceId } : {}),
                ...(Object.keys(rest).length > 0 ? { context: rest } : {}),
                ...(errorInfo ? { error: errorInfo } : {})
            };
            const line = JSON.stringify(entry);
            if (level === 'error') {
                console.error(line);
            } else {
                console.log(line);
            }
            return;
        }

        const prefix = traceId ? `[${level.toUpperCase()}] [${String(traceId)}]` : `[${level.toUpperCase()}]`;
        const details: unknown[] = [];
        if (Object.keys(rest).length > 0) details.push(rest);
        if (error !== undefined) details.push(error);

        switch (level) {
            case 'error':
                console.error(`${prefix} ${message}`, ...details);
                break;
            case 'warn':
                console.warn(`${prefix} ${message}`, ...details);
                break;
            case 'debug':
                console.debug(`${prefix} ${message}`, ...details);
                break;
            default:
                console.log(`${prefix} ${message}`, ...details);
        }
    }

    public info(message: string, context?: LogContext): void {
        this.write('info', message, context);
    }

    public error(message: string, error?: unknown, context?: LogContext): void {
        this.write('error', message, context, error);
    }

    public warn(message: string, context?: LogContext): void {
        this.write('warn', message, context);
    }

    public debug(message: string, context?: LogContext): void {
        this.write('debug', message, context);
    }
}

const defaultLevel = process.env.NODE_ENV === 'test' ? 'error' : 'info';

export const logger = new Logger(process.env.LOG_LEVEL || defaultLevel, {
    service: process.env.SERVICE_NAME || 'division',
    version: process.env.APP_VERSION || '2.0.0'
});

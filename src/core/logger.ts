/**
 * Scoped, levelled logger used by the client.
 * @module core/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

export type LogContext = Record<string, unknown>;

/** Anything the client can log through. {@link ComponentLogger} is the default. */
export interface Logger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
}

const WEIGHTS: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    none: 100,
};

type LoggerConfig = {
    level: LogLevel;
    json: boolean;
    stdout: NodeJS.WritableStream;
    stderr: NodeJS.WritableStream;
};

export type LoggerOptions = Partial<LoggerConfig>;

class LogManager {
    private readonly config: LoggerConfig = {
        level: 'info',
        json: false,
        stdout: process.stdout,
        stderr: process.stderr,
    };

    public configure(options: LoggerOptions): void {
        this.config.level = options.level ?? this.config.level;
        this.config.json = options.json ?? this.config.json;
        this.config.stdout = options.stdout ?? this.config.stdout;
        this.config.stderr = options.stderr ?? this.config.stderr;
    }

    public get level(): LogLevel {
        return this.config.level;
    }

    public create(component: string, ...scopes: string[]): ComponentLogger {
        return new ComponentLogger(this.config, [component, ...scopes]);
    }
}

export const logManager = new LogManager();

export const createLogger = (component: string, ...scopes: string[]): ComponentLogger =>
    logManager.create(component, ...scopes);

/** Logger bound to a list of scopes, sharing the global configuration. */
export class ComponentLogger implements Logger {
    constructor(
        private readonly config: Readonly<LoggerConfig>,
        private readonly scopes: string[],
    ) {}

    public debug(message: string, context?: LogContext): void {
        this.write('debug', message, context);
    }

    public info(message: string, context?: LogContext): void {
        this.write('info', message, context);
    }

    public warn(message: string, context?: LogContext): void {
        this.write('warn', message, context);
    }

    public error(message: string, context?: LogContext): void {
        this.write('error', message, context);
    }

    public child(scope: string): ComponentLogger {
        return new ComponentLogger(this.config, [...this.scopes, scope]);
    }

    public isEnabled(level: LogLevel): boolean {
        return WEIGHTS[level] >= WEIGHTS[this.config.level];
    }

    private write(level: Exclude<LogLevel, 'none'>, message: string, context?: LogContext): void {
        if (!this.isEnabled(level)) return;

        const payload = this.config.json
            ? JSON.stringify({
                timestamp: new Date().toISOString(),
                level,
                scopes: this.scopes,
                message,
                context: context ?? {},
            })
            : this.formatLine(level, message, context);

        const stream = level === 'error' ? this.config.stderr : this.config.stdout;
        stream.write(`${payload}\n`);
    }

    private formatLine(level: string, message: string, context?: LogContext): string {
        const ts = new Date().toISOString();
        return `[${ts}][${level.toUpperCase()}][${this.scopes.join('|')}]${formatContext(context)} ${message}`;
    }
}

const stringifyValue = (value: unknown): string => {
    if (value === null) return 'null';
    if (value === undefined) return 'undefined';
    if (typeof value === 'string') {
        if (value.length === 0) return '""';
        return /[\s"\\[\]]/.test(value) ? JSON.stringify(value) : value;
    }
    if (typeof value === 'object') {
        try {
            return JSON.stringify(value);
        } catch {
            return String(value);
        }
    }
    return String(value);
};

const formatContext = (context?: LogContext): string => {
    if (!context || Object.keys(context).length === 0) return '';
    const entries = Object.entries(context)
        .sort(([left], [right]) => left.localeCompare(right))
        .map(([key, value]) => `${key}=${stringifyValue(value)}`)
        .join(' ');
    return ` [${entries}]`;
};

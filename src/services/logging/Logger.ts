import { LogLevel } from '../../config/viewerConfig';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export interface LogSink {
    log(...args: unknown[]): void;
    warn(...args: unknown[]): void;
    error(...args: unknown[]): void;
}

export interface LoggerOptions {
    level?: LogLevel;
    scope?: string;
    sink?: LogSink;
}

export class Logger {
    private readonly level: LogLevel;
    private readonly scope: string | undefined;
    private readonly sink: LogSink;

    constructor(options: LoggerOptions = {}) {
        this.level = options.level ?? 'info';
        this.scope = options.scope;
        this.sink = options.sink ?? console;
    }

    child(scope: string): Logger {
        return new Logger({
            level: this.level,
            scope: this.scope ? `${this.scope}:${scope}` : scope,
            sink: this.sink,
        });
    }

    debug(message: string, ...details: unknown[]): void {
        if (this.enabled('debug')) {
            this.sink.log(this.format(message), ...details);
        }
    }

    info(message: string, ...details: unknown[]): void {
        if (this.enabled('info')) {
            this.sink.log(this.format(message), ...details);
        }
    }

    warn(message: string, ...details: unknown[]): void {
        if (this.enabled('warn')) {
            this.sink.warn(this.format(message), ...details);
        }
    }

    error(message: string, ...details: unknown[]): void {
        if (this.enabled('error')) {
            this.sink.error(this.format(message), ...details);
        }
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
    }

    private format(message: string): string {
        return this.scope ? `[${this.scope}] ${message}` : message;
    }
}

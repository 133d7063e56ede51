export enum LogLevel {
    ERROR = 0,
    WARN = 1,
    INFO = 2,
    DEBUG = 3
}

export function parseLogLevel(value: string | undefined): LogLevel {
    const envLevel = value?.toUpperCase();
    if (envLevel === 'DEBUG') return LogLevel.DEBUG;
    if (envLevel === 'WARN') return LogLevel.WARN;
    if (envLevel === 'ERROR') return LogLevel.ERROR;
    return LogLevel.INFO;
}

export class Logger {
    private ownLevel: LogLevel;

    constructor(private readonly scope?: string, private readonly parent?: Logger) {
        this.ownLevel = parseLogLevel(process.env.LOG_LEVEL);
    }

    private get level(): LogLevel {
        return this.parent ? this.parent.level : this.ownLevel;
    }

    public setLevel(level: LogLevel): void {
        if (this.parent) {
            this.parent.setLevel(level);
        } else {
            this.ownLevel = level;
        }
    }

    public isEnabled(level: LogLevel): boolean {
        return this.level >= level;
    }

    /** Returns a logger sharing this one's level whose lines are prefixed with `[scope]`. */
    public child(scope: string): Logger {
        return new Logger(scope, this);
    }

    private formatMessage(level: string, message: string): string {
        const timestamp = new Date().toISOString();
        const prefix = this.scope ? `[${this.scope}] ` : '';
        return `[${timestamp}] [${level}] ${prefix}${message}`;
    }

    error(message: string, ...args: unknown[]) {
        if (this.level >= LogLevel.ERROR) {
            console.error(this.formatMessage('ERROR', message), ...args);
        }
    }

    warn(message: string, ...args: unknown[]) {
        if (this.level >= LogLevel.WARN) {
            console.warn(this.formatMessage('WARN', message), ...args);
        }
    }

    info(message: string, ...args: unknown[]) {
        if (this.level >= LogLevel.INFO) {
            console.log(this.formatMessage('INFO', message), ...args);
        }
    }

    debug(message: string, ...args: unknown[]) {
        if (this.level >= LogLevel.DEBUG) {
            console.log(this.formatMessage('DEBUG', message), ...args);
        }
    }
}

export const logger = new Logger();

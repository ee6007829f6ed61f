/**
 * Internal logging utility for bitframe.
 * Structured logging with levels and tags; everything below the configured
 * level is dropped before it reaches the console.
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4
}

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

export class Logger {
    private level: LogLevel = LogLevel.WARN;
    private tag: string;
    private useJson: boolean = false;

    constructor(tag: string = 'bitframe', debug: boolean = false) {
        this.tag = tag;
        if (debug) {
            this.level = LogLevel.DEBUG;
        }
    }

    public setLogLevel(level: LogLevel): void {
        this.level = level;
    }

    public getLogLevel(): LogLevel {
        return this.level;
    }

    public setJson(enabled: boolean): void {
        this.useJson = enabled;
    }

    private log(method: ConsoleMethod, levelName: string, message: string, args: unknown[]): void {
        if (this.useJson) {
            const entry = {
                timestamp: new Date().toISOString(),
                tag: this.tag,
                level: levelName,
                message,
                data: args.length > 0 ? args : undefined
            };
            console[method](JSON.stringify(entry));
        } else {
            const prefix = `[${this.tag}]${levelName === 'DEBUG' ? ' (DEBUG)' : ''}${levelName === 'WARN' ? ' ⚠️' : ''}${levelName === 'ERROR' ? ' ❌' : ''}`;
            console[method](`${prefix} ${message}`, ...args);
        }
    }

    public debug(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.DEBUG) {
            this.log('debug', 'DEBUG', message, args);
        }
    }

    public info(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.INFO) {
            this.log('info', 'INFO', message, args);
        }
    }

    public warn(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.WARN) {
            this.log('warn', 'WARN', message, args);
        }
    }

    public error(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.ERROR) {
            this.log('error', 'ERROR', message, args);
        }
    }

    /**
     * Creates a child logger with an extended tag.
     * The child reads its level and format from the parent on every call,
     * so reconfiguring the root logger reaches module loggers created earlier.
     */
    public child(subTag: string): Logger {
        return new ChildLogger(`${this.tag}:${subTag}`, this);
    }

    /**
     * Support for JSON.stringify(logger)
     */
    public toJSON() {
        return {
            tag: this.tag,
            level: this.level,
            useJson: this.useJson
        };
    }
}

class ChildLogger extends Logger {
    constructor(tag: string, private readonly parent: Logger) {
        super(tag);
    }

    public override getLogLevel(): LogLevel {
        return this.parent.getLogLevel();
    }

    public override debug(message: string, ...args: unknown[]): void {
        this.sync();
        super.debug(message, ...args);
    }

    public override info(message: string, ...args: unknown[]): void {
        this.sync();
        super.info(message, ...args);
    }

    public override warn(message: string, ...args: unknown[]): void {
        this.sync();
        super.warn(message, ...args);
    }

    public override error(message: string, ...args: unknown[]): void {
        this.sync();
        super.error(message, ...args);
    }

    private sync(): void {
        this.setLogLevel(this.parent.getLogLevel());
        this.setJson(this.parent.toJSON().useJson);
    }
}

// Global default logger
export const logger = new Logger('bitframe');

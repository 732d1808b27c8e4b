import {LogLevel, type ILogger, type LogEntry, type Transport} from "./types";
import {ConsoleTransport, HECTransport, type HECTransportConfig} from "./transports";
import {TextFormatter} from "./formatters";

export class Logger implements ILogger {
    private readonly transports: Transport[] = [];
    private tags: string[] = [];
    private name?: string;

    constructor(
        private minLevel: LogLevel = LogLevel.INFO,
        transports: Transport[] = [new ConsoleTransport()]
    ) {
        this.transports = transports;
    }

    addTransport(transport: Transport): this {
        this.transports.push(transport);
        return this;
    }

    removeTransport(transport: Transport): this {
        const index = this.transports.indexOf(transport);
        if (index > -1) {
            this.transports.splice(index, 1);
        }
        return this;
    }

    withTags(...tags: string[]): Logger {
        const child = this.child();
        child.tags = [...this.tags, ...tags];
        return child;
    }

    /**
     * Child logger whose entries carry `name`, the default Splunk source.
     */
    withName(name: string): Logger {
        const child = this.child();
        child.name = name;
        return child;
    }

    setLevel(level: LogLevel): this {
        this.minLevel = level;
        return this;
    }

    private child(): Logger {
        const child = new Logger(this.minLevel, this.transports);
        child.tags = this.tags;
        child.name = this.name;
        return child;
    }

    private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
        if (level < this.minLevel) return;

        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date(),
            context,
            error,
            tags: this.tags.length > 0 ? [...this.tags] : undefined,
            logger: this.name
        };

        // Fire and forget - don't block on transport writes
        this.transports.forEach(transport => {
            try {
                const result = transport.write(entry);
                // If transport returns a promise, catch errors but don't await
                if (result instanceof Promise) {
                    result.catch(error => {
                        console.error('Async transport failed:', error);
                    });
                }
            } catch (error) {
                console.error('Sync transport failed:', error);
            }
        });
    }

    trace(message: string, context?: Record<string, unknown>): void {
        this.log(LogLevel.TRACE, message, context);
    }

    debug(message: string, context?: Record<string, unknown>): void {
        this.log(LogLevel.DEBUG, message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.log(LogLevel.INFO, message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.log(LogLevel.WARN, message, context);
    }

    error(message: string, contextOrError?: Record<string, unknown> | Error, error?: Error): void {
        if (contextOrError instanceof Error) {
            this.log(LogLevel.ERROR, message, undefined, contextOrError);
        } else {
            this.log(LogLevel.ERROR, message, contextOrError, error);
        }
    }

    fatal(message: string, contextOrError?: Record<string, unknown> | Error, error?: Error): void {
        if (contextOrError instanceof Error) {
            this.log(LogLevel.FATAL, message, undefined, contextOrError);
        } else {
            this.log(LogLevel.FATAL, message, contextOrError, error);
        }
    }

    async flush(): Promise<void> {
        const results = await Promise.allSettled(this.transports.map(transport => transport.flush?.()));
        reportFailures('Transport flush failed:', results);
    }

    async close(): Promise<void> {
        const results = await Promise.allSettled(this.transports.map(transport => transport.close?.()));
        reportFailures('Transport close failed:', results);
    }
}

function reportFailures(message: string, results: PromiseSettledResult<unknown>[]): void {
    for (const result of results) {
        if (result.status === 'rejected') {
            console.error(message, result.reason);
        }
    }
}

// ============================================================================
// CONVENIENCE FACTORY
// ============================================================================
export function Console(level: LogLevel = LogLevel.INFO): Logger {
    return new Logger(level, [new ConsoleTransport(new TextFormatter(), level)]);
}

/**
 * Logger that echoes to the console and forwards to a Splunk HTTP Event
 * Collector. Throws ConfigurationError when `serverUrl` or `token` is unusable.
 */
export function Splunk(config: HECTransportConfig & { level?: LogLevel }): Logger {
    const level = config.level ?? LogLevel.INFO;
    return new Logger(level, [
        new ConsoleTransport(new TextFormatter(), level),
        new HECTransport({minLevel: level, ...config})
    ]);
}

export * from './formatters'
export * from './transports'
export * from './types'
export * from './constants'
export * from './errors'
export * from './hec'

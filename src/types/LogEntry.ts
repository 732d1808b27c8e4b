import {LogLevel} from "./LogLevel";

export interface LogEntry {
    level: LogLevel;
    /** Message template; `{name}` holes are filled from `context`. */
    message: string;
    timestamp: Date;
    context?: Record<string, unknown>;
    error?: Error;
    tags?: string[];
    /** Name of the emitting logger, the default Splunk source. */
    logger?: string;
}

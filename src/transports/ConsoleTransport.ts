import {LogLevel, type Formatter, type LogEntry, type Transport} from "../types";
import {TextFormatter} from "../formatters";

export type ConsoleBinding = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Local echo of log entries, one formatted line per entry.
 */
export class ConsoleTransport implements Transport {
    constructor(
        private readonly formatter: Formatter = new TextFormatter(),
        private readonly minLevel: LogLevel = LogLevel.INFO,
        private readonly binding: ConsoleBinding = console
    ) {
    }

    write(entry: LogEntry): void {
        if (entry.level < this.minLevel) return;

        const line = this.formatter.format(entry);

        if (entry.level >= LogLevel.ERROR) {
            this.binding.error(line);
        } else if (entry.level === LogLevel.WARN) {
            this.binding.warn(line);
        } else if (entry.level === LogLevel.INFO) {
            this.binding.info(line);
        } else {
            this.binding.debug(line);
        }
    }
}

import type {LogEntry} from "./LogEntry";

export interface Transport {
    write(entry: LogEntry): Promise<void> | void;
    // Buffering transports send what they hold
    flush?(): Promise<unknown> | void;
    close?(): Promise<void> | void;
}

import type {LogEntry} from "./LogEntry";

export type Layout = string | ((entry: LogEntry) => string | undefined);

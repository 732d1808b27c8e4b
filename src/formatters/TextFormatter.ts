import {LogLevel, type Formatter, type LogEntry} from "../types";
import {formatTemplateValue, renderMessageTemplate} from "./MessageTemplate";

/**
 * One-line console format:
 *
 * [2025-10-18T12:00:00.000Z] [INFO] [api] [auth,v2] User ada signed in {"user":"ada"}
 *
 * The message template is filled from the context; the context is still
 * appended so fields that are not in the template stay visible.
 */
export class TextFormatter implements Formatter {
    constructor(private readonly includeTimestamp = true, private readonly colored: boolean = true) {
    }

    format(entry: LogEntry): string {
        const parts: string[] = [];

        if (this.includeTimestamp) {
            parts.push(`[${entry.timestamp.toISOString()}]`);
        }

        const level = `[${LogLevel[entry.level]}]`;
        parts.push(this.colored ? `${TextFormatter.levelColor(entry.level)}${level}${TextFormatter.Colors.RESET}` : level);

        if (entry.logger) parts.push(`[${entry.logger}]`);
        if (entry.tags?.length) parts.push(`[${entry.tags.join(',')}]`);

        parts.push(renderMessageTemplate(entry.message, entry.context).text);

        if (entry.context && Object.keys(entry.context).length > 0) {
            parts.push(formatTemplateValue(entry.context));
        }

        let line = parts.join(' ');
        if (entry.error) {
            line += `\n${entry.error.stack ?? `${entry.error.name}: ${entry.error.message}`}`;
        }
        return line;
    }

    private static levelColor(level: LogLevel): string {
        if (level >= LogLevel.ERROR) return TextFormatter.Colors.RED;
        if (level === LogLevel.WARN) return TextFormatter.Colors.YELLOW;
        if (level === LogLevel.INFO) return TextFormatter.Colors.CYAN;
        return TextFormatter.Colors.GRAY;
    }

    static readonly Colors = {
        RESET: '\x1b[0m',
        RED: '\x1b[31m',
        YELLOW: '\x1b[33m',
        CYAN: '\x1b[36m',
        GRAY: '\x1b[90m'
    } as const;
}

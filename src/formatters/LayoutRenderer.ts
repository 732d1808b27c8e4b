import {LogLevel, type LogEntry, type Layout} from "../types";
import {renderMessageTemplate} from "./MessageTemplate";

const TOKEN_PATTERN = /\$\{(logger|level|message)\}/g;

/**
 * Renders a layout for one entry. String layouts expand `${logger}`,
 * `${level}` and `${message}`.
 */
export function renderLayout(layout: Layout | undefined, entry: LogEntry): string | undefined {
    if (layout === undefined) return undefined;
    if (typeof layout === 'function') return layout(entry);

    return layout.replace(TOKEN_PATTERN, (_match: string, token: string) => {
        switch (token) {
            case 'logger':
                return entry.logger ?? '';
            case 'level':
                return LogLevel[entry.level];
            default:
                return renderMessageTemplate(entry.message, entry.context).text;
        }
    });
}

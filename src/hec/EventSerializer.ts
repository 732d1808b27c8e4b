import type {EventRecord} from "../types";
import type {EventBuffer} from "./EventBuffer";

type Replacer = (this: unknown, key: string, value: unknown) => unknown;

/**
 * Writes events in the collector's JSON shape, one object per line:
 *
 * {"time":1760781600.123,"index":"main","source":"api","sourcetype":"_json","host":"web-1","event":{...}}
 *
 * Fields are written to the buffer as they are encoded, so a failure can
 * leave a partial object behind. Callers roll the buffer back.
 */
export class EventSerializer {
    write(record: EventRecord, buffer: EventBuffer): void {
        const {metadata} = record;

        buffer.write(`{"time":${toEpochSeconds(record.timestamp)}`);
        this.writeMember(buffer, 'index', metadata.index);
        this.writeMember(buffer, 'source', metadata.source);
        this.writeMember(buffer, 'sourcetype', metadata.sourcetype);
        this.writeMember(buffer, 'host', metadata.host);

        buffer.write(',"event":');
        if (record.event !== undefined) {
            buffer.write(this.stringify(record.event));
        } else {
            this.writeStructuredEvent(record, buffer);
        }
        buffer.write('}\n');
    }

    private writeStructuredEvent(record: EventRecord, buffer: EventBuffer): void {
        buffer.write('{');
        let first = true;
        const member = (name: string, value: unknown): void => {
            if (value === undefined || value === null) return;
            buffer.write(`${first ? '' : ','}${JSON.stringify(name)}:${this.stringify(value)}`);
            first = false;
        };

        member('id', record.id);
        member('message-template', record.messageTemplate);
        member('message', record.renderedMessage);
        member('level', record.level);
        member('exception', record.exception);
        member('properties', record.properties);
        buffer.write('}');
    }

    private writeMember(buffer: EventBuffer, name: string, value: string | undefined): void {
        if (value === undefined) return;
        buffer.write(`,${JSON.stringify(name)}:${JSON.stringify(value)}`);
    }

    private stringify(value: unknown): string {
        return JSON.stringify(value, createLoopSafeReplacer()) ?? 'null';
    }
}

export function toEpochSeconds(timestamp: Date): number {
    const millis = timestamp.getTime();
    if (!Number.isFinite(millis)) {
        throw new RangeError('Event timestamp is not a valid date');
    }
    return millis / 1000;
}

/**
 * Drops references back to an enclosing object instead of failing on them,
 * and expands Error instances, whose fields are not enumerable.
 */
function createLoopSafeReplacer(): Replacer {
    const holders: unknown[] = [];
    const originals: unknown[] = [];

    return function (this: unknown, _key: string, value: unknown): unknown {
        if (typeof value !== 'object' || value === null) return value;

        while (holders.length > 0 && holders[holders.length - 1] !== this) {
            holders.pop();
            originals.pop();
        }
        if (originals.includes(value)) return undefined;

        const replaced = value instanceof Error ? describeError(value) : value;
        holders.push(replaced);
        originals.push(value);
        return replaced;
    };
}

function describeError(error: Error): Record<string, unknown> {
    const described: Record<string, unknown> = {
        name: error.name,
        message: error.message
    };
    if (error.stack) described.stack = error.stack;
    for (const [key, value] of Object.entries(error)) {
        described[key] = value;
    }
    if (error.cause !== undefined) described.cause = error.cause;
    return described;
}

import { describe, it, expect } from 'vitest';
import { EventBuffer, EventSerializer, toEpochSeconds, type EventRecord, type Metadata } from '../../src';

const metadata: Metadata = { index: 'main', source: 'api', sourcetype: '_json', host: 'web-1' };
const timestamp = new Date('2025-10-18T10:00:00.123Z');

const serialize = (record: EventRecord): string => {
    const buffer = new EventBuffer();
    new EventSerializer().write(record, buffer);
    return buffer.toString();
};

describe('EventSerializer', () => {
    it('writes the collector shape as one line', () => {
        const output = serialize({
            timestamp,
            level: 'INFO',
            messageTemplate: 'User {user} signed in',
            renderedMessage: 'User ada signed in',
            properties: { user: 'ada' },
            metadata
        });

        expect(output).toBe(
            '{"time":1760781600.123,"index":"main","source":"api","sourcetype":"_json","host":"web-1",' +
            '"event":{"message-template":"User {user} signed in","message":"User ada signed in","level":"INFO",' +
            '"properties":{"user":"ada"}}}\n'
        );
    });

    it('omits unset metadata and event fields', () => {
        const output = serialize({
            timestamp: new Date('2025-10-18T10:00:00.000Z'),
            renderedMessage: 'hello',
            metadata: { sourcetype: '_json', host: '' }
        });

        expect(output).toBe('{"time":1760781600,"sourcetype":"_json","host":"","event":{"message":"hello"}}\n');
    });

    it('writes the id first when present', () => {
        const output = serialize({ timestamp, id: 'evt-1', level: 'WARN', metadata });

        expect(JSON.parse(output).event).toEqual({ id: 'evt-1', level: 'WARN' });
        expect(output).toContain('"event":{"id":"evt-1","level":"WARN"}');
    });

    it('expands Error exceptions', () => {
        const error = new Error('boom');
        error.stack = 'Error: boom\n    at handler (app.ts:1:1)';

        const parsed = JSON.parse(serialize({ timestamp, level: 'ERROR', exception: error, metadata }));

        expect(parsed.event.exception).toEqual({
            name: 'Error',
            message: 'boom',
            stack: 'Error: boom\n    at handler (app.ts:1:1)'
        });
    });

    it('includes the cause of an exception', () => {
        const cause = new TypeError('bad input');
        cause.stack = undefined;
        const error = new Error('request failed', { cause });
        error.stack = undefined;

        const parsed = JSON.parse(serialize({ timestamp, exception: error, metadata }));

        expect(parsed.event.exception).toEqual({
            name: 'Error',
            message: 'request failed',
            cause: { name: 'TypeError', message: 'bad input' }
        });
    });

    it('drops references back to an enclosing object', () => {
        const properties: Record<string, unknown> = { a: 1 };
        properties.self = properties;
        properties.list = [properties, 2];

        const parsed = JSON.parse(serialize({ timestamp, properties, metadata }));

        expect(parsed.event.properties).toEqual({ a: 1, list: [null, 2] });
    });

    it('keeps an object referenced twice without a loop', () => {
        const shared = { id: 7 };

        const parsed = JSON.parse(serialize({ timestamp, properties: { first: shared, second: shared }, metadata }));

        expect(parsed.event.properties).toEqual({ first: { id: 7 }, second: { id: 7 } });
    });

    it('writes an override event in place of the structured fields', () => {
        const output = serialize({ timestamp, level: 'INFO', renderedMessage: 'ignored', event: 42, metadata });

        expect(output).toBe(
            '{"time":1760781600.123,"index":"main","source":"api","sourcetype":"_json","host":"web-1","event":42}\n'
        );
    });

    it('throws on values JSON cannot represent', () => {
        expect(() => serialize({ timestamp, properties: { big: 1n }, metadata })).toThrow(TypeError);
    });

    it('rejects invalid timestamps', () => {
        expect(() => toEpochSeconds(new Date('not a date'))).toThrow(RangeError);
    });
});

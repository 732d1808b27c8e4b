import { describe, it, expect, vi } from 'vitest';
import { HECBatch, SerializationError, type EventFormatter, type Metadata, type PostEvents } from '../../src';

const metadata: Metadata = { index: 'main', source: 'api', sourcetype: '_json', host: 'web-1' };
const timestamp = new Date('2025-10-18T10:00:00.000Z');

const decode = (payload: Uint8Array): string => Buffer.from(payload).toString('utf8');
const parseLines = (payload: Uint8Array) => decode(payload).trim().split('\n').map(line => JSON.parse(line));

describe('HECBatch', () => {
    const createPost = () => vi.fn<PostEvents>().mockResolvedValue(200);

    it('sends events in the order they were added', async () => {
        const post = createPost();
        const batch = new HECBatch(post, metadata);

        batch.addEvent(timestamp, { level: 'Info', renderedMessage: 'a' });
        batch.addEvent(timestamp, { level: 'Error', renderedMessage: 'b' });
        batch.addEvent(timestamp, { level: 'Info', renderedMessage: 'c' });
        const status = await batch.send();

        expect(status).toBe(200);
        expect(post).toHaveBeenCalledTimes(1);
        const events = parseLines(post.mock.calls[0][0]);
        expect(events.map(e => e.event.message)).toEqual(['a', 'b', 'c']);
        expect(events.map(e => e.event.level)).toEqual(['Info', 'Error', 'Info']);
    });

    it('leaves the buffer untouched when an event fails to serialize', async () => {
        const post = createPost();
        const failing = new HECBatch(post, metadata);
        const reference = new HECBatch(post, metadata);

        for (const batch of [failing, reference]) {
            batch.addEvent(timestamp, { renderedMessage: 'one' });
            batch.addEvent(timestamp, { renderedMessage: 'two' });
        }

        expect(() => failing.addEvent(timestamp, { renderedMessage: 'three', properties: { big: 3n } }))
            .toThrow(SerializationError);
        expect(failing.byteLength).toBe(reference.byteLength);
        expect(failing.size).toBe(2);

        failing.addEvent(timestamp, { renderedMessage: 'four' });
        reference.addEvent(timestamp, { renderedMessage: 'four' });
        await failing.send();
        await reference.send();

        expect(decode(post.mock.calls[0][0])).toBe(decode(post.mock.calls[1][0]));
        expect(parseLines(post.mock.calls[0][0]).map(e => e.event.message)).toEqual(['one', 'two', 'four']);
    });

    it('rolls back a formatter result that cannot be encoded', async () => {
        const post = createPost();
        const formatter: EventFormatter = {
            format: record => record.renderedMessage === 'bad' ? { x: 1n } : undefined
        };
        const failing = new HECBatch(post, metadata, formatter);
        const reference = new HECBatch(post, metadata, formatter);

        for (const batch of [failing, reference]) {
            batch.addEvent(timestamp, { renderedMessage: 'one' });
        }

        expect(() => failing.addEvent(timestamp, { renderedMessage: 'bad' })).toThrow(SerializationError);
        expect(failing.byteLength).toBe(reference.byteLength);
        expect(failing.size).toBe(1);

        failing.addEvent(timestamp, { renderedMessage: 'two' });
        reference.addEvent(timestamp, { renderedMessage: 'two' });
        await failing.send();
        await reference.send();

        expect(decode(post.mock.calls[0][0])).toBe(decode(post.mock.calls[1][0]));
        expect(parseLines(post.mock.calls[0][0]).map(e => e.event.message)).toEqual(['one', 'two']);
    });

    it('keeps the original error as the cause', () => {
        const batch = new HECBatch(createPost(), metadata);

        let thrown: unknown;
        try {
            batch.addEvent(timestamp, { properties: { big: 1n } });
        } catch (error) {
            thrown = error;
        }

        expect(thrown).toBeInstanceOf(SerializationError);
        expect(thrown instanceof SerializationError && thrown.cause).toBeInstanceOf(TypeError);
    });

    it('sends a formatter override as the bare event value', async () => {
        const post = createPost();
        const formatter: EventFormatter = { format: () => 42 };
        const batch = new HECBatch(post, metadata, formatter);

        batch.addEvent(timestamp, { level: 'Info', renderedMessage: 'replaced' });
        await batch.send();

        expect(decode(post.mock.calls[0][0])).toBe(
            '{"time":1760781600,"index":"main","source":"api","sourcetype":"_json","host":"web-1","event":42}\n'
        );
    });

    it('keeps the structured shape when the formatter returns undefined', async () => {
        const post = createPost();
        const format = vi.fn<EventFormatter['format']>().mockReturnValue(undefined);
        const batch = new HECBatch(post, metadata, { format });

        batch.addEvent(timestamp, { renderedMessage: 'kept' });
        await batch.send();

        expect(format).toHaveBeenCalledWith(expect.objectContaining({ renderedMessage: 'kept', metadata }));
        expect(parseLines(post.mock.calls[0][0])[0].event).toEqual({ message: 'kept' });
    });

    it('drops the event when the formatter throws', () => {
        const batch = new HECBatch(createPost(), metadata, {
            format: () => {
                throw new Error('formatter failed');
            }
        });

        expect(() => batch.addEvent(timestamp, { renderedMessage: 'x' })).toThrow(SerializationError);
        expect(batch.byteLength).toBe(0);
    });

    it('uses the metadata override for a single event', async () => {
        const post = createPost();
        const batch = new HECBatch(post, metadata);

        batch.addEvent(timestamp, {
            renderedMessage: 'worker',
            metadataOverride: { source: 'worker', sourcetype: 'job', host: 'web-2' }
        });
        batch.addEvent(timestamp, { renderedMessage: 'default' });
        await batch.send();

        const [first, second] = parseLines(post.mock.calls[0][0]);
        expect(first).toMatchObject({ source: 'worker', sourcetype: 'job', host: 'web-2' });
        expect(first.index).toBeUndefined();
        expect(second).toMatchObject({ index: 'main', source: 'api', host: 'web-1' });
    });

    it('does not post an empty batch', async () => {
        const post = createPost();
        const batch = new HECBatch(post, metadata);

        await expect(batch.send()).resolves.toBe(200);
        expect(post).not.toHaveBeenCalled();
    });

    it('can be reused after send', async () => {
        const post = createPost();
        const batch = new HECBatch(post, metadata);

        batch.addEvent(timestamp, { renderedMessage: 'first' });
        const pending = batch.send();
        expect(batch.size).toBe(0);
        batch.addEvent(timestamp, { renderedMessage: 'second' });
        await pending;
        await batch.send();

        expect(parseLines(post.mock.calls[0][0]).map(e => e.event.message)).toEqual(['first']);
        expect(parseLines(post.mock.calls[1][0]).map(e => e.event.message)).toEqual(['second']);
    });

    it('returns the status reported by the client', async () => {
        const post = vi.fn<PostEvents>().mockResolvedValue(503);
        const batch = new HECBatch(post, metadata);

        batch.addEvent(timestamp, { renderedMessage: 'x' });

        await expect(batch.send()).resolves.toBe(503);
    });

    it('rejects with the abort reason when already cancelled', async () => {
        const post = createPost();
        const batch = new HECBatch(post, metadata);
        const controller = new AbortController();
        controller.abort();

        batch.addEvent(timestamp, { renderedMessage: 'x' });

        await expect(batch.send(controller.signal)).rejects.toMatchObject({ name: 'AbortError' });
        expect(post).not.toHaveBeenCalled();
    });

    it('passes the signal on to the client', async () => {
        const post = createPost();
        const batch = new HECBatch(post, metadata);
        const controller = new AbortController();

        batch.addEvent(timestamp, { renderedMessage: 'x' });
        await batch.send(controller.signal);

        expect(post).toHaveBeenCalledWith(expect.any(Uint8Array), controller.signal);
    });
});

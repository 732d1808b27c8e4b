import type {EventFields, EventFormatter, EventRecord, Metadata} from "../types";
import {SerializationError} from "../errors";
import {HttpStatus} from "../constants";
import {EventBuffer} from "./EventBuffer";
import {EventSerializer} from "./EventSerializer";

export type PostEvents = (payload: Uint8Array, signal?: AbortSignal) => Promise<number>;

/**
 * Collects events for one flush cycle. Events are encoded as soon as they are
 * added, in call order, and `send` hands the encoded bytes to the client.
 *
 * @example
 * const batch = await client.startBatch();
 * batch.addEvent(new Date(), {level: 'INFO', renderedMessage: 'started'});
 * const status = await batch.send();
 */
export class HECBatch {
    private readonly buffer = new EventBuffer();
    private serializer = new EventSerializer();
    private count = 0;

    constructor(
        private readonly post: PostEvents,
        private readonly metadata: Metadata,
        private readonly formatter?: EventFormatter
    ) {
    }

    /** Number of events currently buffered. */
    get size(): number {
        return this.count;
    }

    get byteLength(): number {
        return this.buffer.length;
    }

    /**
     * @throws SerializationError when the event cannot be encoded. The event is
     * dropped; events added before and after it are unaffected.
     */
    addEvent(timestamp: Date, fields: EventFields = {}): void {
        const {metadataOverride, ...rest} = fields;
        const record: EventRecord = {
            timestamp,
            ...rest,
            metadata: metadataOverride ?? this.metadata
        };

        const checkpoint = this.buffer.length;
        try {
            this.serializer.write(this.applyFormatter(record), this.buffer);
        } catch (error) {
            this.buffer.truncate(checkpoint);
            this.serializer = new EventSerializer();
            const reason = error instanceof Error ? error.message : String(error);
            throw new SerializationError(`Failed to serialize log event: ${reason}`, {cause: error});
        }
        this.count++;
    }

    /**
     * Sends everything added so far and empties the batch, which can take new
     * events straight away. An empty batch is not posted.
     */
    async send(signal?: AbortSignal): Promise<number> {
        signal?.throwIfAborted();

        const payload = this.buffer.snapshot();
        this.buffer.reset();
        this.count = 0;

        if (payload.length === 0) return HttpStatus.OK;
        return this.post(payload, signal);
    }

    private applyFormatter(record: EventRecord): EventRecord {
        if (!this.formatter) return record;

        const event = this.formatter.format(record);
        return event === undefined ? record : {...record, event};
    }
}

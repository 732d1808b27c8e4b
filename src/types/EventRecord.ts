import type {Metadata} from "./Metadata";

/**
 * One log occurrence as it is written to the collector.
 *
 * When `event` is set (by an {@link EventFormatter}) it is serialized as the
 * event payload in place of the structured fields.
 */
export interface EventRecord {
    readonly timestamp: Date;
    readonly id?: string;
    readonly level?: string;
    readonly messageTemplate?: string;
    readonly renderedMessage?: string;
    readonly exception?: unknown;
    readonly properties?: Readonly<Record<string, unknown>>;
    readonly metadata: Metadata;
    readonly event?: unknown;
}

export type EventFields = Omit<EventRecord, 'timestamp' | 'metadata' | 'event'> & {
    metadataOverride?: Metadata;
};

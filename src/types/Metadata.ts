/**
 * Destination metadata attached to every event sent to the collector.
 * Instances are shared between events, so they are frozen on creation.
 */
export interface Metadata {
    readonly index?: string;
    readonly source?: string;
    readonly sourcetype: string;
    readonly host: string;
}

import type {EventRecord} from "./EventRecord";

/**
 * Replaces the wire shape of an event. Whatever `format` returns is sent as
 * the `event` payload; returning `undefined` keeps the structured shape.
 */
export interface EventFormatter {
    format(record: EventRecord): unknown;
}

import type {Metadata} from "../types";
import {DEFAULT_SOURCETYPE, METADATA_CACHE_LIMIT} from "../constants";

/**
 * Metadata tuples keyed by source.
 *
 * A hit returns the tuple built the first time the source was seen, even if
 * `index` or `sourcetype` differ on the later call. Keep those stable per
 * source.
 */
export class MetadataCache {
    private readonly entries = new Map<string, Metadata>();

    constructor(
        readonly host: string,
        private readonly limit: number = METADATA_CACHE_LIMIT
    ) {
    }

    get size(): number {
        return this.entries.size;
    }

    get(index?: string, source?: string, sourcetype?: string): Metadata {
        const key = source ?? '';
        const cached = this.entries.get(key);
        if (cached) return cached;

        if (this.entries.size >= this.limit) {
            this.entries.clear();
        }

        const metadata: Metadata = Object.freeze({
            index: index || undefined,
            source: source || undefined,
            sourcetype: sourcetype || DEFAULT_SOURCETYPE,
            host: this.host
        });
        this.entries.set(key, metadata);
        return metadata;
    }
}

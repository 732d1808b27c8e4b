import {LogLevel, type EventFormatter, type Layout, type LogEntry, type Transport} from "../types";
import {
    getHostName,
    HECClient,
    SendMode,
    type MetadataCache,
    type ErrorListener,
    type FetchLike,
    type HECBatch,
    type HECClientOptions
} from "../hec";
import {renderLayout, renderMessageTemplate} from "../formatters";
import {DEFAULT_SOURCE, DEFAULT_SOURCETYPE, HttpStatus} from "../constants";

export interface HECTransportConfig extends Omit<HECClientOptions, 'index' | 'source' | 'sourcetype' | 'host'> {
    index?: Layout;
    source?: Layout;
    sourcetype?: Layout;
    id?: Layout;
    // Rendered message; the message template filled from the entry context by default
    layout?: Layout;
    contextProperties?: Record<string, Layout>;
    includePositionalParameters?: boolean;
    formatter?: EventFormatter;
    batchSize?: number;
    flushInterval?: number;
    minLevel?: LogLevel;
    onError?: ErrorListener;
}

type ResolvedConfig = HECTransportConfig & Required<Pick<HECTransportConfig,
    'source' | 'sourcetype' | 'contextProperties' | 'includePositionalParameters' | 'batchSize' | 'flushInterval' | 'minLevel'>>;

/**
 * HECTransport - forwards entries to a Splunk HTTP Event Collector.
 * Flushes every `flushInterval` ms OR when `batchSize` entries are queued.
 *
 * @example
 * const logger = new Logger(LogLevel.INFO, [
 *     new HECTransport({
 *         serverUrl: 'https://splunk.example.com:8088',
 *         token: 'test-token',
 *         index: 'app',
 *         sendMode: SendMode.Sequential
 *     })
 * ]);
 */
export class HECTransport implements Transport {
    readonly client: HECClient;

    private readonly config: ResolvedConfig;
    private queue: LogEntry[] = [];
    private timer?: NodeJS.Timeout;
    private sequentialTail: Promise<unknown> = Promise.resolve();
    private readonly inFlight = new Set<Promise<number>>();
    private closePromise?: Promise<void>;

    /**
     * @throws ConfigurationError when the server URL or token is missing or invalid
     */
    constructor(
        config: HECTransportConfig,
        fetchImpl?: FetchLike,
        hostName: () => Promise<string> = getHostName
    ) {
        this.config = {
            source: DEFAULT_SOURCE,
            sourcetype: DEFAULT_SOURCETYPE,
            contextProperties: {},
            includePositionalParameters: false,
            batchSize: 10,
            flushInterval: 5000,
            minLevel: LogLevel.INFO,
            ...config
        };

        const {index, source, sourcetype, ...clientOptions} = this.config;
        this.client = new HECClient(clientOptions, fetchImpl, hostName);
        this.client.onError(error => {
            console.error('HECTransport failed to send log events:', error);
        });
        if (this.config.onError) {
            this.client.onError(this.config.onError);
        }

        if (this.config.flushInterval > 0) {
            this.timer = setInterval(() => {
                this.flush().catch(error => console.error('HECTransport flush failed:', error));
            }, this.config.flushInterval);
            this.timer.unref();
        }
    }

    get closed(): boolean {
        return this.closePromise !== undefined;
    }

    /** Entries waiting for the next flush. */
    get pending(): number {
        return this.queue.length;
    }

    onError(listener: ErrorListener): () => void {
        return this.client.onError(listener);
    }

    write(entry: LogEntry): void {
        if (this.closed || entry.level < this.config.minLevel) return;

        this.queue.push(entry);

        if (this.queue.length >= this.config.batchSize) {
            // Don't await - fire and forget for non-blocking behavior
            this.flush().catch(error => console.error('HECTransport flush failed:', error));
        }
    }

    /**
     * Sends everything queued so far as one batch.
     *
     * @returns the collector's status code; 200 when nothing was queued
     */
    flush(signal?: AbortSignal): Promise<number> {
        if (this.client.sendMode === SendMode.Sequential) {
            const next = this.sequentialTail.then(() => this.sendQueued(signal));
            // a failed flush must not stall the ones queued behind it
            this.sequentialTail = next.then(() => undefined, () => undefined);
            return this.track(next);
        }
        return this.track(this.sendQueued(signal));
    }

    close(): Promise<void> {
        this.closePromise ??= this.shutdown();
        return this.closePromise;
    }

    private async shutdown(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }

        try {
            await this.flush();
            await Promise.allSettled([...this.inFlight]);
        } finally {
            await this.client.close();
        }
    }

    private async sendQueued(signal?: AbortSignal): Promise<number> {
        if (this.queue.length === 0) return HttpStatus.OK;

        const entries = this.queue.splice(0);
        const metadata = await this.client.getMetadataCache();
        const batch = await this.client.startBatch();

        for (const entry of entries) {
            signal?.throwIfAborted();
            try {
                this.addToBatch(batch, entry, metadata);
            } catch (error) {
                console.error('HECTransport dropped log event:', error);
            }
        }

        return batch.send(signal);
    }

    private addToBatch(batch: HECBatch, entry: LogEntry, metadata: MetadataCache): void {
        const template = renderMessageTemplate(entry.message, entry.context);

        const properties: Record<string, unknown> = {};
        for (const [name, layout] of Object.entries(this.config.contextProperties)) {
            properties[name] = renderLayout(layout, entry);
        }
        Object.assign(properties, entry.context);
        if (entry.tags?.length) {
            properties.tags = [...entry.tags];
        }
        if (this.config.includePositionalParameters) {
            template.parameters.forEach((value, position) => {
                properties[`{${position}}`] = value;
            });
        }

        batch.addEvent(entry.timestamp, {
            id: renderLayout(this.config.id, entry) || undefined,
            level: LogLevel[entry.level],
            messageTemplate: entry.message,
            renderedMessage: this.config.layout === undefined
                ? template.text
                : renderLayout(this.config.layout, entry),
            exception: entry.error,
            properties,
            metadataOverride: metadata.get(
                renderLayout(this.config.index, entry),
                renderLayout(this.config.source, entry),
                renderLayout(this.config.sourcetype, entry)
            )
        });
    }

    private track(pending: Promise<number>): Promise<number> {
        this.inFlight.add(pending);
        const untrack = () => {
            this.inFlight.delete(pending);
        };
        pending.then(untrack, untrack);
        return pending;
    }
}

import {fetch as undiciFetch, type Dispatcher} from "undici";
import type {EventFormatter, Metadata} from "../types";
import {DeliveryError} from "../errors";
import {AUTHORIZATION_SCHEME, CHANNEL_HEADER, CONTENT_TYPE, DEFAULT_SOURCETYPE, HEC_EVENT_PATH, HttpStatus} from "../constants";
import {ErrorReporter, type ErrorListener} from "./ErrorReporter";
import {HECBatch} from "./HECBatch";
import {buildDispatcher} from "./dispatcher";
import {getHostName} from "./hostName";
import {MetadataCache} from "./MetadataCache";
import {parseClientOptions, type HECClientOptions, type ResolvedHECClientOptions} from "./options";

export interface HECRequest {
    method: 'POST';
    headers: Record<string, string>;
    body: Uint8Array;
    signal?: AbortSignal;
}

export interface HECResponse {
    status: number;
    body: unknown;
    text(): Promise<string>;
}

export type FetchLike = (url: string, request: HECRequest) => Promise<HECResponse>;

export interface HECClientConfig extends HECClientOptions {
    formatter?: EventFormatter;
}

/**
 * Client for the Splunk HTTP Event Collector.
 *
 * Owns one connection pool for its lifetime. `post` never throws: failures are
 * published to the `onError` observers and a status code is still returned.
 *
 * @example
 * const client = new HECClient({serverUrl: 'https://splunk.local:8088', token: 'test-token', index: 'main'});
 * client.onError(error => console.error(error));
 * const batch = await client.startBatch();
 * batch.addEvent(new Date(), {level: 'INFO', renderedMessage: 'ready'});
 * await batch.send();
 * await client.close();
 */
export class HECClient {
    readonly endpoint: string;
    readonly sendMode: ResolvedHECClientOptions['sendMode'];

    private readonly options: ResolvedHECClientOptions;
    private readonly formatter?: EventFormatter;
    private readonly errors = new ErrorReporter();
    private readonly dispatcher: Dispatcher;
    private readonly fetch: FetchLike;
    private readonly headers: Record<string, string>;
    private metadataCache?: Promise<MetadataCache>;
    private closePromise?: Promise<void>;

    /**
     * @param hostName resolves the machine identity when `host` is not configured
     * @throws ConfigurationError when the server URL or token is missing or invalid
     */
    constructor(
        config: HECClientConfig,
        fetchImpl?: FetchLike,
        private readonly hostName: () => Promise<string> = getHostName
    ) {
        this.options = parseClientOptions(config);
        this.formatter = config.formatter;
        this.sendMode = this.options.sendMode;
        this.endpoint = this.options.serverUrl.replace(/\/+$/, '') + HEC_EVENT_PATH;

        this.dispatcher = buildDispatcher(this.options, error => this.errors.publish(error));
        this.fetch = fetchImpl ?? ((url: string, request: HECRequest) => undiciFetch(url, {...request, dispatcher: this.dispatcher}));

        this.headers = {
            'Authorization': `${AUTHORIZATION_SCHEME} ${this.options.token}`,
            'Content-Type': CONTENT_TYPE
        };
        if (this.options.channel) {
            this.headers[CHANNEL_HEADER] = this.options.channel;
        }
        if (this.options.useHttpVersion10Hack) {
            this.headers['Connection'] = 'keep-alive';
        }
    }

    get closed(): boolean {
        return this.closePromise !== undefined;
    }

    onError(listener: ErrorListener): () => void {
        return this.errors.subscribe(listener);
    }

    /**
     * Metadata tuples for this client, carrying the configured host or the
     * resolved machine identity. Resolved once per client.
     */
    getMetadataCache(): Promise<MetadataCache> {
        this.metadataCache ??= this.resolveHost().then(host => new MetadataCache(host));
        return this.metadataCache;
    }

    /** The configured index, source and sourcetype with the resolved host. */
    async defaultMetadata(): Promise<Metadata> {
        const {host} = await this.getMetadataCache();
        return Object.freeze({
            index: this.options.index || undefined,
            source: this.options.source || undefined,
            sourcetype: this.options.sourcetype || DEFAULT_SOURCETYPE,
            host
        });
    }

    /**
     * @param metadata defaults for events added without their own metadata;
     * {@link defaultMetadata} when omitted
     */
    async startBatch(metadata?: Metadata): Promise<HECBatch> {
        const defaults = metadata ?? await this.defaultMetadata();
        return new HECBatch((payload, signal) => this.post(payload, signal), defaults, this.formatter);
    }

    /**
     * Posts already encoded events.
     *
     * @returns the response status, or 400 when no response was received
     */
    async post(payload: Uint8Array, signal?: AbortSignal): Promise<number> {
        let status: number = HttpStatus.OK;
        let response: HECResponse | undefined;

        try {
            response = await this.fetch(this.endpoint, {
                method: 'POST',
                headers: {...this.headers},
                body: payload,
                signal
            });
            status = response.status;

            if (status !== HttpStatus.OK && response.body !== null) {
                const serverReply = await response.text();
                this.errors.publish(new DeliveryError(`HEC responded with status ${status}: ${serverReply}`, {
                    statusCode: status,
                    serverReply,
                    response,
                    serializedEvents: decodePayload(payload)
                }));
            }
        } catch (error) {
            status = status === HttpStatus.OK ? HttpStatus.BAD_REQUEST : status;
            const reason = error instanceof Error ? error.message : String(error);
            this.errors.publish(new DeliveryError(`Failed to post events to HEC: ${reason}`, {
                statusCode: status,
                response,
                serializedEvents: decodePayload(payload),
                cause: error
            }));
        }

        return status;
    }

    /**
     * Drops all error observers and closes the connection pool. Safe to call
     * more than once.
     */
    close(): Promise<void> {
        this.closePromise ??= this.dispose();
        return this.closePromise;
    }

    private async resolveHost(): Promise<string> {
        return this.options.host?.trim() || this.hostName();
    }

    private async dispose(): Promise<void> {
        this.errors.clear();
        await this.dispatcher.close();
    }
}

function decodePayload(payload: Uint8Array): string {
    return Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength).toString('utf8');
}

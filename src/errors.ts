export class HECError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * A required setting is missing or unusable. Thrown synchronously while the
 * client is built; nothing has been sent at that point.
 */
export class ConfigurationError extends HECError {
}

/**
 * A single event could not be encoded. The event was dropped and the batch
 * buffer is unchanged.
 */
export class SerializationError extends HECError {
}

export interface DeliveryErrorDetails {
    statusCode: number;
    serverReply?: string;
    response?: unknown;
    serializedEvents?: string;
    cause?: unknown;
}

/**
 * A failed or questionable delivery. Never thrown by the client; published to
 * the observers registered with `HECClient.onError`.
 */
export class DeliveryError extends HECError {
    readonly statusCode: number;
    readonly serverReply?: string;
    readonly response?: unknown;
    readonly serializedEvents?: string;

    constructor(message: string, details: DeliveryErrorDetails) {
        super(message, details.cause === undefined ? undefined : {cause: details.cause});
        this.statusCode = details.statusCode;
        this.serverReply = details.serverReply;
        this.response = details.response;
        this.serializedEvents = details.serializedEvents;
    }
}

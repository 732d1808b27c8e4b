import type {DeliveryError} from "../errors";

export type ErrorListener = (error: DeliveryError) => void;

/**
 * Fan-out of delivery failures to registered observers.
 *
 * Publishing with no observers registered is a no-op: the failure is
 * dropped. Transports that want failures to be visible subscribe at
 * construction time (HECTransport writes them to the console).
 */
export class ErrorReporter {
    private listeners: ErrorListener[] = [];

    get listenerCount(): number {
        return this.listeners.length;
    }

    /**
     * @returns a function that removes the listener again
     */
    subscribe(listener: ErrorListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    publish(error: DeliveryError): void {
        for (const listener of [...this.listeners]) {
            try {
                listener(error);
            } catch (listenerError) {
                console.error('HEC error listener failed:', listenerError);
            }
        }
    }

    clear(): void {
        this.listeners = [];
    }
}

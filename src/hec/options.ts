import {z} from "zod";
import {ConfigurationError} from "../errors";
import {DEFAULT_MAX_CONNECTIONS_PER_SERVER} from "../constants";

/**
 * Parallel lets batches race each other. Sequential keeps at most one batch
 * in flight per transport, so events reach the collector in write order.
 */
export enum SendMode {
    Parallel = 'parallel',
    Sequential = 'sequential'
}

const httpUrl = (field: string) => z.string()
    .trim()
    .min(1, `${field} is not set`)
    .url(`${field} must be an absolute URL`)
    .refine(value => /^https?:$/.test(safeProtocol(value)), `${field} must use http or https`);

export const HECClientOptionsSchema = z.object({
    serverUrl: httpUrl('serverUrl'),
    token: z.string().trim().min(1, 'token is not set'),
    channel: z.string().trim().optional(),
    index: z.string().optional(),
    source: z.string().optional(),
    sourcetype: z.string().optional(),
    host: z.string().optional(),
    ignoreSslErrors: z.boolean().default(false),
    useProxy: z.boolean().default(true),
    proxyUrl: z.string().trim().optional(),
    proxyUser: z.string().optional(),
    proxyPassword: z.string().optional(),
    maxConnectionsPerServer: z.number().int().nonnegative().default(DEFAULT_MAX_CONNECTIONS_PER_SERVER),
    useHttpVersion10Hack: z.boolean().default(false),
    sendMode: z.nativeEnum(SendMode).default(SendMode.Sequential)
});

export type HECClientOptions = z.input<typeof HECClientOptionsSchema>;
export type ResolvedHECClientOptions = z.output<typeof HECClientOptionsSchema>;

export function parseClientOptions(options: HECClientOptions): ResolvedHECClientOptions {
    const result = HECClientOptionsSchema.safeParse(options);
    if (!result.success) {
        const reasons = result.error.issues.map(issue => issue.message).join('; ');
        throw new ConfigurationError(`Invalid HEC client configuration: ${reasons}`);
    }
    return result.data;
}

function safeProtocol(value: string): string {
    try {
        return new URL(value).protocol;
    } catch {
        return '';
    }
}

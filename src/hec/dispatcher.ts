import {Agent, buildConnector, ProxyAgent, type Dispatcher} from "undici";
import type {PeerCertificate} from "tls";
import {DeliveryError} from "../errors";
import {HttpStatus} from "../constants";
import type {ResolvedHECClientOptions} from "./options";

type DispatcherOptions = Pick<ResolvedHECClientOptions,
    'ignoreSslErrors' | 'useProxy' | 'proxyUrl' | 'proxyUser' | 'proxyPassword' | 'maxConnectionsPerServer'>;

/**
 * Builds the connection pool shared by every post of one client.
 *
 * Falls back to a default Agent when the configured one cannot be built, so a
 * bad proxy setting does not stop logging altogether.
 */
export function buildDispatcher(
    options: DispatcherOptions,
    report: (error: DeliveryError) => void,
    env: NodeJS.ProcessEnv = process.env
): Dispatcher {
    try {
        return buildConfiguredDispatcher(options, report, env);
    } catch (error) {
        console.warn('HEC client could not apply its connection settings, using defaults:', error);
        return new Agent();
    }
}

function buildConfiguredDispatcher(
    options: DispatcherOptions,
    report: (error: DeliveryError) => void,
    env: NodeJS.ProcessEnv
): Dispatcher {
    const connections = options.maxConnectionsPerServer > 0 ? options.maxConnectionsPerServer : null;
    const proxyUrl = options.useProxy ? options.proxyUrl || environmentProxy(env) : undefined;

    if (proxyUrl) {
        return new ProxyAgent({
            uri: proxyUrl,
            token: proxyAuthorization(options.proxyUser, options.proxyPassword),
            connections,
            // ProxyAgent builds the tunnelled connector from requestTls itself, so
            // untrusted certificates behind a proxy are accepted without a report
            requestTls: options.ignoreSslErrors ? {rejectUnauthorized: false} : undefined
        });
    }

    return new Agent({
        connections,
        connect: options.ignoreSslErrors
            ? createCertificateReportingConnector(report)
            : undefined
    });
}

/**
 * TLS connector that accepts any server certificate and reports the ones that
 * would have been rejected.
 */
export function createCertificateReportingConnector(
    report: (error: DeliveryError) => void,
    connect: buildConnector.connector = buildConnector({rejectUnauthorized: false})
): buildConnector.connector {
    return (options, callback) => {
        connect(options, (error, socket) => {
            if (socket === null) {
                callback(error ?? new Error('Connection failed'), null);
                return;
            }

            if ('authorized' in socket && !socket.authorized) {
                const certificate = socket.getPeerCertificate();
                const warning = 'The following certificate errors were encountered when establishing the HTTPS connection to the server: '
                    + `${describeAuthorizationError(socket.authorizationError)}, `
                    + `Certificate subject: ${formatDistinguishedName(certificate.subject)}, `
                    + `Certificate issuer: ${formatDistinguishedName(certificate.issuer)}`;
                report(new DeliveryError(warning, {statusCode: HttpStatus.NOT_ACCEPTABLE, serverReply: warning}));
            }

            callback(null, socket);
        });
    };
}

export function proxyAuthorization(user?: string, password?: string): string | undefined {
    if (!user?.trim() || !password?.trim()) return undefined;
    return `Basic ${Buffer.from(`${user}:${password}`).toString('base64')}`;
}

function environmentProxy(env: NodeJS.ProcessEnv): string | undefined {
    return env.HTTPS_PROXY || env.https_proxy || env.HTTP_PROXY || env.http_proxy || undefined;
}

function describeAuthorizationError(value: unknown): string {
    if (value instanceof Error) return value.message;
    return String(value);
}

function formatDistinguishedName(name: PeerCertificate['subject'] | undefined): string {
    if (!name) return '';
    return Object.entries(name)
        .map(([key, value]) => `${key}=${Array.isArray(value) ? value.join('+') : value}`)
        .join(', ');
}

import os from "os";
import {promises as dns} from "dns";

export type HostNameLookup = {
    name: string;
    lookup: () => string | undefined | Promise<string | undefined>;
};

export const DEFAULT_HOST_NAME_LOOKUPS: readonly HostNameLookup[] = [
    {name: 'COMPUTERNAME', lookup: () => process.env.COMPUTERNAME},
    {name: 'HOSTNAME', lookup: () => process.env.HOSTNAME},
    {name: 'os.hostname', lookup: () => os.hostname()},
    {name: 'DNS', lookup: lookupHostNameByDns}
];

/**
 * Tries each lookup in order and returns the first non-blank, trimmed
 * result. A lookup that throws counts as blank. Returns an empty string when
 * every lookup comes back blank.
 */
export async function resolveHostName(
    lookups: readonly HostNameLookup[] = DEFAULT_HOST_NAME_LOOKUPS
): Promise<string> {
    for (const {name, lookup} of lookups) {
        try {
            const value = (await lookup())?.trim();
            if (value) return value;
        } catch (error) {
            console.warn(`HEC host name lookup ${name} failed:`, error);
        }
    }
    return '';
}

let processHostName: Promise<string> | undefined;

/**
 * Host identity of this process, resolved on first call and reused after.
 */
export function getHostName(): Promise<string> {
    processHostName ??= resolveHostName();
    return processHostName;
}

async function lookupHostNameByDns(): Promise<string | undefined> {
    const {address} = await dns.lookup(os.hostname());
    const [name] = await dns.reverse(address);
    return name;
}

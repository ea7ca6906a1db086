import { LsnpError } from "./errors";
import { Identity } from "./types";

const IPV4 = /^\d{1,3}(\.\d{1,3}){3}$/;

export function isIpv4(value: string): boolean {
    if (!IPV4.test(value)) return false;
    return value.split(".").every(octet => Number(octet) <= 255);
}

/** Returns the IPv4 literal embedded after "@", if the identity carries one. */
export function extractIp(identity: Identity): string | undefined {
    const at = identity.indexOf("@");
    if (at === -1) return undefined;
    const ip = identity.slice(at + 1).trim();
    return isIpv4(ip) ? ip : undefined;
}

export function usernameOf(identity: Identity): string {
    const at = identity.indexOf("@");
    return at === -1 ? identity : identity.slice(0, at);
}

export function makeIdentity(username: string, ip: string): Identity {
    if (!username || /[@|\s]/.test(username)) {
        throw new LsnpError("INVALID_IDENTITY", `Invalid username: ${JSON.stringify(username)}`);
    }
    if (!isIpv4(ip)) {
        throw new LsnpError("INVALID_IDENTITY", `Invalid IPv4 address: ${ip}`);
    }
    return `${username}@${ip}`;
}

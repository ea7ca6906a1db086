import { DEFAULT_DEDUP_CAPACITY, DEFAULT_TOKEN_TTL, LsnpError, isIpv4, makeIdentity } from "@lsnp/core";
import { detectLocalIp } from "./transport";

export const LSNP_PORT = 50999;

export interface PeerConfig {
    username: string;
    ip: string;
    displayName: string;
    status: string;
    port: number;
    verbose: boolean;
    tokenTtl: number;          // seconds
    ackTimeoutMs: number;
    ackRetries: number;
    dedupCapacity: number;
    peerTtlMs: number;
    offerTimeoutMs: number;
    receiptTimeoutMs: number;
    chunkSize: number;
    downloadDir: string;
    pingIntervalMs: number;
}

export const DEFAULT_CONFIG: Omit<PeerConfig, "username" | "ip" | "displayName"> = {
    status: "Exploring LSNP!",
    port: LSNP_PORT,
    verbose: false,
    tokenTtl: DEFAULT_TOKEN_TTL,
    ackTimeoutMs: 2000,
    ackRetries: 3,
    dedupCapacity: DEFAULT_DEDUP_CAPACITY,
    peerTtlMs: 60_000,
    offerTimeoutMs: 30_000,
    receiptTimeoutMs: 60_000,
    chunkSize: 1024,
    downloadDir: "downloads",
    pingIntervalMs: 300_000,
};

function parseIntEnv(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number, max?: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === "") return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || (max !== undefined && value > max)) {
        const range = max === undefined ? `>= ${min}` : `${min}-${max}`;
        throw new LsnpError("INVALID_CONFIG", `${key} must be an integer ${range}, got ${JSON.stringify(raw)}`, {
            key,
            value: raw,
        });
    }
    return value;
}

function parseBoolEnv(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
    const raw = env[key]?.trim().toLowerCase();
    if (!raw) return fallback;
    if (["1", "true", "yes", "on"].includes(raw)) return true;
    if (["0", "false", "no", "off"].includes(raw)) return false;
    throw new LsnpError("INVALID_CONFIG", `${key} must be a boolean, got ${JSON.stringify(env[key])}`, { key });
}

/** Builds a full config from LSNP_* environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PeerConfig {
    const username = env.LSNP_USERNAME?.trim() || "user";
    const ip = env.LSNP_IP?.trim() || detectLocalIp();
    if (!isIpv4(ip)) {
        throw new LsnpError("INVALID_CONFIG", `LSNP_IP must be an IPv4 address, got ${JSON.stringify(ip)}`, { key: "LSNP_IP" });
    }
    try {
        makeIdentity(username, ip);
    } catch (e) {
        throw new LsnpError("INVALID_CONFIG", `LSNP_USERNAME is not usable: ${e instanceof Error ? e.message : String(e)}`, {
            key: "LSNP_USERNAME",
        });
    }

    return {
        username,
        ip,
        displayName: env.LSNP_DISPLAY_NAME?.trim() || username,
        status: env.LSNP_STATUS?.trim() || DEFAULT_CONFIG.status,
        port: parseIntEnv(env, "LSNP_PORT", DEFAULT_CONFIG.port, 1, 65535),
        verbose: parseBoolEnv(env, "LSNP_VERBOSE", DEFAULT_CONFIG.verbose),
        tokenTtl: parseIntEnv(env, "LSNP_TOKEN_TTL", DEFAULT_CONFIG.tokenTtl, 1),
        ackTimeoutMs: parseIntEnv(env, "LSNP_ACK_TIMEOUT_MS", DEFAULT_CONFIG.ackTimeoutMs, 1),
        ackRetries: parseIntEnv(env, "LSNP_ACK_RETRIES", DEFAULT_CONFIG.ackRetries, 1),
        dedupCapacity: parseIntEnv(env, "LSNP_DEDUP_CAPACITY", DEFAULT_CONFIG.dedupCapacity, 1),
        peerTtlMs: parseIntEnv(env, "LSNP_PEER_TTL_MS", DEFAULT_CONFIG.peerTtlMs, 1),
        offerTimeoutMs: parseIntEnv(env, "LSNP_OFFER_TIMEOUT_MS", DEFAULT_CONFIG.offerTimeoutMs, 1),
        receiptTimeoutMs: parseIntEnv(env, "LSNP_RECEIPT_TIMEOUT_MS", DEFAULT_CONFIG.receiptTimeoutMs, 1),
        chunkSize: parseIntEnv(env, "LSNP_CHUNK_SIZE", DEFAULT_CONFIG.chunkSize, 1),
        downloadDir: env.LSNP_DOWNLOAD_DIR?.trim() || DEFAULT_CONFIG.downloadDir,
        pingIntervalMs: parseIntEnv(env, "LSNP_PING_INTERVAL_MS", DEFAULT_CONFIG.pingIntervalMs, 1),
    };
}

/** Config for a peer with explicit identity parts, used by tests and examples. */
export function createConfig(username: string, ip: string, overrides: Partial<PeerConfig> = {}): PeerConfig {
    makeIdentity(username, ip);
    return { ...DEFAULT_CONFIG, username, ip, displayName: username, ...overrides };
}

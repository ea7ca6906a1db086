import {
    FileId,
    FileOffer,
    GameId,
    GameInvite,
    GameMove,
    GameSession,
    Identity,
    PlayerSymbol,
    usernameOf,
} from "@lsnp/core";

export interface PeerRecord {
    identity: Identity;
    ip: string;
    lastSeenMs: number;
    displayName: string;
    status: string;
}

export interface PeerProfile {
    displayName?: string;
    status?: string;
}

/** Known peers keyed by identity; liveness is judged against a fixed window. */
export class PeerDirectory {
    private peers = new Map<Identity, PeerRecord>();

    constructor(private readonly ttlMs: number) {}

    upsert(identity: Identity, ip: string, nowMs: number = Date.now(), profile: PeerProfile = {}): PeerRecord {
        const existing = this.peers.get(identity);
        const record: PeerRecord = {
            identity,
            ip,
            lastSeenMs: nowMs,
            displayName: profile.displayName ?? existing?.displayName ?? usernameOf(identity),
            status: profile.status ?? existing?.status ?? "",
        };
        this.peers.set(identity, record);
        return record;
    }

    get(identity: Identity): PeerRecord | undefined {
        return this.peers.get(identity);
    }

    resolveIp(identity: Identity): string | undefined {
        return this.peers.get(identity)?.ip;
    }

    active(nowMs: number = Date.now()): PeerRecord[] {
        return Array.from(this.peers.values()).filter(p => nowMs - p.lastSeenMs < this.ttlMs);
    }

    remove(identity: Identity): boolean {
        return this.peers.delete(identity);
    }

    get size(): number {
        return this.peers.size;
    }
}

// --- Game state ---

/** Game ids are only unique per pair of players, so sessions are keyed by opponent too. */
export type GameKey = string;

export function gameKey(opponent: Identity, gameId: GameId): GameKey {
    return `${opponent}/${gameId}`;
}

export interface GameRecord {
    session: GameSession;
    localSymbol: PlayerSymbol;
    opponent: Identity;
    /** Last outgoing frame that was never acknowledged; resend() retransmits it. */
    pendingMove?: GameInvite | GameMove;
}

export interface PendingInvite {
    gameId: GameId;
    from: Identity;
    inviterSymbol: PlayerSymbol;
    receivedAtMs: number;
}

// --- File state ---

export type OutgoingState = "offered" | "accepted" | "sending" | "sent";

export interface OutgoingTransfer {
    fileId: FileId;
    recipient: Identity;
    path: string;
    filename: string;
    filesize: number;
    totalChunks: number;
    chunkSize: number;
    token: string;
    digest: string;
    state: OutgoingState;
    timer?: NodeJS.Timeout;
}

export interface IncomingOffer {
    offer: FileOffer;
    receivedAtMs: number;
}

export interface IncomingTransfer {
    fileId: FileId;
    sender: Identity;
    filename: string;
    filesize: number;
    totalChunks: number;
    chunks: Map<number, Buffer>;
}

/**
 * Map-backed store owned by one manager. Handlers and user operations only
 * reach records through these methods, so each mutation is a single step.
 */
export class RecordStore<K, V> {
    private records = new Map<K, V>();

    get(key: K): V | undefined {
        return this.records.get(key);
    }

    has(key: K): boolean {
        return this.records.has(key);
    }

    put(key: K, value: V): void {
        this.records.set(key, value);
    }

    /** Removes and returns the record, so a finisher claims it exactly once. */
    take(key: K): V | undefined {
        const value = this.records.get(key);
        if (value !== undefined) this.records.delete(key);
        return value;
    }

    list(): V[] {
        return Array.from(this.records.values());
    }

    get size(): number {
        return this.records.size;
    }
}

import type {
    Board,
    DirectMessage,
    Endpoint,
    FileId,
    GameId,
    GameResultKind,
    Identity,
    Logger,
    LsnpMessage,
    PlayerSymbol,
    TokenAuthority,
    TokenString,
} from "@lsnp/core";
import type { PeerConfig } from "./config";
import type { Outbox } from "./outbox";
import type { PeerDirectory, PeerRecord } from "./state";

export interface GameInviteEvent {
    gameId: GameId;
    from: Identity;
    /** Symbol the local player would hold. */
    symbol: PlayerSymbol;
    openingPosition?: number;
    board: Board;
}

export interface GameMoveEvent {
    gameId: GameId;
    from: Identity;
    symbol: PlayerSymbol;
    position: number;
    turn: number;
    board: Board;
}

export interface GameOverEvent {
    gameId: GameId;
    opponent: Identity;
    /** Outcome from the local player's side. */
    result: GameResultKind;
    winningLine?: [number, number, number];
    board?: Board;
}

export interface FileOfferEvent {
    fileId: FileId;
    from: Identity;
    filename: string;
    filesize: number;
    totalChunks: number;
    description?: string;
}

export interface FileDoneEvent {
    fileId: FileId;
    peer: Identity;
    filename: string;
}

export interface FileReceivedEvent extends FileDoneEvent {
    path: string;
    size: number;
    digest: string;
}

export interface PeerEvents {
    message: [message: LsnpMessage, source: Endpoint];
    dm: [message: DirectMessage];
    peer: [record: PeerRecord];
    revoked: [token: TokenString, issuer: Identity];
    "game:invite": [event: GameInviteEvent];
    "game:move": [event: GameMoveEvent];
    "game:over": [event: GameOverEvent];
    "file:offer": [event: FileOfferEvent];
    "file:rejected": [event: FileDoneEvent];
    "file:timeout": [event: FileDoneEvent];
    "file:sent": [event: FileDoneEvent];
    "file:delivered": [event: FileDoneEvent];
    "file:unconfirmed": [event: FileDoneEvent];
    "file:received": [event: FileReceivedEvent];
}

export type PeerEmit = <K extends keyof PeerEvents>(event: K, ...args: PeerEvents[K]) => void;

/** Shared collaborators handed to every service of a peer. */
export interface PeerContext {
    identity: Identity;
    config: PeerConfig;
    tokens: TokenAuthority;
    directory: PeerDirectory;
    outbox: Outbox;
    emit: PeerEmit;
    logger: (tag: string) => Logger;
}

export type Identity = string;      // "username@ipv4", routing key and spoof-check input
export type MessageId = string;     // 8 lowercase hex chars
export type FileId = string;        // 8 lowercase hex chars
export type GameId = string;        // "g<0..255>"
export type TokenString = string;   // "identity|expiry|scope"
export type UnixSeconds = number;

export type Clock = () => UnixSeconds;

export const SCOPES = ["chat", "broadcast", "follow", "file", "game", "group"] as const;
export type Scope = (typeof SCOPES)[number];

export interface Token {
    identity: Identity;
    expiry: UnixSeconds;
    scope: Scope;
}

export type TokenFailure = "malformed" | "expired" | "scope_mismatch" | "revoked";

export type TokenCheck =
    | { ok: true; reason: "ok" }
    | { ok: false; reason: TokenFailure };

export type PlayerSymbol = "X" | "O";
export type Cell = PlayerSymbol | null;
export type Board = Cell[]; // always 9 slots, row-major

export type GameResultKind = "WIN" | "LOSS" | "DRAW" | "FORFEIT";

export interface Endpoint {
    ip: string;
    port: number;
}

export type Fields = Record<string, string>;

// --- Message variants ---

export interface Ping {
    type: "PING";
    userId: Identity;
}

export interface Profile {
    type: "PROFILE";
    userId: Identity;
    displayName: string;
    status?: string;
    avatarType?: string;
    avatarEncoding?: string;
    avatarData?: string;
}

export interface Ack {
    type: "ACK";
    messageId: MessageId;
    status: string;
}

export interface Revoke {
    type: "REVOKE";
    token: TokenString;
    from?: Identity;
    messageId?: MessageId;
}

export interface DirectMessage {
    type: "DM";
    from: Identity;
    to: Identity;
    content: string;
    messageId: MessageId;
    token: TokenString;
    timestamp?: UnixSeconds;
}

export interface GameInvite {
    type: "TICTACTOE_INVITE";
    from: Identity;
    to: Identity;
    gameId: GameId;
    symbol: PlayerSymbol;
    messageId: MessageId;
    token: TokenString;
    position?: number; // inviter's opening move, only when inviting as X
    turn?: number;
    timestamp?: UnixSeconds;
}

export interface GameMove {
    type: "TICTACTOE_MOVE";
    from: Identity;
    to: Identity;
    gameId: GameId;
    symbol: PlayerSymbol;
    position: number;
    turn: number;
    messageId: MessageId;
    token: TokenString;
    timestamp?: UnixSeconds;
}

export interface GameResult {
    type: "TICTACTOE_RESULT";
    from: Identity;
    to: Identity;
    gameId: GameId;
    result: GameResultKind;
    symbol: PlayerSymbol;
    messageId: MessageId;
    token: TokenString;
    winningLine?: [number, number, number];
    timestamp?: UnixSeconds;
}

export interface FileOffer {
    type: "FILE_OFFER";
    from: Identity;
    to: Identity;
    filename: string;
    filesize: number;
    fileId: FileId;
    totalChunks: number;
    chunkSize: number;
    messageId: MessageId;
    token: TokenString;
    filetype?: string;
    description?: string;
    timestamp?: UnixSeconds;
}

export interface FileAccept {
    type: "FILE_ACCEPT";
    from: Identity;
    to: Identity;
    fileId: FileId;
    messageId: MessageId;
    token: TokenString;
    timestamp?: UnixSeconds;
}

export interface FileReject {
    type: "FILE_REJECT";
    from: Identity;
    to: Identity;
    fileId: FileId;
    messageId: MessageId;
    token: TokenString;
    timestamp?: UnixSeconds;
}

export interface FileChunk {
    type: "FILE_CHUNK";
    from: Identity;
    to: Identity;
    fileId: FileId;
    chunkIndex: number;
    totalChunks: number;
    data: string; // base64
    messageId: MessageId;
    token: TokenString;
    chunkSize?: number;
    timestamp?: UnixSeconds;
}

export interface FileReceived {
    type: "FILE_RECEIVED";
    from: Identity;
    to: Identity;
    fileId: FileId;
    status: string;
    messageId?: MessageId;
    timestamp?: UnixSeconds;
}

export const PASSTHROUGH_TYPES = [
    "POST",
    "LIKE",
    "FOLLOW",
    "UNFOLLOW",
    "GROUP_CREATE",
    "GROUP_UPDATE",
    "GROUP_MESSAGE",
] as const;
export type PassthroughType = (typeof PASSTHROUGH_TYPES)[number];

// Social and group traffic handled by collaborators outside the core
export interface PassthroughMessage {
    type: PassthroughType;
    sender: Identity;
    token: TokenString;
    messageId?: MessageId;
    fields: Fields;
}

export type LsnpMessage =
    | Ping
    | Profile
    | Ack
    | Revoke
    | DirectMessage
    | GameInvite
    | GameMove
    | GameResult
    | FileOffer
    | FileAccept
    | FileReject
    | FileChunk
    | FileReceived
    | PassthroughMessage;

export type MessageType = LsnpMessage["type"];

export type MessageOf<T extends MessageType> = Extract<LsnpMessage, { type: T }>;

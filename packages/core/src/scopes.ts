import { LsnpMessage, MessageType, Scope } from "./types";

/**
 * Token scope required per message type. null means the type carries no
 * token and skips validation (presence, acks, revocations, receipts).
 */
export const EXPECTED_SCOPE: Record<MessageType, Scope | null> = {
    PING: null,
    PROFILE: null,
    ACK: null,
    REVOKE: null,
    POST: "broadcast",
    LIKE: "broadcast",
    FOLLOW: "follow",
    UNFOLLOW: "follow",
    DM: "chat",
    GROUP_CREATE: "group",
    GROUP_UPDATE: "group",
    GROUP_MESSAGE: "group",
    TICTACTOE_INVITE: "game",
    TICTACTOE_MOVE: "game",
    TICTACTOE_RESULT: "game",
    FILE_OFFER: "file",
    FILE_ACCEPT: "file",
    FILE_REJECT: "file",
    FILE_CHUNK: "file",
    FILE_RECEIVED: null,
};

// Types the router acknowledges on receipt and senders retry until acknowledged
export const RELIABLE_TYPES: ReadonlySet<MessageType> = new Set<MessageType>([
    "DM",
    "TICTACTOE_INVITE",
    "TICTACTOE_MOVE",
    "TICTACTOE_RESULT",
    "FILE_OFFER",
    "FILE_CHUNK",
]);

export function isReliable(type: MessageType): boolean {
    return RELIABLE_TYPES.has(type);
}

/** The identity a message claims to come from, if it declares one. */
export function senderOf(message: LsnpMessage): string | undefined {
    switch (message.type) {
        case "PING":
        case "PROFILE":
            return message.userId;
        case "ACK":
            return undefined;
        case "REVOKE":
            return message.from;
        case "POST":
        case "LIKE":
        case "FOLLOW":
        case "UNFOLLOW":
        case "GROUP_CREATE":
        case "GROUP_UPDATE":
        case "GROUP_MESSAGE":
            return message.sender;
        default:
            return message.from;
    }
}

export function tokenOf(message: LsnpMessage): string | undefined {
    return "token" in message ? message.token : undefined;
}

export function messageIdOf(message: LsnpMessage): string | undefined {
    return "messageId" in message ? message.messageId : undefined;
}

import { z } from "zod";
import {
    Fields,
    LsnpMessage,
    MessageType,
    PASSTHROUGH_TYPES,
    PassthroughType,
} from "./types";

const text = z.string().min(1);
const identity = z.string().min(1).regex(/^[^|\s]+$/, "identity must not contain '|' or whitespace");
const uint = z.string().regex(/^\d+$/, "expected a non-negative integer").transform(Number);
const cell = uint.refine(n => n <= 8, "position must be 0-8");
const symbol = z.enum(["X", "O"]);
const base64 = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, "expected base64");
const winningLine = z
    .string()
    .regex(/^[0-8],[0-8],[0-8]$/, "expected three comma-separated cells")
    .transform((v): [number, number, number] => {
        const [a, b, c] = v.split(",").map(Number);
        return [a, b, c];
    });

const optionalTimestamp = { TIMESTAMP: uint.optional() };

const schemas = {
    PING: z.object({ USER_ID: identity }).transform(f => ({
        type: "PING" as const,
        userId: f.USER_ID,
    })),
    PROFILE: z
        .object({
            USER_ID: identity,
            DISPLAY_NAME: text,
            STATUS: z.string().optional(),
            AVATAR_TYPE: z.string().optional(),
            AVATAR_ENCODING: z.string().optional(),
            AVATAR_DATA: z.string().optional(),
        })
        .transform(f => ({
            type: "PROFILE" as const,
            userId: f.USER_ID,
            displayName: f.DISPLAY_NAME,
            status: f.STATUS,
            avatarType: f.AVATAR_TYPE,
            avatarEncoding: f.AVATAR_ENCODING,
            avatarData: f.AVATAR_DATA,
        })),
    ACK: z.object({ MESSAGE_ID: text, STATUS: text }).transform(f => ({
        type: "ACK" as const,
        messageId: f.MESSAGE_ID,
        status: f.STATUS,
    })),
    REVOKE: z
        .object({ TOKEN: text, FROM: identity.optional(), MESSAGE_ID: text.optional() })
        .transform(f => ({
            type: "REVOKE" as const,
            token: f.TOKEN,
            from: f.FROM,
            messageId: f.MESSAGE_ID,
        })),
    DM: z
        .object({
            FROM: identity,
            TO: identity,
            CONTENT: text,
            MESSAGE_ID: text,
            TOKEN: text,
            ...optionalTimestamp,
        })
        .transform(f => ({
            type: "DM" as const,
            from: f.FROM,
            to: f.TO,
            content: f.CONTENT,
            messageId: f.MESSAGE_ID,
            token: f.TOKEN,
            timestamp: f.TIMESTAMP,
        })),
    TICTACTOE_INVITE: z
        .object({
            FROM: identity,
            TO: identity,
            GAMEID: text,
            SYMBOL: symbol,
            MESSAGE_ID: text,
            TOKEN: text,
            POSITION: cell.optional(),
            TURN: uint.optional(),
            ...optionalTimestamp,
        })
        .transform(f => ({
            type: "TICTACTOE_INVITE" as const,
            from: f.FROM,
            to: f.TO,
            gameId: f.GAMEID,
            symbol: f.SYMBOL,
            messageId: f.MESSAGE_ID,
            token: f.TOKEN,
            position: f.POSITION,
            turn: f.TURN,
            timestamp: f.TIMESTAMP,
        })),
    TICTACTOE_MOVE: z
        .object({
            FROM: identity,
            TO: identity,
            GAMEID: text,
            SYMBOL: symbol,
            POSITION: cell,
            TURN: uint,
            MESSAGE_ID: text,
            TOKEN: text,
            ...optionalTimestamp,
        })
        .transform(f => ({
            type: "TICTACTOE_MOVE" as const,
            from: f.FROM,
            to: f.TO,
            gameId: f.GAMEID,
            symbol: f.SYMBOL,
            position: f.POSITION,
            turn: f.TURN,
            messageId: f.MESSAGE_ID,
            token: f.TOKEN,
            timestamp: f.TIMESTAMP,
        })),
    TICTACTOE_RESULT: z
        .object({
            FROM: identity,
            TO: identity,
            GAMEID: text,
            RESULT: z.enum(["WIN", "LOSS", "DRAW", "FORFEIT"]),
            SYMBOL: symbol,
            MESSAGE_ID: text,
            TOKEN: text,
            WINNING_LINE: winningLine.optional(),
            ...optionalTimestamp,
        })
        .transform(f => ({
            type: "TICTACTOE_RESULT" as const,
            from: f.FROM,
            to: f.TO,
            gameId: f.GAMEID,
            result: f.RESULT,
            symbol: f.SYMBOL,
            messageId: f.MESSAGE_ID,
            token: f.TOKEN,
            winningLine: f.WINNING_LINE,
            timestamp: f.TIMESTAMP,
        })),
    FILE_OFFER: z
        .object({
            FROM: identity,
            TO: identity,
            FILENAME: text,
            FILESIZE: uint,
            FILEID: text,
            TOTAL_CHUNKS: uint.refine(n => n >= 1, "TOTAL_CHUNKS must be at least 1"),
            CHUNK_SIZE: uint.refine(n => n >= 1, "CHUNK_SIZE must be at least 1"),
            MESSAGE_ID: text,
            TOKEN: text,
            FILETYPE: z.string().optional(),
            DESCRIPTION: z.string().optional(),
            ...optionalTimestamp,
        })
        .transform(f => ({
            type: "FILE_OFFER" as const,
            from: f.FROM,
            to: f.TO,
            filename: f.FILENAME,
            filesize: f.FILESIZE,
            fileId: f.FILEID,
            totalChunks: f.TOTAL_CHUNKS,
            chunkSize: f.CHUNK_SIZE,
            messageId: f.MESSAGE_ID,
            token: f.TOKEN,
            filetype: f.FILETYPE,
            description: f.DESCRIPTION,
            timestamp: f.TIMESTAMP,
        })),
    FILE_ACCEPT: z
        .object({ FROM: identity, TO: identity, FILEID: text, MESSAGE_ID: text, TOKEN: text, ...optionalTimestamp })
        .transform(f => ({
            type: "FILE_ACCEPT" as const,
            from: f.FROM,
            to: f.TO,
            fileId: f.FILEID,
            messageId: f.MESSAGE_ID,
            token: f.TOKEN,
            timestamp: f.TIMESTAMP,
        })),
    FILE_REJECT: z
        .object({ FROM: identity, TO: identity, FILEID: text, MESSAGE_ID: text, TOKEN: text, ...optionalTimestamp })
        .transform(f => ({
            type: "FILE_REJECT" as const,
            from: f.FROM,
            to: f.TO,
            fileId: f.FILEID,
            messageId: f.MESSAGE_ID,
            token: f.TOKEN,
            timestamp: f.TIMESTAMP,
        })),
    FILE_CHUNK: z
        .object({
            FROM: identity,
            TO: identity,
            FILEID: text,
            CHUNK_INDEX: uint,
            TOTAL_CHUNKS: uint,
            DATA: base64,
            MESSAGE_ID: text,
            TOKEN: text,
            CHUNK_SIZE: uint.optional(),
            ...optionalTimestamp,
        })
        .transform(f => ({
            type: "FILE_CHUNK" as const,
            from: f.FROM,
            to: f.TO,
            fileId: f.FILEID,
            chunkIndex: f.CHUNK_INDEX,
            totalChunks: f.TOTAL_CHUNKS,
            data: f.DATA,
            messageId: f.MESSAGE_ID,
            token: f.TOKEN,
            chunkSize: f.CHUNK_SIZE,
            timestamp: f.TIMESTAMP,
        })),
    FILE_RECEIVED: z
        .object({ FROM: identity, TO: identity, FILEID: text, STATUS: text, MESSAGE_ID: text.optional(), ...optionalTimestamp })
        .transform(f => ({
            type: "FILE_RECEIVED" as const,
            from: f.FROM,
            to: f.TO,
            fileId: f.FILEID,
            status: f.STATUS,
            messageId: f.MESSAGE_ID,
            timestamp: f.TIMESTAMP,
        })),
};

type TypedSchemaKey = keyof typeof schemas;

const passthroughSchema = z.object({
    TOKEN: text,
    MESSAGE_ID: text.optional(),
});

// POST identifies its author with USER_ID, the other pass-through types with FROM
function passthroughSenderField(type: PassthroughType): "USER_ID" | "FROM" {
    return type === "POST" ? "USER_ID" : "FROM";
}

export type Decoded =
    | { ok: true; message: LsnpMessage }
    | { ok: false; reason: string };

function isTypedKey(type: string): type is TypedSchemaKey {
    return Object.prototype.hasOwnProperty.call(schemas, type);
}

function isPassthrough(type: string): type is PassthroughType {
    return (PASSTHROUGH_TYPES as readonly string[]).includes(type);
}

function describe(error: z.ZodError): string {
    return error.issues.map(i => `${i.path.join(".") || "frame"}: ${i.message}`).join("; ");
}

/** Validates a parsed frame into its typed variant; required fields are enforced here. */
export function decodeMessage(fields: Fields): Decoded {
    const type = fields.TYPE;
    if (!type) return { ok: false, reason: "missing TYPE" };

    if (isTypedKey(type)) {
        const schema: z.ZodType<LsnpMessage, z.ZodTypeDef, unknown> = schemas[type];
        const parsed = schema.safeParse(fields);
        if (!parsed.success) return { ok: false, reason: `${type}: ${describe(parsed.error)}` };
        return { ok: true, message: parsed.data };
    }

    if (isPassthrough(type)) {
        const senderField = passthroughSenderField(type);
        const sender = fields[senderField];
        if (!sender) return { ok: false, reason: `${type}: ${senderField}: Required` };
        const parsed = passthroughSchema.safeParse(fields);
        if (!parsed.success) return { ok: false, reason: `${type}: ${describe(parsed.error)}` };
        return {
            ok: true,
            message: {
                type,
                sender,
                token: parsed.data.TOKEN,
                messageId: parsed.data.MESSAGE_ID,
                fields: { ...fields },
            },
        };
    }

    return { ok: false, reason: `unknown TYPE ${type}` };
}

function put(fields: Fields, key: string, value: string | number | undefined): void {
    if (value !== undefined) fields[key] = String(value);
}

/** Inverse of decodeMessage: typed variant to ordered wire fields. */
export function encodeMessage(message: LsnpMessage): Fields {
    const f: Fields = { TYPE: message.type };
    switch (message.type) {
        case "PING":
            put(f, "USER_ID", message.userId);
            break;
        case "PROFILE":
            put(f, "USER_ID", message.userId);
            put(f, "DISPLAY_NAME", message.displayName);
            put(f, "STATUS", message.status);
            put(f, "AVATAR_TYPE", message.avatarType);
            put(f, "AVATAR_ENCODING", message.avatarEncoding);
            put(f, "AVATAR_DATA", message.avatarData);
            break;
        case "ACK":
            put(f, "MESSAGE_ID", message.messageId);
            put(f, "STATUS", message.status);
            break;
        case "REVOKE":
            put(f, "FROM", message.from);
            put(f, "TOKEN", message.token);
            put(f, "MESSAGE_ID", message.messageId);
            break;
        case "DM":
            put(f, "FROM", message.from);
            put(f, "TO", message.to);
            put(f, "CONTENT", message.content);
            put(f, "TIMESTAMP", message.timestamp);
            put(f, "MESSAGE_ID", message.messageId);
            put(f, "TOKEN", message.token);
            break;
        case "TICTACTOE_INVITE":
            put(f, "FROM", message.from);
            put(f, "TO", message.to);
            put(f, "GAMEID", message.gameId);
            put(f, "MESSAGE_ID", message.messageId);
            put(f, "SYMBOL", message.symbol);
            put(f, "POSITION", message.position);
            put(f, "TURN", message.turn);
            put(f, "TIMESTAMP", message.timestamp);
            put(f, "TOKEN", message.token);
            break;
        case "TICTACTOE_MOVE":
            put(f, "FROM", message.from);
            put(f, "TO", message.to);
            put(f, "GAMEID", message.gameId);
            put(f, "MESSAGE_ID", message.messageId);
            put(f, "POSITION", message.position);
            put(f, "SYMBOL", message.symbol);
            put(f, "TURN", message.turn);
            put(f, "TIMESTAMP", message.timestamp);
            put(f, "TOKEN", message.token);
            break;
        case "TICTACTOE_RESULT":
            put(f, "FROM", message.from);
            put(f, "TO", message.to);
            put(f, "GAMEID", message.gameId);
            put(f, "MESSAGE_ID", message.messageId);
            put(f, "RESULT", message.result);
            put(f, "SYMBOL", message.symbol);
            put(f, "WINNING_LINE", message.winningLine?.join(","));
            put(f, "TIMESTAMP", message.timestamp);
            put(f, "TOKEN", message.token);
            break;
        case "FILE_OFFER":
            put(f, "FROM", message.from);
            put(f, "TO", message.to);
            put(f, "FILENAME", message.filename);
            put(f, "FILESIZE", message.filesize);
            put(f, "FILETYPE", message.filetype);
            put(f, "FILEID", message.fileId);
            put(f, "DESCRIPTION", message.description);
            put(f, "TIMESTAMP", message.timestamp);
            put(f, "TOKEN", message.token);
            put(f, "TOTAL_CHUNKS", message.totalChunks);
            put(f, "CHUNK_SIZE", message.chunkSize);
            put(f, "MESSAGE_ID", message.messageId);
            break;
        case "FILE_ACCEPT":
        case "FILE_REJECT":
            put(f, "FROM", message.from);
            put(f, "TO", message.to);
            put(f, "FILEID", message.fileId);
            put(f, "TIMESTAMP", message.timestamp);
            put(f, "MESSAGE_ID", message.messageId);
            put(f, "TOKEN", message.token);
            break;
        case "FILE_CHUNK":
            put(f, "FROM", message.from);
            put(f, "TO", message.to);
            put(f, "FILEID", message.fileId);
            put(f, "CHUNK_INDEX", message.chunkIndex);
            put(f, "TOTAL_CHUNKS", message.totalChunks);
            put(f, "CHUNK_SIZE", message.chunkSize);
            put(f, "DATA", message.data);
            put(f, "TOKEN", message.token);
            put(f, "MESSAGE_ID", message.messageId);
            put(f, "TIMESTAMP", message.timestamp);
            break;
        case "FILE_RECEIVED":
            put(f, "FROM", message.from);
            put(f, "TO", message.to);
            put(f, "FILEID", message.fileId);
            put(f, "STATUS", message.status);
            put(f, "TIMESTAMP", message.timestamp);
            put(f, "MESSAGE_ID", message.messageId);
            break;
        default: {
            // Pass-through types keep their received fields; sender and auth fields are reasserted
            const passthrough: Fields = { TYPE: message.type, ...message.fields };
            passthrough[passthroughSenderField(message.type)] = message.sender;
            passthrough.TOKEN = message.token;
            put(passthrough, "MESSAGE_ID", message.messageId);
            return passthrough;
        }
    }
    return f;
}

export function isKnownType(type: string): type is MessageType {
    return isTypedKey(type) || isPassthrough(type);
}

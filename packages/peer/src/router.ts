import {
    DedupCache,
    EXPECTED_SCOPE,
    Endpoint,
    Logger,
    LsnpMessage,
    MessageOf,
    MessageType,
    Revoke,
    TokenFailure,
    decodeMessage,
    extractIp,
    isReliable,
    messageIdOf,
    parseFrame,
    parseToken,
    senderOf,
    tokenOf,
} from "@lsnp/core";
import { AckRegistry } from "./ack";
import { PeerContext } from "./context";

export type DropReason =
    | "unparseable"
    | "invalid_message"
    | "own_message"
    | "revoke_malformed"
    | "revoke_expired"
    | "revoke_ip_mismatch"
    | "ip_mismatch"
    | "missing_token"
    | "token_owner_mismatch"
    | TokenFailure;

export type RouteOutcome =
    | { kind: "dispatched"; type: MessageType }
    | { kind: "duplicate"; type: MessageType }
    | { kind: "ack"; messageId: string }
    | { kind: "revoked"; token: string }
    | { kind: "dropped"; reason: DropReason; type?: MessageType };

export type Handler<T extends MessageType> = (message: MessageOf<T>, source: Endpoint) => void | Promise<void>;

type AnyHandler = (message: LsnpMessage, source: Endpoint) => void | Promise<void>;

function isType<T extends MessageType>(message: LsnpMessage, type: T): message is MessageOf<T> {
    return message.type === type;
}

/**
 * Inbound pipeline: decode, authorise, dedup, acknowledge and dispatch one
 * datagram. Each stage either passes the message on or ends the route with
 * an outcome.
 */
export class Router {
    private handlers = new Map<MessageType, AnyHandler>();
    private log: Logger;

    constructor(
        private readonly ctx: PeerContext,
        private readonly acks: AckRegistry,
        private readonly dedup: DedupCache
    ) {
        this.log = ctx.logger("router");
    }

    on<T extends MessageType>(type: T, handler: Handler<T>): void {
        this.handlers.set(type, (message, source) => {
            if (isType(message, type)) return handler(message, source);
        });
    }

    private drop(reason: DropReason, message?: LsnpMessage, detail = ""): RouteOutcome {
        const type = message?.type;
        this.log.debug(`DROP ${type ?? "frame"}: ${reason}${detail ? ` (${detail})` : ""}`);
        return { kind: "dropped", reason, type };
    }

    async route(raw: string, source: Endpoint): Promise<RouteOutcome> {
        const fields = parseFrame(raw);
        if (!fields) return this.drop("unparseable");

        const decoded = decodeMessage(fields);
        if (!decoded.ok) return this.drop("invalid_message", undefined, decoded.reason);
        const message = decoded.message;

        if (message.type === "ACK") {
            const resolved = this.acks.resolve(message.messageId);
            this.log.debug(`< ACK ${message.messageId}${resolved ? "" : " (no waiter)"}`);
            return { kind: "ack", messageId: message.messageId };
        }

        if (message.type === "REVOKE") {
            return this.handleRevoke(message, source);
        }

        const sender = senderOf(message);
        if (sender === undefined) return this.drop("invalid_message", message);
        if (sender === this.ctx.identity) return this.drop("own_message", message);

        const token = tokenOf(message);
        const declaredIp = extractIp(sender);
        if (declaredIp !== undefined && declaredIp !== source.ip) {
            if (token !== undefined) {
                return this.drop("ip_mismatch", message, `${sender} from ${source.ip}`);
            }
            this.log.debug(`${message.type} from ${sender} arrived from ${source.ip}`);
        }

        const scope = EXPECTED_SCOPE[message.type];
        if (scope !== null) {
            if (token === undefined) return this.drop("missing_token", message);
            const check = this.ctx.tokens.validate(token, scope);
            if (!check.ok) return this.drop(check.reason, message);
            if (parseToken(token)?.identity !== sender) {
                return this.drop("token_owner_mismatch", message, sender);
            }
        }

        const messageId = messageIdOf(message);
        const reliable = isReliable(message.type);
        if (messageId !== undefined && this.dedup.check(messageId)) {
            this.log.debug(`Duplicate ${message.type} ${messageId}`);
            if (reliable) await this.ctx.outbox.sendAck(messageId, source.ip);
            return { kind: "duplicate", type: message.type };
        }

        // Presence frames update the directory in their own handlers
        if (message.type !== "PING" && message.type !== "PROFILE") {
            this.ctx.directory.upsert(sender, source.ip);
        }

        if (reliable && messageId !== undefined) {
            await this.ctx.outbox.sendAck(messageId, source.ip);
        }

        this.log.debug(`< ${message.type} from ${sender}`);
        const handler = this.handlers.get(message.type);
        if (handler) {
            await handler(message, source);
        } else {
            this.ctx.emit("message", message, source);
        }
        return { kind: "dispatched", type: message.type };
    }

    private handleRevoke(message: Revoke, source: Endpoint): RouteOutcome {
        if (this.dedup.check(message.messageId ?? `revoke:${message.token}`)) {
            return { kind: "duplicate", type: "REVOKE" };
        }
        const parsed = parseToken(message.token);
        if (!parsed) return this.drop("revoke_malformed", message);
        if (parsed.identity === this.ctx.identity) return this.drop("own_message", message);
        if (this.ctx.tokens.now() > parsed.expiry) return this.drop("revoke_expired", message);
        if (message.from !== undefined && message.from !== parsed.identity) {
            return this.drop("token_owner_mismatch", message, message.from);
        }
        const issuerIp = extractIp(parsed.identity);
        if (issuerIp !== undefined && issuerIp !== source.ip) {
            return this.drop("revoke_ip_mismatch", message, `${parsed.identity} from ${source.ip}`);
        }

        this.ctx.tokens.revoke(message.token);
        this.ctx.directory.remove(parsed.identity);
        this.log.info(`Token of ${parsed.identity} revoked (${parsed.scope})`);
        this.ctx.emit("revoked", message.token, parsed.identity);
        return { kind: "revoked", token: message.token };
    }
}

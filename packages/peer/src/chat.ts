import { DirectMessage, Identity, Logger, MessageId, randomId } from "@lsnp/core";
import { PeerContext } from "./context";

export type DmResult =
    | { ok: true; messageId: MessageId }
    | { ok: false; messageId?: MessageId; error: "invalid_content" | "not_acknowledged" };

export class ChatService {
    private log: Logger;

    constructor(private readonly ctx: PeerContext) {
        this.log = ctx.logger("dm");
    }

    async send(to: Identity, content: string): Promise<DmResult> {
        if (!content || /[\r\n]/.test(content)) return { ok: false, error: "invalid_content" };

        const message: DirectMessage = {
            type: "DM",
            from: this.ctx.identity,
            to,
            content,
            messageId: randomId(),
            token: this.ctx.tokens.mint("chat", this.ctx.config.tokenTtl),
            timestamp: this.ctx.tokens.now(),
        };
        if (!(await this.ctx.outbox.sendReliable(message, to))) {
            return { ok: false, messageId: message.messageId, error: "not_acknowledged" };
        }
        return { ok: true, messageId: message.messageId };
    }

    handle(message: DirectMessage): void {
        if (message.to !== this.ctx.identity) {
            this.log.debug(`DM addressed to ${message.to}, ignoring`);
            return;
        }
        this.log.info(`${message.from}: ${message.content}`);
        this.ctx.emit("dm", message);
    }
}

import {
    DirectMessage,
    FileChunk,
    FileOffer,
    GameInvite,
    GameMove,
    GameResult,
    Identity,
    Logger,
    LsnpMessage,
    MessageId,
    buildFrame,
    encodeMessage,
    extractIp,
} from "@lsnp/core";
import { AckRegistry } from "./ack";
import { PeerDirectory } from "./state";
import { Transport } from "./transport";

export type ReliableMessage = DirectMessage | GameInvite | GameMove | GameResult | FileOffer | FileChunk;

export interface OutboxOptions {
    port: number;
    ackTimeoutMs: number;
    ackRetries: number;
}

/**
 * Outgoing side of the peer: frames messages, resolves recipients to
 * addresses and runs the retry loop for reliable types.
 */
export class Outbox {
    constructor(
        private readonly transport: Transport,
        private readonly directory: PeerDirectory,
        private readonly acks: AckRegistry,
        private readonly options: OutboxOptions,
        private readonly log: Logger
    ) {}

    /** Directory ip first, then the ip embedded in the identity. */
    resolve(recipient: Identity): string | undefined {
        return this.directory.resolveIp(recipient) ?? extractIp(recipient);
    }

    async send(message: LsnpMessage, recipient: Identity): Promise<boolean> {
        const ip = this.resolve(recipient);
        if (!ip) {
            this.log.warn(`No address known for ${recipient}, ${message.type} not sent`);
            return false;
        }
        return this.transmit(message, ip);
    }

    async transmit(message: LsnpMessage, ip: string): Promise<boolean> {
        const frame = buildFrame(encodeMessage(message));
        const ok = await this.transport.send(frame, ip, this.options.port);
        if (ok) this.log.debug(`> ${message.type} to ${ip}`);
        return ok;
    }

    async broadcast(message: LsnpMessage): Promise<void> {
        await this.transport.broadcast(buildFrame(encodeMessage(message)), this.options.port);
        this.log.debug(`> ${message.type} broadcast`);
    }

    /**
     * Transmits until acknowledged, up to ackRetries attempts of ackTimeoutMs
     * each. Resolves false once the attempts are exhausted; the waiter is
     * dropped either way.
     */
    async sendReliable(message: ReliableMessage, recipient: Identity): Promise<boolean> {
        const { messageId } = message;
        const waiter = this.acks.register(messageId);
        try {
            for (let attempt = 1; attempt <= this.options.ackRetries; attempt++) {
                if (waiter.acknowledged) return true;
                const sent = await this.send(message, recipient);
                if (!sent) {
                    this.log.debug(`${message.type} ${messageId} transmit failed (attempt ${attempt})`);
                    continue;
                }
                if (await waiter.wait(this.options.ackTimeoutMs)) return true;
                this.log.debug(`No ACK for ${message.type} ${messageId} (attempt ${attempt}/${this.options.ackRetries})`);
            }
            this.log.warn(`${message.type} ${messageId} to ${recipient} not acknowledged after ${this.options.ackRetries} attempts`);
            return false;
        } finally {
            this.acks.abandon(messageId);
        }
    }

    sendAck(messageId: MessageId, ip: string): Promise<boolean> {
        return this.transmit({ type: "ACK", messageId, status: "RECEIVED" }, ip);
    }
}

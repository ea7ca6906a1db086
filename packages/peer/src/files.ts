import { mkdir, open, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import {
    FileAccept,
    FileChunk,
    FileId,
    FileOffer,
    FileReceived,
    FileReject,
    Identity,
    Logger,
    hashBytes,
    randomId,
} from "@lsnp/core";
import { PeerContext } from "./context";
import { IncomingOffer, IncomingTransfer, OutgoingTransfer, RecordStore } from "./state";

export type FileError = "file_not_found" | "not_acknowledged" | "unknown_file" | "send_failed";

export type FileOpResult = { ok: true; fileId: FileId } | { ok: false; fileId?: FileId; error: FileError };

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Chunked file transfer. The sender side moves offered -> accepted ->
 * sending -> sent and is discarded on reject, timeout or receipt; the
 * receiver side assembles once every index has arrived.
 */
export class FileTransferManager {
    readonly outgoing = new RecordStore<FileId, OutgoingTransfer>();
    readonly offers = new RecordStore<FileId, IncomingOffer>();
    readonly incoming = new RecordStore<FileId, IncomingTransfer>();
    private log: Logger;

    constructor(private readonly ctx: PeerContext) {
        this.log = ctx.logger("file");
    }

    // --- Sender ---

    async offer(recipient: Identity, filePath: string, description?: string): Promise<FileOpResult> {
        let filesize: number;
        try {
            const info = await stat(filePath);
            if (!info.isFile()) return { ok: false, error: "file_not_found" };
            filesize = info.size;
        } catch (e) {
            this.log.debug(`Cannot stat ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
            return { ok: false, error: "file_not_found" };
        }

        const chunkSize = this.ctx.config.chunkSize;
        const totalChunks = Math.max(1, Math.ceil(filesize / chunkSize));
        const fileId = randomId();
        const filename = path.basename(filePath);
        const token = this.ctx.tokens.mint("file", this.ctx.config.tokenTtl);
        const digest = hashBytes(await readFile(filePath));

        const message: FileOffer = {
            type: "FILE_OFFER",
            from: this.ctx.identity,
            to: recipient,
            filename,
            filesize,
            fileId,
            totalChunks,
            chunkSize,
            messageId: randomId(),
            token,
            filetype: "application/octet-stream",
            description,
            timestamp: this.ctx.tokens.now(),
        };

        // Registered before sending so an early FILE_ACCEPT finds the record
        const transfer: OutgoingTransfer = {
            fileId,
            recipient,
            path: filePath,
            filename,
            filesize,
            totalChunks,
            chunkSize,
            token,
            digest,
            state: "offered",
        };
        this.outgoing.put(fileId, transfer);
        this.log.info(`Offering ${filename} (${filesize} bytes, ${totalChunks} chunks, sha256 ${digest}) to ${recipient}`);

        if (!(await this.ctx.outbox.sendReliable(message, recipient))) {
            this.discard(transfer);
            return { ok: false, fileId, error: "not_acknowledged" };
        }

        if (transfer.state === "offered" && this.outgoing.get(fileId) === transfer) {
            transfer.timer = setTimeout(() => {
                if (this.outgoing.get(fileId) !== transfer || transfer.state !== "offered") return;
                this.discard(transfer);
                this.log.warn(`${recipient} did not accept ${filename} in time`);
                this.ctx.emit("file:timeout", { fileId, peer: recipient, filename });
            }, this.ctx.config.offerTimeoutMs);
        }
        return { ok: true, fileId };
    }

    private discard(transfer: OutgoingTransfer): void {
        clearTimeout(transfer.timer);
        transfer.timer = undefined;
        if (this.outgoing.get(transfer.fileId) === transfer) this.outgoing.take(transfer.fileId);
    }

    private outgoingFrom(fileId: FileId, from: Identity): OutgoingTransfer | undefined {
        const transfer = this.outgoing.get(fileId);
        if (!transfer) {
            this.log.debug(`No outgoing transfer ${fileId}`);
            return undefined;
        }
        if (transfer.recipient !== from) {
            this.log.debug(`Ignoring reply for ${fileId} from ${from}, expected ${transfer.recipient}`);
            return undefined;
        }
        return transfer;
    }

    handleAccept(message: FileAccept): void {
        const transfer = this.outgoingFrom(message.fileId, message.from);
        if (!transfer || transfer.state !== "offered") return;

        clearTimeout(transfer.timer);
        transfer.timer = undefined;
        transfer.state = "accepted";
        this.log.info(`${message.from} accepted ${transfer.filename}`);
        this.sendChunks(transfer).catch((e) => {
            this.log.error(`Transfer of ${transfer.filename} failed`, e);
            this.discard(transfer);
        });
    }

    handleReject(message: FileReject): void {
        const transfer = this.outgoingFrom(message.fileId, message.from);
        if (!transfer || transfer.state !== "offered") return;

        this.discard(transfer);
        this.log.info(`${message.from} rejected ${transfer.filename}`);
        this.ctx.emit("file:rejected", { fileId: transfer.fileId, peer: message.from, filename: transfer.filename });
    }

    handleReceived(message: FileReceived): void {
        const transfer = this.outgoingFrom(message.fileId, message.from);
        if (!transfer || transfer.state === "offered") return;

        this.discard(transfer);
        this.log.info(`${message.from} confirmed ${transfer.filename} (${message.status})`);
        this.ctx.emit("file:delivered", { fileId: transfer.fileId, peer: message.from, filename: transfer.filename });
    }

    private async sendChunks(transfer: OutgoingTransfer): Promise<void> {
        transfer.state = "sending";
        const handle = await open(transfer.path, "r");
        try {
            for (let index = 0; index < transfer.totalChunks; index++) {
                if (this.outgoing.get(transfer.fileId) !== transfer) return;

                const buffer = Buffer.alloc(transfer.chunkSize);
                const { bytesRead } = await handle.read(buffer, 0, transfer.chunkSize, index * transfer.chunkSize);
                const chunk: FileChunk = {
                    type: "FILE_CHUNK",
                    from: this.ctx.identity,
                    to: transfer.recipient,
                    fileId: transfer.fileId,
                    chunkIndex: index,
                    totalChunks: transfer.totalChunks,
                    chunkSize: transfer.chunkSize,
                    data: buffer.subarray(0, bytesRead).toString("base64"),
                    messageId: randomId(),
                    token: transfer.token,
                    timestamp: this.ctx.tokens.now(),
                };

                if (await this.ctx.outbox.sendReliable(chunk, transfer.recipient)) continue;
                this.log.warn(`Chunk ${index} of ${transfer.filename} not acknowledged, retrying once`);
                if (!(await this.ctx.outbox.sendReliable(chunk, transfer.recipient))) {
                    this.log.warn(`Chunk ${index} of ${transfer.filename} lost`);
                }
            }
        } finally {
            await handle.close();
        }

        // FILE_RECEIVED may already have closed the transfer
        if (this.outgoing.get(transfer.fileId) !== transfer) return;
        transfer.state = "sent";
        this.log.info(`All ${transfer.totalChunks} chunks of ${transfer.filename} sent`);
        this.ctx.emit("file:sent", { fileId: transfer.fileId, peer: transfer.recipient, filename: transfer.filename });

        transfer.timer = setTimeout(() => {
            if (this.outgoing.get(transfer.fileId) !== transfer) return;
            this.discard(transfer);
            this.log.warn(`${transfer.recipient} never confirmed ${transfer.filename}`);
            this.ctx.emit("file:unconfirmed", {
                fileId: transfer.fileId,
                peer: transfer.recipient,
                filename: transfer.filename,
            });
        }, this.ctx.config.receiptTimeoutMs);
    }

    /** Cancels pending offer and receipt timers; outgoing records are dropped. */
    close(): void {
        for (const transfer of this.outgoing.list()) {
            this.discard(transfer);
        }
    }

    // --- Receiver ---

    handleOffer(message: FileOffer): void {
        if (message.to !== this.ctx.identity) {
            this.log.debug(`Offer ${message.fileId} addressed to ${message.to}, ignoring`);
            return;
        }
        if (this.offers.has(message.fileId) || this.incoming.has(message.fileId)) {
            this.log.debug(`Offer ${message.fileId} already known`);
            return;
        }
        this.offers.put(message.fileId, { offer: message, receivedAtMs: Date.now() });
        this.log.info(`${message.from} offers ${message.filename} (${message.filesize} bytes)`);
        this.ctx.emit("file:offer", {
            fileId: message.fileId,
            from: message.from,
            filename: message.filename,
            filesize: message.filesize,
            totalChunks: message.totalChunks,
            description: message.description,
        });
    }

    async accept(fileId: FileId): Promise<FileOpResult> {
        const pending = this.offers.take(fileId);
        if (!pending) return { ok: false, fileId, error: "unknown_file" };
        const { offer } = pending;

        // Open the transfer first: chunks follow the accept immediately
        this.incoming.put(fileId, {
            fileId,
            sender: offer.from,
            filename: offer.filename,
            filesize: offer.filesize,
            totalChunks: offer.totalChunks,
            chunks: new Map(),
        });

        const sent = await this.ctx.outbox.send(this.reply("FILE_ACCEPT", fileId, offer.from), offer.from);
        if (!sent) {
            this.incoming.take(fileId);
            this.offers.put(fileId, pending);
            return { ok: false, fileId, error: "send_failed" };
        }
        this.log.info(`Accepted ${offer.filename} from ${offer.from}`);
        return { ok: true, fileId };
    }

    async reject(fileId: FileId): Promise<FileOpResult> {
        const pending = this.offers.take(fileId);
        if (!pending) return { ok: false, fileId, error: "unknown_file" };

        const sent = await this.ctx.outbox.send(this.reply("FILE_REJECT", fileId, pending.offer.from), pending.offer.from);
        if (!sent) return { ok: false, fileId, error: "send_failed" };
        this.log.info(`Rejected ${pending.offer.filename} from ${pending.offer.from}`);
        return { ok: true, fileId };
    }

    private reply(type: "FILE_ACCEPT" | "FILE_REJECT", fileId: FileId, to: Identity): FileAccept | FileReject {
        return {
            type,
            from: this.ctx.identity,
            to,
            fileId,
            messageId: randomId(),
            token: this.ctx.tokens.mint("file", this.ctx.config.tokenTtl),
            timestamp: this.ctx.tokens.now(),
        };
    }

    async handleChunk(message: FileChunk): Promise<void> {
        const transfer = this.incoming.get(message.fileId);
        if (!transfer) {
            this.log.debug(`Chunk for unknown transfer ${message.fileId}`);
            return;
        }
        if (message.from !== transfer.sender) {
            this.log.debug(`Chunk for ${message.fileId} from ${message.from}, expected ${transfer.sender}`);
            return;
        }
        if (message.chunkIndex >= transfer.totalChunks) {
            this.log.debug(`Chunk index ${message.chunkIndex} out of range for ${message.fileId}`);
            return;
        }
        if (!BASE64.test(message.data) || message.data.length % 4 !== 0) {
            this.log.debug(`Chunk ${message.chunkIndex} of ${message.fileId} is not valid base64`);
            return;
        }

        transfer.chunks.set(message.chunkIndex, Buffer.from(message.data, "base64"));
        this.log.debug(`Chunk ${message.chunkIndex + 1}/${transfer.totalChunks} of ${transfer.filename}`);
        if (transfer.chunks.size < transfer.totalChunks) return;
        if (this.incoming.take(message.fileId) !== transfer) return;

        await this.assemble(transfer);
    }

    private async assemble(transfer: IncomingTransfer): Promise<void> {
        const parts: Buffer[] = [];
        for (let index = 0; index < transfer.totalChunks; index++) {
            const part = transfer.chunks.get(index);
            if (!part) return;
            parts.push(part);
        }
        const data = Buffer.concat(parts);
        const digest = hashBytes(data);

        const dir = this.ctx.config.downloadDir;
        await mkdir(dir, { recursive: true });
        const target = path.join(dir, `${this.ctx.tokens.now()}_${path.basename(transfer.filename)}`);
        await writeFile(target, data);
        this.log.info(`Saved ${transfer.filename} from ${transfer.sender} to ${target} (sha256 ${digest})`);

        const receipt: FileReceived = {
            type: "FILE_RECEIVED",
            from: this.ctx.identity,
            to: transfer.sender,
            fileId: transfer.fileId,
            status: "COMPLETE",
            timestamp: this.ctx.tokens.now(),
        };
        if (!(await this.ctx.outbox.send(receipt, transfer.sender))) {
            this.log.warn(`Could not confirm ${transfer.filename} to ${transfer.sender}`);
        }
        this.ctx.emit("file:received", {
            fileId: transfer.fileId,
            peer: transfer.sender,
            filename: transfer.filename,
            path: target,
            size: data.length,
            digest,
        });
    }
}

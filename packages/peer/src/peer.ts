import { EventEmitter } from "events";
import {
    Clock,
    DedupCache,
    Endpoint,
    FileId,
    GameId,
    Identity,
    Logger,
    PlayerSymbol,
    TokenAuthority,
    TokenString,
    createLogger,
    makeIdentity,
    randomId,
    systemClock,
} from "@lsnp/core";
import { AckRegistry } from "./ack";
import { ChatService, DmResult } from "./chat";
import { PeerConfig } from "./config";
import { PeerContext, PeerEvents } from "./context";
import { FileOpResult, FileTransferManager } from "./files";
import { GameOpResult, GameSessionManager } from "./games";
import { Outbox } from "./outbox";
import { PresenceService } from "./presence";
import { RouteOutcome, Router } from "./router";
import { GameRecord, PeerDirectory, PeerRecord } from "./state";
import { Transport } from "./transport";

export interface LsnpPeerOptions {
    clock?: Clock;
}

export interface LsnpPeer {
    on<K extends keyof PeerEvents>(event: K, listener: (...args: PeerEvents[K]) => void): this;
    once<K extends keyof PeerEvents>(event: K, listener: (...args: PeerEvents[K]) => void): this;
    off<K extends keyof PeerEvents>(event: K, listener: (...args: PeerEvents[K]) => void): this;
    emit<K extends keyof PeerEvents>(event: K, ...args: PeerEvents[K]): boolean;
}

/**
 * One LSNP participant: owns the transport, the router and every service,
 * and processes inbound datagrams one at a time in arrival order.
 */
export class LsnpPeer extends EventEmitter {
    readonly identity: Identity;
    readonly tokens: TokenAuthority;
    readonly directory: PeerDirectory;
    readonly router: Router;
    readonly games: GameSessionManager;
    readonly files: FileTransferManager;
    readonly presence: PresenceService;
    readonly chat: ChatService;

    private readonly acks = new AckRegistry();
    private readonly outbox: Outbox;
    private readonly log: Logger;
    private messageQueue: Promise<unknown> = Promise.resolve();
    private started = false;
    private closed = false;

    constructor(readonly config: PeerConfig, private readonly transport: Transport, options: LsnpPeerOptions = {}) {
        super();
        this.identity = makeIdentity(config.username, config.ip);
        const logger = (tag: string) => createLogger(`${config.username}:${tag}`, { verbose: config.verbose });
        this.log = logger("peer");

        this.tokens = new TokenAuthority(this.identity, options.clock ?? systemClock);
        this.directory = new PeerDirectory(config.peerTtlMs);
        this.outbox = new Outbox(
            transport,
            this.directory,
            this.acks,
            { port: config.port, ackTimeoutMs: config.ackTimeoutMs, ackRetries: config.ackRetries },
            logger("outbox")
        );

        const ctx: PeerContext = {
            identity: this.identity,
            config,
            tokens: this.tokens,
            directory: this.directory,
            outbox: this.outbox,
            emit: (event, ...args) => {
                this.emit(event, ...args);
            },
            logger,
        };

        this.router = new Router(ctx, this.acks, new DedupCache(config.dedupCapacity));
        this.games = new GameSessionManager(ctx);
        this.files = new FileTransferManager(ctx);
        this.presence = new PresenceService(ctx);
        this.chat = new ChatService(ctx);

        this.router.on("PING", (m, source) => this.presence.handlePing(m, source));
        this.router.on("PROFILE", (m, source) => this.presence.handleProfile(m, source));
        this.router.on("DM", (m) => this.chat.handle(m));
        this.router.on("TICTACTOE_INVITE", (m) => this.games.handleInvite(m));
        this.router.on("TICTACTOE_MOVE", (m) => this.games.handleMove(m));
        this.router.on("TICTACTOE_RESULT", (m) => this.games.handleResult(m));
        this.router.on("FILE_OFFER", (m) => this.files.handleOffer(m));
        this.router.on("FILE_ACCEPT", (m) => this.files.handleAccept(m));
        this.router.on("FILE_REJECT", (m) => this.files.handleReject(m));
        this.router.on("FILE_CHUNK", (m) => this.files.handleChunk(m));
        this.router.on("FILE_RECEIVED", (m) => this.files.handleReceived(m));

        this.transport.onDatagram((data, source) => {
            if (!this.started || this.closed) return;
            this.receive(data.toString("utf8"), source).catch((e) => this.log.error(`Handler failed for datagram from ${source.ip}`, e));
        });
    }

    async start(): Promise<void> {
        if (this.started) return;
        this.started = true;
        this.log.info(`Peer ${this.identity} up on port ${this.config.port}`);
        this.presence.start();
        await this.presence.announce();
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        this.presence.stop();
        this.files.close();
        await this.idle();
        await this.transport.close();
        this.log.info("Peer closed");
    }

    /** Queues one datagram behind those already received; resolves with its route outcome. */
    receive(raw: string, source: Endpoint): Promise<RouteOutcome> {
        const result = this.messageQueue.then(() => this.router.route(raw, source));
        // The caller sees the failure; the queue moves on to the next datagram
        this.messageQueue = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }

    /** Resolves once every datagram received so far has been processed. */
    async idle(): Promise<void> {
        await this.messageQueue;
    }

    // --- Presence ---

    peers(): PeerRecord[] {
        return this.directory.active();
    }

    // --- Direct messages ---

    sendDm(to: Identity, content: string): Promise<DmResult> {
        return this.chat.send(to, content);
    }

    // --- Games ---

    invite(opponent: Identity, symbol: PlayerSymbol, openingPosition?: number): Promise<GameOpResult> {
        return this.games.invite(opponent, symbol, openingPosition);
    }

    // Game operations take the opponent when the same id is in play with several peers

    acceptGame(gameId: GameId, position: number, from?: Identity): Promise<GameOpResult> {
        return this.games.accept(gameId, position, from);
    }

    rejectGame(gameId: GameId, from?: Identity): Promise<GameOpResult> {
        return this.games.reject(gameId, from);
    }

    move(gameId: GameId, position: number, opponent?: Identity): Promise<GameOpResult> {
        return this.games.move(gameId, position, opponent);
    }

    resendMove(gameId: GameId, opponent?: Identity): Promise<GameOpResult> {
        return this.games.resend(gameId, opponent);
    }

    game(gameId: GameId, opponent?: Identity): GameRecord | undefined {
        return this.games.find(gameId, opponent);
    }

    // --- Files ---

    offerFile(recipient: Identity, path: string, description?: string): Promise<FileOpResult> {
        return this.files.offer(recipient, path, description);
    }

    acceptFile(fileId: FileId): Promise<FileOpResult> {
        return this.files.accept(fileId);
    }

    rejectFile(fileId: FileId): Promise<FileOpResult> {
        return this.files.reject(fileId);
    }

    // --- Tokens ---

    /** Revokes a token this peer issued and tells the network. False for foreign tokens. */
    async revoke(token: TokenString): Promise<boolean> {
        if (!this.tokens.issued(token)) {
            this.log.warn("Refusing to revoke a token this peer did not issue");
            return false;
        }
        this.tokens.revoke(token);
        await this.outbox.broadcast({ type: "REVOKE", from: this.identity, token, messageId: randomId() });
        this.log.info("Token revoked");
        return true;
    }
}

import {
    GameId,
    GameInvite,
    GameMove,
    GameResult,
    GameResultKind,
    Identity,
    Logger,
    Move,
    MoveRejection,
    Outcome,
    PlayerSymbol,
    applyMove,
    checkMove,
    createSession,
    evaluateBoard,
    opponentOf,
    randomGameId,
    randomId,
    symbolOf,
} from "@lsnp/core";
import { PeerContext } from "./context";
import { GameKey, GameRecord, PendingInvite, RecordStore, gameKey } from "./state";

export type GameError =
    | MoveRejection
    | "unknown_game"
    | "unknown_invite"
    | "ambiguous_game"
    | "invite_pending"
    | "opening_move_required"
    | "no_free_game_id"
    | "no_pending_move"
    | "not_acknowledged";

export type GameOpResult =
    | { ok: true; gameId: GameId; outcome: Outcome }
    | { ok: false; gameId?: GameId; error: GameError };

// Game ids are "g0".."g255"
const GAME_ID_SPACE = 256;

/**
 * Tic-tac-toe sessions on both sides of the wire. Local moves are applied
 * before they are sent; an unacknowledged move stays on the record as
 * pendingMove until resend() gets it through or the opponent answers it.
 */
export class GameSessionManager {
    readonly games = new RecordStore<GameKey, GameRecord>();
    readonly invites = new RecordStore<GameKey, PendingInvite>();
    private log: Logger;

    constructor(private readonly ctx: PeerContext) {
        this.log = ctx.logger("game");
    }

    // Drawn unique across every local session so a bare id usually names one game
    private nextGameId(): GameId | undefined {
        if (this.games.size >= GAME_ID_SPACE) return undefined;
        for (;;) {
            const id = randomGameId();
            if (this.withId(id).length === 0) return id;
        }
    }

    private withId(gameId: GameId): GameRecord[] {
        return this.games.list().filter(r => r.session.gameId === gameId);
    }

    /**
     * Finds the session a local operation means. Without an opponent the id
     * must name exactly one session.
     */
    private lookup(gameId: GameId, opponent?: Identity): { key: GameKey; record: GameRecord } | { error: GameError } {
        if (opponent !== undefined) {
            const key = gameKey(opponent, gameId);
            const record = this.games.get(key);
            return record ? { key, record } : { error: "unknown_game" };
        }
        const matches = this.withId(gameId);
        if (matches.length > 1) return { error: "ambiguous_game" };
        const [record] = matches;
        if (!record) return { error: "unknown_game" };
        return { key: gameKey(record.opponent, gameId), record };
    }

    find(gameId: GameId, opponent?: Identity): GameRecord | undefined {
        const found = this.lookup(gameId, opponent);
        return "record" in found ? found.record : undefined;
    }

    async invite(opponent: Identity, symbol: PlayerSymbol, openingPosition?: number): Promise<GameOpResult> {
        if (symbol === "X" && openingPosition === undefined) {
            return { ok: false, error: "opening_move_required" };
        }
        if (symbol === "O" && openingPosition !== undefined) {
            return { ok: false, error: "out_of_turn" };
        }
        const gameId = this.nextGameId();
        if (!gameId) return { ok: false, error: "no_free_game_id" };

        const players: Record<PlayerSymbol, Identity> =
            symbol === "X" ? { X: this.ctx.identity, O: opponent } : { X: opponent, O: this.ctx.identity };
        let session = createSession(gameId, players);

        if (openingPosition !== undefined) {
            const opening: Move = { symbol, position: openingPosition, turn: session.turnCounter };
            const check = checkMove(session, opening);
            if (!check.ok) return { ok: false, gameId, error: check.reason };
            session = applyMove(session, opening);
        }

        const message: GameInvite = {
            type: "TICTACTOE_INVITE",
            from: this.ctx.identity,
            to: opponent,
            gameId,
            symbol,
            messageId: randomId(),
            token: this.ctx.tokens.mint("game", this.ctx.config.tokenTtl),
            position: openingPosition,
            turn: openingPosition === undefined ? undefined : 1,
            timestamp: this.ctx.tokens.now(),
        };

        const record: GameRecord = { session, localSymbol: symbol, opponent };
        this.games.put(gameKey(opponent, gameId), record);
        this.log.info(`Inviting ${opponent} to ${gameId} as ${symbol}`);

        if (!(await this.ctx.outbox.sendReliable(message, opponent))) {
            record.pendingMove = message;
            return { ok: false, gameId, error: "not_acknowledged" };
        }
        return { ok: true, gameId, outcome: evaluateBoard(record.session.board) };
    }

    /** Accepts an invite by playing the first local move; a refused move leaves the invite open. */
    async accept(gameId: GameId, position: number, from?: Identity): Promise<GameOpResult> {
        const found = this.lookup(gameId, from);
        if ("error" in found) {
            return { ok: false, gameId, error: found.error === "unknown_game" ? "unknown_invite" : found.error };
        }
        const { key, record } = found;
        if (!this.invites.has(key)) return { ok: false, gameId, error: "unknown_invite" };

        const check = checkMove(record.session, {
            symbol: record.localSymbol,
            position,
            turn: record.session.turnCounter,
        });
        if (!check.ok) return { ok: false, gameId, error: check.reason };

        this.invites.take(key);
        return this.move(gameId, position, record.opponent);
    }

    /** Declines an invite: answers with a FORFEIT result and forgets the game. */
    async reject(gameId: GameId, from?: Identity): Promise<GameOpResult> {
        const found = this.lookup(gameId, from);
        if ("error" in found) {
            return { ok: false, gameId, error: found.error === "unknown_game" ? "unknown_invite" : found.error };
        }
        const { key, record } = found;
        if (!this.invites.take(key)) return { ok: false, gameId, error: "unknown_invite" };
        this.games.take(key);

        const sent = await this.sendResult(record, "FORFEIT");
        if (!sent) return { ok: false, gameId, error: "not_acknowledged" };
        return { ok: true, gameId, outcome: evaluateBoard(record.session.board) };
    }

    async move(gameId: GameId, position: number, opponent?: Identity): Promise<GameOpResult> {
        const found = this.lookup(gameId, opponent);
        if ("error" in found) return { ok: false, gameId, error: found.error };
        const { key, record } = found;
        if (this.invites.has(key)) return { ok: false, gameId, error: "invite_pending" };

        const move: Move = { symbol: record.localSymbol, position, turn: record.session.turnCounter };
        const check = checkMove(record.session, move);
        if (!check.ok) return { ok: false, gameId, error: check.reason };

        record.session = applyMove(record.session, move);
        record.pendingMove = undefined;
        const outcome = evaluateBoard(record.session.board);

        const message: GameMove = {
            type: "TICTACTOE_MOVE",
            from: this.ctx.identity,
            to: record.opponent,
            gameId,
            symbol: move.symbol,
            position,
            turn: move.turn,
            messageId: randomId(),
            token: this.ctx.tokens.mint("game", this.ctx.config.tokenTtl),
            timestamp: this.ctx.tokens.now(),
        };

        if (!(await this.ctx.outbox.sendReliable(message, record.opponent))) {
            record.pendingMove = message;
            return { ok: false, gameId, error: "not_acknowledged" };
        }
        if (outcome.status !== "playing") {
            await this.finish(record, outcome);
        }
        return { ok: true, gameId, outcome };
    }

    /** Retransmits the unacknowledged invite or move with its original MESSAGE_ID. */
    async resend(gameId: GameId, opponent?: Identity): Promise<GameOpResult> {
        const found = this.lookup(gameId, opponent);
        if ("error" in found) return { ok: false, gameId, error: found.error };
        const { key, record } = found;
        const pending = record.pendingMove;
        if (!pending) return { ok: false, gameId, error: "no_pending_move" };

        if (!(await this.ctx.outbox.sendReliable(pending, record.opponent))) {
            return { ok: false, gameId, error: "not_acknowledged" };
        }
        if (record.pendingMove === pending) record.pendingMove = undefined;

        const outcome = evaluateBoard(record.session.board);
        if (outcome.status !== "playing" && this.games.get(key) === record) {
            await this.finish(record, outcome);
        }
        return { ok: true, gameId, outcome };
    }

    // Mover's side of a terminal board: announce once, then forget the game
    private async finish(record: GameRecord, outcome: Outcome): Promise<void> {
        const gameId = record.session.gameId;
        if (this.games.take(gameKey(record.opponent, gameId)) !== record) return;

        if (outcome.status === "win") {
            await this.sendResult(record, "WIN", outcome.line);
            this.ctx.emit("game:over", {
                gameId,
                opponent: record.opponent,
                result: outcome.symbol === record.localSymbol ? "WIN" : "LOSS",
                winningLine: outcome.line,
                board: record.session.board,
            });
        } else if (outcome.status === "draw") {
            await this.sendResult(record, "DRAW");
            this.ctx.emit("game:over", {
                gameId,
                opponent: record.opponent,
                result: "DRAW",
                board: record.session.board,
            });
        }
    }

    private sendResult(record: GameRecord, result: GameResultKind, winningLine?: [number, number, number]): Promise<boolean> {
        const message: GameResult = {
            type: "TICTACTOE_RESULT",
            from: this.ctx.identity,
            to: record.opponent,
            gameId: record.session.gameId,
            result,
            symbol: record.localSymbol,
            messageId: randomId(),
            token: this.ctx.tokens.mint("game", this.ctx.config.tokenTtl),
            winningLine,
            timestamp: this.ctx.tokens.now(),
        };
        this.log.info(`${record.session.gameId}: sending ${result} to ${record.opponent}`);
        return this.ctx.outbox.sendReliable(message, record.opponent);
    }

    // --- Incoming ---

    handleInvite(message: GameInvite): void {
        if (message.to !== this.ctx.identity) {
            this.log.debug(`Invite ${message.gameId} addressed to ${message.to}, ignoring`);
            return;
        }
        const key = gameKey(message.from, message.gameId);
        if (this.games.has(key)) {
            this.log.debug(`Invite for existing game ${message.gameId} with ${message.from}, ignoring`);
            return;
        }

        const localSymbol = opponentOf(message.symbol);
        const players: Record<PlayerSymbol, Identity> =
            message.symbol === "X"
                ? { X: message.from, O: this.ctx.identity }
                : { X: this.ctx.identity, O: message.from };
        let session = createSession(message.gameId, players);

        if (message.position !== undefined) {
            const opening: Move = { symbol: message.symbol, position: message.position, turn: message.turn ?? 1 };
            const check = checkMove(session, opening);
            if (!check.ok) {
                this.log.debug(`Invite ${message.gameId} carries an illegal opening move (${check.reason})`);
                return;
            }
            session = applyMove(session, opening);
        }

        this.games.put(key, { session, localSymbol, opponent: message.from });
        this.invites.put(key, {
            gameId: message.gameId,
            from: message.from,
            inviterSymbol: message.symbol,
            receivedAtMs: Date.now(),
        });
        this.log.info(`${message.from} invited you to ${message.gameId}; you are ${localSymbol}`);
        this.ctx.emit("game:invite", {
            gameId: message.gameId,
            from: message.from,
            symbol: localSymbol,
            openingPosition: message.position,
            board: session.board,
        });
    }

    handleMove(message: GameMove): void {
        if (message.to !== this.ctx.identity) {
            this.log.debug(`Move in ${message.gameId} addressed to ${message.to}, ignoring`);
            return;
        }
        const key = gameKey(message.from, message.gameId);
        const record = this.games.get(key);
        if (!record) {
            this.log.debug(`Move for unknown game ${message.gameId} from ${message.from}`);
            return;
        }
        if (symbolOf(record.session, message.from) !== message.symbol) {
            this.log.debug(`Move in ${message.gameId} from ${message.from} as ${message.symbol} rejected: not their symbol`);
            return;
        }
        const move: Move = { symbol: message.symbol, position: message.position, turn: message.turn };
        const check = checkMove(record.session, move);
        if (!check.ok) {
            this.log.debug(`Move in ${message.gameId} rejected: ${check.reason}`);
            return;
        }

        record.session = applyMove(record.session, move);
        // An answering move proves our last frame arrived
        record.pendingMove = undefined;
        this.ctx.emit("game:move", {
            gameId: message.gameId,
            from: message.from,
            symbol: message.symbol,
            position: message.position,
            turn: message.turn,
            board: record.session.board,
        });

        const outcome = evaluateBoard(record.session.board);
        if (outcome.status === "playing") return;

        // The mover announces the result; this side only tears down
        this.games.take(key);
        this.invites.take(key);
        this.ctx.emit("game:over", {
            gameId: message.gameId,
            opponent: record.opponent,
            result: outcome.status === "draw" ? "DRAW" : outcome.symbol === record.localSymbol ? "WIN" : "LOSS",
            winningLine: outcome.status === "win" ? outcome.line : undefined,
            board: record.session.board,
        });
    }

    handleResult(message: GameResult): void {
        if (message.to !== this.ctx.identity) {
            this.log.debug(`Result for ${message.gameId} addressed to ${message.to}, ignoring`);
            return;
        }
        const key = gameKey(message.from, message.gameId);
        this.invites.take(key);
        const record = this.games.take(key);
        if (!record) {
            this.log.debug(`${message.gameId}: ${message.result} from ${message.from} for a finished game`);
            return;
        }

        this.log.info(`${message.gameId}: ${message.from} reports ${message.result}`);
        this.ctx.emit("game:over", {
            gameId: message.gameId,
            opponent: message.from,
            result: localResult(message.result),
            winningLine: message.winningLine,
            board: record.session.board,
        });
    }
}

// The sender reports from its own side
function localResult(remote: GameResultKind): GameResultKind {
    switch (remote) {
        case "WIN":
            return "LOSS";
        case "LOSS":
            return "WIN";
        default:
            return remote;
    }
}

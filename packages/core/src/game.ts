import { Board, Cell, GameId, Identity, PlayerSymbol } from "./types";

export const WIN_LINES: ReadonlyArray<readonly [number, number, number]> = [
    [0, 1, 2], [3, 4, 5], [6, 7, 8], // rows
    [0, 3, 6], [1, 4, 7], [2, 5, 8], // columns
    [0, 4, 8], [2, 4, 6],            // diagonals
];

export type GamePhase = "pending" | "active" | "finished";

export interface GameSession {
    gameId: GameId;
    board: Board;
    players: Record<PlayerSymbol, Identity>;
    nextToMove: PlayerSymbol;
    turnCounter: number;     // turn number the next legal move must carry
    seenTurns: Set<number>;
    phase: GamePhase;
}

export interface Move {
    symbol: PlayerSymbol;
    position: number;
    turn: number;
}

export type Outcome =
    | { status: "playing" }
    | { status: "win"; symbol: PlayerSymbol; line: [number, number, number] }
    | { status: "draw" };

export type MoveRejection =
    | "finished"
    | "out_of_turn"
    | "turn_mismatch"
    | "turn_replayed"
    | "bad_position"
    | "cell_taken";

export type MoveCheck = { ok: true } | { ok: false; reason: MoveRejection };

export function opponentOf(symbol: PlayerSymbol): PlayerSymbol {
    return symbol === "X" ? "O" : "X";
}

export function createSession(gameId: GameId, players: Record<PlayerSymbol, Identity>): GameSession {
    return {
        gameId,
        board: Array<Cell>(9).fill(null),
        players,
        nextToMove: "X", // X always opens
        turnCounter: 1,
        seenTurns: new Set(),
        phase: "pending",
    };
}

export function symbolOf(session: GameSession, identity: Identity): PlayerSymbol | undefined {
    if (session.players.X === identity) return "X";
    if (session.players.O === identity) return "O";
    return undefined;
}

export function checkMove(session: GameSession, move: Move): MoveCheck {
    if (session.phase === "finished") return { ok: false, reason: "finished" };
    if (session.seenTurns.has(move.turn)) return { ok: false, reason: "turn_replayed" };
    if (move.symbol !== session.nextToMove) return { ok: false, reason: "out_of_turn" };
    if (move.turn !== session.turnCounter) return { ok: false, reason: "turn_mismatch" };
    if (!Number.isInteger(move.position) || move.position < 0 || move.position > 8) {
        return { ok: false, reason: "bad_position" };
    }
    if (session.board[move.position] !== null) return { ok: false, reason: "cell_taken" };
    return { ok: true };
}

export function evaluateBoard(board: Board): Outcome {
    for (const [a, b, c] of WIN_LINES) {
        const first = board[a];
        if (first !== null && first === board[b] && first === board[c]) {
            return { status: "win", symbol: first, line: [a, b, c] };
        }
    }
    if (board.every(cell => cell !== null)) return { status: "draw" };
    return { status: "playing" };
}

/**
 * Applies a checked move and returns the next session. The caller must run
 * checkMove first; this function trusts its input.
 */
export function applyMove(session: GameSession, move: Move): GameSession {
    const board = session.board.slice();
    board[move.position] = move.symbol;

    const seenTurns = new Set(session.seenTurns);
    seenTurns.add(move.turn);

    const finished = evaluateBoard(board).status !== "playing";

    return {
        ...session,
        board,
        seenTurns,
        nextToMove: opponentOf(move.symbol),
        turnCounter: session.turnCounter + 1,
        phase: finished ? "finished" : "active",
    };
}

export function renderBoard(board: Board): string {
    const c = (i: number) => board[i] ?? " ";
    return [
        ` ${c(0)} | ${c(1)} | ${c(2)}`,
        "-----------",
        ` ${c(3)} | ${c(4)} | ${c(5)}`,
        "-----------",
        ` ${c(6)} | ${c(7)} | ${c(8)}`,
    ].join("\n");
}

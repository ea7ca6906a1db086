import { describe, it, expect } from "vitest";
import { LsnpError, buildFrame, decodeMessage, encodeMessage, isKnownType, parseFrame } from "@lsnp/core";

describe("Frame codec", () => {
    it("parses key/value lines up to the blank line", () => {
        const fields = parseFrame("TYPE: PING\nUSER_ID: alice@10.0.0.1\n\nignored: body\n");
        expect(fields).toEqual({ TYPE: "PING", USER_ID: "alice@10.0.0.1" });
    });

    it("normalises CRLF and bare CR line endings", () => {
        expect(parseFrame("TYPE: PING\r\nUSER_ID: a@10.0.0.1\r\n\r\n")).toEqual({ TYPE: "PING", USER_ID: "a@10.0.0.1" });
        expect(parseFrame("TYPE: PING\rUSER_ID: a@10.0.0.1\r\r")).toEqual({ TYPE: "PING", USER_ID: "a@10.0.0.1" });
    });

    it("returns null without the blank-line terminator", () => {
        expect(parseFrame("TYPE: PING\nUSER_ID: alice@10.0.0.1\n")).toBeNull();
    });

    it("skips lines without a separator and trims keys and values", () => {
        const fields = parseFrame("TYPE: DM\ngarbage\n  CONTENT:   hello there  \nEMPTY:novalue\n\n");
        expect(fields).toEqual({ TYPE: "DM", CONTENT: "hello there" });
    });

    it("keeps everything after the first separator in the value", () => {
        expect(parseFrame("TYPE: DM\nCONTENT: time: 10:30\n\n")).toEqual({ TYPE: "DM", CONTENT: "time: 10:30" });
    });

    it("builds frames in insertion order with the terminator", () => {
        expect(buildFrame({ TYPE: "ACK", MESSAGE_ID: "0a1b2c3d", STATUS: "RECEIVED" })).toBe(
            "TYPE: ACK\nMESSAGE_ID: 0a1b2c3d\nSTATUS: RECEIVED\n\n"
        );
    });

    it("refuses values that would break the frame", () => {
        let caught: unknown;
        try {
            buildFrame({ TYPE: "DM", CONTENT: "line one\nline two" });
        } catch (e) {
            caught = e;
        }
        expect(caught).toBeInstanceOf(LsnpError);
        expect(caught instanceof LsnpError && caught.code).toBe("INVALID_FIELD");
    });
});

describe("Message decoding", () => {
    const dmFields = {
        TYPE: "DM",
        FROM: "alice@10.0.0.1",
        TO: "bob@10.0.0.2",
        CONTENT: "hi bob",
        TIMESTAMP: "1700000000",
        MESSAGE_ID: "00c0ffee",
        TOKEN: "alice@10.0.0.1|1700003600|chat",
    };

    it("decodes a DM into its typed variant", () => {
        expect(decodeMessage(dmFields)).toEqual({
            ok: true,
            message: {
                type: "DM",
                from: "alice@10.0.0.1",
                to: "bob@10.0.0.2",
                content: "hi bob",
                messageId: "00c0ffee",
                token: "alice@10.0.0.1|1700003600|chat",
                timestamp: 1700000000,
            },
        });
    });

    it("rejects a message missing a required field", () => {
        const { CONTENT: _content, ...rest } = dmFields;
        const decoded = decodeMessage(rest);
        expect(decoded.ok).toBe(false);
        expect(!decoded.ok && decoded.reason).toContain("CONTENT");
    });

    it("rejects unknown types and a missing TYPE", () => {
        expect(decodeMessage({ TYPE: "SHOUT", FROM: "a@10.0.0.1" })).toEqual({ ok: false, reason: "unknown TYPE SHOUT" });
        expect(decodeMessage({ FROM: "a@10.0.0.1" })).toEqual({ ok: false, reason: "missing TYPE" });
    });

    it("validates numeric and enumerated fields", () => {
        const move = {
            TYPE: "TICTACTOE_MOVE",
            FROM: "alice@10.0.0.1",
            TO: "bob@10.0.0.2",
            GAMEID: "g12",
            MESSAGE_ID: "0000abcd",
            POSITION: "4",
            SYMBOL: "X",
            TURN: "1",
            TOKEN: "alice@10.0.0.1|1700003600|game",
        };
        expect(decodeMessage(move).ok).toBe(true);
        expect(decodeMessage({ ...move, POSITION: "9" }).ok).toBe(false);
        expect(decodeMessage({ ...move, POSITION: "-1" }).ok).toBe(false);
        expect(decodeMessage({ ...move, SYMBOL: "Z" }).ok).toBe(false);
        expect(decodeMessage({ ...move, TURN: "two" }).ok).toBe(false);
    });

    it("parses WINNING_LINE into three cells", () => {
        const decoded = decodeMessage({
            TYPE: "TICTACTOE_RESULT",
            FROM: "alice@10.0.0.1",
            TO: "bob@10.0.0.2",
            GAMEID: "g7",
            MESSAGE_ID: "1234abcd",
            RESULT: "WIN",
            SYMBOL: "X",
            WINNING_LINE: "0,4,8",
            TOKEN: "alice@10.0.0.1|1700003600|game",
        });
        expect(decoded.ok && decoded.message.type === "TICTACTOE_RESULT" && decoded.message.winningLine).toEqual([0, 4, 8]);
    });

    it("carries social types through with their sender and raw fields", () => {
        const fields = {
            TYPE: "POST",
            USER_ID: "alice@10.0.0.1",
            CONTENT: "hello world",
            TTL: "3600",
            MESSAGE_ID: "f00dcafe",
            TOKEN: "alice@10.0.0.1|1700003600|broadcast",
        };
        const decoded = decodeMessage(fields);
        expect(decoded).toEqual({
            ok: true,
            message: {
                type: "POST",
                sender: "alice@10.0.0.1",
                token: "alice@10.0.0.1|1700003600|broadcast",
                messageId: "f00dcafe",
                fields,
            },
        });
    });

    it("encodes a typed message back to the same wire frame", () => {
        const decoded = decodeMessage(dmFields);
        if (!decoded.ok) throw new Error(decoded.reason);
        const frame = buildFrame(encodeMessage(decoded.message));
        expect(frame).toBe(
            "TYPE: DM\nFROM: alice@10.0.0.1\nTO: bob@10.0.0.2\nCONTENT: hi bob\nTIMESTAMP: 1700000000\n" +
                "MESSAGE_ID: 00c0ffee\nTOKEN: alice@10.0.0.1|1700003600|chat\n\n"
        );
    });

    it("knows every typed and pass-through TYPE", () => {
        expect(isKnownType("FILE_CHUNK")).toBe(true);
        expect(isKnownType("GROUP_MESSAGE")).toBe(true);
        expect(isKnownType("SHOUT")).toBe(false);
    });
});

import { describe, it, expect } from "vitest";
import { TokenAuthority, formatToken, parseToken } from "@lsnp/core";

function clockAt(start: number) {
    const clock = { now: start };
    return { clock, read: () => clock.now };
}

describe("Token authority", () => {
    const alice = "alice@10.0.0.1";

    it("mints identity|expiry|scope tokens", () => {
        const { read } = clockAt(1_000_000);
        const tokens = new TokenAuthority(alice, read);
        expect(tokens.mint("chat", 3600)).toBe("alice@10.0.0.1|1003600|chat");
        expect(parseToken("alice@10.0.0.1|1003600|chat")).toEqual({ identity: alice, expiry: 1003600, scope: "chat" });
        expect(formatToken({ identity: alice, expiry: 5, scope: "file" })).toBe("alice@10.0.0.1|5|file");
    });

    it("accepts a fresh token of the expected scope", () => {
        const { read } = clockAt(1_000_000);
        const tokens = new TokenAuthority(alice, read);
        expect(tokens.validate(tokens.mint("game", 60), "game")).toEqual({ ok: true, reason: "ok" });
    });

    it("expires strictly after the expiry second", () => {
        const { clock, read } = clockAt(1_000_000);
        const tokens = new TokenAuthority(alice, read);
        const token = tokens.mint("chat", 10);

        clock.now = 1_000_010;
        expect(tokens.validate(token, "chat").ok).toBe(true);
        clock.now = 1_000_011;
        expect(tokens.validate(token, "chat")).toEqual({ ok: false, reason: "expired" });
    });

    it("rejects malformed tokens", () => {
        const tokens = new TokenAuthority(alice, () => 0);
        for (const bad of ["", "alice@10.0.0.1|100", "alice@10.0.0.1|soon|chat", "alice@10.0.0.1|100|party", "a|1|chat|x", "|100|chat"]) {
            expect(tokens.validate(bad, "chat")).toEqual({ ok: false, reason: "malformed" });
        }
    });

    it("rejects a token presented for another scope", () => {
        const tokens = new TokenAuthority(alice, () => 0);
        expect(tokens.validate("alice@10.0.0.1|100|file", "chat")).toEqual({ ok: false, reason: "scope_mismatch" });
    });

    it("reports the first failing check", () => {
        const { read } = clockAt(500);
        const tokens = new TokenAuthority(alice, read);
        // expired and wrong scope: expiry is checked first
        expect(tokens.validate("alice@10.0.0.1|100|file", "chat").reason).toBe("expired");

        const token = tokens.mint("chat", 100);
        tokens.revoke(token);
        expect(tokens.validate(token, "chat").reason).toBe("revoked");
        expect(tokens.validate(token, "game").reason).toBe("scope_mismatch");
    });

    it("keeps a revocation only until the token would have expired anyway", () => {
        const { clock, read } = clockAt(1_000);
        const tokens = new TokenAuthority(alice, read);
        const token = tokens.mint("broadcast", 50);

        tokens.revoke(token);
        expect(tokens.isRevoked(token)).toBe(true);
        expect(tokens.revocationCount()).toBe(1);

        clock.now = 1_051;
        expect(tokens.isRevoked(token)).toBe(false);
        expect(tokens.revocationCount()).toBe(0);
        expect(tokens.validate(token, "broadcast").reason).toBe("expired");
    });

    it("ignores revocation of expired or malformed tokens", () => {
        const tokens = new TokenAuthority(alice, () => 1_000);
        tokens.revoke("alice@10.0.0.1|999|chat");
        tokens.revoke("not-a-token");
        expect(tokens.revocationCount()).toBe(0);
    });

    it("garbage-collects expired revocations eagerly", () => {
        const { clock, read } = clockAt(0);
        const tokens = new TokenAuthority(alice, read);
        tokens.revoke(tokens.mint("chat", 10));
        tokens.revoke(tokens.mint("file", 100));

        clock.now = 20;
        expect(tokens.gc()).toBe(1);
        expect(tokens.revocationCount()).toBe(1);
    });

    it("tracks which tokens it issued", () => {
        const tokens = new TokenAuthority(alice, () => 0);
        const own = tokens.mint("chat", 10);
        expect(tokens.issued(own)).toBe(true);
        expect(tokens.issued("bob@10.0.0.2|10|chat")).toBe(false);

        tokens.revoke(own);
        expect(tokens.issued(own)).toBe(false);
    });
});

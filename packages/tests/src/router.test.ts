import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { LsnpMessage, TokenAuthority, buildFrame, encodeMessage } from "@lsnp/core";
import { LSNP_PORT, LsnpPeer, MemoryNetwork, MemoryTransport } from "@lsnp/peer";
import { collect, makePeer } from "./helpers";

const NOW = 1_700_000_000;
const ALICE = "alice@10.0.0.1";
const BOB = "bob@10.0.0.2";

function frame(message: LsnpMessage): string {
    return buildFrame(encodeMessage(message));
}

describe("Router", () => {
    let network: MemoryNetwork;
    let bob: LsnpPeer;
    let aliceSocket: MemoryTransport;
    let aliceInbox: string[];
    const aliceTokens = new TokenAuthority(ALICE, () => NOW);

    beforeEach(() => {
        network = new MemoryNetwork();
        bob = makePeer(network, "bob", "10.0.0.2", {}, { clock: () => NOW });
        aliceSocket = network.attach("10.0.0.1", LSNP_PORT);
        aliceInbox = [];
        aliceSocket.onDatagram((data) => aliceInbox.push(data.toString("utf8")));
    });

    afterEach(async () => {
        await bob.close();
        await aliceSocket.close();
    });

    function dm(overrides: Partial<Extract<LsnpMessage, { type: "DM" }>> = {}): string {
        return frame({
            type: "DM",
            from: ALICE,
            to: BOB,
            content: "hi",
            messageId: "0000beef",
            token: aliceTokens.mint("chat", 3600),
            ...overrides,
        });
    }

    const fromAlice = { ip: "10.0.0.1", port: 41000 };

    it("dispatches a duplicate once and acknowledges both copies", async () => {
        const dms = collect(bob, "dm");
        const raw = dm();

        expect(await bob.receive(raw, fromAlice)).toEqual({ kind: "dispatched", type: "DM" });
        expect(await bob.receive(raw, fromAlice)).toEqual({ kind: "duplicate", type: "DM" });
        await network.settle();

        expect(dms).toHaveLength(1);
        expect(aliceInbox).toEqual([
            "TYPE: ACK\nMESSAGE_ID: 0000beef\nSTATUS: RECEIVED\n\n",
            "TYPE: ACK\nMESSAGE_ID: 0000beef\nSTATUS: RECEIVED\n\n",
        ]);
        expect(bob.directory.resolveIp(ALICE)).toBe("10.0.0.1");
    });

    it("drops a token-bearing message whose identity does not match its source", async () => {
        const dms = collect(bob, "dm");
        const mallory = new TokenAuthority("mallory@10.0.0.5", () => NOW);
        const spoofed = dm({ from: "mallory@10.0.0.5", token: mallory.mint("chat", 3600) });

        expect(await bob.receive(spoofed, { ip: "10.0.0.9", port: 41000 })).toEqual({
            kind: "dropped",
            reason: "ip_mismatch",
            type: "DM",
        });
        await network.settle();
        expect(dms).toHaveLength(0);
        expect(network.deliveredOfType("ACK")).toHaveLength(0);
        expect(bob.directory.get("mallory@10.0.0.5")).toBeUndefined();
    });

    it("only logs identity mismatches on messages without a token", async () => {
        const profile = frame({ type: "PROFILE", userId: "carol@10.0.0.5", displayName: "Carol", status: "hi" });
        expect(await bob.receive(profile, { ip: "10.0.0.9", port: 41000 })).toEqual({ kind: "dispatched", type: "PROFILE" });
        expect(bob.directory.get("carol@10.0.0.5")).toMatchObject({ ip: "10.0.0.9", displayName: "Carol", status: "hi" });
    });

    it("drops expired, mis-scoped and borrowed tokens", async () => {
        const stale = new TokenAuthority(ALICE, () => NOW - 7200);
        expect(await bob.receive(dm({ token: stale.mint("chat", 3600) }), fromAlice)).toEqual({
            kind: "dropped",
            reason: "expired",
            type: "DM",
        });
        expect(await bob.receive(dm({ messageId: "0000bee1", token: aliceTokens.mint("game", 3600) }), fromAlice)).toEqual({
            kind: "dropped",
            reason: "scope_mismatch",
            type: "DM",
        });
        const eve = new TokenAuthority("eve@10.0.0.1", () => NOW);
        expect(await bob.receive(dm({ messageId: "0000bee2", token: eve.mint("chat", 3600) }), fromAlice)).toEqual({
            kind: "dropped",
            reason: "token_owner_mismatch",
            type: "DM",
        });
        expect(await bob.receive(dm({ messageId: "0000bee3", token: "garbage" }), fromAlice)).toEqual({
            kind: "dropped",
            reason: "malformed",
            type: "DM",
        });
        await network.settle();
        expect(aliceInbox).toEqual([]);
    });

    it("applies a REVOKE from the token's owner and then refuses the token", async () => {
        const token = aliceTokens.mint("chat", 3600);
        const revoked = collect(bob, "revoked");
        await bob.receive(dm({ token }), fromAlice);
        expect(bob.directory.get(ALICE)).toBeDefined();

        const revoke = frame({ type: "REVOKE", from: ALICE, token, messageId: "00ddba11" });
        expect(await bob.receive(revoke, fromAlice)).toEqual({ kind: "revoked", token });
        expect(await bob.receive(revoke, fromAlice)).toEqual({ kind: "duplicate", type: "REVOKE" });

        expect(revoked).toEqual([[token, ALICE]]);
        expect(bob.tokens.isRevoked(token)).toBe(true);
        expect(bob.directory.get(ALICE)).toBeUndefined();
        expect(await bob.receive(dm({ messageId: "0000bee4", token }), fromAlice)).toEqual({
            kind: "dropped",
            reason: "revoked",
            type: "DM",
        });
    });

    it("ignores a REVOKE sent from another address than the token's owner", async () => {
        const token = aliceTokens.mint("chat", 3600);
        const revoke = frame({ type: "REVOKE", token, messageId: "00ddba12" });
        expect(await bob.receive(revoke, { ip: "10.0.0.9", port: 41000 })).toEqual({
            kind: "dropped",
            reason: "revoke_ip_mismatch",
            type: "REVOKE",
        });
        expect(bob.tokens.isRevoked(token)).toBe(false);
    });

    it("drops frames that do not decode", async () => {
        expect(await bob.receive("TYPE: DM\nFROM: alice@10.0.0.1\n", fromAlice)).toEqual({ kind: "dropped", reason: "unparseable" });
        expect(await bob.receive("TYPE: SHOUT\nFROM: alice@10.0.0.1\n\n", fromAlice)).toEqual({
            kind: "dropped",
            reason: "invalid_message",
        });
    });

    it("resolves waiters on ACK without further processing", async () => {
        const raw = frame({ type: "ACK", messageId: "abcdef01", status: "RECEIVED" });
        expect(await bob.receive(raw, fromAlice)).toEqual({ kind: "ack", messageId: "abcdef01" });
        expect(bob.directory.size).toBe(0);
    });

    it("hands authorised social messages to listeners of the generic event", async () => {
        const messages = collect(bob, "message");
        const post = frame({
            type: "POST",
            sender: ALICE,
            token: aliceTokens.mint("broadcast", 3600),
            messageId: "facade01",
            fields: { USER_ID: ALICE, CONTENT: "hello all", TTL: "3600" },
        });
        expect(await bob.receive(post, fromAlice)).toEqual({ kind: "dispatched", type: "POST" });
        expect(messages).toHaveLength(1);
        expect(messages[0][0]).toMatchObject({ type: "POST", sender: ALICE });
    });
});

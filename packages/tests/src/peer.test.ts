import { describe, it, expect, afterEach } from "vitest";
import { buildFrame, encodeMessage } from "@lsnp/core";
import { LsnpPeer, MemoryNetwork, PeerDirectory } from "@lsnp/peer";
import { collect, makePeer, nextEvent, settle } from "./helpers";

describe("Peer directory", () => {
    it("forgets peers outside the liveness window", () => {
        const directory = new PeerDirectory(1000);
        directory.upsert("alice@10.0.0.1", "10.0.0.1", 5000);
        directory.upsert("bob@10.0.0.2", "10.0.0.2", 5500, { displayName: "Bob", status: "around" });

        expect(directory.active(5999).map(p => p.identity)).toEqual(["alice@10.0.0.1", "bob@10.0.0.2"]);
        // exactly one window after the last sighting is already too old
        expect(directory.active(6000).map(p => p.identity)).toEqual(["bob@10.0.0.2"]);
        expect(directory.get("alice@10.0.0.1")?.displayName).toBe("alice");
    });

    it("keeps the profile when a later upsert only refreshes the address", () => {
        const directory = new PeerDirectory(1000);
        directory.upsert("bob@10.0.0.2", "10.0.0.2", 0, { displayName: "Bob", status: "around" });
        directory.upsert("bob@10.0.0.2", "10.0.0.3", 10);

        expect(directory.get("bob@10.0.0.2")).toEqual({
            identity: "bob@10.0.0.2",
            ip: "10.0.0.3",
            lastSeenMs: 10,
            displayName: "Bob",
            status: "around",
        });
        expect(directory.remove("bob@10.0.0.2")).toBe(true);
        expect(directory.resolveIp("bob@10.0.0.2")).toBeUndefined();
    });
});

describe("LsnpPeer", () => {
    let network: MemoryNetwork;
    let alice: LsnpPeer;
    let bob: LsnpPeer;

    afterEach(async () => {
        await alice?.close();
        await bob?.close();
    });

    async function pair(): Promise<void> {
        network = new MemoryNetwork();
        alice = makePeer(network, "alice", "10.0.0.1", { displayName: "Alice", status: "testing" });
        bob = makePeer(network, "bob", "10.0.0.2");
        await alice.start();
        await bob.start();
        await settle(network, alice, bob);
    }

    it("discovers peers from their PROFILE and PING broadcasts", async () => {
        network = new MemoryNetwork();
        alice = makePeer(network, "alice", "10.0.0.1", { displayName: "Alice", status: "testing" });
        bob = makePeer(network, "bob", "10.0.0.2");
        const seen = collect(bob, "peer");

        await bob.start();
        await alice.start();
        await settle(network, alice, bob);

        expect(bob.peers()).toEqual([
            expect.objectContaining({ identity: "alice@10.0.0.1", ip: "10.0.0.1", displayName: "Alice", status: "testing" }),
        ]);
        expect(seen.map(([p]) => p.identity)).toEqual(["alice@10.0.0.1"]);
        // bob announced before alice was listening
        expect(alice.peers()).toEqual([]);

        await bob.presence.announce();
        await settle(network, alice, bob);
        expect(alice.peers().map(p => p.displayName)).toEqual(["bob"]);
    });

    it("reports a peer first heard by PING only once", async () => {
        network = new MemoryNetwork();
        bob = makePeer(network, "bob", "10.0.0.2");
        await bob.start();
        const seen = collect(bob, "peer");
        const ping = buildFrame(encodeMessage({ type: "PING", userId: "carol@10.0.0.5" }));

        await bob.receive(ping, { ip: "10.0.0.5", port: 40100 });
        await bob.receive(ping, { ip: "10.0.0.5", port: 40100 });

        expect(seen.map(([p]) => p.identity)).toEqual(["carol@10.0.0.5"]);
        expect(bob.directory.resolveIp("carol@10.0.0.5")).toBe("10.0.0.5");
    });

    it("delivers direct messages", async () => {
        await pair();
        const dm = nextEvent(bob, "dm");
        const result = await alice.sendDm(bob.identity, "lunch at noon?");
        expect(result.ok).toBe(true);

        const [message] = await dm;
        expect(message).toMatchObject({ from: alice.identity, to: bob.identity, content: "lunch at noon?" });
        expect(result.ok && result.messageId).toBe(message.messageId);
    });

    it("revokes its own tokens across the network", async () => {
        await pair();
        const token = alice.tokens.mint("chat", 3600);
        const revoked = nextEvent(bob, "revoked");

        expect(await alice.revoke(token)).toBe(true);
        expect(await revoked).toEqual([token, alice.identity]);
        expect(bob.tokens.isRevoked(token)).toBe(true);
        expect(alice.tokens.isRevoked(token)).toBe(true);
        expect(bob.directory.get(alice.identity)).toBeUndefined();
    });

    it("refuses to revoke a token it did not issue", async () => {
        await pair();
        const foreign = bob.tokens.mint("chat", 3600);
        expect(await alice.revoke(foreign)).toBe(false);
        await settle(network, alice, bob);
        expect(network.deliveredOfType("REVOKE")).toHaveLength(0);
    });
});

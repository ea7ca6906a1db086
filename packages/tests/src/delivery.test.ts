import { describe, it, expect, afterEach } from "vitest";
import { AckRegistry, LsnpPeer, MemoryNetwork } from "@lsnp/peer";
import { collect, makePeer, settle } from "./helpers";

describe("Ack registry", () => {
    it("resolves a waiter once and ignores unknown ids", async () => {
        const acks = new AckRegistry();
        const waiter = acks.register("0000beef");
        expect(acks.pending()).toEqual(["0000beef"]);

        const waiting = waiter.wait(1000);
        expect(acks.resolve("0000beef")).toBe(true);
        expect(acks.resolve("0000beef")).toBe(false);
        expect(acks.resolve("ffffffff")).toBe(false);
        await expect(waiting).resolves.toBe(true);
        expect(acks.pending()).toEqual([]);
    });

    it("times out when nothing arrives", async () => {
        const acks = new AckRegistry();
        const waiter = acks.register("0000beef");
        await expect(waiter.wait(20)).resolves.toBe(false);

        acks.abandon("0000beef");
        expect(acks.pending()).toEqual([]);
        expect(acks.resolve("0000beef")).toBe(false);
    });

    it("answers immediately once acknowledged", async () => {
        const acks = new AckRegistry();
        const waiter = acks.register("0000beef");
        acks.resolve("0000beef");
        await expect(waiter.wait(1000)).resolves.toBe(true);
    });
});

describe("Reliable delivery", () => {
    let network: MemoryNetwork;
    let alice: LsnpPeer;
    let bob: LsnpPeer;

    afterEach(async () => {
        await alice?.close();
        await bob?.close();
    });

    async function pair(): Promise<void> {
        network = new MemoryNetwork();
        alice = makePeer(network, "alice", "10.0.0.1");
        bob = makePeer(network, "bob", "10.0.0.2");
        await alice.start();
        await bob.start();
        await settle(network, alice, bob);
    }

    it("retransmits until an ACK gets through and delivers once", async () => {
        await pair();
        const dms = collect(bob, "dm");
        let acksDropped = 0;
        network.addDropFilter(d => d.data.startsWith("TYPE: ACK\n") && acksDropped++ < 2);

        const result = await alice.sendDm(bob.identity, "are you there?");
        await settle(network, alice, bob);

        expect(result.ok).toBe(true);
        expect(network.deliveredOfType("DM")).toHaveLength(3);
        expect(network.dropped).toHaveLength(2);
        expect(network.deliveredOfType("ACK")).toHaveLength(1);
        expect(dms).toHaveLength(1);
        expect(dms[0][0].content).toBe("are you there?");
    });

    it("gives up after the configured attempts", async () => {
        await pair();
        const dms = collect(bob, "dm");
        network.addDropFilter(d => d.data.startsWith("TYPE: ACK\n"));

        const result = await alice.sendDm(bob.identity, "hello?");
        await settle(network, alice, bob);

        expect(result).toEqual({ ok: false, messageId: expect.any(String), error: "not_acknowledged" });
        expect(network.deliveredOfType("DM")).toHaveLength(3);
        // every copy was acknowledged, the duplicates by re-ACK
        expect(network.dropped).toHaveLength(3);
        expect(dms).toHaveLength(1);
    });

    it("fails without sending when the recipient has no address", async () => {
        await pair();
        const result = await alice.sendDm("ghost", "anyone?");
        expect(result.ok).toBe(false);
        expect(network.deliveredOfType("DM")).toHaveLength(0);
    });

    it("refuses DM content that cannot be framed", async () => {
        await pair();
        expect(await alice.sendDm(bob.identity, "two\nlines")).toEqual({ ok: false, error: "invalid_content" });
    });
});

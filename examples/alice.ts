import { Board, GameId } from "@lsnp/core";
import { LsnpPeer, UdpTransport, loadConfig } from "@lsnp/peer";

// Run on one host: LSNP_USERNAME=alice npx tsx examples/alice.ts bob@<bob-ip> [file-to-send]

function firstFree(board: Board): number {
    return board.findIndex(cell => cell === null);
}

async function main() {
    const opponent = process.argv[2];
    if (!opponent) {
        console.error("Please provide bob's identity (bob@<ip>) as argument");
        process.exit(1);
    }
    const filePath = process.argv[3];

    const config = loadConfig({ LSNP_USERNAME: "alice", ...process.env });
    const transport = await UdpTransport.bind({ port: config.port, localAddress: config.ip, verbose: config.verbose });
    const alice = new LsnpPeer(config, transport);

    const playing = new Set<GameId>();
    alice.on("game:move", (e) => {
        if (!playing.has(e.gameId)) return;
        void alice.move(e.gameId, firstFree(e.board), e.from).then((r) => {
            if (!r.ok) console.error(`Alice could not move in ${e.gameId}: ${r.error}`);
        });
    });
    alice.on("game:over", (e) => {
        console.log(`Game ${e.gameId} over: ${e.result}`);
        playing.delete(e.gameId);
    });
    alice.on("dm", (m) => console.log(`Bob says: ${m.content}`));
    alice.on("file:delivered", (e) => console.log(`Bob confirmed ${e.filename}`));

    try {
        await alice.start();
        console.log(`Alice up as ${alice.identity}`);

        const dm = await alice.sendDm(opponent, "Hello Bob, this is a real message over UDP!");
        console.log(dm.ok ? "Alice's DM was acknowledged" : `Alice's DM failed: ${dm.error}`);

        const game = await alice.invite(opponent, "X", 4);
        if (game.ok) {
            playing.add(game.gameId);
            console.log(`Alice invited Bob to ${game.gameId}`);
        } else {
            console.error(`Invite failed: ${game.error}`);
        }

        if (filePath) {
            const offer = await alice.offerFile(opponent, filePath, "from alice");
            console.log(offer.ok ? `Offered ${filePath} as ${offer.fileId}` : `Offer failed: ${offer.error}`);
        }

        // Leave a minute for the game and transfer to finish
        setTimeout(() => {
            alice.close().then(() => process.exit(0), () => process.exit(1));
        }, 60_000);
    } catch (e) {
        console.error("Alice error:", e);
        await alice.close();
        process.exit(1);
    }
}

main();

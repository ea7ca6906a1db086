import { Board } from "@lsnp/core";
import { LsnpPeer, UdpTransport, loadConfig } from "@lsnp/peer";

// Run on another host: LSNP_USERNAME=bob npx tsx examples/bob.ts
// Bob accepts every invite and offer, and answers DMs.

function firstFree(board: Board): number {
    return board.findIndex(cell => cell === null);
}

async function main() {
    const config = loadConfig({ LSNP_USERNAME: "bob", ...process.env });
    const transport = await UdpTransport.bind({ port: config.port, localAddress: config.ip, verbose: config.verbose });
    const bob = new LsnpPeer(config, transport);

    bob.on("dm", (m) => {
        console.log(`${m.from} says: ${m.content}`);
        void bob.sendDm(m.from, "Hi! Got your message.");
    });

    bob.on("game:invite", (e) => {
        console.log(`Bob accepts ${e.gameId} from ${e.from} as ${e.symbol}`);
        void bob.acceptGame(e.gameId, firstFree(e.board), e.from).then((r) => {
            if (!r.ok) console.error(`Accept failed: ${r.error}`);
        });
    });
    bob.on("game:move", (e) => {
        void bob.move(e.gameId, firstFree(e.board), e.from).then((r) => {
            if (!r.ok) console.error(`Bob could not move in ${e.gameId}: ${r.error}`);
        });
    });
    bob.on("game:over", (e) => console.log(`Game ${e.gameId} over: ${e.result}`));

    bob.on("file:offer", (e) => {
        console.log(`Bob accepts ${e.filename} (${e.filesize} bytes)`);
        void bob.acceptFile(e.fileId);
    });
    bob.on("file:received", (e) => console.log(`Saved ${e.filename} to ${e.path} (sha256 ${e.digest})`));

    await bob.start();
    console.log(`Bob up as ${bob.identity}, waiting for peers...`);

    process.once("SIGINT", () => {
        bob.close().then(() => process.exit(0), () => process.exit(1));
    });
}

main();

import { createLogger, renderBoard } from "@lsnp/core";
import { PeerConfig, loadConfig } from "./config";
import { LsnpPeer } from "./peer";
import { UdpTransport } from "./transport";

/** Starts a peer on UDP from LSNP_* settings and logs what it sees until SIGINT. */
export async function runPeer(config: PeerConfig): Promise<LsnpPeer> {
    const log = createLogger(`${config.username}:cli`, { verbose: config.verbose });
    const transport = await UdpTransport.bind({ port: config.port, localAddress: config.ip, verbose: config.verbose });
    const peer = new LsnpPeer(config, transport);

    peer.on("peer", (p) => log.info(`Peer ${p.displayName} (${p.identity}) at ${p.ip}: ${p.status}`));
    peer.on("dm", (m) => log.info(`DM from ${m.from}: ${m.content}`));
    peer.on("revoked", (_token, issuer) => log.info(`${issuer} revoked a token`));
    peer.on("message", (m) => log.info(`${m.type} received`));
    peer.on("game:invite", (e) => log.info(`${e.from} invites you to ${e.gameId} as ${e.symbol}\n${renderBoard(e.board)}`));
    peer.on("game:move", (e) => log.info(`${e.from} played ${e.position} in ${e.gameId}\n${renderBoard(e.board)}`));
    peer.on("game:over", (e) => log.info(`${e.gameId} against ${e.opponent} ended: ${e.result}`));
    peer.on("file:offer", (e) => log.info(`${e.from} offers ${e.filename} (${e.filesize} bytes) as ${e.fileId}`));
    peer.on("file:received", (e) => log.info(`Received ${e.filename} from ${e.peer} -> ${e.path}`));
    peer.on("file:delivered", (e) => log.info(`${e.peer} received ${e.filename}`));
    peer.on("file:rejected", (e) => log.info(`${e.peer} rejected ${e.filename}`));
    peer.on("file:timeout", (e) => log.warn(`${e.peer} never answered the offer of ${e.filename}`));
    peer.on("file:unconfirmed", (e) => log.warn(`${e.peer} never confirmed ${e.filename}`));

    await peer.start();

    process.once("SIGINT", () => {
        log.info("Shutting down...");
        peer.close().then(
            () => process.exit(0),
            (e) => {
                log.error("Shutdown failed", e);
                process.exit(1);
            }
        );
    });
    return peer;
}

if (require.main === module) {
    void (async () => {
        const args = process.argv.slice(2);
        try {
            const config = loadConfig(process.env);
            if (args.includes("--verbose") || args.includes("-v")) config.verbose = true;
            await runPeer(config);
        } catch (e) {
            console.error("Failed to start peer:", e instanceof Error ? e.message : String(e));
            process.exit(1);
        }
    })();
}

import { LsnpPeer, LsnpPeerOptions, MemoryNetwork, PeerConfig, PeerEvents, createConfig } from "@lsnp/peer";

// Short timeouts so retry paths finish quickly; presence timers effectively off
export const FAST: Partial<PeerConfig> = {
    ackTimeoutMs: 100,
    ackRetries: 3,
    pingIntervalMs: 3_600_000,
};

export function makePeer(
    network: MemoryNetwork,
    username: string,
    ip: string,
    overrides: Partial<PeerConfig> = {},
    options: LsnpPeerOptions = {}
): LsnpPeer {
    const config = createConfig(username, ip, { ...FAST, ...overrides });
    return new LsnpPeer(config, network.attach(ip, config.port), options);
}

export function nextEvent<K extends keyof PeerEvents>(peer: LsnpPeer, event: K): Promise<PeerEvents[K]> {
    return new Promise((resolve) => {
        peer.once(event, (...args) => resolve(args));
    });
}

export function collect<K extends keyof PeerEvents>(peer: LsnpPeer, event: K): PeerEvents[K][] {
    const seen: PeerEvents[K][] = [];
    peer.on(event, (...args) => {
        seen.push(args);
    });
    return seen;
}

export async function settle(network: MemoryNetwork, ...peers: LsnpPeer[]): Promise<void> {
    for (let i = 0; i < 3; i++) {
        await network.settle();
        await Promise.all(peers.map(p => p.idle()));
    }
}

import { Endpoint } from "@lsnp/core";
import { DatagramListener, Transport } from "./transport";

export interface Delivery {
    data: string;
    source: Endpoint;
    destination: Endpoint;
}

/** Returns true to drop the datagram. */
export type DropFilter = (delivery: Delivery) => boolean;

/**
 * In-process datagram fabric. Each attached transport owns one ip; datagrams
 * are delivered asynchronously, like a socket would, and can be dropped by
 * filters to simulate loss.
 */
export class MemoryNetwork {
    private nodes = new Map<string, MemoryTransport>(); // "ip:port" -> transport
    private filters: DropFilter[] = [];
    readonly delivered: Delivery[] = [];
    readonly dropped: Delivery[] = [];

    attach(ip: string, port: number): MemoryTransport {
        const key = `${ip}:${port}`;
        if (this.nodes.has(key)) {
            throw new Error(`Address ${key} already attached`);
        }
        const transport = new MemoryTransport(this, ip, port);
        this.nodes.set(key, transport);
        return transport;
    }

    detach(transport: MemoryTransport): void {
        this.nodes.delete(`${transport.localAddress}:${transport.port}`);
    }

    addDropFilter(filter: DropFilter): () => void {
        this.filters.push(filter);
        return () => {
            this.filters = this.filters.filter(f => f !== filter);
        };
    }

    /** Delivers a raw datagram with an arbitrary source, as a spoofing peer could. */
    inject(data: string, source: Endpoint, destination: Endpoint): boolean {
        return this.route({ data, source, destination });
    }

    route(delivery: Delivery): boolean {
        const target = this.nodes.get(`${delivery.destination.ip}:${delivery.destination.port}`);
        if (!target) return false;
        if (this.filters.some(f => f(delivery))) {
            this.dropped.push(delivery);
            return true; // UDP gives the sender no signal
        }
        this.delivered.push(delivery);
        setImmediate(() => target.receive(Buffer.from(delivery.data, "utf8"), delivery.source));
        return true;
    }

    broadcast(data: string, source: Endpoint, port: number): void {
        for (const node of this.nodes.values()) {
            if (node.port !== port || node.localAddress === source.ip) continue;
            this.route({ data, source, destination: { ip: node.localAddress, port } });
        }
    }

    /** Delivered datagrams whose frame carries the given TYPE line. */
    deliveredOfType(type: string): Delivery[] {
        return this.delivered.filter(d => d.data.startsWith(`TYPE: ${type}\n`));
    }

    /** Resolves once no delivery is queued; useful after a burst of sends. */
    async settle(rounds = 5): Promise<void> {
        for (let i = 0; i < rounds; i++) {
            await new Promise(r => setImmediate(r));
        }
    }
}

export class MemoryTransport implements Transport {
    private listeners: DatagramListener[] = [];
    private closed = false;
    private nextEphemeralPort = 40000;

    constructor(
        private readonly network: MemoryNetwork,
        readonly localAddress: string,
        readonly port: number
    ) {}

    // Outgoing datagrams leave from an ephemeral port, like a fresh UDP socket
    private sourceEndpoint(): Endpoint {
        this.nextEphemeralPort = this.nextEphemeralPort >= 60000 ? 40000 : this.nextEphemeralPort + 1;
        return { ip: this.localAddress, port: this.nextEphemeralPort };
    }

    async send(data: string, ip: string, port: number): Promise<boolean> {
        if (this.closed) return false;
        return this.network.route({ data, source: this.sourceEndpoint(), destination: { ip, port } });
    }

    async broadcast(data: string, port: number): Promise<void> {
        if (this.closed) return;
        this.network.broadcast(data, this.sourceEndpoint(), port);
    }

    onDatagram(listener: DatagramListener): void {
        this.listeners.push(listener);
    }

    receive(data: Buffer, source: Endpoint): void {
        if (this.closed) return;
        for (const listener of this.listeners) {
            listener(data, source);
        }
    }

    async close(): Promise<void> {
        this.closed = true;
        this.network.detach(this);
    }
}

import dgram from "node:dgram";
import os from "node:os";
import { Endpoint, Logger, createLogger } from "@lsnp/core";

export type DatagramListener = (data: Buffer, source: Endpoint) => void;

export interface Transport {
    /** Address the transport is reachable at (ip of the local identity). */
    readonly localAddress: string;
    send(data: string, ip: string, port: number): Promise<boolean>;
    broadcast(data: string, port: number): Promise<void>;
    onDatagram(listener: DatagramListener): void;
    close(): Promise<void>;
}

const LIMITED_BROADCAST = "255.255.255.255";

export function detectLocalIp(): string {
    for (const addrs of Object.values(os.networkInterfaces())) {
        for (const addr of addrs ?? []) {
            if (addr.family === "IPv4" && !addr.internal) return addr.address;
        }
    }
    return "127.0.0.1";
}

export function subnetBroadcast(ip: string): string {
    const parts = ip.split(".");
    parts[3] = "255";
    return parts.join(".");
}

export interface UdpTransportOptions {
    port: number;
    localAddress?: string;
    bindAttempts?: number;
    bindRetryDelayMs?: number;
    verbose?: boolean;
}

/**
 * UDP transport bound to the well-known port on all interfaces. Receives
 * broadcasts; sends unicast and to both the subnet and limited broadcast
 * addresses.
 */
export class UdpTransport implements Transport {
    readonly localAddress: string;
    private socket: dgram.Socket;
    private listeners: DatagramListener[] = [];
    private log: Logger;

    private constructor(socket: dgram.Socket, localAddress: string, log: Logger) {
        this.socket = socket;
        this.localAddress = localAddress;
        this.log = log;

        this.socket.on("message", (data, rinfo) => {
            const source = { ip: rinfo.address, port: rinfo.port };
            for (const listener of this.listeners) {
                listener(data, source);
            }
        });
        // Read errors must not end the receive loop
        this.socket.on("error", (err) => {
            this.log.error("Socket error", err);
        });
    }

    static async bind(options: UdpTransportOptions): Promise<UdpTransport> {
        const log = createLogger("udp", { verbose: options.verbose });
        const attempts = options.bindAttempts ?? 5;
        const delay = options.bindRetryDelayMs ?? 1000;

        for (let attempt = 1; ; attempt++) {
            const socket = dgram.createSocket({ type: "udp4", reuseAddr: true });
            try {
                await new Promise<void>((resolve, reject) => {
                    socket.once("error", reject);
                    socket.bind(options.port, () => {
                        socket.off("error", reject);
                        resolve();
                    });
                });
                socket.setBroadcast(true);
                log.info(`Listening on UDP port ${options.port}`);
                return new UdpTransport(socket, options.localAddress ?? detectLocalIp(), log);
            } catch (e) {
                socket.close();
                if (attempt >= attempts) {
                    throw e;
                }
                log.warn(`Retry ${attempt}: failed to bind port ${options.port}, retrying in ${delay}ms...`);
                await new Promise(r => setTimeout(r, delay));
            }
        }
    }

    send(data: string, ip: string, port: number): Promise<boolean> {
        return new Promise((resolve) => {
            this.socket.send(data, port, ip, (err) => {
                if (err) {
                    this.log.debug(`Send to ${ip}:${port} failed: ${err.message}`);
                    resolve(false);
                } else {
                    resolve(true);
                }
            });
        });
    }

    async broadcast(data: string, port: number): Promise<void> {
        const targets = new Set([subnetBroadcast(this.localAddress), LIMITED_BROADCAST]);
        for (const target of targets) {
            const ok = await this.send(data, target, port);
            if (!ok) this.log.warn(`Broadcast to ${target} failed`);
        }
    }

    onDatagram(listener: DatagramListener): void {
        this.listeners.push(listener);
    }

    close(): Promise<void> {
        return new Promise((resolve) => this.socket.close(() => resolve()));
    }
}

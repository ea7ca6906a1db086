import { Endpoint, Logger, Ping, Profile } from "@lsnp/core";
import { PeerContext } from "./context";

/** Periodic PING/PROFILE broadcasts and the directory updates they carry. */
export class PresenceService {
    private timers: NodeJS.Timeout[] = [];
    private log: Logger;

    constructor(private readonly ctx: PeerContext) {
        this.log = ctx.logger("presence");
    }

    broadcastPing(): Promise<void> {
        return this.ctx.outbox.broadcast({ type: "PING", userId: this.ctx.identity });
    }

    broadcastProfile(): Promise<void> {
        return this.ctx.outbox.broadcast({
            type: "PROFILE",
            userId: this.ctx.identity,
            displayName: this.ctx.config.displayName,
            status: this.ctx.config.status,
        });
    }

    async announce(): Promise<void> {
        await this.broadcastProfile();
        await this.broadcastPing();
    }

    start(): void {
        if (this.timers.length > 0) return;
        const every = (fn: () => Promise<void>) => {
            const timer = setInterval(() => {
                fn().catch((e) => this.log.error("Presence broadcast failed", e));
            }, this.ctx.config.pingIntervalMs);
            timer.unref();
            this.timers.push(timer);
        };
        every(() => this.broadcastPing());
        every(() => this.broadcastProfile());
    }

    stop(): void {
        for (const timer of this.timers) clearInterval(timer);
        this.timers = [];
    }

    handlePing(message: Ping, source: Endpoint): void {
        const known = this.ctx.directory.get(message.userId) !== undefined;
        const record = this.ctx.directory.upsert(message.userId, source.ip);
        this.log.debug(`PING from ${message.userId} at ${source.ip}`);
        if (!known) this.ctx.emit("peer", record);
    }

    handleProfile(message: Profile, source: Endpoint): void {
        const record = this.ctx.directory.upsert(message.userId, source.ip, Date.now(), {
            displayName: message.displayName,
            status: message.status ?? "",
        });
        this.log.debug(`PROFILE from ${message.displayName} (${message.userId}) at ${source.ip}`);
        this.ctx.emit("peer", record);
    }
}

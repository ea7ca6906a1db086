import { MessageId } from "@lsnp/core";

/** One outstanding reliable send. Resolves at most once. */
export class AckWaiter {
    private settled = false;
    private listeners = new Set<() => void>();

    constructor(readonly messageId: MessageId) {}

    get acknowledged(): boolean {
        return this.settled;
    }

    /** Waits up to timeoutMs for the ACK; true if it arrived (now or earlier). */
    wait(timeoutMs: number): Promise<boolean> {
        if (this.settled) return Promise.resolve(true);
        return new Promise((resolve) => {
            const done = () => {
                clearTimeout(timer);
                resolve(true);
            };
            const timer = setTimeout(() => {
                this.listeners.delete(done);
                resolve(false);
            }, timeoutMs);
            this.listeners.add(done);
        });
    }

    settle(): boolean {
        if (this.settled) return false;
        this.settled = true;
        for (const listener of this.listeners) listener();
        this.listeners.clear();
        return true;
    }
}

export class AckRegistry {
    private waiters = new Map<MessageId, AckWaiter>();

    register(messageId: MessageId): AckWaiter {
        let waiter = this.waiters.get(messageId);
        if (!waiter) {
            waiter = new AckWaiter(messageId);
            this.waiters.set(messageId, waiter);
        }
        return waiter;
    }

    /** Signals the waiter for messageId. Unknown and already-resolved ids are ignored. */
    resolve(messageId: MessageId): boolean {
        const waiter = this.waiters.get(messageId);
        if (!waiter) return false;
        this.waiters.delete(messageId);
        return waiter.settle();
    }

    abandon(messageId: MessageId): void {
        this.waiters.delete(messageId);
    }

    pending(): MessageId[] {
        return Array.from(this.waiters.keys());
    }
}

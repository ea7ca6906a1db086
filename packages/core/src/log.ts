export interface Logger {
    info(msg: string): void;
    debug(msg: string): void;
    warn(msg: string): void;
    error(msg: string, err?: unknown): void;
}

export interface LoggerOptions {
    verbose?: boolean;
}

function stamp(tag: string): string {
    return `[${new Date().toISOString()}] [${tag}]`;
}

export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
    const verbose = options.verbose ?? false;
    return {
        info(msg) {
            console.log(`${stamp(tag)} ${msg}`);
        },
        debug(msg) {
            if (verbose) console.log(`${stamp(tag)} ${msg}`);
        },
        warn(msg) {
            console.warn(`${stamp(tag)} WARN: ${msg}`);
        },
        error(msg, err) {
            const errStr = err instanceof Error ? err.message : String(err ?? "");
            console.error(`${stamp(tag)} ERROR: ${msg}${errStr ? `: ${errStr}` : ""}`);
        },
    };
}


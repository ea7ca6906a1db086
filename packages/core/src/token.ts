import { Clock, Identity, SCOPES, Scope, Token, TokenCheck, TokenString, UnixSeconds } from "./types";

export const DEFAULT_TOKEN_TTL = 3600;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

function isScope(value: string): value is Scope {
    return (SCOPES as readonly string[]).includes(value);
}

export function formatToken(token: Token): TokenString {
    return `${token.identity}|${token.expiry}|${token.scope}`;
}

/** Splits "identity|expiry|scope"; undefined when it is not exactly that. */
export function parseToken(raw: TokenString): Token | undefined {
    const parts = raw.split("|");
    if (parts.length !== 3) return undefined;
    const [identity, expiryRaw, scope] = parts;
    if (!identity || !/^\d+$/.test(expiryRaw) || !isScope(scope)) return undefined;
    return { identity, expiry: Number(expiryRaw), scope };
}

/**
 * Mints tokens for the local identity, validates tokens on inbound messages
 * and keeps the revocation table.
 *
 * Revocation records live until the revoked token's own expiry; after that
 * the token fails on expiry alone, so the record is dropped.
 */
export class TokenAuthority {
    private readonly clock: Clock;
    private readonly revoked = new Map<TokenString, UnixSeconds>();
    private readonly issuedTokens = new Map<TokenString, UnixSeconds>();

    constructor(private readonly identity: Identity, clock: Clock = systemClock) {
        this.clock = clock;
    }

    now(): UnixSeconds {
        return this.clock();
    }

    mint(scope: Scope, ttl: number = DEFAULT_TOKEN_TTL, identity: Identity = this.identity): TokenString {
        const expiry = this.clock() + ttl;
        const token = formatToken({ identity, expiry, scope });
        if (identity === this.identity) {
            this.issuedTokens.set(token, expiry);
        }
        return token;
    }

    /** Whether this authority minted the token (only the issuer may revoke). */
    issued(token: TokenString): boolean {
        const expiry = this.issuedTokens.get(token);
        if (expiry === undefined) return false;
        if (this.clock() > expiry) {
            this.issuedTokens.delete(token);
            return false;
        }
        return true;
    }

    validate(token: TokenString, expectedScope: Scope): TokenCheck {
        const parsed = parseToken(token);
        if (!parsed) return { ok: false, reason: "malformed" };
        if (this.clock() > parsed.expiry) return { ok: false, reason: "expired" };
        if (parsed.scope !== expectedScope) return { ok: false, reason: "scope_mismatch" };
        if (this.isRevoked(token)) return { ok: false, reason: "revoked" };
        return { ok: true, reason: "ok" };
    }

    revoke(token: TokenString): void {
        if (this.revoked.has(token)) return;
        const parsed = parseToken(token);
        if (!parsed || this.clock() > parsed.expiry) return;
        this.revoked.set(token, parsed.expiry);
        this.issuedTokens.delete(token);
    }

    isRevoked(token: TokenString): boolean {
        const expiry = this.revoked.get(token);
        if (expiry === undefined) return false;
        if (this.clock() > expiry) {
            this.revoked.delete(token);
            return false;
        }
        return true;
    }

    /** Drops revocation records whose token has expired. */
    gc(): number {
        const now = this.clock();
        let dropped = 0;
        for (const [token, expiry] of this.revoked) {
            if (now > expiry) {
                this.revoked.delete(token);
                dropped++;
            }
        }
        for (const [token, expiry] of this.issuedTokens) {
            if (now > expiry) this.issuedTokens.delete(token);
        }
        return dropped;
    }

    revocationCount(): number {
        return this.revoked.size;
    }
}

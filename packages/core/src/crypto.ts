import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, randomBytes } from "@noble/hashes/utils";

/** Hex sha256 digest, logged on both ends of a file transfer. */
export function hashBytes(data: Uint8Array): string {
    return bytesToHex(sha256(data));
}

/** 8 lowercase hex chars, the id format used for MESSAGE_ID and FILEID. */
export function randomId(): string {
    return bytesToHex(randomBytes(4));
}

export function randomGameId(): string {
    return `g${randomBytes(1)[0]}`;
}

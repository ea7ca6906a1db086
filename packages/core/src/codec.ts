import { LsnpError } from "./errors";
import { Fields } from "./types";

const TERMINATOR = "\n\n";

/**
 * Parses an LSNP frame into its key/value fields.
 *
 * Line endings are normalised first and only the header before the first
 * blank line is read. Returns null when the frame has no blank-line terminator.
 */
export function parseFrame(raw: string): Fields | null {
    const normalized = raw.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
    const end = normalized.indexOf(TERMINATOR);
    if (end === -1) return null;

    const fields: Fields = {};
    for (const line of normalized.slice(0, end).split("\n")) {
        const sep = line.indexOf(": ");
        if (sep === -1) continue;
        const key = line.slice(0, sep).trim();
        if (!key) continue;
        fields[key] = line.slice(sep + 2).trim();
    }
    return fields;
}

export function buildFrame(fields: Fields): string {
    let body = "";
    for (const [key, value] of Object.entries(fields)) {
        if (key.includes("\n") || value.includes("\n") || value.includes("\r")) {
            throw new LsnpError("INVALID_FIELD", `Field ${key} contains a line break`, { key });
        }
        body += `${key}: ${value}\n`;
    }
    return body + "\n";
}

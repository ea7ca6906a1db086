export type LsnpErrorCode =
    | "INVALID_CONFIG"
    | "INVALID_FIELD"
    | "INVALID_IDENTITY"
    | "INVALID_TOKEN";

export class LsnpError extends Error {
    readonly code: LsnpErrorCode;
    readonly details?: Record<string, unknown>;

    constructor(code: LsnpErrorCode, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = "LsnpError";
        this.code = code;
        this.details = details;
    }
}

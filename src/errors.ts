/**
 * Fatal errors: raised before any scoring starts and reported by the CLI
 * as a plain message with a non-zero exit code.
 */

export type FactCheckErrorKind = "config" | "io";

export type FactCheckErrorCode =
    | "MISSING_CREDENTIAL"   // no OPENAI_API_KEY
    | "INVALID_CONFIG"       // option failed validation
    | "ARTICLE_NOT_FOUND"
    | "SOURCES_NOT_FOUND"    // sources directory missing
    | "NO_SOURCES"           // directory has no source* files
    | "READ_FAILED"
    | "WRITE_FAILED";

const ERROR_KINDS: Record<FactCheckErrorCode, FactCheckErrorKind> = {
    MISSING_CREDENTIAL: "config",
    INVALID_CONFIG: "config",
    ARTICLE_NOT_FOUND: "io",
    SOURCES_NOT_FOUND: "io",
    NO_SOURCES: "io",
    READ_FAILED: "io",
    WRITE_FAILED: "io",
};

export class FactCheckError extends Error {
    readonly code: FactCheckErrorCode;
    readonly kind: FactCheckErrorKind;
    readonly details?: Record<string, unknown>;

    constructor(code: FactCheckErrorCode, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = "FactCheckError";
        this.code = code;
        this.kind = ERROR_KINDS[code];
        if (details !== undefined) {
            this.details = details;
        }
    }
}

export function isFactCheckError(error: unknown): error is FactCheckError {
    return error instanceof FactCheckError;
}

/**
 * Message of an unknown thrown value, for logging
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

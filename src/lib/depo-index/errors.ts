/**
 * DepoIndex: Error Types
 *
 * Every error raised by the pipeline carries a stable `code` so callers can
 * branch on it without string matching.
 */

export class DepoIndexError extends Error {
    readonly code: string;
    readonly context?: Record<string, unknown>;

    constructor(message: string, code: string, context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.context = context;
    }
}

/** No usable content after cleaning. Fatal to the run. */
export class EmptyInputError extends DepoIndexError {
    constructor(message = "Transcript has no usable content after cleaning.") {
        super(message, "EMPTY_INPUT");
    }
}

/** The AI capability replied with something that is not the expected structure */
export class MalformedResponseError extends DepoIndexError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, "MALFORMED_RESPONSE", context);
    }
}

/** No AI backend configured; callers switch to the fallback path */
export class CapabilityUnavailableError extends DepoIndexError {
    constructor(message: string) {
        super(message, "CAPABILITY_UNAVAILABLE");
    }
}

/** A bug: data reached a stage that should have been filtered earlier */
export class InternalInvariantError extends DepoIndexError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, "INTERNAL_INVARIANT", context);
    }
}

export class SortKeyError extends InternalInvariantError {}

export class ConfigError extends DepoIndexError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration: ${issues.join("; ")}`, "INVALID_CONFIG");
        this.issues = issues;
    }
}

/**
 * Error taxonomy for ldsync.
 *
 * Every error raised for bad input or a failed repository call extends
 * LdSyncError, which is what the import driver catches per row. Anything
 * else is a defect and propagates.
 */

export const ErrorCode = {
    TERM_CONVERSION: 'TERM_CONVERSION',
    INDEX_PARSE: 'INDEX_PARSE',
    LOOKUP: 'LOOKUP',
    INDEX_OVERFLOW: 'INDEX_OVERFLOW',
    MISSING_COLUMN: 'MISSING_COLUMN',
    MISSING_VALUE: 'MISSING_VALUE',
    UNKNOWN_MODEL: 'UNKNOWN_MODEL',
    MODEL_DEFINITION: 'MODEL_DEFINITION',
    UPDATE_PARSE: 'UPDATE_PARSE',
    REPOSITORY: 'REPOSITORY',
    CONFIG: 'CONFIG',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export class LdSyncError extends Error {
    readonly code: ErrorCodeType;

    constructor(code: ErrorCodeType, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** A cell value cannot be coerced to the term shape a property demands. */
export class TermConversionError extends LdSyncError {
    constructor(readonly value: string, readonly expected: string) {
        super(ErrorCode.TERM_CONVERSION, `Cannot convert "${value}" to ${expected}`);
    }
}

/** An index descriptor entry is malformed. */
export class IndexParseError extends LdSyncError {
    constructor(readonly entry: string, reason: string) {
        super(ErrorCode.INDEX_PARSE, `Invalid index entry "${entry}": ${reason}`);
    }
}

/** An index descriptor refers to an embedded object the resource does not hold. */
export class LookupError extends LdSyncError {
    constructor(readonly attribute: string, readonly uri: string) {
        super(ErrorCode.LOOKUP, `No embedded "${attribute}" object with URI <${uri}>`);
    }
}

/** A row holds more values for an embedded property than the index has positions. */
export class IndexOverflowError extends LdSyncError {
    constructor(readonly attribute: string, readonly position: number) {
        super(
            ErrorCode.INDEX_OVERFLOW,
            `No indexed "${attribute}" object at position ${position}`
        );
    }
}

export class MissingColumnError extends LdSyncError {
    constructor(readonly column: string) {
        super(ErrorCode.MISSING_COLUMN, `Required column "${column}" is missing`);
    }
}

export class MissingValueError extends LdSyncError {
    constructor(readonly column: string) {
        super(ErrorCode.MISSING_VALUE, `Column "${column}" is empty`);
    }
}

export class UnknownModelError extends LdSyncError {
    constructor(readonly model: string) {
        super(ErrorCode.UNKNOWN_MODEL, `Unknown model "${model}"`);
    }
}

export class ModelDefinitionError extends LdSyncError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(ErrorCode.MODEL_DEFINITION, message, options);
    }
}

export class UpdateParseError extends LdSyncError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(ErrorCode.UPDATE_PARSE, message, options);
    }
}

/** The repository could not be read from or written to. */
export class RepositoryError extends LdSyncError {
    constructor(
        message: string,
        readonly uri: string,
        readonly status?: number,
        options?: { cause?: unknown }
    ) {
        super(ErrorCode.REPOSITORY, message, options);
    }
}

export class ConfigError extends LdSyncError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(ErrorCode.CONFIG, message, options);
    }
}

export function isLdSyncError(error: unknown): error is LdSyncError {
    return error instanceof LdSyncError;
}

// src/utils/errors.ts

export type EmailAssistantErrorCode =
    | 'AUTHENTICATION_FAILED'
    | 'CONNECTION_FAILED'
    | 'STRUCTURAL_VALIDATION_FAILED'
    | 'EMPTY_INPUT'
    | 'INDEX_NOT_FOUND'
    | 'QUERY_FAILED'
    | 'CONFIGURATION_INVALID';

/** Base error for every failure the assistant reports to its callers. */
export class EmailAssistantError extends Error {
    readonly code: EmailAssistantErrorCode;

    constructor(code: EmailAssistantErrorCode, message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'EmailAssistantError';
        this.code = code;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class AuthenticationFailedError extends EmailAssistantError {
    constructor(message: string, cause?: unknown) {
        super('AUTHENTICATION_FAILED', message, cause);
        this.name = 'AuthenticationFailedError';
    }
}

export class ConnectionFailedError extends EmailAssistantError {
    constructor(message: string, cause?: unknown) {
        super('CONNECTION_FAILED', message, cause);
        this.name = 'ConnectionFailedError';
    }
}

/** Raised when an email record is missing one of its required fields. */
export class StructuralValidationError extends EmailAssistantError {
    constructor(message: string, cause?: unknown) {
        super('STRUCTURAL_VALIDATION_FAILED', message, cause);
        this.name = 'StructuralValidationError';
    }
}

export class EmptyInputError extends EmailAssistantError {
    constructor(message: string) {
        super('EMPTY_INPUT', message);
        this.name = 'EmptyInputError';
    }
}

export class IndexNotFoundError extends EmailAssistantError {
    constructor(message: string) {
        super('INDEX_NOT_FOUND', message);
        this.name = 'IndexNotFoundError';
    }
}

export class QueryFailedError extends EmailAssistantError {
    constructor(message: string, cause?: unknown) {
        super('QUERY_FAILED', message, cause);
        this.name = 'QueryFailedError';
    }
}

export class ConfigurationInvalidError extends EmailAssistantError {
    readonly problems: string[];

    constructor(problems: string[]) {
        super(
            'CONFIGURATION_INVALID',
            `Configuration validation failed:\n${problems.map(p => `  - ${p}`).join('\n')}`
        );
        this.name = 'ConfigurationInvalidError';
        this.problems = problems;
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

const STATUS_BY_CODE: Record<EmailAssistantErrorCode, number> = {
    AUTHENTICATION_FAILED: 401,
    CONNECTION_FAILED: 502,
    STRUCTURAL_VALIDATION_FAILED: 400,
    EMPTY_INPUT: 400,
    INDEX_NOT_FOUND: 404,
    QUERY_FAILED: 502,
    CONFIGURATION_INVALID: 400,
};

/**
 * Maps an error to the HTTP status the API answers with.
 */
export function httpStatusFor(error: unknown): number {
    return error instanceof EmailAssistantError ? STATUS_BY_CODE[error.code] : 500;
}

/**
 * Error types for the context pipeline.
 *
 * Fatal conditions are thrown as ContextError subclasses.
 * Non-fatal conditions are collected as ContextWarning values and rendered
 * into the document instead of aborting the run.
 */

export type ContextErrorCode = 'InvalidRoot' | 'OutputWriteError' | 'ConfigError';

export interface ContextErrorOptions {
    /** Filesystem path the error refers to */
    path?: string;
    cause?: unknown;
}

export class ContextError extends Error {
    public readonly code: ContextErrorCode;
    public readonly path?: string;
    public readonly cause?: unknown;

    constructor(code: ContextErrorCode, message: string, options: ContextErrorOptions = {}) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.path = options.path;
        this.cause = options.cause;
    }
}

/** Root path is missing, or is not the kind of path the mode needs. */
export class InvalidRootError extends ContextError {
    constructor(message: string, options: ContextErrorOptions = {}) {
        super('InvalidRoot', message, options);
    }
}

/** The assembled document could not be written. */
export class OutputWriteError extends ContextError {
    constructor(message: string, options: ContextErrorOptions = {}) {
        super('OutputWriteError', message, options);
    }
}

/** Config file or rule values are unusable. */
export class ConfigError extends ContextError {
    constructor(message: string, options: ContextErrorOptions = {}) {
        super('ConfigError', message, options);
    }
}

export type WarningKind = 'PermissionDenied' | 'ReadError' | 'DecodeError' | 'WalkError';

export interface ContextWarning {
    kind: WarningKind;
    /** Path relative to the project root ('/' separated) */
    path: string;
    message: string;
}

/** Node fs errors carry a string `code` (ENOENT, EACCES, ...). */
export function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const { code } = error;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Build a warning from a caught fs error. EACCES/EPERM become PermissionDenied,
 * everything else falls back to the given kind.
 */
export function toWarning(path: string, error: unknown, fallback: WarningKind): ContextWarning {
    const code = errorCode(error);
    const kind: WarningKind = code === 'EACCES' || code === 'EPERM' ? 'PermissionDenied' : fallback;
    return { kind, path, message: errorMessage(error) };
}

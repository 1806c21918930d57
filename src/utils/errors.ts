/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Retry with different input might succeed
    TRANSIENT = "TRANSIENT", // Temporary issue, will resolve
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Configuration and wiring
    INVALID_CONFIG = "INVALID_CONFIG",
    CONTRACT_VIOLATION = "CONTRACT_VIOLATION",

    // Collaborators
    PROVIDER_UNAVAILABLE = "PROVIDER_UNAVAILABLE",
    PROVIDER_RESPONSE_INVALID = "PROVIDER_RESPONSE_INVALID",
    LIBRARY_UNAVAILABLE = "LIBRARY_UNAVAILABLE",

    // Storage
    PERSISTENCE_FAILED = "PERSISTENCE_FAILED",
    PERMISSION_DENIED = "PERMISSION_DENIED",
    DISK_FULL = "DISK_FULL",

    // Control flow
    OPERATION_CANCELLED = "OPERATION_CANCELLED",
    UNKNOWN_ACTION = "UNKNOWN_ACTION",
}

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, AppError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

export function cancellationError(operation: string): AppError {
    return new AppError(
        ErrorCode.OPERATION_CANCELLED,
        ErrorCategory.RECOVERABLE,
        `${operation} was cancelled`
    );
}

/**
 * True for our own cancellation error and for the DOMException/axios shapes
 * an aborted signal produces.
 */
export function isCancellation(error: unknown): boolean {
    if (error instanceof AppError) {
        return error.code === ErrorCode.OPERATION_CANCELLED;
    }
    if (error instanceof Error) {
        return error.name === "AbortError" || error.name === "CanceledError";
    }
    return false;
}

function readErrorCode(error: unknown): string | undefined {
    if (typeof error === "object" && error !== null && "code" in error) {
        const code = error.code;
        return typeof code === "string" ? code : undefined;
    }
    return undefined;
}

function readErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap a filesystem error raised while reading or writing a document
 */
export function wrapPersistenceError(err: unknown, context: string): AppError {
    const code = readErrorCode(err);
    const details = { originalError: readErrorMessage(err), errno: code };

    if (code === "EACCES" || code === "EPERM") {
        return new AppError(
            ErrorCode.PERMISSION_DENIED,
            ErrorCategory.FATAL,
            `Permission denied: ${context}`,
            details
        );
    }

    if (code === "ENOSPC") {
        return new AppError(
            ErrorCode.DISK_FULL,
            ErrorCategory.TRANSIENT,
            `Disk full: ${context}`,
            details
        );
    }

    return new AppError(
        ErrorCode.PERSISTENCE_FAILED,
        ErrorCategory.TRANSIENT,
        `Failed to persist: ${context}`,
        details
    );
}

/**
 * Constructor guard for required collaborators.
 */
export function requireDependency<T>(
    value: T | null | undefined,
    name: string
): T {
    if (value === null || value === undefined) {
        throw new AppError(
            ErrorCode.CONTRACT_VIOLATION,
            ErrorCategory.FATAL,
            `Missing required collaborator: ${name}`,
            { dependency: name }
        );
    }
    return value;
}

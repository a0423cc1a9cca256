/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Caller can fix the input and retry
    TRANSIENT = "TRANSIENT", // Remote side may recover on its own
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Playback errors
    EMPTY_ALBUM = "EMPTY_ALBUM",
    INDEX_OUT_OF_RANGE = "INDEX_OUT_OF_RANGE",
    NO_ALBUM_LOADED = "NO_ALBUM_LOADED",

    // Catalog errors
    INVALID_RELEASE_REFERENCE = "INVALID_RELEASE_REFERENCE",
    RELEASE_NOT_FOUND = "RELEASE_NOT_FOUND",

    // Remote services (Last.fm, Discogs)
    EXTERNAL_SERVICE_FAILURE = "EXTERNAL_SERVICE_FAILURE",

    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",
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

export function emptyAlbumError(details?: Record<string, unknown>): AppError {
    return new AppError(
        ErrorCode.EMPTY_ALBUM,
        ErrorCategory.RECOVERABLE,
        "Album has no playable tracks",
        details
    );
}

export function indexOutOfRangeError(index: number, length: number): AppError {
    return new AppError(
        ErrorCode.INDEX_OUT_OF_RANGE,
        ErrorCategory.RECOVERABLE,
        `Track index ${index} is outside [0, ${length})`,
        { index, length }
    );
}

export function noAlbumLoadedError(): AppError {
    return new AppError(
        ErrorCode.NO_ALBUM_LOADED,
        ErrorCategory.RECOVERABLE,
        "No album loaded - load a release first"
    );
}

/**
 * Wrap a failed remote call (Last.fm, Discogs) in an AppError
 */
export function externalServiceError(
    service: string,
    operation: string,
    err: unknown
): AppError {
    const message = err instanceof Error ? err.message : String(err);
    return new AppError(
        ErrorCode.EXTERNAL_SERVICE_FAILURE,
        ErrorCategory.TRANSIENT,
        `${service} ${operation} failed: ${message}`,
        { service, operation, originalError: message }
    );
}

export function isAppError(error: unknown, code?: ErrorCode): error is AppError {
    return error instanceof AppError && (code === undefined || error.code === code);
}

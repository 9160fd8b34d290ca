/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Retry might succeed
    TRANSIENT = "TRANSIENT", // Temporary issue, will resolve
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Pipeline errors
    RESOLUTION_FAILED = "RESOLUTION_FAILED",
    PLAYER_CONSTRUCTION_FAILED = "PLAYER_CONSTRUCTION_FAILED",
    STALE_RESOLUTION = "STALE_RESOLUTION",

    // Queue errors
    INVALID_QUEUE_POSITION = "INVALID_QUEUE_POSITION",
    TRACK_NOT_FOUND = "TRACK_NOT_FOUND",

    // Source errors
    FILE_NOT_FOUND = "FILE_NOT_FOUND",
    PLAYBACK_FAILED = "PLAYBACK_FAILED",
    CATALOG_REQUEST_FAILED = "CATALOG_REQUEST_FAILED",

    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",
}

export type PlaybackErrorDetails = Record<string, unknown>;

/**
 * Error raised or reported by the playback session and its collaborators.
 */
export class PlaybackError extends Error {
    constructor(
        public readonly code: ErrorCode,
        public readonly category: ErrorCategory,
        message: string,
        public readonly details?: PlaybackErrorDetails
    ) {
        super(message);
        this.name = "PlaybackError";
        Object.setPrototypeOf(this, PlaybackError.prototype);
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

export function isRecoverable(error: unknown): boolean {
    if (error instanceof PlaybackError) {
        return error.category === ErrorCategory.RECOVERABLE;
    }
    return false;
}

export function isTransient(error: unknown): boolean {
    if (error instanceof PlaybackError) {
        return error.category === ErrorCategory.TRANSIENT;
    }
    return false;
}

function describeCause(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/**
 * Wrap an unknown failure from a collaborator (resolver, adapter factory)
 * in a PlaybackError, keeping PlaybackErrors as they are.
 */
export function toPlaybackError(
    error: unknown,
    code: ErrorCode,
    context: string
): PlaybackError {
    if (error instanceof PlaybackError) {
        return error;
    }

    return new PlaybackError(
        code,
        ErrorCategory.RECOVERABLE,
        `${context}: ${describeCause(error)}`,
        { originalError: describeCause(error) }
    );
}

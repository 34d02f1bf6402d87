/**
 * Domain errors.
 *
 * Everything the engine throws on purpose extends AevcError, so callers can
 * catch the whole family with `instanceof AevcError` or a single failure by
 * its class.
 */

export class AevcError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = this.constructor.name
    }
}

// Preconditions

export class FileNotFoundError extends AevcError {
    constructor(public readonly path: string) {
        super(`File '${path}' does not exist`)
    }
}

export class InvalidExtensionError extends AevcError {
    constructor(public readonly path: string, public readonly allowed: readonly string[]) {
        super(`File '${path}' must have one of these extensions: ${allowed.join(", ")}`)
    }
}

export class AlreadyInitializedError extends AevcError {
    constructor(public readonly configPath: string) {
        super(`A project is already initialized at '${configPath}'`)
    }
}

export class NotInitializedError extends AevcError {
    constructor(public readonly configPath: string) {
        super(`No project found at '${configPath}'`)
    }
}

export class VersionNotFoundError extends AevcError {
    constructor(public readonly version: number) {
        super(`Version ${version} does not exist`)
    }
}

export class LastVersionError extends AevcError {
    constructor(public readonly version: number) {
        super(`Version ${version} is the only version of the project and cannot be removed`)
    }
}

export class RestoreConflictError extends AevcError {
    constructor(public readonly path: string) {
        super(`Restoring would overwrite the tracked project file '${path}', choose another output directory`)
    }
}

export class NoProjectSelectedError extends AevcError {
    constructor() {
        super("No project selected")
    }
}

// Backend readiness and operations

export class BackendUnavailableError extends AevcError {
    constructor(public readonly backend: string, reason: string, options?: { cause?: unknown }) {
        super(`Storage backend '${backend}' is not available: ${reason}`, options)
    }
}

export class BackendVersionError extends AevcError {
    constructor(
        public readonly backend: string,
        public readonly found: string,
        public readonly required: string
    ) {
        super(`Storage backend '${backend}' version ${found} is not supported (${required} or newer is required)`)
    }
}

export class BackendOperationError extends AevcError {
    constructor(
        public readonly operation: string,
        public readonly key: string,
        reason: string,
        options?: { cause?: unknown }
    ) {
        super(`Storage ${operation} failed for '${key}': ${reason}`, options)
    }
}

// Reading and persisting

export class ExtractionError extends AevcError {
    constructor(public readonly path: string, reason: string, options?: { cause?: unknown }) {
        super(`Failed to read project file '${path}': ${reason}`, options)
    }
}

export class PersistenceError extends AevcError {
    constructor(public readonly configPath: string, reason: string, options?: { cause?: unknown }) {
        super(`Failed to save project record '${configPath}': ${reason}`, options)
    }
}

export class ProjectLoadError extends AevcError {
    constructor(public readonly configPath: string, reason: string, options?: { cause?: unknown }) {
        super(`Failed to load project record '${configPath}': ${reason}`, options)
    }
}

// Checked by shape: errors raised by Node itself may come from another realm
export function hasErrorCode(err: unknown, ...codes: string[]): boolean {
    return typeof err === "object" && err !== null && "code" in err
        && typeof err.code === "string" && codes.includes(err.code)
}

export function errorMessage(err: unknown): string {
    if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
        return err.message
    }
    return String(err)
}

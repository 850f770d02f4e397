export type StorageErrorKind = "conflict" | "persistence";

/**
 * Error raised by repositories when a commit fails.
 * `conflict`: a targeted row was changed or removed underneath the commit.
 * `persistence`: anything else the store rejected (connectivity, constraints).
 */
export class StorageError extends Error {
    readonly kind: StorageErrorKind;

    constructor(kind: StorageErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "StorageError";
        this.kind = kind;
    }
}

export function storageErrorIs(error: unknown, kind?: StorageErrorKind): error is StorageError {
    return error instanceof StorageError && (kind === undefined || error.kind === kind);
}

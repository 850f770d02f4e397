import { StorageError } from "../storage/storageError.js";

/**
 * Maps an error thrown out of a route to its HTTP status.
 * Store failures (including unresolved conflicts) are fatal; framework
 * client errors such as malformed JSON keep their own 4xx status.
 */
export function apiErrorStatusResolve(error: unknown): number {
    if (error instanceof StorageError) {
        return 500;
    }
    if (typeof error === "object" && error !== null && "statusCode" in error) {
        const statusCode = error.statusCode;
        if (typeof statusCode === "number" && statusCode >= 400 && statusCode < 500) {
            return statusCode;
        }
    }
    return 500;
}

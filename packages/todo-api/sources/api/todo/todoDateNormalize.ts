import { isValid, parseISO } from "date-fns";

/**
 * Parses an ISO-8601 timestamp into an absolute instant.
 * Values carrying an offset keep it; values without one are read as server-local time.
 * Returns null for anything that is not a valid ISO-8601 timestamp.
 */
export function todoDateNormalize(value: string): Date | null {
    const parsed = parseISO(value.trim());
    return isValid(parsed) ? parsed : null;
}

import { InvalidArgumentError } from "commander";

/**
 * Parses a --port value into a TCP port number.
 */
export function portOptionParse(value: string): number {
    const port = Number(value);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new InvalidArgumentError(`Invalid port: ${value}`);
    }
    return port;
}

import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogFormat = "pretty" | "json";
export type LogDestination = "stdout" | "stderr" | string;

export type LogConfig = {
    level: string;
    format: LogFormat;
    destination: LogDestination;
    redact: string[];
    service: string;
    environment: string;
};

const DEFAULT_REDACT = ["password", "connectionString", "*.password", "*.connectionString", "database.url"];

const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

const MODULE_WIDTH = 12;
const PRETTY_RESERVED_FIELDS = new Set([
    "pid",
    "hostname",
    "level",
    "time",
    "__time",
    "__level",
    "service",
    "environment",
    "module",
    "msg"
]);

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }

    const config = resolveLogConfig(overrides);
    rootLogger = buildLogger(config);
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: normalizeModule(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const isDev = process.env.NODE_ENV !== "production";
    const level =
        overrides.level ??
        envValue("TODO_API_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (isUnitTestRun() ? "silent" : isDev ? "debug" : "info");
    const destination = overrides.destination ?? envValue("TODO_API_LOG_DEST") ?? envValue("LOG_DEST") ?? "stdout";
    const forceJson =
        parseBooleanFlag(envValue("TODO_API_LOG_JSON")) ?? parseBooleanFlag(envValue("LOG_JSON")) ?? !isDev;
    let format =
        overrides.format ??
        parseFormat(envValue("TODO_API_LOG_FORMAT")) ??
        parseFormat(envValue("LOG_FORMAT")) ??
        (forceJson ? "json" : "pretty");
    const service = overrides.service ?? envValue("TODO_API_LOG_SERVICE") ?? "todo-api";
    const environment = overrides.environment ?? envValue("NODE_ENV") ?? "development";

    if (!isStdDestination(destination)) {
        format = "json";
    }

    const redact = overrides.redact ?? mergeRedactList(DEFAULT_REDACT, envValue("TODO_API_LOG_REDACT"));

    return {
        level,
        format,
        destination,
        redact,
        service,
        environment
    };
}

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: {
            service: config.service,
            environment: config.environment
        },
        redact: config.redact.length > 0 ? { paths: config.redact, censor: "[REDACTED]" } : undefined,
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    const destination = resolveDestination(config.destination);

    if (config.format === "pretty") {
        const prettyFactory = resolvePrettyFactory();
        if (!prettyFactory) {
            return destination ? pino(options, destination) : pino(options);
        }
        const prettyStream = prettyFactory({
            colorize: true,
            translateTime: false,
            ignore: "pid,hostname,level,service,environment,module",
            hideObject: true,
            levelKey: "__level",
            timestampKey: "__time",
            messageFormat: formatPrettyMessage,
            singleLine: true,
            destination: config.destination === "stderr" ? 2 : 1
        });
        return pino(options, prettyStream);
    }

    return destination ? pino(options, destination) : pino(options);
}

/**
 * Renders one pretty log line as `[HH:mm:ss] [module] message key=value`.
 * Expects: log is a pino record; messageKey names its message field.
 */
export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const time = formatLogTime(log.time ?? Date.now());
    const moduleName = normalizeModule(typeof log.module === "string" ? log.module : undefined);
    const module = `[${moduleName.padEnd(MODULE_WIDTH, " ")}]`;
    const messageValue = log[messageKey];
    const message = messageValue === undefined || messageValue === null ? "" : String(messageValue);
    const details = formatPrettyDetails(log, messageKey);
    const content = [module, message, details].filter((part) => part.length > 0).join(" ");
    return `[${time}] ${content}`;
}

function normalizeModule(moduleName?: string): string {
    if (typeof moduleName !== "string") {
        return "unknown";
    }
    const trimmed = moduleName.trim();
    return trimmed.length > 0 ? trimmed : "unknown";
}

function formatPrettyDetails(log: Record<string, unknown>, messageKey: string): string {
    const details: string[] = [];
    for (const [key, value] of Object.entries(log)) {
        if (key === messageKey || PRETTY_RESERVED_FIELDS.has(key) || value === undefined) {
            continue;
        }
        details.push(`${key}=${formatPrettyDetailValue(value)}`);
    }
    return details.join(" ");
}

function formatPrettyDetailValue(value: unknown): string {
    if (value === null) {
        return "null";
    }
    if (typeof value === "string") {
        return /[=\s]/.test(value) || value.length === 0 ? JSON.stringify(value) : value;
    }
    if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
        return String(value);
    }
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (typeof value === "object" && "message" in value && typeof value.message === "string") {
        return JSON.stringify(value.message);
    }
    return JSON.stringify(value) ?? String(value);
}

function formatLogTime(value: unknown): string {
    let date: Date;
    if (value instanceof Date) {
        date = value;
    } else if (typeof value === "number" || typeof value === "string") {
        date = new Date(value);
    } else {
        date = new Date();
    }
    if (Number.isNaN(date.getTime())) {
        date = new Date();
    }
    return `${padTime(date.getHours())}:${padTime(date.getMinutes())}:${padTime(date.getSeconds())}`;
}

function padTime(value: number): string {
    return String(value).padStart(2, "0");
}

function resolveDestination(destination: LogDestination): DestinationStream | undefined {
    if (destination === "stdout") {
        return undefined;
    }

    if (destination === "stderr") {
        return pino.destination(2);
    }

    return pino.destination({ dest: destination, mkdir: true, sync: false });
}

function resolvePrettyFactory(): ((options: Record<string, unknown>) => DestinationStream) | null {
    try {
        return nodeRequire("pino-pretty");
    } catch {
        return null;
    }
}

function parseFormat(value: string | null): LogFormat | null {
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase().trim();
    return normalized === "pretty" || normalized === "json" ? normalized : null;
}

function parseBooleanFlag(value: string | null): boolean | null {
    if (!value) {
        return null;
    }
    const normalized = value.trim().toLowerCase();
    if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") {
        return true;
    }
    if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") {
        return false;
    }
    return null;
}

function envValue(key: string): string | null {
    const value = process.env[key];
    if (typeof value !== "string") {
        return null;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}

function mergeRedactList(base: string[], extra: string | null): string[] {
    if (!extra) {
        return [...base];
    }

    const additions = extra
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean);
    return [...new Set([...base, ...additions])];
}

function isStdDestination(destination: LogDestination): boolean {
    return destination === "stdout" || destination === "stderr";
}

function isUnitTestRun(): boolean {
    return process.env.VITEST === "true" || process.env.VITEST === "1";
}

import path from "node:path";

import type { SettingsConfig } from "../settings.js";
import { configFreeze } from "./configFreeze.js";
import type { Config, ConfigOverrides, DatabaseTarget } from "./configTypes.js";

export const DEFAULT_SERVER_HOST = "127.0.0.1";
export const DEFAULT_SERVER_PORT = 5000;
export const DEFAULT_CORS_ORIGIN = "http://localhost:3000";

const DEFAULT_DATABASE_FILE = "todo.pglite";

/**
 * Resolves derived paths and defaults into an immutable Config snapshot.
 * Expects: settings already validated by configSettingsParse.
 */
export function configResolve(settings: SettingsConfig, settingsPath: string, overrides: ConfigOverrides = {}): Config {
    const resolvedSettingsPath = path.resolve(settingsPath);
    const configDir = path.dirname(resolvedSettingsPath);
    const dataDir = path.join(configDir, "data");

    return configFreeze({
        settingsPath: resolvedSettingsPath,
        configDir,
        dataDir,
        server: {
            host: overrides.host ?? settings.server?.host ?? DEFAULT_SERVER_HOST,
            port: overrides.port ?? settings.server?.port ?? DEFAULT_SERVER_PORT
        },
        cors: {
            origin: corsOriginNormalize(settings.cors?.origin ?? DEFAULT_CORS_ORIGIN)
        },
        database: databaseTargetResolve(settings, configDir, dataDir),
        settings: structuredClone(settings)
    });
}

function databaseTargetResolve(settings: SettingsConfig, configDir: string, dataDir: string): DatabaseTarget {
    const url = settings.database?.url;
    if (url) {
        return { kind: "postgres", url };
    }
    const databasePath = settings.database?.path;
    if (databasePath === ":memory:") {
        return { kind: "pglite", path: databasePath };
    }
    return {
        kind: "pglite",
        path: databasePath ? path.resolve(configDir, databasePath) : path.join(dataDir, DEFAULT_DATABASE_FILE)
    };
}

// Browsers send the origin without a trailing slash or path.
function corsOriginNormalize(origin: string): string {
    return new URL(origin).origin;
}

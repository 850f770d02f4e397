import path from "node:path";

export type ServerSettings = {
    host?: string;
    port?: number;
};

export type CorsSettings = {
    origin?: string;
};

/**
 * Database target. `url` selects a PostgreSQL server; otherwise an embedded
 * PGlite store is opened at `path` (":memory:" keeps it in process memory).
 */
export type DatabaseSettings = {
    path?: string;
    url?: string;
};

export type SettingsConfig = {
    server?: ServerSettings;
    cors?: CorsSettings;
    database?: DatabaseSettings;
};

export const DEFAULT_SETTINGS_PATH = path.resolve("todo-api.json");

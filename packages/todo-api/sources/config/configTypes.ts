import type { SettingsConfig } from "../settings.js";

export type DatabaseTarget = { kind: "pglite"; path: string } | { kind: "postgres"; url: string };

export type Config = {
    settingsPath: string;
    configDir: string;
    dataDir: string;
    server: {
        host: string;
        port: number;
    };
    cors: {
        origin: string;
    };
    database: DatabaseTarget;
    settings: SettingsConfig;
};

export type ConfigOverrides = {
    host?: string;
    port?: number;
};

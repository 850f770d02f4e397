import { z } from "zod";

import type { SettingsConfig } from "../settings.js";

const settingsSchema = z
    .object({
        server: z
            .object({
                host: z.string().trim().min(1).optional(),
                port: z.number().int().min(1).max(65535).optional()
            })
            .strict()
            .optional(),
        cors: z
            .object({
                origin: z.string().trim().url().optional()
            })
            .strict()
            .optional(),
        database: z
            .object({
                path: z.string().trim().min(1).optional(),
                url: z
                    .string()
                    .trim()
                    .regex(/^postgres(ql)?:\/\//, "database.url must use postgres:// or postgresql://")
                    .optional()
            })
            .strict()
            .optional()
    })
    .strict();

/**
 * Parses raw settings data into a validated SettingsConfig.
 * Expects: raw is JSON-compatible; unknown keys are rejected.
 */
export function configSettingsParse(raw: unknown): SettingsConfig {
    return settingsSchema.parse(raw ?? {});
}

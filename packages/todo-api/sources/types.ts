// Central type re-exports for cross-cutting concerns.
// Import via: import type { ... } from "@/types";

// Config
export type { Config, ConfigOverrides, DatabaseTarget } from "./config/configTypes.js";
export type { SettingsConfig } from "./settings.js";
// Storage
export type {
    TodoItemChange,
    TodoItemCreateInput,
    TodoItemDbRecord,
    TodoItemsFilter
} from "./storage/databaseTypes.js";
export type { StorageErrorKind } from "./storage/storageError.js";
// API
export type { TodoItemJson, TodoItemsStore, TodoRequestFailure } from "./api/todo/todoTypes.js";

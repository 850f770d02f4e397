#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { Command } from "commander";

import { migrateCommand } from "./commands/migrate.js";
import { portOptionParse } from "./commands/portOptionParse.js";
import { startCommand } from "./commands/start.js";
import { getLogger, initLogging } from "./log.js";
import { DEFAULT_SETTINGS_PATH } from "./settings.js";

const pkg: { version: string } = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));

const program = new Command();

initLogging();

program.name("todo-api").description("REST service for todo items").version(pkg.version);

program
    .command("start")
    .description("Start the HTTP API")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("--host <host>", "Override the listen host")
    .option("--port <port>", "Override the listen port", portOptionParse)
    .action(startCommand);

program
    .command("migrate")
    .description("Apply pending database migrations and exit")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(migrateCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
    getLogger("main").fatal({ error }, "Command failed");
    process.exitCode = 1;
});

#!/usr/bin/env node
/**
 * opsdesk entry point
 */

import { program } from "commander";
import { createApp } from "./app.js";
import { loadConfig } from "./config/loader.js";
import { openDatabase } from "./db/connection.js";
import { listSchemaObjects } from "./db/schema.js";
import { startApiServer } from "./http/server.js";
import { logger } from "./utils/logger.js";
import { ensureOpsdeskHomeEnv } from "./utils/paths.js";
import { VERSION } from "./version.js";

const log = logger;

const nodeMajor = Number.parseInt(process.versions.node.split(".")[0] ?? "0", 10);
if (Number.isNaN(nodeMajor) || nodeMajor < 20) {
  log.error(`Node.js ${process.versions.node} is not supported. Please upgrade to >= 20.0.0.`);
  process.exit(1);
}

program
  .name("opsdesk")
  .description("Maintenance desk backend: users, clients, assets and work orders")
  .version(VERSION);

const configOption = [
  "-c, --config <path>",
  "Config file path (YAML). Without one, defaults under $OPSDESK_HOME are used",
] as const;

function configPath(option: string | undefined): string | undefined {
  return option ?? process.env.OPSDESK_CONFIG_PATH;
}

program
  .command("serve")
  .description("Open the database and start the HTTP API")
  .option(...configOption)
  .action(async (options: { config?: string }) => {
    try {
      ensureOpsdeskHomeEnv();
      const config = await loadConfig(configPath(options.config));
      const app = createApp(config);
      const server = await startApiServer({ app });

      const shutdown = async () => {
        log.info("Shutting down...");
        try {
          await server.stop();
        } catch (err) {
          log.error("Error stopping server", err);
        }
        process.exit(0);
      };
      process.on("SIGINT", () => void shutdown());
      process.on("SIGTERM", () => void shutdown());

      log.info(`opsdesk v${VERSION} serving at ${server.baseUrl}. Press Ctrl+C to stop.`);
    } catch (err) {
      log.error("Failed to start", err);
      process.exit(1);
    }
  });

program
  .command("db:init")
  .description("Create the schema (idempotent) and list tables and indexes")
  .option(...configOption)
  .action(async (options: { config?: string }) => {
    try {
      const config = await loadConfig(configPath(options.config));
      const db = openDatabase(config.database.sqlitePath);
      const objects = listSchemaObjects(db);
      db.close();
      log.info(`Schema ready at ${config.database.sqlitePath}`);
      log.info(`Tables: ${objects.tables.join(", ")}`);
      log.info(`Indexes: ${objects.indexes.join(", ")}`);
    } catch (err) {
      log.error("Schema initialization failed", err);
      process.exit(1);
    }
  });

program
  .command("bootstrap-owner")
  .description("Create an admin user, or promote an existing one and reset its password")
  .requiredOption("--email <email>", "Owner email")
  .requiredOption("--password <password>", "Owner password (min 8 characters)")
  .option("--name <name>", "Display name", "Owner")
  .option(...configOption)
  .action(async (options: { email: string; password: string; name: string; config?: string }) => {
    try {
      if (options.password.length < 8) {
        log.error("Password must have at least 8 characters");
        process.exit(1);
      }
      const config = await loadConfig(configPath(options.config));
      const app = createApp(config);
      const owner = app.auth.bootstrapOwner({
        email: options.email,
        password: options.password,
        name: options.name,
      });
      await app.close();
      log.info(`Owner ready: ${owner.email} (${owner.id})`);
    } catch (err) {
      log.error("Failed to bootstrap owner", err);
      process.exit(1);
    }
  });

await program.parseAsync();

/**
 * Config loader with environment variable expansion
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { configSchema, type Config } from "./schema.js";
import { createLogger } from "../utils/logger.js";
import { ZodError } from "zod";
import { ensureOpsdeskHomeEnv, resolvePathLike } from "../utils/paths.js";
import { expandEnvVarsDeep } from "./expand-env.js";

const log = createLogger("config");

/**
 * Load config from a YAML file. With no path, schema defaults are used.
 */
export async function loadConfig(path?: string): Promise<Config> {
  // Ensure OPSDESK_HOME is always defined so ${OPSDESK_HOME} defaults expand.
  ensureOpsdeskHomeEnv();

  let raw: unknown = {};
  if (path) {
    const expandedPath = resolvePathLike(path);
    log.info(`Loading config from ${expandedPath}`);

    let content: string;
    try {
      content = await readFile(expandedPath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        throw new Error(`Config file not found: ${expandedPath}`);
      }
      throw err;
    }
    raw = parse(content) ?? {};
  } else {
    log.info("No config file given, using defaults");
  }

  // Expand env vars on user-provided values, then again to cover schema defaults.
  const first = parseConfig(expandEnvVarsDeep(raw, process.env));
  const config = parseConfig(expandEnvVarsDeep(first, process.env));

  log.info("Config loaded successfully");
  return config;
}

export function parseConfig(raw: unknown): Config {
  try {
    return configSchema.parse(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new Error(formatZodError(err));
    }
    throw err;
  }
}

function formatZodError(error: ZodError): string {
  const lines = error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `- ${path}: ${issue.message}`;
  });
  return `Config validation failed:\n${lines.join("\n")}`;
}

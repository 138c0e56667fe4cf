import { homedir } from "node:os";
import { join, resolve } from "node:path";

/** Base directory for the database and bulk storage when config leaves them at defaults */
export function defaultHome(): string {
  return join(homedir(), ".opsdesk");
}

/** Make sure ${OPSDESK_HOME} is defined so config defaults expand to a real path. */
export function ensureOpsdeskHomeEnv(): string {
  const current = process.env.OPSDESK_HOME;
  if (current && current.trim().length > 0) return current;
  const home = defaultHome();
  process.env.OPSDESK_HOME = home;
  return home;
}

/** Expand a leading ~ and resolve against cwd. */
export function resolvePathLike(path: string): string {
  const home = process.env.HOME ?? process.env.USERPROFILE ?? ".";
  if (path === "~") return home;
  if (path.startsWith("~/")) return resolve(home, path.slice(2));
  return resolve(path);
}

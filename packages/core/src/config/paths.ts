import { homedir } from "node:os";
import { resolve } from "node:path";
import { DEFAULT_ROOT_PATH } from "./defaults.js";

export const ROOT_PATH_ENV = "PORTICO_ROOT_PATH";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the root path to an absolute path. Falls back to
 * PORTICO_ROOT_PATH, then to the default root.
 */
export function resolveRootPath(input?: string): string {
  const fromEnv = process.env[ROOT_PATH_ENV] || undefined;
  return resolve(expandHomePath(input ?? fromEnv ?? DEFAULT_ROOT_PATH));
}

import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { BOXES_DIRNAME, DEFAULT_ROOT_PATH, ROOT_PATH_ENV } from "./defaults.js";

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
 * Resolves the root path to an absolute path.
 * Precedence: explicit input, then $COLDBOX_ROOT, then ~/.coldbox.
 */
export function resolveRootPath(input?: string): string {
  const fromEnv = process.env[ROOT_PATH_ENV];
  const chosen = input ?? (fromEnv ? fromEnv : DEFAULT_ROOT_PATH);
  return resolve(expandHomePath(chosen));
}

/** Directory holding every box's local state. */
export function boxesDir(rootPath: string): string {
  return join(rootPath, BOXES_DIRNAME);
}

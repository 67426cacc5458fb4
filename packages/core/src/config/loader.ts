import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import {
  AppConfigSchema,
  LogLevelSchema,
  type AppConfig,
} from "../schemas/app-config.js";
import { CONFIG_FILENAME, LOG_LEVEL_ENV } from "./defaults.js";
import { resolveRootPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  rootPath?: string;
  /** Defaults to process.env. */
  env?: Record<string, string | undefined>;
}

function isEnoent(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Reads `<root>/config.json`, filling in defaults. The file is rewritten when
 * defaults were added so they are visible and editable. A log level from
 * $COLDBOX_LOG_LEVEL applies to the returned config only.
 */
export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<AppConfig> {
  const configPath =
    options?.configPath ??
    join(resolveRootPath(options?.rootPath), CONFIG_FILENAME);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (!isEnoent(err)) throw err;
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const config = AppConfigSchema.parse(parsed);

  const serialized = JSON.stringify(config, null, 2) + "\n";
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  const envLevel = (options?.env ?? process.env)[LOG_LEVEL_ENV];
  if (envLevel) {
    return {
      ...config,
      logging: { ...config.logging, level: LogLevelSchema.parse(envLevel) },
    };
  }
  return config;
}

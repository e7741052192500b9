import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import {
  UtilConfigSchema,
  type UtilConfig,
} from "../schemas/util-config.js";
import { resolveRootPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  rootPath?: string;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Load and validate `config.json`, filling in defaults.
 *
 * A missing file counts as `{}`. When the normalized config differs from
 * what is on disk it is written back so the defaults become editable.
 */
export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<UtilConfig> {
  const configPath =
    options?.configPath ??
    join(resolveRootPath(options?.rootPath), "config.json");

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (!isMissingFile(err)) {
      throw err;
    }
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const config = UtilConfigSchema.parse(parsed);

  // Write back so that defaults are visible and editable in config.json
  const serialized = JSON.stringify(config, null, 2) + "\n";
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  return config;
}

export async function saveConfig(
  config: UtilConfig,
  options?: LoadConfigOptions,
): Promise<void> {
  const configPath =
    options?.configPath ??
    join(resolveRootPath(options?.rootPath), "config.json");
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(config, null, 2) + "\n", "utf-8");
}

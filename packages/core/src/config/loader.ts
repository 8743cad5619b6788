import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { InvalidConfigFileError } from "../errors/catalog.js";
import {
  PorticoConfigSchema,
  type PorticoConfig,
} from "../schemas/portico-config.js";
import { CONFIG_FILE_NAME } from "./defaults.js";
import { resolveRootPath } from "./paths.js";

export interface LoadConfigOptions {
  /** Explicit file; wins over `rootPath`. */
  configPath?: string;
  rootPath?: string;
}

export function configPathFor(options?: LoadConfigOptions): string {
  return (
    options?.configPath ??
    join(resolveRootPath(options?.rootPath), CONFIG_FILE_NAME)
  );
}

/** File contents, or undefined when the file does not exist yet. */
async function readConfigFile(configPath: string): Promise<string | undefined> {
  try {
    return await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return undefined;
    }
    throw err;
  }
}

function parseConfigFile(configPath: string, raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new InvalidConfigFileError(
      configPath,
      [{ path: "", message: err instanceof Error ? err.message : String(err) }],
      err,
    );
  }
}

/**
 * Reads the Portico config file, filling in defaults. A missing file is
 * created; endpoint overrides under `apps` are kept raw and only
 * validated when an endpoint resolves them.
 */
export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<PorticoConfig> {
  const configPath = configPathFor(options);
  const raw = await readConfigFile(configPath);

  const parsed = raw !== undefined ? parseConfigFile(configPath, raw) : {};
  const result = PorticoConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new InvalidConfigFileError(
      configPath,
      result.error.issues.map((issue) => ({
        path: issue.path.map(String).join("."),
        message: issue.message,
      })),
    );
  }
  const config = result.data;

  // Write back so that defaults are visible and editable in config.json
  const serialized = JSON.stringify(config, null, 2) + "\n";
  if (serialized !== raw) {
    await saveConfig(config, { configPath });
  }

  return config;
}

export async function saveConfig(
  config: PorticoConfig,
  options?: LoadConfigOptions,
): Promise<void> {
  const configPath = configPathFor(options);
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(config, null, 2) + "\n", "utf-8");
}

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import {
  PipelineConfigSchema,
  type PipelineConfig,
} from "../schemas/pipeline-config.js";
import { CONFIG_FILE_NAME, HUB_TOKEN_ENV } from "./defaults.js";
import { resolveRootPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  rootPath?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: Readonly<Record<string, string | undefined>>;
}

function configPathFor(options?: LoadConfigOptions): string {
  return (
    options?.configPath ??
    join(resolveRootPath(options?.rootPath), CONFIG_FILE_NAME)
  );
}

function serialize(config: PipelineConfig): string {
  return JSON.stringify(config, null, 2) + "\n";
}

async function readConfigFile(configPath: string): Promise<string | undefined> {
  try {
    return await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (
      err instanceof Error &&
      "code" in err &&
      (err as NodeJS.ErrnoException).code === "ENOENT"
    ) {
      return undefined;
    }
    throw err;
  }
}

function parseJson(configPath: string, raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new SyntaxError(
      `${configPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
}

/** A token from the environment wins over one in the file and is never written back. */
function withEnvironment(
  config: PipelineConfig,
  env: Readonly<Record<string, string | undefined>>,
): PipelineConfig {
  const token = env[HUB_TOKEN_ENV];
  const http = config.storage.config.http;
  if (!token || !http) return config;
  return {
    ...config,
    storage: {
      ...config.storage,
      config: { ...config.storage.config, http: { ...http, token } },
    },
  };
}

/**
 * Load config.json, filling every missing field from DEFAULTS. The filled
 * file is written back so the defaults are visible and editable.
 * @throws ZodError for out-of-range values
 */
export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<PipelineConfig> {
  const configPath = configPathFor(options);
  const raw = await readConfigFile(configPath);
  const config = PipelineConfigSchema.parse(
    raw !== undefined ? parseJson(configPath, raw) : {},
  );

  const serialized = serialize(config);
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  return withEnvironment(config, options?.env ?? process.env);
}

export async function saveConfig(
  config: PipelineConfig,
  options?: LoadConfigOptions,
): Promise<void> {
  const configPath = configPathFor(options);
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, serialize(config), "utf-8");
}

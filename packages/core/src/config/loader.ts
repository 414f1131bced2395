import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import {
  StorageConfigSchema,
  type StorageConfig,
} from "../schemas/storage-config.js";
import { DEFAULT_CONFIG_FILENAME } from "./defaults.js";
import { expandHomePath } from "./paths.js";

export interface LoadConfigOptions {
  /** Defaults to `s3mirror.config.json` in the working directory. */
  configPath?: string;
}

/**
 * Read and validate the JSON config file. A missing file yields the
 * defaults; malformed JSON throws SyntaxError, invalid values ZodError.
 */
export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<StorageConfig> {
  const configPath = resolve(
    expandHomePath(options?.configPath ?? DEFAULT_CONFIG_FILENAME),
  );

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (
      err instanceof Error &&
      "code" in err &&
      (err as NodeJS.ErrnoException).code === "ENOENT"
    ) {
      // No file — defaults only
    } else {
      throw err;
    }
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  return StorageConfigSchema.parse(parsed);
}

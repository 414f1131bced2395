import type { ModeSelection, StorageConfig } from "../schemas/storage-config.js";
import { resolveRootPath } from "./paths.js";

/** Values given on the command line; each wins over env and config. */
export interface SettingOverrides {
  endpoint?: string;
  profile?: string;
  region?: string;
  mode?: ModeSelection;
  rootPath?: string;
  userId?: string;
}

export interface StorageSettings {
  mode: ModeSelection;
  endpoint?: string;
  region: string;
  profile?: string;
  rootPath: string;
  defaultUserId?: string;
}

/**
 * Merge flag > environment > config file. Credentials are not part of the
 * settings; the client factory resolves them separately.
 */
export function resolveSettings(
  config: StorageConfig,
  env: NodeJS.ProcessEnv = process.env,
  overrides: SettingOverrides = {},
): StorageSettings {
  return {
    mode: overrides.mode ?? config.mode,
    endpoint: overrides.endpoint ?? env.S3_ENDPOINT_URL ?? config.endpoint_url,
    region:
      overrides.region ??
      env.AWS_REGION ??
      env.AWS_DEFAULT_REGION ??
      config.region,
    profile: overrides.profile ?? env.AWS_PROFILE ?? config.profile,
    rootPath: resolveRootPath(overrides.rootPath ?? config.root_path),
    defaultUserId: overrides.userId ?? config.default_user_id,
  };
}

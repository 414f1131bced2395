import {
  createStorageClient,
  createStsProbe,
  detectMode,
  resolveCredentials,
  type ClientHandle,
  type IdentityProbe,
  type ModeDetection,
  type ResolveCredentialsOptions,
} from "@s3mirror/core/client";
import {
  loadConfig,
  mirrorRootFor,
  resolveSettings,
  type StorageSettings,
} from "@s3mirror/core/config";
import {
  createStorageFacade,
  type StorageFacade,
} from "@s3mirror/core/facade";
import { createLogger, type Logger } from "@s3mirror/core/logger";
import { createMirrorManager } from "@s3mirror/core/mirror";
import {
  ModeSelectionSchema,
  type StorageMode,
} from "@s3mirror/core/schemas";
import { createS3ObjectStore } from "@s3mirror/core/store";

/** Options shared by every command. */
export type GlobalOptions = {
  endpoint?: string;
  profile?: string;
  region?: string;
  config?: string;
  mode?: string;
  root?: string;
  user?: string;
};

/** What a command needs to run. */
export interface CliContext {
  facade: StorageFacade;
  logger: Logger;
  /** Resolved region; new buckets are created there */
  region: string;
  /** Acting user for permission checks, from --user or the config file */
  userId?: string;
  close(): void;
}

export type ContextFactory = (globals: GlobalOptions) => Promise<CliContext>;

export interface StorageCliContext extends CliContext {
  settings: StorageSettings;
  mode: StorageMode;
  /** Present when the mode was auto-detected */
  detection?: ModeDetection;
  handle: ClientHandle;
}

export interface CreateCliContextOptions
  extends Pick<ResolveCredentialsOptions, "credentialsFilepath" | "configFilepath"> {
  env?: NodeJS.ProcessEnv;
  probe?: IdentityProbe;
  logger?: Logger;
}

/**
 * Wire config, credentials, client, mirrors and facade for one CLI run.
 * Logs go to stderr so stdout only carries command output.
 */
export async function createCliContext(
  globals: GlobalOptions,
  options: CreateCliContextOptions = {},
): Promise<StorageCliContext> {
  const env = options.env ?? process.env;
  const config = await loadConfig({ configPath: globals.config });
  const settings = resolveSettings(config, env, {
    endpoint: globals.endpoint,
    profile: globals.profile,
    region: globals.region,
    mode:
      globals.mode !== undefined
        ? ModeSelectionSchema.parse(globals.mode)
        : undefined,
    rootPath: globals.root,
    userId: globals.user,
  });
  const logger = options.logger ?? createLogger(config.logging, { fd: 2 });

  const credentialOptions: ResolveCredentialsOptions = {
    profile: settings.profile,
    env,
    credentialsFilepath: options.credentialsFilepath,
    configFilepath: options.configFilepath,
  };

  let detection: ModeDetection | undefined;
  let mode: StorageMode;
  if (settings.mode === "auto") {
    detection = await detectMode({
      resolve: () => resolveCredentials(credentialOptions),
      probe: options.probe ?? createStsProbe({ region: settings.region }),
      logger,
    });
    mode = detection.mode;
  } else {
    mode = settings.mode;
  }

  const handle = await createStorageClient({
    ...credentialOptions,
    mode,
    endpoint: settings.endpoint,
    region: settings.region,
  });
  logger.debug(
    {
      mode,
      reason: detection?.reason,
      endpoint: handle.endpoint,
      credentialSource: handle.credentialSource,
    },
    "Storage client ready",
  );

  const mirrors = {
    mock: createMirrorManager({ root: mirrorRootFor(settings.rootPath, "mock") }),
    real: createMirrorManager({ root: mirrorRootFor(settings.rootPath, "real") }),
  };

  const facade = createStorageFacade({
    mode,
    store: createS3ObjectStore(handle.s3),
    mirror: mirrors[mode],
    knownMirrors: [mirrors.mock, mirrors.real],
    logger,
  });

  return {
    facade,
    logger,
    region: settings.region,
    ...(settings.defaultUserId !== undefined && {
      userId: settings.defaultUserId,
    }),
    settings,
    mode,
    ...(detection !== undefined && { detection }),
    handle,
    close: () => handle.s3.destroy(),
  };
}

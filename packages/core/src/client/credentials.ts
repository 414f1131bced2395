import { loadSharedConfigFiles } from "@smithy/shared-ini-file-loader";
import { ConfigurationError } from "../errors/catalog.js";

export interface StaticCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

export type CredentialSource =
  | "explicit"
  | "environment"
  | "profile"
  | "placeholder";

export interface ResolvedCredentials {
  source: CredentialSource;
  credentials: StaticCredentials;
  /** Set when the credentials came from a profile file. */
  profile?: string;
}

export interface ResolveCredentialsOptions {
  credentials?: Partial<StaticCredentials>;
  profile?: string;
  env?: NodeJS.ProcessEnv;
  /** Shared credentials file; the SDK default (~/.aws/credentials) otherwise. */
  credentialsFilepath?: string;
  /** Shared config file; the SDK default (~/.aws/config) otherwise. */
  configFilepath?: string;
}

/** Credentials moto and other local emulators accept. */
export const PLACEHOLDER_CREDENTIALS: StaticCredentials = {
  accessKeyId: "testing",
  secretAccessKey: "testing",
};

/**
 * Resolve credentials without touching the network.
 * Order: explicit > environment > profile file. Returns undefined when no
 * source has a complete key pair.
 */
export async function resolveCredentials(
  options: ResolveCredentialsOptions = {},
): Promise<ResolvedCredentials | undefined> {
  const env = options.env ?? process.env;

  const explicit = options.credentials;
  if (
    explicit &&
    (explicit.accessKeyId !== undefined ||
      explicit.secretAccessKey !== undefined)
  ) {
    if (!explicit.accessKeyId || !explicit.secretAccessKey) {
      throw new ConfigurationError(
        "Explicit credentials need both an access key id and a secret access key",
      );
    }
    return {
      source: "explicit",
      credentials: {
        accessKeyId: explicit.accessKeyId,
        secretAccessKey: explicit.secretAccessKey,
        ...(explicit.sessionToken !== undefined && {
          sessionToken: explicit.sessionToken,
        }),
      },
    };
  }

  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    return {
      source: "environment",
      credentials: {
        accessKeyId: env.AWS_ACCESS_KEY_ID,
        secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
        ...(env.AWS_SESSION_TOKEN !== undefined && {
          sessionToken: env.AWS_SESSION_TOKEN,
        }),
      },
    };
  }

  const profile = options.profile ?? env.AWS_PROFILE ?? "default";
  const files = await loadSharedConfigFiles({
    filepath: options.credentialsFilepath,
    configFilepath: options.configFilepath,
    ignoreCache: true,
  });
  // Credentials file wins over config file for the same profile
  const section = files.credentialsFile[profile] ?? files.configFile[profile];
  const accessKeyId = section?.aws_access_key_id;
  const secretAccessKey = section?.aws_secret_access_key;
  const sessionToken = section?.aws_session_token;
  if (accessKeyId && secretAccessKey) {
    return {
      source: "profile",
      profile,
      credentials: {
        accessKeyId,
        secretAccessKey,
        ...(sessionToken !== undefined && { sessionToken }),
      },
    };
  }

  return undefined;
}

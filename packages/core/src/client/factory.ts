import { S3Client } from "@aws-sdk/client-s3";
import { DEFAULT_MOCK_ENDPOINT, DEFAULT_REGION } from "../config/defaults.js";
import { ConfigurationError } from "../errors/catalog.js";
import type { StorageMode } from "../schemas/storage-config.js";
import {
  PLACEHOLDER_CREDENTIALS,
  resolveCredentials,
  type CredentialSource,
  type ResolveCredentialsOptions,
} from "./credentials.js";

/** A configured S3 client bound to exactly one backend. */
export interface ClientHandle {
  readonly mode: StorageMode;
  /** Undefined for real mode without an override: the SDK picks the AWS endpoint. */
  readonly endpoint: string | undefined;
  readonly region: string;
  readonly credentialSource: CredentialSource;
  readonly s3: S3Client;
}

export interface CreateStorageClientOptions extends ResolveCredentialsOptions {
  mode: StorageMode;
  endpoint?: string;
  region?: string;
}

/**
 * Build a client handle. Only reads the environment and profile files;
 * the first network call happens on the first command sent.
 */
export async function createStorageClient(
  options: CreateStorageClientOptions,
): Promise<ClientHandle> {
  const region = options.region ?? DEFAULT_REGION;
  const resolved = await resolveCredentials(options);

  if (options.mode === "real") {
    if (!resolved) {
      throw new ConfigurationError(
        "No AWS credentials found: pass them explicitly, set AWS_ACCESS_KEY_ID/AWS_SECRET_ACCESS_KEY, or configure a profile",
        { profile: options.profile ?? options.env?.AWS_PROFILE ?? "default" },
      );
    }
    return {
      mode: "real",
      endpoint: options.endpoint,
      region,
      credentialSource: resolved.source,
      s3: new S3Client({
        region,
        credentials: resolved.credentials,
        ...(options.endpoint !== undefined && { endpoint: options.endpoint }),
      }),
    };
  }

  const endpoint = options.endpoint ?? DEFAULT_MOCK_ENDPOINT;
  return {
    mode: "mock",
    endpoint,
    region,
    credentialSource: resolved?.source ?? "placeholder",
    s3: new S3Client({
      region,
      endpoint,
      forcePathStyle: true,
      credentials: resolved?.credentials ?? PLACEHOLDER_CREDENTIALS,
    }),
  };
}

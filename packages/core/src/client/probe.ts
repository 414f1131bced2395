import { GetCallerIdentityCommand, STSClient } from "@aws-sdk/client-sts";
import type { Logger } from "pino";
import { ConfigurationError, ProbeError } from "../errors/catalog.js";
import type { StorageMode } from "../schemas/storage-config.js";
import type { ResolvedCredentials } from "./credentials.js";

/** Resolves when the credentials are accepted by the real backend. */
export type IdentityProbe = (resolved: ResolvedCredentials) => Promise<void>;

export type DetectionReason = "verified" | "no-credentials" | "auth-failed";

export interface ModeDetection {
  mode: StorageMode;
  reason: DetectionReason;
}

export interface DetectModeOptions {
  resolve: () => Promise<ResolvedCredentials | undefined>;
  probe: IdentityProbe;
  logger?: Logger;
}

/** SDK error names that mean the credentials themselves were rejected. */
const AUTH_ERROR_NAMES = new Set([
  "AccessDenied",
  "AccessDeniedException",
  "AuthFailure",
  "CredentialsProviderError",
  "ExpiredToken",
  "ExpiredTokenException",
  "InvalidAccessKeyId",
  "InvalidClientTokenId",
  "SignatureDoesNotMatch",
  "UnrecognizedClientException",
]);

export function isAuthError(err: unknown): err is Error {
  if (err instanceof ConfigurationError) return true;
  return err instanceof Error && AUTH_ERROR_NAMES.has(err.name);
}

/** Default probe: STS GetCallerIdentity with the resolved credentials. */
export function createStsProbe(options: { region: string }): IdentityProbe {
  return async (resolved) => {
    const sts = new STSClient({
      region: options.region,
      credentials: resolved.credentials,
    });
    try {
      await sts.send(new GetCallerIdentityCommand({}));
    } finally {
      sts.destroy();
    }
  };
}

/**
 * Pick real mode when usable credentials are found and accepted, mock mode
 * when there are none or they are rejected. Any other probe failure
 * (network, throttling, a 5xx) is raised as ProbeError instead of being
 * read as "no credentials".
 */
export async function detectMode(
  options: DetectModeOptions,
): Promise<ModeDetection> {
  const { logger } = options;

  let resolved: ResolvedCredentials | undefined;
  try {
    resolved = await options.resolve();
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    logger?.warn({ error: err.message }, "Unusable credentials, using mock mode");
    return { mode: "mock", reason: "no-credentials" };
  }

  if (!resolved) {
    logger?.info("No credentials found, using mock mode");
    return { mode: "mock", reason: "no-credentials" };
  }

  try {
    await options.probe(resolved);
  } catch (err) {
    if (isAuthError(err)) {
      logger?.warn(
        { source: resolved.source, error: err.message },
        "Credentials rejected, using mock mode",
      );
      return { mode: "mock", reason: "auth-failed" };
    }
    throw new ProbeError(
      `Could not verify credentials against the real backend: ${
        err instanceof Error ? err.message : String(err)
      }`,
      err,
    );
  }

  logger?.debug({ source: resolved.source }, "Credentials verified");
  return { mode: "real", reason: "verified" };
}

export {
  PLACEHOLDER_CREDENTIALS,
  resolveCredentials,
  type StaticCredentials,
  type CredentialSource,
  type ResolvedCredentials,
  type ResolveCredentialsOptions,
} from "./credentials.js";
export {
  createStorageClient,
  type ClientHandle,
  type CreateStorageClientOptions,
} from "./factory.js";
export {
  createStsProbe,
  detectMode,
  isAuthError,
  type IdentityProbe,
  type DetectionReason,
  type ModeDetection,
  type DetectModeOptions,
} from "./probe.js";

export {
  StorageError,
  ConfigurationError,
  ProbeError,
  NotFoundError,
  AlreadyExistsError,
  BucketNotEmptyError,
  BackendError,
  LocalIOError,
  DecodeError,
  AccessDeniedError,
} from "./catalog.js";

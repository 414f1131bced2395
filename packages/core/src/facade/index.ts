export {
  createStorageFacade,
  type CleanupOptions,
  type CleanupResult,
  type CreateBucketResult,
  type DeleteBucketResult,
  type DeleteFileResult,
  type DownloadResult,
  type LargeUploadOptions,
  type LargeUploadResult,
  type MirrorOutcome,
  type StorageFacade,
  type StorageFacadeOptions,
  type UploadOptions,
  type UploadResult,
  type UserOptions,
} from "./storage-facade.js";
export { DEFAULT_PART_SIZE, MIN_PART_SIZE, readFileParts } from "./parts.js";

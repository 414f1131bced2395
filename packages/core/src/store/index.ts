export {
  MAX_DELETE_BATCH,
  type ObjectStore,
  type ObjectMetadata,
  type StoredObject,
  type ObjectHead,
  type DeleteObjectsResult,
} from "./interface.js";
export { createS3ObjectStore, translateS3Error } from "./s3.js";

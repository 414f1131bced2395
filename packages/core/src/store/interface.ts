/**
 * Backend-neutral object store.
 * Implementations translate backend failures into the errors catalog:
 * missing bucket/key → NotFoundError, anything unexpected → BackendError.
 */

/** Upper bound on keys per deleteObjects call (S3 DeleteObjects limit). */
export const MAX_DELETE_BATCH = 1000;

export type ObjectMetadata = Record<string, string>;

export interface StoredObject {
  body: Uint8Array;
  metadata: ObjectMetadata;
}

export interface ObjectHead {
  size: number;
  metadata: ObjectMetadata;
  lastModified?: Date;
}

export interface DeleteObjectsResult {
  deleted: string[];
  errors: Array<{ key: string; code: string; message: string }>;
}

export interface ObjectStore {
  listBuckets(): Promise<string[]>;

  /**
   * @throws AlreadyExistsError with `ownedByCaller` set when the name is taken
   */
  createBucket(bucket: string, region?: string): Promise<void>;

  /**
   * @throws BucketNotEmptyError if objects remain
   */
  deleteBucket(bucket: string): Promise<void>;

  putObject(
    bucket: string,
    key: string,
    body: Uint8Array,
    metadata?: ObjectMetadata,
  ): Promise<void>;

  /**
   * Multipart upload; each yielded chunk becomes one part.
   * The upload is aborted if any part fails.
   */
  putObjectMultipart(
    bucket: string,
    key: string,
    parts: AsyncIterable<Uint8Array>,
    metadata?: ObjectMetadata,
  ): Promise<{ partCount: number }>;

  getObject(bucket: string, key: string): Promise<StoredObject>;

  headObject(bucket: string, key: string): Promise<ObjectHead>;

  /**
   * Delete one object.
   * @returns false if the key was already absent
   */
  deleteObject(bucket: string, key: string): Promise<boolean>;

  /** Delete up to MAX_DELETE_BATCH keys in one call. */
  deleteObjects(bucket: string, keys: string[]): Promise<DeleteObjectsResult>;

  /**
   * Keys under `prefix` in lexicographic order, fetched page by page as the
   * caller iterates. Each new iteration starts from the first page.
   */
  listKeys(bucket: string, prefix?: string): AsyncIterable<string>;
}

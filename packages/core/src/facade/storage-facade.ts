import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import type { Logger } from "pino";
import { AuthorizationContext, type PermissionLevel } from "../auth/context.js";
import {
  AlreadyExistsError,
  BackendError,
  ConfigurationError,
  DecodeError,
  LocalIOError,
  NotFoundError,
} from "../errors/catalog.js";
import { normalizeMetadata } from "../metadata/normalize.js";
import type { MirrorManager } from "../mirror/manager.js";
import type { StorageMode } from "../schemas/storage-config.js";
import {
  MAX_DELETE_BATCH,
  type ObjectMetadata,
  type ObjectStore,
} from "../store/interface.js";
import { DEFAULT_PART_SIZE, MIN_PART_SIZE, readFileParts } from "./parts.js";

export interface StorageFacadeOptions {
  mode: StorageMode;
  store: ObjectStore;
  /** Mirror of the active mode; every transfer is copied here. */
  mirror: MirrorManager;
  /** Mirrors of other modes; deletes and cleanup clear these as well. */
  knownMirrors?: MirrorManager[];
  authorization?: AuthorizationContext;
  logger: Logger;
}

export interface UserOptions {
  /** When set, the authorization context gates the call. */
  userId?: string;
}

export interface UploadOptions extends UserOptions {
  metadata?: Record<string, string | number | boolean>;
}

export interface LargeUploadOptions extends UploadOptions {
  /** Bytes per part; at least 5 MiB. */
  partSize?: number;
}

export interface MirrorOutcome {
  mirrored: boolean;
  mirrorPath?: string;
  /** Set when the remote side succeeded but the local copy did not. */
  mirrorError?: LocalIOError;
}

export interface UploadResult extends MirrorOutcome {
  bucket: string;
  key: string;
  size: number;
}

export interface LargeUploadResult extends UploadResult {
  partCount: number;
}

export interface DownloadResult extends MirrorOutcome {
  bucket: string;
  key: string;
  destPath: string;
  size: number;
}

export interface CreateBucketResult {
  bucket: string;
  status: "created" | "already-owned";
}

export interface DeleteFileResult {
  bucket: string;
  key: string;
  status: "deleted" | "already-absent";
  mirrorCopiesRemoved: number;
}

export interface DeleteBucketResult {
  bucket: string;
  status: "deleted" | "refused";
  objectsDeleted: number;
  batches: number;
}

export interface CleanupOptions extends UserOptions {
  bucket?: string;
  removeLocal: boolean;
  removeBucket: boolean;
}

export interface CleanupResult {
  /** Mirror directories that existed and were removed */
  localRemoved: string[];
  bucket?: DeleteBucketResult;
}

export interface StorageFacade {
  readonly mode: StorageMode;
  readonly authorization: AuthorizationContext;
  createBucket(
    bucket: string,
    options?: UserOptions & { region?: string },
  ): Promise<CreateBucketResult>;
  listBuckets(): Promise<string[]>;
  deleteBucket(
    bucket: string,
    options?: UserOptions & { force?: boolean },
  ): Promise<DeleteBucketResult>;
  uploadFile(
    bucket: string,
    key: string,
    sourcePath: string,
    options?: UploadOptions,
  ): Promise<UploadResult>;
  uploadContent(
    bucket: string,
    key: string,
    content: string | Uint8Array,
    options?: UploadOptions,
  ): Promise<UploadResult>;
  uploadLargeFile(
    bucket: string,
    key: string,
    sourcePath: string,
    options?: LargeUploadOptions,
  ): Promise<LargeUploadResult>;
  downloadFile(
    bucket: string,
    key: string,
    destPath: string,
    options?: UserOptions,
  ): Promise<DownloadResult>;
  readFile(bucket: string, key: string, options?: UserOptions): Promise<string>;
  getObjectMetadata(
    bucket: string,
    key: string,
    options?: UserOptions,
  ): Promise<ObjectMetadata>;
  deleteFile(
    bucket: string,
    key: string,
    options?: UserOptions,
  ): Promise<DeleteFileResult>;
  listFiles(
    bucket: string,
    options?: UserOptions & { prefix?: string },
  ): AsyncIterable<string>;
  cleanup(options: CleanupOptions): Promise<CleanupResult>;
}

function errnoOf(err: unknown): string | undefined {
  return err instanceof Error && "code" in err
    ? (err as NodeJS.ErrnoException).code
    : undefined;
}

async function readSource(sourcePath: string): Promise<Uint8Array> {
  try {
    return await readFile(sourcePath);
  } catch (err) {
    if (errnoOf(err) === "ENOENT") {
      throw new NotFoundError(`Source file not found: ${sourcePath}`, {
        path: sourcePath,
      });
    }
    throw new LocalIOError(`Cannot read ${sourcePath}`, sourcePath, err);
  }
}

async function sizeOfSource(sourcePath: string): Promise<number> {
  try {
    return (await stat(sourcePath)).size;
  } catch (err) {
    if (errnoOf(err) === "ENOENT") {
      throw new NotFoundError(`Source file not found: ${sourcePath}`, {
        path: sourcePath,
      });
    }
    throw new LocalIOError(`Cannot stat ${sourcePath}`, sourcePath, err);
  }
}

export function createStorageFacade(
  options: StorageFacadeOptions,
): StorageFacade {
  const { mode, store, mirror, logger } = options;
  const authorization = options.authorization ?? new AuthorizationContext();

  // Active mirror first, then the others, one manager per root
  const mirrors = [mirror, ...(options.knownMirrors ?? [])].filter(
    (m, i, all) => all.findIndex((other) => other.root === m.root) === i,
  );

  function authorize(
    bucket: string,
    key: string | undefined,
    userId: string | undefined,
    required: PermissionLevel,
  ): void {
    if (userId === undefined) return;
    authorization.assert(bucket, key, userId, required);
  }

  /** Uploaders with no entry of their own become the object's owner. */
  function claimObject(bucket: string, key: string, userId?: string): void {
    if (userId === undefined) return;
    if (authorization.levelFor(bucket, key, userId) === undefined) {
      authorization.grant(bucket, key, userId, "owner");
    }
  }

  async function tryMirror(
    bucket: string,
    key: string,
    write: () => Promise<string>,
  ): Promise<MirrorOutcome> {
    try {
      return { mirrored: true, mirrorPath: await write() };
    } catch (err) {
      if (!(err instanceof LocalIOError)) throw err;
      logger.warn(
        { bucket, key, error: err.message },
        "Remote write succeeded but the local mirror was not updated",
      );
      return { mirrored: false, mirrorError: err };
    }
  }

  async function emptyBucket(
    bucket: string,
  ): Promise<{ objectsDeleted: number; batches: number }> {
    const keys: string[] = [];
    for await (const key of store.listKeys(bucket)) {
      keys.push(key);
    }

    let objectsDeleted = 0;
    let batches = 0;
    for (let i = 0; i < keys.length; i += MAX_DELETE_BATCH) {
      const batch = keys.slice(i, i + MAX_DELETE_BATCH);
      const result = await store.deleteObjects(bucket, batch);
      batches += 1;
      objectsDeleted += result.deleted.length;
      if (result.errors.length > 0) {
        throw new BackendError(
          `Could not delete ${result.errors.length} object(s) from bucket '${bucket}'`,
          { bucket, errors: result.errors },
        );
      }
    }
    logger.debug({ bucket, objectsDeleted, batches }, "Emptied bucket");
    return { objectsDeleted, batches };
  }

  const facade: StorageFacade = {
    mode,
    authorization,

    async createBucket(bucket, opts = {}) {
      let status: CreateBucketResult["status"] = "created";
      try {
        await store.createBucket(bucket, opts.region);
        logger.info({ bucket }, "Bucket created");
      } catch (err) {
        if (!(err instanceof AlreadyExistsError && err.ownedByCaller)) throw err;
        logger.info({ bucket }, "Bucket already exists and is owned by you");
        status = "already-owned";
      }
      if (opts.userId !== undefined && !authorization.isManaged(bucket)) {
        authorization.grantBucket(bucket, opts.userId, "owner");
      }
      return { bucket, status };
    },

    async listBuckets() {
      return store.listBuckets();
    },

    async deleteBucket(bucket, opts = {}) {
      if (mode === "real") {
        logger.warn({ bucket }, "Refusing to delete a bucket on the real backend");
        return { bucket, status: "refused", objectsDeleted: 0, batches: 0 };
      }
      authorize(bucket, undefined, opts.userId, "owner");

      const emptied = opts.force
        ? await emptyBucket(bucket)
        : { objectsDeleted: 0, batches: 0 };
      await store.deleteBucket(bucket);
      authorization.forgetBucket(bucket);
      logger.info({ bucket, ...emptied }, "Bucket deleted");
      return { bucket, status: "deleted", ...emptied };
    },

    async uploadFile(bucket, key, sourcePath, opts = {}) {
      authorize(bucket, key, opts.userId, "write");
      const body = await readSource(sourcePath);
      const metadata =
        opts.metadata !== undefined ? normalizeMetadata(opts.metadata) : undefined;

      await store.putObject(bucket, key, body, metadata);
      claimObject(bucket, key, opts.userId);
      logger.info({ bucket, key, size: body.byteLength }, "Uploaded object");

      // Mirror the bytes that were sent, not a second read of the source
      const outcome = await tryMirror(bucket, key, () =>
        mirror.writeBytes(bucket, key, body),
      );
      return { bucket, key, size: body.byteLength, ...outcome };
    },

    async uploadContent(bucket, key, content, opts = {}) {
      authorize(bucket, key, opts.userId, "write");
      const body =
        typeof content === "string" ? new TextEncoder().encode(content) : content;
      const metadata =
        opts.metadata !== undefined ? normalizeMetadata(opts.metadata) : undefined;

      await store.putObject(bucket, key, body, metadata);
      claimObject(bucket, key, opts.userId);
      logger.info({ bucket, key, size: body.byteLength }, "Uploaded object");

      const outcome = await tryMirror(bucket, key, () =>
        mirror.writeBytes(bucket, key, body),
      );
      return { bucket, key, size: body.byteLength, ...outcome };
    },

    async uploadLargeFile(bucket, key, sourcePath, opts = {}) {
      const partSize = opts.partSize ?? DEFAULT_PART_SIZE;
      if (partSize < MIN_PART_SIZE) {
        throw new RangeError(
          `Part size must be at least ${MIN_PART_SIZE} bytes, got ${partSize}`,
        );
      }
      authorize(bucket, key, opts.userId, "write");
      const size = await sizeOfSource(sourcePath);
      const metadata =
        opts.metadata !== undefined ? normalizeMetadata(opts.metadata) : undefined;

      const { partCount } = await store.putObjectMultipart(
        bucket,
        key,
        readFileParts(sourcePath, partSize),
        metadata,
      );
      claimObject(bucket, key, opts.userId);
      logger.info({ bucket, key, size, partCount }, "Uploaded object in parts");

      const outcome = await tryMirror(bucket, key, () =>
        mirror.copyIn(sourcePath, bucket, key),
      );
      return { bucket, key, size, partCount, ...outcome };
    },

    async downloadFile(bucket, key, destPath, opts = {}) {
      authorize(bucket, key, opts.userId, "read");
      const object = await store.getObject(bucket, key);

      const target = resolve(destPath);
      try {
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, object.body);
      } catch (err) {
        throw new LocalIOError(`Cannot write ${target}`, target, err);
      }
      logger.info({ bucket, key, destPath: target }, "Downloaded object");

      const outcome = await tryMirror(bucket, key, () =>
        mirror.copyIn(target, bucket, key),
      );
      return {
        bucket,
        key,
        destPath: target,
        size: object.body.byteLength,
        ...outcome,
      };
    },

    async readFile(bucket, key, opts = {}) {
      authorize(bucket, key, opts.userId, "read");
      const object = await store.getObject(bucket, key);
      try {
        // A leading byte-order mark is content, not a decoding hint
        return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(
          object.body,
        );
      } catch (err) {
        throw new DecodeError(bucket, key, err);
      }
    },

    async getObjectMetadata(bucket, key, opts = {}) {
      authorize(bucket, key, opts.userId, "read");
      const head = await store.headObject(bucket, key);
      return head.metadata;
    },

    async deleteFile(bucket, key, opts = {}) {
      authorize(bucket, key, opts.userId, "write");
      const existed = await store.deleteObject(bucket, key);
      if (existed) {
        logger.info({ bucket, key }, "Deleted object");
      } else {
        logger.info({ bucket, key }, "Object already absent");
      }
      authorization.forgetObject(bucket, key);

      let mirrorCopiesRemoved = 0;
      for (const m of mirrors) {
        try {
          if (await m.remove(bucket, key)) mirrorCopiesRemoved += 1;
        } catch (err) {
          if (!(err instanceof LocalIOError)) throw err;
          logger.warn(
            { bucket, key, root: m.root, error: err.message },
            "Could not remove mirrored copy",
          );
        }
      }

      return {
        bucket,
        key,
        status: existed ? "deleted" : "already-absent",
        mirrorCopiesRemoved,
      };
    },

    listFiles(bucket, opts = {}) {
      authorize(bucket, undefined, opts.userId, "read");
      return store.listKeys(bucket, opts.prefix);
    },

    async cleanup(opts) {
      const result: CleanupResult = { localRemoved: [] };
      if (opts.removeBucket) {
        if (opts.bucket === undefined) {
          throw new ConfigurationError("Removing a bucket needs a bucket name");
        }
        // Nothing local is removed for a caller who may not delete the bucket
        if (mode !== "real") {
          authorize(opts.bucket, undefined, opts.userId, "owner");
        }
      }

      if (opts.removeLocal) {
        for (const m of mirrors) {
          if (opts.bucket !== undefined) {
            if (await m.removeAll(opts.bucket)) {
              result.localRemoved.push(join(m.root, opts.bucket));
            }
          } else if (await m.removeRoot()) {
            result.localRemoved.push(m.root);
          }
        }
        logger.info({ removed: result.localRemoved }, "Local mirror cleaned");
      }

      if (opts.removeBucket && opts.bucket !== undefined) {
        result.bucket = await facade.deleteBucket(opts.bucket, {
          force: true,
          userId: opts.userId,
        });
      }

      return result;
    },
  };

  return facade;
}

/**
 * In-memory ObjectStore for tests.
 * Mirrors the S3 behaviors the facade relies on (already-owned buckets,
 * non-empty bucket deletion, sorted paginated listing, lower-cased metadata
 * keys) and records every call so tests can count round trips.
 */

import {
  AlreadyExistsError,
  BucketNotEmptyError,
  NotFoundError,
} from "../errors/catalog.js";
import {
  MAX_DELETE_BATCH,
  type ObjectMetadata,
  type ObjectStore,
} from "../store/interface.js";

export interface MemoryObject {
  body: Uint8Array;
  metadata: ObjectMetadata;
  lastModified: Date;
}

export interface StoreCall {
  method: keyof ObjectStore;
  bucket?: string;
  key?: string;
  keyCount?: number;
}

export interface MemoryObjectStore extends ObjectStore {
  readonly calls: StoreCall[];
  callsTo(method: keyof ObjectStore): StoreCall[];
  /** Direct view of one bucket's contents; undefined if the bucket is missing. */
  objects(bucket: string): Map<string, MemoryObject> | undefined;
}

export interface MemoryObjectStoreOptions {
  /** Keys per listing page, like MaxKeys. */
  pageSize?: number;
}

function lowerKeys(metadata: ObjectMetadata | undefined): ObjectMetadata {
  return Object.fromEntries(
    Object.entries(metadata ?? {}).map(([k, v]) => [k.toLowerCase(), v]),
  );
}

export function createMemoryObjectStore(
  options: MemoryObjectStoreOptions = {},
): MemoryObjectStore {
  const pageSize = options.pageSize ?? 1000;
  const buckets = new Map<string, Map<string, MemoryObject>>();
  const calls: StoreCall[] = [];

  function bucketOf(bucket: string): Map<string, MemoryObject> {
    const objects = buckets.get(bucket);
    if (!objects) {
      throw new NotFoundError(`Bucket '${bucket}' not found`, { bucket });
    }
    return objects;
  }

  function objectOf(bucket: string, key: string): MemoryObject {
    const object = bucketOf(bucket).get(key);
    if (!object) {
      throw new NotFoundError(`Object '${key}' not found in bucket '${bucket}'`, {
        bucket,
        key,
      });
    }
    return object;
  }

  function store(
    bucket: string,
    key: string,
    body: Uint8Array,
    metadata?: ObjectMetadata,
  ): void {
    bucketOf(bucket).set(key, {
      body: new Uint8Array(body),
      metadata: lowerKeys(metadata),
      lastModified: new Date(),
    });
  }

  async function* listPages(bucket: string, prefix: string): AsyncGenerator<string> {
    let after: string | undefined;
    for (;;) {
      calls.push({ method: "listKeys", bucket });
      const page = [...bucketOf(bucket).keys()]
        .filter((key) => key.startsWith(prefix))
        .filter((key) => after === undefined || key > after)
        .sort()
        .slice(0, pageSize);
      yield* page;
      if (page.length < pageSize) return;
      after = page[page.length - 1];
    }
  }

  return {
    calls,

    callsTo(method) {
      return calls.filter((call) => call.method === method);
    },

    objects(bucket) {
      return buckets.get(bucket);
    },

    async listBuckets() {
      calls.push({ method: "listBuckets" });
      return [...buckets.keys()].sort();
    },

    async createBucket(bucket) {
      calls.push({ method: "createBucket", bucket });
      if (buckets.has(bucket)) {
        throw new AlreadyExistsError(`Bucket '${bucket}' already exists`, true, {
          bucket,
        });
      }
      buckets.set(bucket, new Map());
    },

    async deleteBucket(bucket) {
      calls.push({ method: "deleteBucket", bucket });
      if (bucketOf(bucket).size > 0) {
        throw new BucketNotEmptyError(bucket);
      }
      buckets.delete(bucket);
    },

    async putObject(bucket, key, body, metadata) {
      calls.push({ method: "putObject", bucket, key });
      store(bucket, key, body, metadata);
    },

    async putObjectMultipart(bucket, key, parts, metadata) {
      calls.push({ method: "putObjectMultipart", bucket, key });
      bucketOf(bucket);
      const chunks: Uint8Array[] = [];
      for await (const chunk of parts) {
        chunks.push(chunk);
      }
      store(bucket, key, Buffer.concat(chunks), metadata);
      return { partCount: Math.max(chunks.length, 1) };
    },

    async getObject(bucket, key) {
      calls.push({ method: "getObject", bucket, key });
      const object = objectOf(bucket, key);
      return { body: new Uint8Array(object.body), metadata: { ...object.metadata } };
    },

    async headObject(bucket, key) {
      calls.push({ method: "headObject", bucket, key });
      const object = objectOf(bucket, key);
      return {
        size: object.body.byteLength,
        metadata: { ...object.metadata },
        lastModified: object.lastModified,
      };
    },

    async deleteObject(bucket, key) {
      calls.push({ method: "deleteObject", bucket, key });
      return bucketOf(bucket).delete(key);
    },

    async deleteObjects(bucket, keys) {
      calls.push({ method: "deleteObjects", bucket, keyCount: keys.length });
      if (keys.length > MAX_DELETE_BATCH) {
        throw new RangeError(
          `deleteObjects takes at most ${MAX_DELETE_BATCH} keys, got ${keys.length}`,
        );
      }
      const objects = bucketOf(bucket);
      for (const key of keys) {
        objects.delete(key);
      }
      return { deleted: [...keys], errors: [] };
    },

    listKeys(bucket, prefix = "") {
      return { [Symbol.asyncIterator]: () => listPages(bucket, prefix) };
    },
  };
}

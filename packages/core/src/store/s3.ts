/**
 * S3 object store.
 * Thin pass-through to @aws-sdk/client-s3; its job is translating SDK
 * exceptions into the errors catalog. No retries beyond the SDK's own.
 */

import {
  AbortMultipartUploadCommand,
  BucketLocationConstraint,
  CompleteMultipartUploadCommand,
  CreateBucketCommand,
  CreateMultipartUploadCommand,
  DeleteBucketCommand,
  DeleteObjectCommand,
  DeleteObjectsCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3ServiceException,
  UploadPartCommand,
  type CompletedPart,
  type S3Client,
} from "@aws-sdk/client-s3";
import {
  AlreadyExistsError,
  BackendError,
  BucketNotEmptyError,
  ConfigurationError,
  NotFoundError,
  StorageError,
} from "../errors/catalog.js";
import {
  MAX_DELETE_BATCH,
  type DeleteObjectsResult,
  type ObjectStore,
} from "./interface.js";

interface CallContext {
  operation: string;
  bucket?: string;
  key?: string;
}

const NOT_FOUND_NAMES = new Set(["NoSuchKey", "NotFound", "NoSuchBucket"]);

function httpStatusOf(err: unknown): number | undefined {
  return err instanceof S3ServiceException
    ? err.$metadata.httpStatusCode
    : undefined;
}

export function translateS3Error(err: unknown, context: CallContext): Error {
  if (err instanceof StorageError) return err;

  const name = err instanceof Error ? err.name : "UnknownError";
  const message = err instanceof Error ? err.message : String(err);
  const { bucket, key } = context;

  if (NOT_FOUND_NAMES.has(name)) {
    if (name === "NoSuchBucket" || key === undefined) {
      return new NotFoundError(`Bucket '${bucket}' not found`, { bucket });
    }
    return new NotFoundError(`Object '${key}' not found in bucket '${bucket}'`, {
      bucket,
      key,
    });
  }
  if (name === "BucketAlreadyOwnedByYou") {
    return new AlreadyExistsError(`Bucket '${bucket}' already exists`, true, {
      bucket,
    });
  }
  if (name === "BucketAlreadyExists") {
    return new AlreadyExistsError(
      `Bucket '${bucket}' already exists and is owned by another account`,
      false,
      { bucket },
    );
  }
  if (name === "BucketNotEmpty" && bucket !== undefined) {
    return new BucketNotEmptyError(bucket, err);
  }

  return new BackendError(
    `${context.operation} failed: ${message}`,
    {
      ...context,
      name,
      ...(httpStatusOf(err) !== undefined && {
        httpStatusCode: httpStatusOf(err),
      }),
    },
    err,
  );
}

const LOCATION_CONSTRAINTS: ReadonlySet<string> = new Set(
  Object.values(BucketLocationConstraint),
);

function isLocationConstraint(
  region: string,
): region is BucketLocationConstraint {
  return LOCATION_CONSTRAINTS.has(region);
}

function locationConstraint(region: string | undefined) {
  // us-east-1 is the implicit location and must not be sent
  if (region === undefined || region === "us-east-1") return undefined;
  if (!isLocationConstraint(region)) {
    throw new ConfigurationError(`Unknown bucket region '${region}'`, {
      region,
    });
  }
  return { LocationConstraint: region };
}

export function createS3ObjectStore(client: S3Client): ObjectStore {
  async function call<T>(context: CallContext, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw translateS3Error(err, context);
    }
  }

  async function abortAndRethrow(
    bucket: string,
    key: string,
    uploadId: string,
    failure: unknown,
  ): Promise<never> {
    try {
      await client.send(
        new AbortMultipartUploadCommand({
          Bucket: bucket,
          Key: key,
          UploadId: uploadId,
        }),
      );
    } catch (abortErr) {
      throw new BackendError(
        `Multipart upload of '${key}' failed and could not be aborted`,
        { bucket, key, uploadId },
        new AggregateError([failure, abortErr]),
      );
    }
    throw translateS3Error(failure, {
      operation: "MultipartUpload",
      bucket,
      key,
    });
  }

  async function headObject(bucket: string, key: string) {
    const res = await call({ operation: "HeadObject", bucket, key }, () =>
      client.send(new HeadObjectCommand({ Bucket: bucket, Key: key })),
    );
    return {
      size: res.ContentLength ?? 0,
      metadata: res.Metadata ?? {},
      ...(res.LastModified !== undefined && {
        lastModified: res.LastModified,
      }),
    };
  }

  async function* listPages(
    bucket: string,
    prefix: string | undefined,
  ): AsyncGenerator<string> {
    let continuationToken: string | undefined;
    do {
      const token = continuationToken;
      const page = await call({ operation: "ListObjectsV2", bucket }, () =>
        client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            ...(prefix ? { Prefix: prefix } : {}),
            ...(token !== undefined && { ContinuationToken: token }),
          }),
        ),
      );
      for (const object of page.Contents ?? []) {
        if (object.Key !== undefined) yield object.Key;
      }
      continuationToken = page.IsTruncated
        ? page.NextContinuationToken
        : undefined;
    } while (continuationToken !== undefined);
  }

  return {
    async listBuckets() {
      const res = await call({ operation: "ListBuckets" }, () =>
        client.send(new ListBucketsCommand({})),
      );
      return (res.Buckets ?? []).flatMap((b) =>
        b.Name !== undefined ? [b.Name] : [],
      );
    },

    async createBucket(bucket, region) {
      const configuration = locationConstraint(region);
      await call({ operation: "CreateBucket", bucket }, () =>
        client.send(
          new CreateBucketCommand({
            Bucket: bucket,
            ...(configuration !== undefined && {
              CreateBucketConfiguration: configuration,
            }),
          }),
        ),
      );
    },

    async deleteBucket(bucket) {
      await call({ operation: "DeleteBucket", bucket }, () =>
        client.send(new DeleteBucketCommand({ Bucket: bucket })),
      );
    },

    async putObject(bucket, key, body, metadata) {
      await call({ operation: "PutObject", bucket, key }, () =>
        client.send(
          new PutObjectCommand({
            Bucket: bucket,
            Key: key,
            Body: body,
            ContentLength: body.byteLength,
            ...(metadata !== undefined && { Metadata: metadata }),
          }),
        ),
      );
    },

    async putObjectMultipart(bucket, key, parts, metadata) {
      const created = await call(
        { operation: "CreateMultipartUpload", bucket, key },
        () =>
          client.send(
            new CreateMultipartUploadCommand({
              Bucket: bucket,
              Key: key,
              ...(metadata !== undefined && { Metadata: metadata }),
            }),
          ),
      );
      const uploadId = created.UploadId;
      if (uploadId === undefined) {
        throw new BackendError("CreateMultipartUpload returned no UploadId", {
          bucket,
          key,
        });
      }

      const completed: CompletedPart[] = [];
      try {
        for await (const chunk of parts) {
          const partNumber = completed.length + 1;
          const res = await client.send(
            new UploadPartCommand({
              Bucket: bucket,
              Key: key,
              UploadId: uploadId,
              PartNumber: partNumber,
              Body: chunk,
              ContentLength: chunk.byteLength,
            }),
          );
          completed.push({ ETag: res.ETag, PartNumber: partNumber });
        }
        if (completed.length === 0) {
          // S3 needs at least one part, even for an empty file
          const res = await client.send(
            new UploadPartCommand({
              Bucket: bucket,
              Key: key,
              UploadId: uploadId,
              PartNumber: 1,
              Body: new Uint8Array(0),
              ContentLength: 0,
            }),
          );
          completed.push({ ETag: res.ETag, PartNumber: 1 });
        }
        await client.send(
          new CompleteMultipartUploadCommand({
            Bucket: bucket,
            Key: key,
            UploadId: uploadId,
            MultipartUpload: { Parts: completed },
          }),
        );
      } catch (err) {
        return abortAndRethrow(bucket, key, uploadId, err);
      }
      return { partCount: completed.length };
    },

    async getObject(bucket, key) {
      const res = await call({ operation: "GetObject", bucket, key }, () =>
        client.send(new GetObjectCommand({ Bucket: bucket, Key: key })),
      );
      const stream = res.Body;
      const body = stream
        ? await call({ operation: "GetObject", bucket, key }, () =>
            stream.transformToByteArray(),
          )
        : new Uint8Array(0);
      return { body, metadata: res.Metadata ?? {} };
    },

    headObject,

    async deleteObject(bucket, key) {
      // S3 DeleteObject succeeds for missing keys; HEAD tells them apart
      try {
        await headObject(bucket, key);
      } catch (err) {
        if (err instanceof NotFoundError && err.details?.key === key) {
          return false;
        }
        throw err;
      }
      await call({ operation: "DeleteObject", bucket, key }, () =>
        client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key })),
      );
      return true;
    },

    async deleteObjects(bucket, keys): Promise<DeleteObjectsResult> {
      if (keys.length > MAX_DELETE_BATCH) {
        throw new RangeError(
          `deleteObjects takes at most ${MAX_DELETE_BATCH} keys, got ${keys.length}`,
        );
      }
      if (keys.length === 0) return { deleted: [], errors: [] };

      const res = await call({ operation: "DeleteObjects", bucket }, () =>
        client.send(
          new DeleteObjectsCommand({
            Bucket: bucket,
            Delete: { Objects: keys.map((Key) => ({ Key })), Quiet: false },
          }),
        ),
      );
      return {
        deleted: (res.Deleted ?? []).flatMap((d) =>
          d.Key !== undefined ? [d.Key] : [],
        ),
        errors: (res.Errors ?? []).map((e) => ({
          key: e.Key ?? "",
          code: e.Code ?? "UnknownError",
          message: e.Message ?? "",
        })),
      };
    },

    listKeys(bucket, prefix) {
      return { [Symbol.asyncIterator]: () => listPages(bucket, prefix) };
    },
  };
}

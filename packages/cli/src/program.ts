import { createRequire } from "node:module";
import {
  Command,
  CommanderError,
  InvalidArgumentError,
  Option,
} from "commander";
import type { MirrorOutcome } from "@s3mirror/core/facade";
import { parseMetadataJson } from "@s3mirror/core/metadata";
import { ConfigurationError } from "@s3mirror/core/errors";
import type { CliContext, ContextFactory, GlobalOptions } from "./context.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

/** Where command output and errors are written. */
export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

interface UploadFileOptions {
  metadata?: string;
  large?: boolean;
  partSize?: number;
}

interface CleanupCommandOptions {
  local?: boolean;
  removeBucket?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return parsed;
}

export function createProgram(io: CliIO, createContext: ContextFactory): Command {
  const program = new Command();

  program
    .name("s3mirror")
    .description("Manage S3 buckets and objects against AWS or a local mock, with a local mirror")
    .version(pkg.version)
    .option("--endpoint <url>", "S3 endpoint URL (mock mode defaults to http://localhost:5000)")
    .option("--profile <name>", "AWS profile to read credentials from")
    .option("--region <region>", "AWS region")
    .option("--config <path>", "Config file", "s3mirror.config.json")
    .addOption(
      new Option("--mode <mode>", "Backend to use (default: auto)").choices([
        "auto",
        "mock",
        "real",
      ]),
    )
    .option("--root <dir>", "Directory holding the local mirrors")
    .option("--user <id>", "Acting user for permission checks")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text),
      writeErr: (text) => io.err(text),
    });

  async function withContext(
    run: (ctx: CliContext) => Promise<void>,
  ): Promise<void> {
    const ctx = await createContext(program.opts<GlobalOptions>());
    try {
      await run(ctx);
    } finally {
      ctx.close();
    }
  }

  function warnIfNotMirrored(outcome: MirrorOutcome): void {
    if (!outcome.mirrored && outcome.mirrorError) {
      io.err(`Warning: local mirror not updated: ${outcome.mirrorError.message}\n`);
    }
  }

  program
    .command("create-bucket")
    .description("Create a bucket in the region given by --region")
    .argument("<bucket>", "Bucket name")
    .action(async (bucket: string) => {
      await withContext(async (ctx) => {
        const result = await ctx.facade.createBucket(bucket, {
          region: ctx.region,
          userId: ctx.userId,
        });
        io.out(
          result.status === "created"
            ? `Created bucket ${bucket}\n`
            : `Bucket ${bucket} already exists and is owned by you\n`,
        );
      });
    });

  program
    .command("list-buckets")
    .description("List buckets")
    .action(async () => {
      await withContext(async (ctx) => {
        const buckets = await ctx.facade.listBuckets();
        if (buckets.length === 0) {
          io.out("No buckets found\n");
          return;
        }
        for (const bucket of buckets) io.out(`${bucket}\n`);
      });
    });

  program
    .command("delete-bucket")
    .description("Delete a bucket (mock backend only)")
    .argument("<bucket>", "Bucket name")
    .option("--force", "Delete every object first")
    .action(async (bucket: string, options: { force?: boolean }) => {
      await withContext(async (ctx) => {
        const result = await ctx.facade.deleteBucket(bucket, {
          force: options.force === true,
          userId: ctx.userId,
        });
        if (result.status === "refused") {
          io.out(`Refusing to delete bucket ${bucket} on the real backend\n`);
          return;
        }
        io.out(`Deleted bucket ${bucket} (${result.objectsDeleted} objects removed)\n`);
      });
    });

  program
    .command("upload-file")
    .description("Upload a local file")
    .argument("<bucket>", "Bucket name")
    .argument("<file_path>", "Local file to upload")
    .argument("<object_name>", "Object key")
    .option("--metadata <json>", "User metadata as a JSON object")
    .option("--large", "Use a multipart upload")
    .option("--part-size <bytes>", "Part size for --large", parsePositiveInt)
    .action(
      async (
        bucket: string,
        filePath: string,
        key: string,
        options: UploadFileOptions,
      ) => {
        const metadata =
          options.metadata !== undefined
            ? parseMetadataJson(options.metadata)
            : undefined;
        await withContext(async (ctx) => {
          if (options.large || options.partSize !== undefined) {
            const result = await ctx.facade.uploadLargeFile(bucket, key, filePath, {
              metadata,
              partSize: options.partSize,
              userId: ctx.userId,
            });
            io.out(
              `Uploaded ${filePath} to ${bucket}/${key} (${result.size} bytes in ${result.partCount} parts)\n`,
            );
            warnIfNotMirrored(result);
            return;
          }
          const result = await ctx.facade.uploadFile(bucket, key, filePath, {
            metadata,
            userId: ctx.userId,
          });
          io.out(`Uploaded ${filePath} to ${bucket}/${key} (${result.size} bytes)\n`);
          warnIfNotMirrored(result);
        });
      },
    );

  program
    .command("upload")
    .description("Upload inline content")
    .argument("<bucket>", "Bucket name")
    .argument("<object_name>", "Object key")
    .argument("<content>", "Text to store")
    .option("--metadata <json>", "User metadata as a JSON object")
    .action(
      async (
        bucket: string,
        key: string,
        content: string,
        options: { metadata?: string },
      ) => {
        const metadata =
          options.metadata !== undefined
            ? parseMetadataJson(options.metadata)
            : undefined;
        await withContext(async (ctx) => {
          const result = await ctx.facade.uploadContent(bucket, key, content, {
            metadata,
            userId: ctx.userId,
          });
          io.out(`Uploaded ${result.size} bytes to ${bucket}/${key}\n`);
          warnIfNotMirrored(result);
        });
      },
    );

  program
    .command("download-file")
    .description("Download an object to a local file")
    .argument("<bucket>", "Bucket name")
    .argument("<object_name>", "Object key")
    .argument("<download_path>", "Destination file")
    .action(async (bucket: string, key: string, downloadPath: string) => {
      await withContext(async (ctx) => {
        const result = await ctx.facade.downloadFile(bucket, key, downloadPath, {
          userId: ctx.userId,
        });
        io.out(`Downloaded ${bucket}/${key} to ${result.destPath}\n`);
        warnIfNotMirrored(result);
      });
    });

  program
    .command("read-file")
    .description("Print an object as UTF-8 text")
    .argument("<bucket>", "Bucket name")
    .argument("<object_name>", "Object key")
    .action(async (bucket: string, key: string) => {
      await withContext(async (ctx) => {
        const text = await ctx.facade.readFile(bucket, key, { userId: ctx.userId });
        io.out(text.endsWith("\n") ? text : `${text}\n`);
      });
    });

  program
    .command("delete-file")
    .description("Delete an object and its local copies")
    .argument("<bucket>", "Bucket name")
    .argument("<object_name>", "Object key")
    .action(async (bucket: string, key: string) => {
      await withContext(async (ctx) => {
        const result = await ctx.facade.deleteFile(bucket, key, { userId: ctx.userId });
        io.out(
          result.status === "deleted"
            ? `Deleted ${bucket}/${key}\n`
            : `${bucket}/${key} was already absent\n`,
        );
      });
    });

  program
    .command("metadata")
    .description("Print an object's user metadata as JSON")
    .argument("<bucket>", "Bucket name")
    .argument("<object_name>", "Object key")
    .action(async (bucket: string, key: string) => {
      await withContext(async (ctx) => {
        const metadata = await ctx.facade.getObjectMetadata(bucket, key, {
          userId: ctx.userId,
        });
        io.out(`${JSON.stringify(metadata, null, 2)}\n`);
      });
    });

  program
    .command("list")
    .description("List the keys in a bucket, or the buckets when none is given")
    .argument("[bucket]", "Bucket name")
    .option("--prefix <prefix>", "Only keys starting with this prefix")
    .action(async (bucket: string | undefined, options: { prefix?: string }) => {
      await withContext(async (ctx) => {
        if (bucket === undefined) {
          const buckets = await ctx.facade.listBuckets();
          if (buckets.length === 0) io.out("No buckets found\n");
          for (const name of buckets) io.out(`${name}\n`);
          return;
        }
        let count = 0;
        for await (const key of ctx.facade.listFiles(bucket, {
          prefix: options.prefix,
          userId: ctx.userId,
        })) {
          io.out(`${key}\n`);
          count += 1;
        }
        if (count === 0) io.out("No objects found\n");
      });
    });

  program
    .command("cleanup")
    .description("Remove local mirror copies and, on the mock backend, a bucket")
    .argument("[bucket]", "Limit the cleanup to one bucket")
    .option("--local", "Remove local mirror copies")
    .option("--remove-bucket", "Empty and delete the bucket (mock backend only)")
    .action(async (bucket: string | undefined, options: CleanupCommandOptions) => {
      const removeLocal = options.local === true;
      const removeBucket = options.removeBucket === true;
      if (!removeLocal && !removeBucket) {
        throw new ConfigurationError(
          "Nothing to clean up: pass --local, --remove-bucket or both",
        );
      }
      await withContext(async (ctx) => {
        const result = await ctx.facade.cleanup({
          bucket,
          removeLocal,
          removeBucket,
          userId: ctx.userId,
        });
        if (removeLocal) {
          if (result.localRemoved.length === 0) io.out("No local mirror copies found\n");
          for (const path of result.localRemoved) io.out(`Removed ${path}\n`);
        }
        if (result.bucket?.status === "refused") {
          io.out(`Refusing to delete bucket ${result.bucket.bucket} on the real backend\n`);
        } else if (result.bucket) {
          io.out(
            `Deleted bucket ${result.bucket.bucket} (${result.bucket.objectsDeleted} objects removed)\n`,
          );
        }
      });
    });

  return program;
}

/**
 * Parse and run one command line.
 * @returns the process exit code
 */
export async function runCli(
  argv: string[],
  io: CliIO,
  createContext: ContextFactory,
): Promise<number> {
  const program = createProgram(io, createContext);
  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (err) {
    // Commander has already printed its own usage errors, help and version
    if (err instanceof CommanderError) return err.exitCode;
    io.err(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}

import { access, copyFile, mkdir, rm, rmdir, unlink, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { LocalIOError } from "../errors/catalog.js";
import { buildBucketDir, buildMirrorPath } from "./paths.js";

export interface MirrorManagerOptions {
  root: string;
}

/**
 * Best-effort shadow copy of remote objects at `<root>/<bucket>/<key>`.
 * Never the source of truth: writes are not atomic and a crash can leave a
 * truncated file behind.
 */
export interface MirrorManager {
  readonly root: string;
  pathFor(bucket: string, key: string): string;
  /** mkdir -p; a no-op for existing directories */
  ensureDir(path: string): Promise<void>;
  copyIn(sourcePath: string, bucket: string, key: string): Promise<string>;
  writeBytes(bucket: string, key: string, bytes: Uint8Array): Promise<string>;
  copyOut(bucket: string, key: string, destPath: string): Promise<void>;
  /** @returns false if there was no copy to remove */
  remove(bucket: string, key: string): Promise<boolean>;
  removeAll(bucket: string): Promise<boolean>;
  removeRoot(): Promise<boolean>;
}

function errnoOf(err: unknown): string | undefined {
  return err instanceof Error && "code" in err
    ? (err as NodeJS.ErrnoException).code
    : undefined;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (err) {
    if (errnoOf(err) === "ENOENT") return false;
    throw new LocalIOError(`Cannot access ${path}`, path, err);
  }
}

export function createMirrorManager(options: MirrorManagerOptions): MirrorManager {
  const root = resolve(options.root);

  async function ensureDir(path: string): Promise<void> {
    try {
      await mkdir(path, { recursive: true });
    } catch (err) {
      throw new LocalIOError(`Cannot create directory ${path}`, path, err);
    }
  }

  async function copy(source: string, target: string): Promise<void> {
    await ensureDir(dirname(target));
    try {
      await copyFile(source, target);
    } catch (err) {
      if (errnoOf(err) === "ENOENT" && !(await exists(source))) {
        throw new LocalIOError(`Source file not found: ${source}`, source, err);
      }
      throw new LocalIOError(`Cannot copy ${source} to ${target}`, target, err);
    }
  }

  /** Remove empty directories between `from` and the bucket directory */
  async function pruneEmptyParents(from: string, bucketDir: string): Promise<void> {
    let dir = from;
    while (dir !== bucketDir && dir.startsWith(bucketDir)) {
      try {
        await rmdir(dir);
      } catch (err) {
        const code = errnoOf(err);
        if (code === "ENOTEMPTY" || code === "EEXIST") return;
        if (code !== "ENOENT") {
          throw new LocalIOError(`Cannot remove directory ${dir}`, dir, err);
        }
      }
      dir = dirname(dir);
    }
  }

  async function removeTree(path: string): Promise<boolean> {
    const present = await exists(path);
    try {
      await rm(path, { recursive: true, force: true });
    } catch (err) {
      throw new LocalIOError(`Cannot remove ${path}`, path, err);
    }
    return present;
  }

  return {
    root,

    pathFor(bucket, key) {
      return buildMirrorPath(root, bucket, key);
    },

    ensureDir,

    async copyIn(sourcePath, bucket, key) {
      const target = buildMirrorPath(root, bucket, key);
      await copy(sourcePath, target);
      return target;
    },

    async writeBytes(bucket, key, bytes) {
      const target = buildMirrorPath(root, bucket, key);
      await ensureDir(dirname(target));
      try {
        await writeFile(target, bytes);
      } catch (err) {
        throw new LocalIOError(`Cannot write ${target}`, target, err);
      }
      return target;
    },

    async copyOut(bucket, key, destPath) {
      const source = buildMirrorPath(root, bucket, key);
      await copy(source, resolve(destPath));
    },

    async remove(bucket, key) {
      const target = buildMirrorPath(root, bucket, key);
      try {
        await unlink(target);
      } catch (err) {
        if (errnoOf(err) === "ENOENT") return false;
        throw new LocalIOError(`Cannot remove ${target}`, target, err);
      }
      await pruneEmptyParents(dirname(target), buildBucketDir(root, bucket));
      return true;
    },

    async removeAll(bucket) {
      return removeTree(buildBucketDir(root, bucket));
    },

    async removeRoot() {
      return removeTree(root);
    },
  };
}

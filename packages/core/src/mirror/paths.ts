import { isAbsolute, join, relative, resolve, sep } from "node:path";
import { LocalIOError } from "../errors/catalog.js";

function assertInside(root: string, target: string, label: string): string {
  const rel = relative(root, target);
  if (rel === "" || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new LocalIOError(`${label} escapes the mirror root`, target);
  }
  return target;
}

/** `<root>/<bucket>`; the bucket must be a single path segment */
export function buildBucketDir(root: string, bucket: string): string {
  if (bucket === "" || bucket.includes("/") || bucket.includes(sep)) {
    throw new LocalIOError(`Invalid bucket name '${bucket}'`, root);
  }
  const absRoot = resolve(root);
  return assertInside(absRoot, join(absRoot, bucket), `Bucket '${bucket}'`);
}

/** `<root>/<bucket>/<key>`, with "/" in keys becoming directories */
export function buildMirrorPath(root: string, bucket: string, key: string): string {
  const bucketDir = buildBucketDir(root, bucket);
  if (key === "" || key.endsWith("/")) {
    throw new LocalIOError(`Key '${key}' does not name a file`, bucketDir);
  }
  return assertInside(bucketDir, join(bucketDir, ...key.split("/")), `Key '${key}'`);
}

import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { LocalIOError } from "../errors/catalog.js";
import { buildBucketDir, buildMirrorPath } from "./paths.js";

const ROOT = "/tmp/s3mirror/mirror/mock";

describe("buildMirrorPath", () => {
  it("places objects under <root>/<bucket>/<key>", () => {
    expect(buildMirrorPath(ROOT, "b1", "a.txt")).toBe(join(ROOT, "b1", "a.txt"));
  });

  it("turns key separators into directories", () => {
    expect(buildMirrorPath(ROOT, "b1", "folder/nested.txt")).toBe(
      join(ROOT, "b1", "folder", "nested.txt"),
    );
  });

  it("rejects keys that climb out of the bucket", () => {
    expect(() => buildMirrorPath(ROOT, "b1", "../b2/a.txt")).toThrow(LocalIOError);
    expect(() => buildMirrorPath(ROOT, "b1", "a/../../x")).toThrow(
      "Key 'a/../../x' escapes the mirror root",
    );
  });

  it("rejects folder-marker and empty keys", () => {
    expect(() => buildMirrorPath(ROOT, "b1", "folder/")).toThrow(
      "Key 'folder/' does not name a file",
    );
    expect(() => buildMirrorPath(ROOT, "b1", "")).toThrow(LocalIOError);
  });
});

describe("buildBucketDir", () => {
  it("returns the bucket directory", () => {
    expect(buildBucketDir(ROOT, "b1")).toBe(join(ROOT, "b1"));
  });

  it("rejects names that are not a single segment", () => {
    expect(() => buildBucketDir(ROOT, "..")).toThrow(LocalIOError);
    expect(() => buildBucketDir(ROOT, "a/b")).toThrow("Invalid bucket name 'a/b'");
  });
});

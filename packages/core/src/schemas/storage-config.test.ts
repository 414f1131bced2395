import { describe, it, expect } from "vitest";
import { StorageConfigSchema, StorageModeSchema } from "./storage-config.js";

describe("StorageConfigSchema", () => {
  it("fills every default from an empty object", () => {
    expect(StorageConfigSchema.parse({})).toEqual({
      region: "us-east-1",
      mode: "auto",
      root_path: "~/.s3mirror",
      logging: { level: "info", pretty: false },
    });
  });

  it("accepts the recognized keys", () => {
    const config = StorageConfigSchema.parse({
      endpoint_url: "http://localhost:5000",
      region: "us-west-2",
      default_user_id: "test_user",
    });

    expect(config.endpoint_url).toBe("http://localhost:5000");
    expect(config.region).toBe("us-west-2");
    expect(config.default_user_id).toBe("test_user");
  });

  it("rejects a malformed endpoint_url", () => {
    expect(() =>
      StorageConfigSchema.parse({ endpoint_url: "not a url" }),
    ).toThrow();
  });

  it("rejects an unknown mode", () => {
    expect(() => StorageConfigSchema.parse({ mode: "hybrid" })).toThrow();
  });

  it("rejects an empty region", () => {
    expect(() => StorageConfigSchema.parse({ region: "" })).toThrow();
  });
});

describe("StorageModeSchema", () => {
  it("only allows mock and real", () => {
    expect(StorageModeSchema.parse("mock")).toBe("mock");
    expect(StorageModeSchema.parse("real")).toBe("real");
    expect(() => StorageModeSchema.parse("auto")).toThrow();
  });
});

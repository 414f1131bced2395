import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { mkdtemp, writeFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { loadConfig } from "./loader.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "config-test-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true });
  }
}

describe("loadConfig", () => {
  it("returns defaults when file is missing", async () => {
    const config = await loadConfig({
      configPath: "/tmp/nonexistent-config-path/s3mirror.config.json",
    });

    expect(config.region).toBe("us-east-1");
    expect(config.mode).toBe("auto");
    expect(config.endpoint_url).toBeUndefined();
    expect(config.default_user_id).toBeUndefined();
    expect(config.logging.level).toBe("info");
    expect(config.logging.pretty).toBe(false);
  });

  it("parses the recognized keys", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "s3mirror.config.json");
      await writeFile(
        configPath,
        JSON.stringify({
          endpoint_url: "http://localhost:5000",
          region: "us-west-2",
          default_user_id: "test_user",
        }),
      );

      const config = await loadConfig({ configPath });

      expect(config.endpoint_url).toBe("http://localhost:5000");
      expect(config.region).toBe("us-west-2");
      expect(config.default_user_id).toBe("test_user");
    });
  });

  it("merges partial config with defaults", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "s3mirror.config.json");
      await writeFile(configPath, JSON.stringify({ logging: { level: "warn" } }));

      const config = await loadConfig({ configPath });

      expect(config.logging.level).toBe("warn");
      expect(config.logging.pretty).toBe(false);
      expect(config.region).toBe("us-east-1");
    });
  });

  it("throws for invalid values", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "s3mirror.config.json");
      await writeFile(configPath, JSON.stringify({ endpoint_url: 42 }));

      await expect(loadConfig({ configPath })).rejects.toThrow();
    });
  });

  it("throws for malformed JSON", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "s3mirror.config.json");
      await writeFile(configPath, "{ invalid json }}}");

      await expect(loadConfig({ configPath })).rejects.toThrow(SyntaxError);
    });
  });
});

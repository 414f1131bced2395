import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import pino from "pino";
import { ProbeError } from "@s3mirror/core/errors";
import { createCliContext, type CreateCliContextOptions } from "./context.js";

const logger = pino({ level: "silent" });
const ENV_CREDENTIALS = {
  AWS_ACCESS_KEY_ID: "test-key",
  AWS_SECRET_ACCESS_KEY: "test-secret",
};

function namedError(name: string): Error {
  const err = new Error(name);
  err.name = name;
  return err;
}

describe("createCliContext", () => {
  let dir: string;
  let config: string;
  let options: CreateCliContextOptions;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cli-context-test-"));
    config = join(dir, "s3mirror.config.json");
    options = {
      env: {},
      logger,
      credentialsFilepath: join(dir, "no-credentials"),
      configFilepath: join(dir, "no-config"),
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("builds a mock context with placeholder credentials", async () => {
    const ctx = await createCliContext({ mode: "mock", root: dir, config }, options);

    expect(ctx.mode).toBe("mock");
    expect(ctx.facade.mode).toBe("mock");
    expect(ctx.detection).toBeUndefined();
    expect(ctx.handle.endpoint).toBe("http://localhost:5000");
    expect(ctx.handle.credentialSource).toBe("placeholder");
    expect(ctx.region).toBe("us-east-1");
    expect(ctx.settings.rootPath).toBe(dir);
    ctx.close();
  });

  it("reads settings from the config file and lets flags win", async () => {
    await writeFile(
      config,
      JSON.stringify({
        mode: "mock",
        region: "eu-west-1",
        default_user_id: "alice",
        root_path: dir,
        endpoint_url: "http://127.0.0.1:9000",
      }),
    );

    const fromFile = await createCliContext({ config }, options);
    expect(fromFile.mode).toBe("mock");
    expect(fromFile.region).toBe("eu-west-1");
    expect(fromFile.userId).toBe("alice");
    expect(fromFile.handle.endpoint).toBe("http://127.0.0.1:9000");
    fromFile.close();

    const flagged = await createCliContext(
      { config, region: "ap-south-1", user: "bob" },
      options,
    );
    expect(flagged.region).toBe("ap-south-1");
    expect(flagged.userId).toBe("bob");
    flagged.close();
  });

  it("falls back to mock mode when no credentials resolve", async () => {
    const probe = vi.fn(async () => {});

    const ctx = await createCliContext({ root: dir, config }, { ...options, probe });

    expect(ctx.detection).toEqual({ mode: "mock", reason: "no-credentials" });
    expect(ctx.facade.mode).toBe("mock");
    expect(probe).not.toHaveBeenCalled();
    ctx.close();
  });

  it("uses real mode when the probe accepts the credentials", async () => {
    const probe = vi.fn(async () => {});

    const ctx = await createCliContext(
      { root: dir, config },
      { ...options, env: ENV_CREDENTIALS, probe },
    );

    expect(ctx.detection).toEqual({ mode: "real", reason: "verified" });
    expect(ctx.facade.mode).toBe("real");
    expect(ctx.handle.credentialSource).toBe("environment");
    expect(probe).toHaveBeenCalledTimes(1);
    ctx.close();
  });

  it("uses mock mode when the credentials are rejected", async () => {
    const probe = vi.fn(async () => {
      throw namedError("InvalidClientTokenId");
    });

    const ctx = await createCliContext(
      { root: dir, config },
      { ...options, env: ENV_CREDENTIALS, probe },
    );

    expect(ctx.detection).toEqual({ mode: "mock", reason: "auth-failed" });
    expect(ctx.handle.credentialSource).toBe("environment");
    ctx.close();
  });

  it("raises ProbeError when the backend cannot be reached", async () => {
    const probe = vi.fn(async () => {
      throw namedError("TimeoutError");
    });

    await expect(
      createCliContext({ root: dir, config }, { ...options, env: ENV_CREDENTIALS, probe }),
    ).rejects.toBeInstanceOf(ProbeError);
  });
});

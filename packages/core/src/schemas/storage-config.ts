import { z } from "zod";

export const DEFAULTS = {
  region: "us-east-1",
  mode: "auto" as const,
  rootPath: "~/.s3mirror",
  mockEndpoint: "http://localhost:5000",
  logging: {
    level: "info" as const,
    pretty: false,
  },
};

export const StorageModeSchema = z.enum(["mock", "real"]);
export const ModeSelectionSchema = z.enum(["auto", "mock", "real"]);

export const StorageConfigSchema = z.object({
  endpoint_url: z
    .url()
    .optional()
    .describe("Endpoint override; points at the mock server in mock mode"),
  region: z.string().min(1).default(DEFAULTS.region),
  default_user_id: z
    .string()
    .min(1)
    .optional()
    .describe("User id applied to permission checks when --user is absent"),
  profile: z.string().min(1).optional(),
  mode: ModeSelectionSchema.default(DEFAULTS.mode),
  root_path: z
    .string()
    .min(1)
    .default(DEFAULTS.rootPath)
    .describe("Parent directory of the per-mode mirror roots"),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug", "silent"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
});

export type StorageMode = z.infer<typeof StorageModeSchema>;
export type ModeSelection = z.infer<typeof ModeSelectionSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type LoggingConfig = StorageConfig["logging"];

import { z } from "zod";
import { ConfigurationError } from "../errors/catalog.js";
import type { ObjectMetadata } from "../store/interface.js";

// S3 user metadata travels as x-amz-meta-* headers: ASCII names, no spaces
const METADATA_KEY = /^[!#$%&'*+.^_`|~0-9a-z-]+$/;

export const ObjectMetadataSchema = z
  .record(z.string(), z.union([z.string(), z.number(), z.boolean()]))
  .transform((record, ctx) => {
    const normalized: ObjectMetadata = {};
    for (const [rawKey, rawValue] of Object.entries(record)) {
      const key = rawKey.trim().toLowerCase();
      if (!METADATA_KEY.test(key)) {
        ctx.addIssue({
          code: "custom",
          message: `Invalid metadata key '${rawKey}'`,
          path: [rawKey],
        });
        continue;
      }
      normalized[key] = String(rawValue);
    }
    return normalized;
  });

/** Validate metadata and lower-case its keys, as S3 returns them. */
export function normalizeMetadata(input: unknown): ObjectMetadata {
  return ObjectMetadataSchema.parse(input);
}

/** Parse a `--metadata '{"author":"..."}'` argument. */
export function parseMetadataJson(text: string): ObjectMetadata {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError("Metadata must be valid JSON", {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  const result = ObjectMetadataSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(
      "Metadata must be a JSON object of string values",
      { issues: result.error.issues.map((issue) => issue.message) },
    );
  }
  return result.data;
}

/**
 * Store configuration: validated options merged with environment variables
 *
 * Environment:
 *   LAZYKV_CACHE_SIZE      per-container cache bound, overrides the option (0 = unbounded)
 *   LAZYKV_DEFAULT_HASHER  hasher for containers whose options name none, when
 *                          the option is not given
 *   LAZYKV_DEBUG           enables debug logs (read by the logger)
 */

import { z } from "zod";
import type { KeyHasher, StorageBackend, StoreOptions } from "./types.js";
import { ConfigError } from "./errors.js";
import { MemoryStorage } from "./storage/memory.js";

export function isStorageBackend(value: unknown): value is StorageBackend {
  return (
    typeof value === "object" &&
    value !== null &&
    "read" in value &&
    typeof value.read === "function" &&
    "write" in value &&
    typeof value.write === "function" &&
    "remove" in value &&
    typeof value.remove === "function" &&
    "has" in value &&
    typeof value.has === "function"
  );
}

export const KeyHasherSchema = z.enum(["identity", "sha256", "keccak256"]);

export const StoreOptionsSchema = z
  .object({
    storage: z
      .custom<StorageBackend>(isStorageBackend, {
        message: "storage must implement read, write, remove and has",
      })
      .optional(),
    cacheSize: z.number().int().nonnegative().optional(),
    defaultHasher: KeyHasherSchema.optional(),
  })
  .strict();

export const EnvSchema = z.object({
  LAZYKV_CACHE_SIZE: z
    .string()
    .regex(/^\d+$/, "LAZYKV_CACHE_SIZE must be a non-negative integer")
    .transform(Number)
    .optional(),
  LAZYKV_DEFAULT_HASHER: KeyHasherSchema.optional(),
});

export interface ResolvedConfig {
  storage: StorageBackend;
  /** 0 = unbounded */
  cacheSize: number;
  /** undefined = each container's own default */
  defaultHasher: KeyHasher | undefined;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    )
    .join("; ");
}

/**
 * Validate store options and apply environment overrides
 * @throws {ConfigError} If an option or environment variable is invalid
 */
export function resolveConfig(
  options: StoreOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const parsedOptions = StoreOptionsSchema.safeParse(options);
  if (!parsedOptions.success) {
    throw new ConfigError(describeIssues(parsedOptions.error), { cause: parsedOptions.error });
  }

  const parsedEnv = EnvSchema.safeParse({
    LAZYKV_CACHE_SIZE: env.LAZYKV_CACHE_SIZE,
    LAZYKV_DEFAULT_HASHER: env.LAZYKV_DEFAULT_HASHER,
  });
  if (!parsedEnv.success) {
    throw new ConfigError(describeIssues(parsedEnv.error), { cause: parsedEnv.error });
  }

  const opts = parsedOptions.data;
  const vars = parsedEnv.data;

  return {
    storage: opts.storage ?? new MemoryStorage(),
    cacheSize: vars.LAZYKV_CACHE_SIZE ?? opts.cacheSize ?? 0,
    defaultHasher: opts.defaultHasher ?? vars.LAZYKV_DEFAULT_HASHER,
  };
}

import * as path from "node:path";
import { z } from "zod";
import type { LogLevel } from "./logging";

export interface RewriterConfig {
  /** Fence language and marker tag: "rust" means ```rust blocks under <!-- INCLUDE-RUST: ... --> markers. */
  language: string;
  /** Directory relative document paths are resolved against. */
  cwd: string;
  /** Directory referenced paths are resolved against. */
  baseDir: string;
  logLevel: LogLevel;
}

const RewriterConfigSchema = z
  .object({
    language: z
      .string()
      .regex(/^[a-z0-9_+-]+$/, "language must be a lower-case fence identifier such as \"rust\""),
    baseDir: z.string().min(1),
    logLevel: z.enum(["info", "debug"]),
  })
  .partial()
  .strict();

export type RewriterConfigOverrides = z.input<typeof RewriterConfigSchema>;

export function defaultConfig(cwd: string): RewriterConfig {
  return {
    language: "rust",
    cwd,
    baseDir: cwd,
    logLevel: "info",
  };
}

export function resolveConfig(overrides: unknown, cwd: string): RewriterConfig {
  const parsed = RewriterConfigSchema.safeParse(overrides ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid rewriter config: ${issues}`);
  }

  const defaults = defaultConfig(cwd);
  const supplied = parsed.data;

  return {
    language: supplied.language ?? defaults.language,
    cwd: defaults.cwd,
    baseDir: supplied.baseDir ? path.resolve(cwd, supplied.baseDir) : defaults.baseDir,
    logLevel: supplied.logLevel ?? defaults.logLevel,
  };
}

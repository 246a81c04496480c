import { z } from "zod";
import { DEFAULT_PRIORITY } from "../document/parser.js";
import { DEFAULT_EXTENSIONS } from "../util/files.js";
import { LOG_LEVELS, type LogLevel } from "../util/logger.js";

export const RemoteConfigSchema = z.object({
  kind: z.enum(["git", "directory"]).default("git"),
  url: z.string().min(1),
  ref: z.string().min(1).optional(),
  /** Sub-directory of the remote holding the rule files. */
  path: z.string().default(""),
  timeoutMs: z.number().int().positive().default(60_000),
});

export const LockConfigSchema = z.object({
  timeoutMs: z.number().int().nonnegative().default(10_000),
  staleMs: z.number().int().positive().default(10 * 60_000),
});

export const ProjectConfigSchema = z.object({
  remote: RemoteConfigSchema,
  sharedDir: z.string().default(".rules/shared"),
  overrideDir: z.string().default(".rules/local"),
  stateFile: z.string().default(".ruleshare/state.yaml"),
  extensions: z.array(z.string().startsWith(".")).min(1).default([...DEFAULT_EXTENSIONS]),
  strict: z.boolean().default(false),
  defaultPriority: z.number().int().default(DEFAULT_PRIORITY),
  exclusiveCategories: z.array(z.string()).default([]),
  lock: LockConfigSchema.default({}),
  logLevel: z
    .string()
    .refine((v): v is LogLevel => LOG_LEVELS.some((l) => l === v), "unknown log level")
    .default("warn"),
});

export type RemoteConfig = z.infer<typeof RemoteConfigSchema>;
export type LockConfig = z.infer<typeof LockConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

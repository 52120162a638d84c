/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const DownloadConfigSchema = z.object({
  maxSize: z.number().positive(), // In megabytes
  timeout: z.number().positive(), // In seconds, per attempt
  concurrency: z.number().int().min(1),
  retries: z.number().int().nonnegative(),
  baseDelay: z.number().int().nonnegative(), // In milliseconds
  maxDelay: z.number().int().nonnegative(),
  userAgent: z.string().min(1),
});

export const GitHubConfigSchema = z.object({
  retries: z.number().int().nonnegative(),
  baseDelay: z.number().int().nonnegative(),
  maxDelay: z.number().int().nonnegative(),
});

export const OutputConfigSchema = z.object({
  force: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["quiet", "normal", "verbose", "debug"]),
});

export const AppConfigSchema = z.object({
  download: DownloadConfigSchema,
  github: GitHubConfigSchema,
  output: OutputConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialAppConfigSchema = z
  .object({
    download: DownloadConfigSchema.partial(),
    github: GitHubConfigSchema.partial(),
    output: OutputConfigSchema.partial(),
    logging: LoggingConfigSchema.partial(),
  })
  .partial()
  .strict();

// Infer TypeScript types from Zod schemas
export type DownloadConfig = z.infer<typeof DownloadConfigSchema>;
export type GitHubConfig = z.infer<typeof GitHubConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type PartialAppConfig = z.infer<typeof PartialAppConfigSchema>;

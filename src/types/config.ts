/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const ArchiveConfigSchema = z.object({
  // Base URL of each archive collection, keyed by archive type
  image: z.string(),
  ortho: z.string(),
  dem: z.string(),
  lvis: z.string(),
  atm1: z.string(),
  atm2: z.string(),
});

export const AuthConfigSchema = z.object({
  netrcPath: z.string(), // "~" expands to the home directory
  cookiePath: z.string(),
});

export const DownloadConfigSchema = z.object({
  batchSize: z.number().int().positive(), // Files per batch
  timeout: z.number().int().positive(), // In milliseconds, per request
  userAgent: z.string(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const FetchConfigSchema = z.object({
  archive: ArchiveConfigSchema,
  auth: AuthConfigSchema,
  download: DownloadConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialFetchConfigSchema = FetchConfigSchema.partial().extend({
  archive: ArchiveConfigSchema.partial().optional(),
  auth: AuthConfigSchema.partial().optional(),
  download: DownloadConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type ArchiveConfig = z.infer<typeof ArchiveConfigSchema>;
export type AuthConfig = z.infer<typeof AuthConfigSchema>;
export type DownloadConfig = z.infer<typeof DownloadConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type FetchConfig = z.infer<typeof FetchConfigSchema>;
export type PartialFetchConfig = z.infer<typeof PartialFetchConfigSchema>;

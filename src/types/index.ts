/**
 * Central type exports
 */

// Configuration
export type {
  FetchConfig,
  PartialFetchConfig,
  ArchiveConfig,
  AuthConfig,
  DownloadConfig,
  LoggingConfig,
  LogLevel,
} from "./config";
export { FetchConfigSchema, PartialFetchConfigSchema } from "./config";

// Archive
export type {
  DataType,
  LidarType,
  ArchiveType,
  Site,
  SurveyDate,
  ResolvedFolder,
  FrameTable,
  PlannedFile,
} from "./archive";
export { DATA_TYPES, LIDAR_TYPES, SITES, isLidarType } from "./archive";

// Context
export type {
  FetchContext,
  FetchRequest,
  Issue,
  IssueType,
  DownloadIssue,
  ValidationIssue,
  ResourceIssue,
  DownloadIssueReason,
  ValidationIssueReason,
  ResourceIssueReason,
  FetchStats,
  BatchResult,
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";

// Network
export type { HttpClient } from "../utils/archive-client";

// Config errors
export interface ConfigError {
  path: string;
  error: unknown;
}

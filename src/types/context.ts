/**
 * Fetch context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { FetchConfig } from "./config";
import type {
  DataType,
  FrameTable,
  PlannedFile,
  ResolvedFolder,
  Site,
  SurveyDate,
} from "./archive";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { HttpClient } from "../utils/archive-client";

// Re-export types from tracker
export type {
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
} from "../utils/tracker";

/**
 * What the user asked for, after CLI validation
 */
export interface FetchRequest {
  date: SurveyDate;
  site?: Site;
  type: DataType;
  output: string; // Absolute output folder
  startFrame?: number;
  stopFrame?: number;
  allFrames: boolean;
  dryRun: boolean;
  requireComplete: boolean;
  refetchIndex: boolean;
}

export interface FetchContext {
  // Input - provided at initialization
  config: FetchConfig;
  request: FetchRequest;
  client: HttpClient;
  logger: Logger;

  // Unified tracking for stats and errors
  tracker: Tracker;

  folder?: ResolvedFolder | null; // Locator; null when no folder exists
  frames?: FrameTable; // Indexer
  plan?: PlannedFile[]; // Planner
}

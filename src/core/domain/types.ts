/**
 * Shared types for the archive fetcher
 */

/** REST path of the jobs overview; per-job overviews in a bundle use it too. */
export const JOBS_OVERVIEW_PATH = "/jobs/overview";

/** Overview path written by producers before the jobs overview was renamed. */
export const LEGACY_JOB_OVERVIEW_PATH = "/joboverview";

export interface ArchiveEntry {
  /** Entry name; a valid job id. */
  jobId: string;
  /** Location string of the source that listed the entry. */
  location: string;
  /** Full path or object key used to read or remove the bundle. */
  path: string;
  /** Last modification, epoch millis. */
  modifiedAt: number;
}

export interface ArchivedJson {
  path: string;
  json: string;
}

export interface StoredOverview {
  jobId: string;
  json: string;
}

export type ArchiveEventType = "CREATED" | "DELETED";

export interface ArchiveEvent {
  readonly jobId: string;
  readonly type: ArchiveEventType;
}

export type ArchiveEventListener = (event: ArchiveEvent) => void;

export interface FetchCycleResult {
  created: string[];
  deleted: string[];
  failedLocations: string[];
  failedJobs: string[];
  /** False when the cycle was aborted by an unexpected error. */
  completed: boolean;
}

export const EXECUTION_STATES = [
  "created",
  "scheduled",
  "deploying",
  "running",
  "finished",
  "canceling",
  "canceled",
  "failed",
  "reconciling",
  "initializing",
] as const;

export type ExecutionState = (typeof EXECUTION_STATES)[number];

export const JOB_STATUSES = [
  "INITIALIZING",
  "CREATED",
  "RUNNING",
  "FAILING",
  "FAILED",
  "CANCELLING",
  "CANCELED",
  "FINISHED",
  "RESTARTING",
  "SUSPENDED",
  "RECONCILING",
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type TaskCounts = Record<ExecutionState, number> & { total: number };

export interface JobDetails {
  jid: string;
  name: string;
  "start-time": number;
  "end-time": number;
  duration: number;
  state: JobStatus;
  "last-modification": number;
  tasks: TaskCounts;
}

export interface MultipleJobsDetails {
  jobs: JobDetails[];
}

const JOB_ID_PATTERN = /^[0-9a-fA-F]{32}$/;

/** Job ids are 32 hex characters; anything else in an archive directory is ignored. */
export function isValidJobId(name: string): boolean {
  return JOB_ID_PATTERN.test(name);
}

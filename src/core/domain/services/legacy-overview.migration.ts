import { z } from "zod";
import { MalformedArchiveError } from "../errors.js";
import {
  JOB_STATUSES,
  JobDetails,
  MultipleJobsDetails,
  isValidJobId,
} from "../types.js";

const count = z.number().int().nonnegative();

const LegacyTasksSchema = z.object({
  total: count,
  pending: count.optional(),
  created: count.optional(),
  scheduled: count.optional(),
  deploying: count.optional(),
  running: count,
  finished: count,
  canceling: count,
  canceled: count,
  failed: count,
});

const LegacyJobSchema = z.object({
  jid: z.string().refine(isValidJobId, "not a valid job id"),
  name: z.string(),
  state: z.enum(JOB_STATUSES),
  "start-time": z.number(),
  "end-time": z.number(),
  duration: z.number(),
  "last-modification": z.number(),
  tasks: LegacyTasksSchema,
});

const LegacyOverviewSchema = z.object({
  finished: z
    .array(z.unknown())
    .min(1, "a legacy overview must describe its job"),
});

type LegacyTasks = z.infer<typeof LegacyTasksSchema>;

/**
 * Producers that predate the split of `pending` report created, scheduled
 * and deploying tasks as one number. All of it is counted as scheduled.
 */
function splitPending(
  jobId: string,
  tasks: LegacyTasks,
): { created: number; scheduled: number; deploying: number } {
  if (tasks.pending !== undefined) {
    return { created: 0, scheduled: tasks.pending, deploying: 0 };
  }
  const { created, scheduled, deploying } = tasks;
  if (created === undefined || scheduled === undefined || deploying === undefined) {
    throw new MalformedArchiveError(
      jobId,
      `Legacy overview of job ${jobId} has neither 'pending' nor 'created'/'scheduled'/'deploying' task counts`,
    );
  }
  return { created, scheduled, deploying };
}

function describe(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
    .join("; ");
}

/**
 * Converts a `/joboverview` document from an older producer into the
 * current `/jobs/overview` document with a single job.
 */
export function migrateLegacyOverview(jobId: string, legacy: string): string {
  let root: unknown;
  try {
    root = JSON.parse(legacy);
  } catch (e) {
    throw new MalformedArchiveError(jobId, `Legacy overview of job ${jobId} is not valid JSON`, { cause: e });
  }

  const overview = LegacyOverviewSchema.safeParse(root);
  if (!overview.success) {
    throw new MalformedArchiveError(
      jobId,
      `Legacy overview of job ${jobId} is invalid. ${describe(overview.error)}`,
    );
  }

  const job = LegacyJobSchema.safeParse(overview.data.finished[0]);
  if (!job.success) {
    throw new MalformedArchiveError(
      jobId,
      `Legacy overview of job ${jobId} is invalid. ${describe(job.error)}`,
    );
  }

  const legacyJob = job.data;
  const { tasks } = legacyJob;
  const details: JobDetails = {
    jid: legacyJob.jid,
    name: legacyJob.name,
    "start-time": legacyJob["start-time"],
    "end-time": legacyJob["end-time"],
    duration: legacyJob.duration,
    state: legacyJob.state,
    "last-modification": legacyJob["last-modification"],
    tasks: {
      total: tasks.total,
      ...splitPending(jobId, tasks),
      running: tasks.running,
      finished: tasks.finished,
      canceling: tasks.canceling,
      canceled: tasks.canceled,
      failed: tasks.failed,
      reconciling: 0,
      initializing: 0,
    },
  };

  const migrated: MultipleJobsDetails = { jobs: [details] };
  return JSON.stringify(migrated);
}

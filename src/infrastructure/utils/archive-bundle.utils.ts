import { z } from "zod";
import { MalformedArchiveError } from "../../core/domain/errors.js";
import { ArchivedJson } from "../../core/domain/types.js";

/**
 * Bundle layout written by the producer:
 *   { "archive": [ { "path": "/jobs/<id>", "json": "<serialized document>" }, ... ] }
 */
const ArchiveBundleSchema = z.object({
  archive: z.array(z.object({ path: z.string().min(1), json: z.string() })),
});

export function parseArchiveBundle(jobId: string, raw: string): ArchivedJson[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new MalformedArchiveError(jobId, `Archive of job ${jobId} is not valid JSON`, {
      cause: e,
    });
  }
  const bundle = ArchiveBundleSchema.safeParse(parsed);
  if (!bundle.success) {
    const detail = bundle.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new MalformedArchiveError(jobId, `Archive of job ${jobId} is malformed. ${detail}`);
  }
  return bundle.data.archive.map(({ path, json }) => ({ path, json }));
}

export function serializeArchiveBundle(documents: readonly ArchivedJson[]): string {
  return JSON.stringify({
    archive: documents.map(({ path, json }) => ({ path, json })),
  });
}

import { rm } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../domain/errors.js";
import { IArchiveStorage } from "../domain/repositories/archive-storage.repository.js";
import { ArchiveEventNotifier } from "../domain/services/archive-event-notifier.js";
import { ArchiveEvent, JOBS_OVERVIEW_PATH } from "../domain/types.js";
import { createArchiveStorage } from "../../infrastructure/storage/archive-storage.factory.js";
import { SqliteArchiveStorage } from "../../infrastructure/storage/sqlite-archive-storage.repository.js";
import {
  FakeArchiveSource,
  RecordingLogger,
  archiveDocuments,
  jobId,
  legacyOverviewJson,
  makeTempDir,
} from "../../test-support/fakes.js";
import { FetchArchivesUseCase, RetentionPolicy } from "./fetch-archives.use-case.js";
import { RebuildOverviewUseCase } from "./rebuild-overview.use-case.js";

const [J1, J2, J3, J4] = [1, 2, 3, 4].map(jobId);

const created = (id: string): ArchiveEvent => ({ jobId: id, type: "CREATED" });
const deleted = (id: string): ArchiveEvent => ({ jobId: id, type: "DELETED" });

const open: IArchiveStorage[] = [];
const tempDirs: string[] = [];

function setup(
  policy: Partial<RetentionPolicy> = {},
  options: { locations?: string[]; storage?: IArchiveStorage } = {},
) {
  const logger = new RecordingLogger();
  const storage = options.storage ?? new SqliteArchiveStorage(":memory:", logger);
  open.push(storage);
  const sources = (options.locations ?? ["archive-a"]).map((l) => new FakeArchiveSource(l));
  const events: ArchiveEvent[] = [];
  const overview = new RebuildOverviewUseCase(storage, logger);
  const listener = vi.fn((event: ArchiveEvent) => {
    events.push(event);
  });
  const fetcher = new FetchArchivesUseCase(
    sources,
    storage,
    overview,
    new ArchiveEventNotifier(logger, listener),
    logger,
    { retainedJobs: -1, cleanupExpiredJobs: true, cleanupBeyondLimit: true, ...policy },
  );
  return { fetcher, storage, sources, source: sources[0], events, listener, overview, logger };
}

async function combinedJobIds(storage: IArchiveStorage): Promise<string[]> {
  const json = await storage.get(JOBS_OVERVIEW_PATH);
  if (json === null) return [];
  const overview: { jobs: { jid: string }[] } = JSON.parse(json);
  return overview.jobs.map((j) => j.jid);
}

afterEach(async () => {
  for (const storage of open.splice(0)) await storage.close();
  for (const dir of tempDirs.splice(0)) await rm(dir, { recursive: true, force: true });
});

describe("FetchArchivesUseCase", () => {
  describe("construction", () => {
    it.each([0, -2, 1.5])("rejects retainedJobs %s", (retainedJobs) => {
      expect(() => setup({ retainedJobs })).toThrow(ConfigurationError);
    });

    it("accepts -1 and positive limits", () => {
      expect(() => setup({ retainedJobs: -1 })).not.toThrow();
      expect(() => setup({ retainedJobs: 1 })).not.toThrow();
    });

    it("requires at least one location", () => {
      expect(() => setup({}, { locations: [] })).toThrow("At least one archive location");
    });

    it("rejects a location configured twice", () => {
      expect(() => setup({}, { locations: ["x", "y", "x"] })).toThrow(
        "Archive location configured twice: x",
      );
    });
  });

  it("starts from empty storage with an empty overview", async () => {
    const { fetcher, storage } = setup();
    await storage.initialize();
    await storage.put(J1, `/jobs/${J1}`, "{}");

    await fetcher.initialize();

    expect(await storage.exists(J1)).toBe(false);
    expect(await storage.get(JOBS_OVERVIEW_PATH)).toBe('{"jobs":[]}');
  });

  it("ingests new archives and publishes them", async () => {
    const { fetcher, storage, source, events } = setup();
    source.add(J1).add(J2);
    await fetcher.initialize();

    const result = await fetcher.execute();

    expect(result).toEqual({
      created: [J1, J2],
      deleted: [],
      failedLocations: [],
      failedJobs: [],
      completed: true,
    });
    expect(events).toEqual([created(J1), created(J2)]);
    expect(await storage.get(`/jobs/${J1}/vertices`)).toBe(archiveDocuments(J1)[2].json);
    expect(await combinedJobIds(storage)).toEqual([J1, J2]);
    expect([...fetcher.cachedJobIds("archive-a")]).toEqual([J1, J2]);
  });

  it("does not ingest an archive twice", async () => {
    const { fetcher, source, events } = setup();
    source.add(J1);
    await fetcher.initialize();
    await fetcher.execute();

    const second = await fetcher.execute();

    expect(second.created).toEqual([]);
    expect(events).toEqual([created(J1)]);
    expect(source.reads).toEqual([J1]);
  });

  describe("retention by count", () => {
    it("keeps the first entries and deletes the rest upstream", async () => {
      const { fetcher, storage, source, events } = setup({ retainedJobs: 2 });
      source.add(J1).add(J2).add(J3).add(J4);
      await fetcher.initialize();

      const result = await fetcher.execute();

      expect(result.created).toEqual([J1, J2]);
      expect(result.deleted).toEqual([J3, J4]);
      expect(events).toEqual([created(J1), created(J2), deleted(J3), deleted(J4)]);
      expect(source.removed).toEqual([J3, J4]);
      expect(source.ids()).toEqual([J1, J2]);
      expect(source.reads).toEqual([J1, J2]);
      expect(await storage.exists(J3)).toBe(false);
      expect(await combinedJobIds(storage)).toEqual([J1, J2]);

      expect(await fetcher.execute()).toMatchObject({ created: [], deleted: [] });
      expect(events).toHaveLength(4);
    });

    it("applies the limit to each location separately", async () => {
      const [A1, A2, B1, B2] = [11, 12, 21, 22].map(jobId);
      const { fetcher, sources, events } = setup(
        { retainedJobs: 1 },
        { locations: ["archive-a", "archive-b"] },
      );
      sources[0].add(A1).add(A2);
      sources[1].add(B1).add(B2);
      await fetcher.initialize();

      await fetcher.execute();

      expect(events).toEqual([created(A1), created(B1), deleted(A2), deleted(B2)]);
    });

    it("ingests everything when beyond-limit cleanup is off", async () => {
      const { fetcher, source } = setup({ retainedJobs: 2, cleanupBeyondLimit: false });
      source.add(J1).add(J2).add(J3);
      await fetcher.initialize();

      const result = await fetcher.execute();

      expect(result.created).toEqual([J1, J2, J3]);
      expect(source.removed).toEqual([]);
    });

    it("still evicts when the upstream delete fails", async () => {
      const { fetcher, source, logger } = setup({ retainedJobs: 1 });
      source.add(J1).add(J2);
      vi.spyOn(source, "remove").mockRejectedValue(new Error("read-only"));
      await fetcher.initialize();

      const result = await fetcher.execute();

      expect(result.deleted).toEqual([J2]);
      expect(logger.messages("warn")).toEqual(["Could not delete old archive"]);
    });
  });

  describe("expired archives", () => {
    it("evicts a job whose archive disappeared", async () => {
      const { fetcher, storage, source, events } = setup();
      source.add(J1).add(J2);
      await fetcher.initialize();
      await fetcher.execute();

      source.drop(J1);
      const result = await fetcher.execute();

      expect(result.deleted).toEqual([J1]);
      expect(events.slice(2)).toEqual([deleted(J1)]);
      expect(await storage.exists(J1)).toBe(false);
      expect(await combinedJobIds(storage)).toEqual([J2]);
    });

    it("keeps the job when expiry cleanup is off", async () => {
      const { fetcher, storage, source } = setup({ cleanupExpiredJobs: false });
      source.add(J1);
      await fetcher.initialize();
      await fetcher.execute();

      source.drop(J1);
      const result = await fetcher.execute();

      expect(result.deleted).toEqual([]);
      expect(await storage.exists(J1)).toBe(true);
    });

    it("evicts nothing from a location that cannot be listed", async () => {
      const { fetcher, storage, source } = setup();
      source.add(J1);
      await fetcher.initialize();
      await fetcher.execute();

      source.failListing = true;
      source.drop(J1);
      const failed = await fetcher.execute();

      expect(failed).toEqual({
        created: [],
        deleted: [],
        failedLocations: ["archive-a"],
        failedJobs: [],
        completed: true,
      });
      expect(await storage.exists(J1)).toBe(true);

      source.failListing = false;
      expect((await fetcher.execute()).deleted).toEqual([J1]);
    });
  });

  describe("job archived in more than one location", () => {
    const both = { locations: ["archive-a", "archive-b"] };

    it("ingests and announces the job once", async () => {
      const { fetcher, sources, events } = setup({}, both);
      sources[0].add(J1);
      sources[1].add(J1);
      await fetcher.initialize();

      await fetcher.execute();

      expect(events).toEqual([created(J1)]);
      expect(sources[1].reads).toEqual([]);
      expect([...fetcher.cachedJobIds("archive-a")]).toEqual([J1]);
      expect([...fetcher.cachedJobIds("archive-b")]).toEqual([J1]);
    });

    it("keeps the documents until the last location lets go", async () => {
      const { fetcher, storage, sources, events } = setup({}, both);
      sources[0].add(J1);
      sources[1].add(J1);
      await fetcher.initialize();
      await fetcher.execute();

      sources[0].drop(J1);
      await fetcher.execute();
      await fetcher.execute();

      expect(events).toEqual([created(J1)]);
      expect(await storage.exists(J1)).toBe(true);
      expect(await combinedJobIds(storage)).toEqual([J1]);
      expect([...fetcher.cachedJobIds("archive-a")]).toEqual([]);

      sources[1].drop(J1);
      const result = await fetcher.execute();

      expect(result.deleted).toEqual([J1]);
      expect(events).toEqual([created(J1), deleted(J1)]);
      expect(await storage.exists(J1)).toBe(false);
    });

    it("keeps the documents when another location exceeds its limit", async () => {
      const { fetcher, storage, sources, events } = setup({ retainedJobs: 1 }, both);
      sources[0].add(J1);
      sources[1].add(J2).add(J1);
      await fetcher.initialize();

      await fetcher.execute();

      expect(sources[1].removed).toEqual([J1]);
      expect(events).toEqual([created(J1), created(J2)]);
      expect(await storage.exists(J1)).toBe(true);
    });
  });

  describe.each(["file", "kvstore"] as const)("re-ingestion into %s storage", (backend) => {
    async function storageState(storage: IArchiveStorage) {
      const documents = archiveDocuments(J1).filter((d) => d.path !== JOBS_OVERVIEW_PATH);
      return {
        documents: await Promise.all(documents.map((d) => storage.get(d.path))),
        combined: await storage.get(JOBS_OVERVIEW_PATH),
        overviews: await storage.listOverviews(),
      };
    }

    it("leaves the same state as the first ingestion", async () => {
      const dir = await makeTempDir();
      tempDirs.push(dir);
      const storage = createArchiveStorage(
        { backend, dir: join(dir, "history"), kvPath: join(dir, "history.sqlite") },
        new RecordingLogger(),
      );
      const first = setup({}, { storage });
      first.source.add(J1);
      await first.fetcher.initialize();
      await first.fetcher.execute();
      const before = await storageState(storage);

      // a fresh fetcher knows nothing and writes the whole job again
      const second = setup({}, { storage });
      second.source.add(J1);
      const result = await second.fetcher.execute();

      expect(result.created).toEqual([J1]);
      expect(await storageState(storage)).toEqual(before);
      expect(before.documents).toEqual(
        archiveDocuments(J1)
          .filter((d) => d.path !== JOBS_OVERVIEW_PATH)
          .map((d) => d.json),
      );
      expect(before.overviews).toEqual([{ jobId: J1, json: archiveDocuments(J1)[0].json }]);
    });
  });

  it("keeps processing other locations when one fails", async () => {
    const { fetcher, sources } = setup({}, { locations: ["archive-a", "archive-b"] });
    sources[0].failListing = true;
    sources[1].add(J2);
    await fetcher.initialize();

    const result = await fetcher.execute();

    expect(result.failedLocations).toEqual(["archive-a"]);
    expect(result.created).toEqual([J2]);
    expect(result.completed).toBe(true);
  });

  describe("failed ingestion", () => {
    it("rolls back partial writes and retries next cycle", async () => {
      const { fetcher, storage, source, events } = setup();
      source.add(J1, [
        { path: `/jobs/${J1}`, json: "{}" },
        { path: "/joboverview", json: "{broken" },
      ]);
      source.add(J2);
      await fetcher.initialize();

      const first = await fetcher.execute();

      expect(first.failedJobs).toEqual([J1]);
      expect(first.created).toEqual([J2]);
      expect(await storage.exists(J1)).toBe(false);
      expect(await storage.get(`/jobs/${J1}`)).toBeNull();

      source.add(J1);
      const second = await fetcher.execute();

      expect(second.created).toEqual([J1]);
      expect(events).toEqual([created(J2), created(J1)]);
    });

    it("skips an unreadable archive", async () => {
      const { fetcher, source, logger } = setup();
      source.add(J1, new Error("truncated"));
      await fetcher.initialize();

      const result = await fetcher.execute();

      expect(result.failedJobs).toEqual([J1]);
      expect(result.completed).toBe(true);
      expect(logger.messages("error")).toEqual([
        "Failure while fetching/processing job archive",
      ]);
    });
  });

  it("migrates legacy overviews on ingestion", async () => {
    const { fetcher, storage, source } = setup();
    source.add(J1, [
      { path: "/joboverview", json: legacyOverviewJson(J1, { pending: 2 }) },
      { path: `/jobs/${J1}`, json: "{}" },
    ]);
    await fetcher.initialize();

    await fetcher.execute();

    expect(await storage.get("/joboverview")).toBeNull();
    const json = await storage.get(JOBS_OVERVIEW_PATH);
    expect(json).not.toBeNull();
    const overview: { jobs: { jid: string; tasks: Record<string, number> }[] } = JSON.parse(
      json ?? "{}",
    );
    expect(overview.jobs.map((j) => j.jid)).toEqual([J1]);
    expect(overview.jobs[0].tasks.scheduled).toBe(2);
    expect(overview.jobs[0].tasks.created).toBe(0);
  });

  it("rebuilds the overview before announcing events", async () => {
    const { fetcher, source, listener, overview } = setup();
    source.add(J1);
    await fetcher.initialize();
    const rebuild = vi.spyOn(overview, "execute");

    await fetcher.execute();

    expect(rebuild).toHaveBeenCalledTimes(1);
    expect(rebuild.mock.invocationCallOrder[0]).toBeLessThan(
      listener.mock.invocationCallOrder[0],
    );
  });

  it("skips the rebuild when nothing changed", async () => {
    const { fetcher, overview } = setup();
    await fetcher.initialize();
    const rebuild = vi.spyOn(overview, "execute");

    await fetcher.execute();

    expect(rebuild).not.toHaveBeenCalled();
  });

  it("survives a failing listener", async () => {
    const { fetcher, source, listener } = setup();
    listener.mockImplementation(() => {
      throw new Error("listener down");
    });
    source.add(J1).add(J2);
    await fetcher.initialize();

    const result = await fetcher.execute();

    expect(listener).toHaveBeenCalledTimes(2);
    expect(result.completed).toBe(true);
  });

  it("reports an aborted cycle instead of throwing", async () => {
    class FailingDeleteStorage extends SqliteArchiveStorage {
      override async delete(): Promise<void> {
        throw new Error("storage offline");
      }
    }
    const { fetcher, source, logger } = setup(
      {},
      { storage: new FailingDeleteStorage(":memory:", new RecordingLogger()) },
    );
    source.add(J1);
    await fetcher.initialize();
    await fetcher.execute();

    source.drop(J1);
    const result = await fetcher.execute();

    expect(result.completed).toBe(false);
    expect(logger.messages("error")).toEqual([
      "Critical failure while fetching/processing job archives",
    ]);
  });
});

import { describe, expect, it, vi } from "vitest";
import { RecordingLogger } from "../../../test-support/fakes.js";
import { ArchiveEvent } from "../types.js";
import { ArchiveEventNotifier } from "./archive-event-notifier.js";

const events: ArchiveEvent[] = [
  { jobId: "a", type: "CREATED" },
  { jobId: "b", type: "DELETED" },
];

describe("ArchiveEventNotifier", () => {
  it("delivers events in order", () => {
    const listener = vi.fn();
    new ArchiveEventNotifier(new RecordingLogger(), listener).notifyAll(events);

    expect(listener.mock.calls).toEqual([[events[0]], [events[1]]]);
  });

  it("keeps notifying after a listener failure", () => {
    const logger = new RecordingLogger();
    const seen: string[] = [];
    const notifier = new ArchiveEventNotifier(logger, (event) => {
      seen.push(event.jobId);
      if (event.jobId === "a") throw new Error("boom");
    });

    notifier.notifyAll(events);

    expect(seen).toEqual(["a", "b"]);
    expect(logger.records).toEqual([
      {
        level: "error",
        msg: "Archive event listener failed",
        fields: { jobId: "a", type: "CREATED", err: "boom" },
      },
    ]);
  });

  it("does nothing without a listener", () => {
    const logger = new RecordingLogger();
    new ArchiveEventNotifier(logger).notifyAll(events);
    expect(logger.records).toEqual([]);
  });
});

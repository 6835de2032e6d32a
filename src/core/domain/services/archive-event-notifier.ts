import { ArchiveEvent, ArchiveEventListener } from "../types.js";
import { ILogger } from "./logger.service.js";
import { errorMessage } from "../errors.js";

/**
 * Hands archive events to the single registered listener, synchronously and
 * in order. A failing listener is logged and skipped for that event.
 */
export class ArchiveEventNotifier {
  constructor(
    private readonly logger: ILogger,
    private readonly listener?: ArchiveEventListener,
  ) {}

  notify(event: ArchiveEvent): void {
    if (!this.listener) return;
    try {
      this.listener(event);
    } catch (e) {
      this.logger.error("Archive event listener failed", {
        jobId: event.jobId,
        type: event.type,
        err: errorMessage(e),
      });
    }
  }

  notifyAll(events: readonly ArchiveEvent[]): void {
    for (const event of events) this.notify(event);
  }
}

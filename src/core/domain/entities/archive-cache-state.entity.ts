/**
 * Which job ids have been ingested from each monitored location.
 *
 * Only the fetch cycle mutates this; everyone else works on snapshots.
 */
export class ArchiveCacheState {
  private readonly ingested = new Map<string, Set<string>>();

  constructor(locations: Iterable<string>) {
    for (const location of locations) {
      this.ingested.set(location, new Set());
    }
  }

  locations(): string[] {
    return [...this.ingested.keys()];
  }

  /** A copy, safe to iterate while the live set changes. */
  snapshot(location: string): Set<string> {
    return new Set(this.idsOf(location));
  }

  has(location: string, jobId: string): boolean {
    return this.idsOf(location).has(jobId);
  }

  /** Whether a location other than `location` holds the id. */
  isHeldElsewhere(location: string, jobId: string): boolean {
    for (const [other, ids] of this.ingested) {
      if (other !== location && ids.has(jobId)) return true;
    }
    return false;
  }

  markIngested(location: string, jobId: string): void {
    this.idsOf(location).add(jobId);
  }

  markEvicted(location: string, jobId: string): void {
    this.idsOf(location).delete(jobId);
  }

  /** Total ids across all locations. */
  size(): number {
    let total = 0;
    for (const ids of this.ingested.values()) total += ids.size;
    return total;
  }

  private idsOf(location: string): Set<string> {
    const ids = this.ingested.get(location);
    if (!ids) {
      throw new Error(`Unknown archive location: ${location}`);
    }
    return ids;
  }
}

import { ArchiveEntry, ArchivedJson } from "../types.js";

/**
 * One monitored archive location.
 */
export interface IArchiveSource {
  readonly location: string;

  /**
   * Entries in the order the underlying listing returns them. Names that are
   * not job ids are left out.
   * @throws ListingError when the location cannot be listed.
   */
  list(): Promise<ArchiveEntry[]>;

  /**
   * Decodes the bundle of one entry.
   * @throws IngestionError / MalformedArchiveError
   */
  read(entry: ArchiveEntry): Promise<ArchivedJson[]>;

  /**
   * Deletes the bundle upstream.
   * @throws HousekeepingError
   */
  remove(entry: ArchiveEntry): Promise<void>;
}

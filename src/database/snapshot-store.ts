import { DetectedSale, InventorySnapshot, Listing, PlatformName, ScrapeLogEntry } from '../types/index.js';

/**
 * Persistence contract for inventory snapshots and detected sales.
 *
 * Implementations enforce uniqueness of (platform, listing_id, snapshot_date)
 * and (platform, listing_id, detection_date) in storage, not in callers.
 */
export interface SnapshotStore {
  /** Upsert every listing of the snapshot; returns the number of rows written */
  saveSnapshot(snapshot: InventorySnapshot): Promise<number>;
  /** Listings stored for the target on that date, empty when there are none */
  getSnapshot(platform: PlatformName, targetKey: string, snapshotDate: string): Promise<Listing[]>;
  /** Insert a sale; resolves false when the same (platform, listing, date) already exists */
  saveDetectedSale(sale: DetectedSale): Promise<boolean>;
  /** Earliest snapshot date per listing id, for the ids that have one */
  getFirstSeenDates(platform: PlatformName, listingIds: string[]): Promise<Map<string, string>>;
  logScrapeRun(entry: ScrapeLogEntry): Promise<void>;
  /** Delete inventory rows dated before the given date; returns rows removed */
  pruneSnapshotsBefore(snapshotDate: string): Promise<number>;
}

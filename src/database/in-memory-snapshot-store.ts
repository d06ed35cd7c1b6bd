import { DetectedSale, InventorySnapshot, Listing, PlatformName, ScrapeLogEntry } from '../types/index.js';
import { SnapshotStore } from './snapshot-store.js';

interface StoredListing {
  targetKey: string;
  snapshotDate: string;
  listing: Listing;
}

/**
 * Process-local SnapshotStore with the same uniqueness rules as the
 * database schema. Backs `--dry-run` and the tests.
 */
export class InMemorySnapshotStore implements SnapshotStore {
  private readonly inventory = new Map<string, StoredListing>();
  private readonly sales = new Map<string, DetectedSale>();
  readonly scrapeLogs: ScrapeLogEntry[] = [];

  async saveSnapshot(snapshot: InventorySnapshot): Promise<number> {
    for (const listing of snapshot.listings) {
      this.inventory.set(inventoryKey(listing.platform, listing.listingId, snapshot.snapshotDate), {
        targetKey: snapshot.targetKey,
        snapshotDate: snapshot.snapshotDate,
        listing,
      });
    }
    return snapshot.listings.length;
  }

  async getSnapshot(platform: PlatformName, targetKey: string, snapshotDate: string): Promise<Listing[]> {
    return [...this.inventory.values()]
      .filter(row => row.listing.platform === platform && row.targetKey === targetKey && row.snapshotDate === snapshotDate)
      .map(row => row.listing);
  }

  async saveDetectedSale(sale: DetectedSale): Promise<boolean> {
    const key = inventoryKey(sale.platform, sale.listingId, sale.detectionDate);
    if (this.sales.has(key)) {
      return false;
    }
    this.sales.set(key, sale);
    return true;
  }

  async getFirstSeenDates(platform: PlatformName, listingIds: string[]): Promise<Map<string, string>> {
    const wanted = new Set(listingIds);
    const firstSeen = new Map<string, string>();

    for (const row of this.inventory.values()) {
      const { listingId } = row.listing;
      if (row.listing.platform !== platform || !wanted.has(listingId)) continue;

      const known = firstSeen.get(listingId);
      if (!known || row.snapshotDate < known) {
        firstSeen.set(listingId, row.snapshotDate);
      }
    }
    return firstSeen;
  }

  async logScrapeRun(entry: ScrapeLogEntry): Promise<void> {
    this.scrapeLogs.push(entry);
  }

  async pruneSnapshotsBefore(snapshotDate: string): Promise<number> {
    let removed = 0;
    for (const [key, row] of this.inventory) {
      if (row.snapshotDate < snapshotDate) {
        this.inventory.delete(key);
        removed++;
      }
    }
    return removed;
  }

  getDetectedSales(): DetectedSale[] {
    return [...this.sales.values()];
  }

  inventorySize(): number {
    return this.inventory.size;
  }
}

function inventoryKey(platform: PlatformName, listingId: string, date: string): string {
  return `${platform}|${listingId}|${date}`;
}

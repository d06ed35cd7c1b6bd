import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { DetectedSale, InventorySnapshot, Listing, PlatformName, ScrapeLogEntry } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { StoreError } from '../utils/errors.js';
import { SnapshotStore } from './snapshot-store.js';

const INVENTORY_TABLE = 'daily_inventory';
const SALES_TABLE = 'detected_sales';
const SCRAPE_LOG_TABLE = 'scrape_logs';

// PostgREST caps responses at 1000 rows by default
const PAGE_SIZE = 1000;
const WRITE_CHUNK_SIZE = 500;
const FILTER_CHUNK_SIZE = 200;

const platformSchema = z.enum(['chrono24', 'vestiaire', 'catawiki']);

const inventoryRowSchema = z.object({
  platform: platformSchema,
  listing_id: z.string(),
  target_key: z.string(),
  snapshot_date: z.string(),
  title: z.string(),
  price: z.coerce.number().nullable(),
  currency: z.string(),
  condition: z.string().nullable(),
  country: z.string().nullable(),
  image_url: z.string().nullable(),
  url: z.string(),
  seen_at_page: z.number().int(),
});

const firstSeenRowSchema = z.object({
  listing_id: z.string(),
  snapshot_date: z.string(),
});

export type InventoryRow = z.infer<typeof inventoryRowSchema>;

interface PostgrestFailure {
  message: string;
  code?: string;
}

function storeError(operation: string, error: PostgrestFailure): StoreError {
  logger.error(`Failed to ${operation}`, { error: error.message, code: error.code });
  return new StoreError(operation, error.message, error.code ?? null);
}

function toInventoryRow(listing: Listing, targetKey: string, snapshotDate: string): InventoryRow {
  return {
    platform: listing.platform,
    listing_id: listing.listingId,
    target_key: targetKey,
    snapshot_date: snapshotDate,
    title: listing.title,
    price: listing.price,
    currency: listing.currency,
    condition: listing.condition,
    country: listing.country,
    image_url: listing.imageUrl,
    url: listing.url,
    seen_at_page: listing.seenAtPage,
  };
}

function fromInventoryRow(row: InventoryRow): Listing {
  return {
    platform: row.platform,
    listingId: row.listing_id,
    title: row.title,
    price: row.price,
    currency: row.currency,
    condition: row.condition,
    country: row.country,
    imageUrl: row.image_url,
    url: row.url,
    seenAtPage: row.seen_at_page,
  };
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * SnapshotStore on Supabase. Uniqueness comes from the UNIQUE constraints in
 * schema.sql; writes are upserts against those constraints.
 */
export class SupabaseSnapshotStore implements SnapshotStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async saveSnapshot(snapshot: InventorySnapshot): Promise<number> {
    // One row per listing per day even if the caller passes duplicates
    const unique = new Map(snapshot.listings.map(listing => [listing.listingId, listing]));
    const rows = [...unique.values()].map(listing =>
      toInventoryRow(listing, snapshot.targetKey, snapshot.snapshotDate)
    );

    for (const batch of chunk(rows, WRITE_CHUNK_SIZE)) {
      const { error } = await this.supabase
        .from(INVENTORY_TABLE)
        .upsert(batch, { onConflict: 'platform,listing_id,snapshot_date' });

      if (error) {
        throw storeError('save inventory snapshot', error);
      }
    }

    logger.info('Saved inventory snapshot', {
      platform: snapshot.platform,
      target: snapshot.targetKey,
      snapshotDate: snapshot.snapshotDate,
      rows: rows.length,
    });
    return rows.length;
  }

  async getSnapshot(platform: PlatformName, targetKey: string, snapshotDate: string): Promise<Listing[]> {
    const listings: Listing[] = [];

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.supabase
        .from(INVENTORY_TABLE)
        .select('*')
        .eq('platform', platform)
        .eq('target_key', targetKey)
        .eq('snapshot_date', snapshotDate)
        .order('listing_id')
        .range(from, from + PAGE_SIZE - 1);

      if (error) {
        throw storeError('fetch inventory snapshot', error);
      }

      const rows = inventoryRowSchema.array().parse(data ?? []);
      listings.push(...rows.map(fromInventoryRow));

      if (rows.length < PAGE_SIZE) break;
    }

    return listings;
  }

  async saveDetectedSale(sale: DetectedSale): Promise<boolean> {
    const { data, error } = await this.supabase
      .from(SALES_TABLE)
      .upsert(
        {
          platform: sale.platform,
          target_key: sale.targetKey,
          listing_id: sale.listingId,
          detection_date: sale.detectionDate,
          last_seen_price: sale.lastSeenPrice,
          sale_price: sale.salePrice,
          currency: sale.currency,
          days_listed: sale.daysListed,
          classification: sale.classification,
          price_is_estimated: sale.priceIsEstimated,
          title: sale.title,
          url: sale.url,
        },
        { onConflict: 'platform,listing_id,detection_date', ignoreDuplicates: true }
      )
      .select('id');

    if (error) {
      throw storeError('save detected sale', error);
    }

    // ON CONFLICT DO NOTHING returns no row for a duplicate
    return Array.isArray(data) && data.length > 0;
  }

  async getFirstSeenDates(platform: PlatformName, listingIds: string[]): Promise<Map<string, string>> {
    const firstSeen = new Map<string, string>();

    for (const ids of chunk(listingIds, FILTER_CHUNK_SIZE)) {
      // One row per listing per day, so a chunk spans many pages over the retention window
      for (let from = 0; ; from += PAGE_SIZE) {
        const { data, error } = await this.supabase
          .from(INVENTORY_TABLE)
          .select('listing_id, snapshot_date')
          .eq('platform', platform)
          .in('listing_id', ids)
          .order('snapshot_date', { ascending: true })
          .order('listing_id')
          .range(from, from + PAGE_SIZE - 1);

        if (error) {
          throw storeError('fetch first-seen dates', error);
        }

        const rows = firstSeenRowSchema.array().parse(data ?? []);
        for (const row of rows) {
          if (!firstSeen.has(row.listing_id)) {
            firstSeen.set(row.listing_id, row.snapshot_date);
          }
        }

        if (rows.length < PAGE_SIZE) break;
      }
    }

    return firstSeen;
  }

  async logScrapeRun(entry: ScrapeLogEntry): Promise<void> {
    const { error } = await this.supabase.from(SCRAPE_LOG_TABLE).insert({
      run_date: entry.runDate,
      platform: entry.platform,
      target_key: entry.targetKey,
      status: entry.status,
      items_scraped: entry.itemsScraped,
      items_sold_detected: entry.itemsSoldDetected,
      pages_attempted: entry.pagesAttempted,
      pages_total_detected: entry.pagesTotalDetected,
      terminated_reason: entry.terminatedReason,
      coverage_reason: entry.coverageReason,
      errors: entry.errors,
      duration_seconds: entry.durationSeconds,
    });

    if (error) {
      throw storeError('write scrape log', error);
    }
  }

  async pruneSnapshotsBefore(snapshotDate: string): Promise<number> {
    const { error, count } = await this.supabase
      .from(INVENTORY_TABLE)
      .delete({ count: 'exact' })
      .lt('snapshot_date', snapshotDate);

    if (error) {
      throw storeError('prune inventory snapshots', error);
    }

    logger.info('Pruned inventory snapshots', { before: snapshotDate, rows: count ?? 0 });
    return count ?? 0;
  }
}

import { ChangeEvent, DetectedSale, Listing, PlatformName } from '../types/index.js';
import { daysBetween } from '../utils/dates.js';

export interface SnapshotDiffInput {
  platform: PlatformName;
  targetKey: string;
  /** Date of today's snapshot; becomes the detection date of any sale */
  detectionDate: string;
  yesterday: Listing[];
  today: Listing[];
  /** listingId → first date the listing appeared in any snapshot */
  firstSeen: ReadonlyMap<string, string>;
  /** The last price seen is the closing price, as on auction platforms */
  finalPriceKnown?: boolean;
}

export interface SnapshotDiff {
  events: ChangeEvent[];
  sales: DetectedSale[];
  sold: number;
  added: number;
  updated: number;
}

/**
 * Classify the differences between two snapshots of one target.
 *
 * SOLD listings come first in yesterday's order, then NEW and UPDATED in
 * today's order. Only SOLD produces a Detected Sale, priced at the last
 * price seen; that price is an estimate unless it is a known closing price.
 */
export function diffSnapshots(input: SnapshotDiffInput): SnapshotDiff {
  const yesterdayById = new Map(input.yesterday.map(listing => [listing.listingId, listing]));
  const todayById = new Map(input.today.map(listing => [listing.listingId, listing]));

  const events: ChangeEvent[] = [];
  const sales: DetectedSale[] = [];
  let added = 0;
  let updated = 0;

  for (const [listingId, previous] of yesterdayById) {
    if (todayById.has(listingId)) continue;

    events.push({
      kind: 'SOLD',
      platform: input.platform,
      listingId,
      previousPrice: previous.price,
      currentPrice: null,
    });
    sales.push({
      platform: input.platform,
      targetKey: input.targetKey,
      listingId,
      detectionDate: input.detectionDate,
      lastSeenPrice: previous.price,
      salePrice: previous.price,
      currency: previous.currency,
      daysListed: daysBetween(input.firstSeen.get(listingId), input.detectionDate),
      classification: 'SOLD',
      priceIsEstimated: !(input.finalPriceKnown && previous.price !== null),
      title: previous.title,
      url: previous.url,
    });
  }

  for (const [listingId, current] of todayById) {
    const previous = yesterdayById.get(listingId);

    if (!previous) {
      added++;
      events.push({
        kind: 'NEW',
        platform: input.platform,
        listingId,
        previousPrice: null,
        currentPrice: current.price,
      });
    } else if (previous.price !== null && current.price !== null && previous.price !== current.price) {
      updated++;
      events.push({
        kind: 'UPDATED',
        platform: input.platform,
        listingId,
        previousPrice: previous.price,
        currentPrice: current.price,
      });
    }
  }

  return { events, sales, sold: sales.length, added, updated };
}

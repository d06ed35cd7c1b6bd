import { DetectedSale, Logger } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { PlatformStrategy } from '../platforms/platform-strategy.js';
import { RenderSession } from '../navigation/render-session.js';

/** Confirmed price paid for a sold listing, or null when none could be read */
export type SoldPriceLookup = (sale: DetectedSale) => Promise<number | null>;

export interface SoldPriceOptions {
  finalPriceKnown: boolean;
  lookupSoldPrice?: SoldPriceLookup;
}

/**
 * Opens each sold listing's detail page in the platform's render session and
 * reads the price paid. A failed lookup leaves the sale at its estimate.
 */
export function detailPageLookup(session: RenderSession, platform: PlatformStrategy, log: Logger): SoldPriceLookup {
  return async sale => {
    if (!sale.url) return null;

    try {
      const response = await session.navigate(sale.url);
      if (!response.ok) {
        log.debug('Sold item page unavailable', { platform: sale.platform, listingId: sale.listingId, status: response.status });
        return null;
      }
      return platform.parseSoldPrice(await session.content());
    } catch (error) {
      log.warn('Could not read sold price', {
        platform: sale.platform,
        listingId: sale.listingId,
        url: sale.url,
        error: errorMessage(error),
      });
      return null;
    }
  };
}

export function soldPriceOptions(platform: PlatformStrategy, session: RenderSession, log: Logger): SoldPriceOptions {
  switch (platform.soldPricePolicy) {
    case 'final_price':
      return { finalPriceKnown: true };
    case 'detail_lookup':
      return { finalPriceKnown: false, lookupSoldPrice: detailPageLookup(session, platform, log) };
    case 'last_asking':
      return { finalPriceKnown: false };
  }
}

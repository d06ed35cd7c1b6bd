import { BasePlatformStrategy, PlatformSelectors } from './platform-strategy.js';

const WRISTWATCH_CATEGORY_PATH = '/es/l/401-relojes-de-pulsera';

/**
 * Catawiki wristwatch auctions, searched by model name. Lots close on a
 * schedule, so a disappearance is a sale or an unsold close; disabled by default.
 */
export class CatawikiStrategy extends BasePlatformStrategy {
  readonly name = 'catawiki' as const;
  readonly baseUrl = 'https://www.catawiki.com';
  readonly paginationTolerance = 100;
  // A closed lot's last bid is the hammer price
  readonly soldPricePolicy = 'final_price' as const;
  protected readonly defaultCurrency = 'EUR';

  readonly selectors: PlatformSelectors = {
    listing: ["[data-testid='lot-card']", "article[class*='LotCard']"],
    fallbackListing: ["a[href*='/l/'][class*='card']", "article:has(a[href*='/l/'])", "div[class*='card']:has(a[href*='/l/'])"],
    nextPage: ["a[aria-label='Next']", "a[rel='next']", "[class*='pagination'] [rel='next']"],
    pageSize: [],
    resultCount: ["[data-testid='search-results-count']", "[class*='ResultsCount']"],
    pagination: ["nav[aria-label='pagination']", "[class*='pagination']"],
    fields: {
      link: "a[href*='/l/']",
      title: "[class*='title']",
      price: "[class*='bid'], [class*='price']",
      image: 'img',
    },
  };

  buildSearchUrl(model: string): string {
    return `${this.baseUrl}${WRISTWATCH_CATEGORY_PATH}?q=${encodeURIComponent(model)}`;
  }

  pageUrl(baseUrl: string, pageNumber: number): string {
    const url = new URL(baseUrl);
    if (pageNumber > 1) {
      url.searchParams.set('page', String(pageNumber));
    } else {
      url.searchParams.delete('page');
    }
    return url.toString();
  }

  protected listingIdFrom(url: string): string | null {
    // Lot URLs are /l/<id>-<slug>; the category path /l/401-... is not a lot
    const match = url.match(/\/l\/(\d+)(?:-|$|\?)/);
    if (!match || url.includes(WRISTWATCH_CATEGORY_PATH)) return null;
    return match[1];
  }
}

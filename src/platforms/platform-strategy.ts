import * as cheerio from 'cheerio';
import { Listing, PlatformName, PlatformSettings } from '../types/index.js';
import { detectCurrency, parsePrice } from '../utils/price.js';

/**
 * Per-platform policy: how result pages are addressed and how listing cards
 * are recognised and parsed. The navigation state machine never looks at
 * marketplace markup directly; it goes through these objects.
 */

export interface ListingFieldSelectors {
  /** Anchor pointing at the listing detail page */
  link: string;
  title: string;
  price: string;
  image: string;
  country?: string;
  condition?: string;
}

export interface PlatformSelectors {
  /** Listing card selectors, tried in order until one matches */
  listing: string[];
  /** Broader card selectors used when resolved HTML is injected without scripts */
  fallbackListing: string[];
  nextPage: string[];
  /** Controls that raise the results-per-page count; clicked once before page 1 */
  pageSize: string[];
  /** Elements whose text states the total result count */
  resultCount: string[];
  /** Containers holding numbered pagination links */
  pagination: string[];
  fields: ListingFieldSelectors;
}

export interface AdvertisedTotals {
  totalItems: number | null;
  totalPages: number | null;
}

export interface ExtractionResult {
  /** Cards that parsed into a listing, before country exclusion */
  recognized: number;
  listings: Listing[];
}

/**
 * Where the price of a sold listing comes from:
 * - `last_asking`: the last asking price seen, recorded as an estimate
 * - `final_price`: the last price seen is the closing price (auctions)
 * - `detail_lookup`: the sold item's detail page states the price paid
 */
export type SoldPricePolicy = 'last_asking' | 'final_price' | 'detail_lookup';

export interface PlatformStrategy {
  readonly name: PlatformName;
  readonly baseUrl: string;
  readonly pageSize: number;
  /** Accepted ±difference between collected and advertised items */
  readonly paginationTolerance: number;
  readonly selectors: PlatformSelectors;
  readonly soldPricePolicy: SoldPricePolicy;
  buildSearchUrl(targetKey: string): string;
  /** Address of results page `pageNumber` given the post-redirect page-1 URL */
  pageUrl(baseUrl: string, pageNumber: number): string;
  detectTotals(html: string): AdvertisedTotals;
  extractListings(elementsHtml: string[], pageNumber: number): ExtractionResult;
  /** Price paid, read from a sold item's detail page */
  parseSoldPrice(detailHtml: string): number | null;
}

// Sanity bound for advertised counts; anything larger is a mis-parsed reference number
const MAX_PLAUSIBLE_ITEMS = 100_000;

const TOTAL_PATTERNS = [
  /(?:of|de|von|sur)\s+([\d][\d.,\s]*)/i,
  /([\d][\d.,\s]*)\s*(?:results?|resultados?|relojes|watch(?:es)?|anuncios?|items?|articles?|artículos?|lots?|objects?)/i,
];

export function parseCount(text: string): number | null {
  const digits = text.replace(/[.,\s]/g, '');
  if (!/^\d+$/.test(digits)) return null;
  return parseInt(digits, 10);
}

export abstract class BasePlatformStrategy implements PlatformStrategy {
  abstract readonly name: PlatformName;
  abstract readonly baseUrl: string;
  abstract readonly paginationTolerance: number;
  abstract readonly selectors: PlatformSelectors;
  protected abstract readonly defaultCurrency: string;

  readonly soldPricePolicy: SoldPricePolicy = 'last_asking';
  /** Detail-page elements holding the price paid, tried in order */
  protected readonly soldPriceSelectors: readonly string[] = [];

  readonly pageSize: number;
  private readonly excludedCountries: string[];

  constructor(settings: Pick<PlatformSettings, 'pageSize' | 'excludedCountries'>) {
    this.pageSize = settings.pageSize;
    this.excludedCountries = settings.excludedCountries.map(c => c.toLowerCase());
  }

  abstract buildSearchUrl(targetKey: string): string;
  abstract pageUrl(baseUrl: string, pageNumber: number): string;

  /**
   * Listing id from the detail URL or the card's own attributes
   */
  protected abstract listingIdFrom(url: string, cardAttributes: Record<string, string>): string | null;

  detectTotals(html: string): AdvertisedTotals {
    const $ = cheerio.load(html);

    let totalItems: number | null = null;
    for (const selector of this.selectors.resultCount) {
      const text = $(selector).first().text();
      if (!text) continue;

      for (const pattern of TOTAL_PATTERNS) {
        const match = text.match(pattern);
        const candidate = match ? parseCount(match[1].trim()) : null;
        if (candidate !== null && candidate > 0 && candidate <= MAX_PLAUSIBLE_ITEMS) {
          totalItems = candidate;
          break;
        }
      }
      if (totalItems !== null) break;
    }

    let totalPages: number | null = null;
    for (const selector of this.selectors.pagination) {
      const numbers = $(selector)
        .find('a, button, span, li')
        .map((_, el) => $(el).text().trim())
        .get()
        .filter(text => /^\d+$/.test(text))
        .map(text => parseInt(text, 10));

      if (numbers.length > 0) {
        totalPages = Math.max(...numbers);
        break;
      }
    }

    if (totalPages === null && totalItems !== null) {
      totalPages = Math.max(1, Math.ceil(totalItems / this.pageSize));
    }

    return { totalItems, totalPages };
  }

  extractListings(elementsHtml: string[], pageNumber: number): ExtractionResult {
    const listings: Listing[] = [];
    let recognized = 0;

    for (const html of elementsHtml) {
      const listing = this.parseListing(html, pageNumber);
      if (!listing) continue;

      recognized++;
      if (!this.isExcludedCountry(listing.country)) {
        listings.push(listing);
      }
    }

    return { recognized, listings };
  }

  parseSoldPrice(detailHtml: string): number | null {
    const $ = cheerio.load(detailHtml);
    for (const selector of this.soldPriceSelectors) {
      const price = parsePrice($(selector).first().text());
      if (price !== null && price > 0) return price;
    }
    return null;
  }

  protected parseListing(html: string, pageNumber: number): Listing | null {
    const $ = cheerio.load(html, null, false);
    const root = $.root();
    const card = root.children().first();
    const fields = this.selectors.fields;

    const link = root.find(fields.link).first();
    const href = link.attr('href') ?? card.attr('href');
    const url = href ? this.absoluteUrl(href) : '';

    const listingId = this.listingIdFrom(url, card.attr() ?? {});
    if (!listingId) return null;

    const textOf = (selector: string | undefined): string | null => {
      if (!selector) return null;
      const text = root.find(selector).first().text().replace(/\s+/g, ' ').trim();
      return text.length > 0 ? text : null;
    };

    const priceText = textOf(fields.price);
    const image = root.find(fields.image).first();
    const imageSrc = image.attr('src') ?? image.attr('data-src') ?? image.attr('srcset')?.split(/[\s,]+/)[0];

    return {
      platform: this.name,
      listingId,
      title: textOf(fields.title) ?? link.attr('title') ?? '',
      price: parsePrice(priceText),
      currency: detectCurrency(priceText, this.defaultCurrency),
      condition: textOf(fields.condition),
      country: textOf(fields.country),
      imageUrl: imageSrc ? this.absoluteUrl(imageSrc) : null,
      url,
      seenAtPage: pageNumber,
    };
  }

  protected absoluteUrl(href: string): string {
    if (href.startsWith('//')) return `https:${href}`;
    try {
      return new URL(href, this.baseUrl).toString();
    } catch {
      return href;
    }
  }

  private isExcludedCountry(country: string | null): boolean {
    if (!country || this.excludedCountries.length === 0) return false;
    const lower = country.toLowerCase();
    return this.excludedCountries.some(excluded => lower === excluded || lower.includes(excluded));
  }
}

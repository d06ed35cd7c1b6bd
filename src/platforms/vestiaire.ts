import * as cheerio from 'cheerio';
import { z } from 'zod';
import { AdvertisedTotals, BasePlatformStrategy, PlatformSelectors } from './platform-strategy.js';

const paginationSchema = z
  .object({
    total: z.number().optional(),
    totalItems: z.number().optional(),
    totalPages: z.number().optional(),
    pageCount: z.number().optional(),
  })
  .passthrough();

const amountSchema = z.object({ amount: z.coerce.number().nullable().optional() }).passthrough();

const productNextDataSchema = z.object({
  props: z.object({
    pageProps: z.object({
      product: z
        .object({
          soldPrice: amountSchema.optional(),
          finalPrice: amountSchema.optional(),
          price: amountSchema.optional(),
        })
        .passthrough()
        .optional(),
    }),
  }),
});

const nextDataSchema = z.object({
  props: z.object({
    pageProps: z
      .object({
        pagination: paginationSchema.optional(),
        userProducts: z.object({ pagination: paginationSchema.optional() }).passthrough().optional(),
      })
      .passthrough(),
  }),
});

/**
 * Vestiaire Collective seller profiles. Targets are seller ids; the
 * "items for sale" tab paginates with a plain `page` parameter.
 */
export class VestiaireStrategy extends BasePlatformStrategy {
  readonly name = 'vestiaire' as const;
  readonly baseUrl = 'https://es.vestiairecollective.com';
  readonly paginationTolerance = 60;
  readonly soldPricePolicy = 'detail_lookup' as const;
  protected readonly defaultCurrency = 'EUR';
  protected readonly soldPriceSelectors = [
    "[data-testid='sold-price']",
    '.sold-price',
    '.final-price',
    '.product-price--sold',
  ];

  readonly selectors: PlatformSelectors = {
    listing: ["[class*='productCard']", "[class*='product-card']"],
    fallbackListing: ["li:has(a[href*='/product/'])", "div:has(> a[href*='.shtml'])"],
    nextPage: ["a[aria-label='Next']", "button[aria-label='Next page']", "[class*='pagination'] [rel='next']"],
    pageSize: [],
    resultCount: ["[class*='productCount']", "[class*='results-count']"],
    pagination: ["[class*='pagination']"],
    fields: {
      link: "a[href*='.shtml'], a[href*='/product/']",
      title: "[class*='productCard__text--name'], [class*='name']",
      price: "[class*='price']",
      image: 'img',
      condition: "[class*='condition']",
    },
  };

  buildSearchUrl(sellerId: string): string {
    return `${this.baseUrl}/profile/${encodeURIComponent(sellerId)}/?tab=items-for-sale`;
  }

  pageUrl(baseUrl: string, pageNumber: number): string {
    const url = new URL(baseUrl);
    url.searchParams.set('tab', 'items-for-sale');
    if (pageNumber > 1) {
      url.searchParams.set('page', String(pageNumber));
    } else {
      url.searchParams.delete('page');
    }
    return url.toString();
  }

  detectTotals(html: string): AdvertisedTotals {
    const fromNextData = this.totalsFromNextData(html);
    if (fromNextData.totalItems !== null || fromNextData.totalPages !== null) {
      return fromNextData;
    }
    return super.detectTotals(html);
  }

  parseSoldPrice(detailHtml: string): number | null {
    const product = this.readNextData(detailHtml, productNextDataSchema)?.props.pageProps.product;
    const amount = product?.soldPrice?.amount ?? product?.finalPrice?.amount ?? product?.price?.amount ?? null;
    if (amount !== null && amount > 0) return amount;
    return super.parseSoldPrice(detailHtml);
  }

  protected listingIdFrom(url: string, cardAttributes: Record<string, string>): string | null {
    const fromUrl = url.match(/-(\d+)\.shtml/) ?? url.match(/\/product\/(\d+)/);
    if (fromUrl) return fromUrl[1];
    return cardAttributes['data-product-id'] || null;
  }

  private totalsFromNextData(html: string): AdvertisedTotals {
    const empty: AdvertisedTotals = { totalItems: null, totalPages: null };
    const nextData = this.readNextData(html, nextDataSchema);
    if (!nextData) return empty;

    const pageProps = nextData.props.pageProps;
    const pagination = pageProps.pagination ?? pageProps.userProducts?.pagination;
    if (!pagination) return empty;

    const totalItems = pagination.total ?? pagination.totalItems ?? null;
    const totalPages =
      pagination.totalPages ??
      pagination.pageCount ??
      (totalItems !== null ? Math.max(1, Math.ceil(totalItems / this.pageSize)) : null);

    return { totalItems, totalPages };
  }

  private readNextData<S extends z.ZodTypeAny>(html: string, schema: S): z.infer<S> | null {
    const raw = cheerio.load(html)('script#__NEXT_DATA__').first().text();
    if (!raw) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return null;
    }

    const parsed = schema.safeParse(json);
    return parsed.success ? parsed.data : null;
  }
}

import { BasePlatformStrategy, PlatformSelectors } from './platform-strategy.js';

// Search results in SEO form: /omega/speedmaster--mod83.htm, page 3 is --mod83-3.htm
const MOD_PATH_PATTERN = /(--mod\d+)(?:-\d+)?(\.htm)/;

export class Chrono24Strategy extends BasePlatformStrategy {
  readonly name = 'chrono24' as const;
  readonly baseUrl = 'https://www.chrono24.es';
  readonly paginationTolerance = 120;
  protected readonly defaultCurrency = 'EUR';

  readonly selectors: PlatformSelectors = {
    listing: ['article.article-item-container', 'div.js-article-item-container'],
    fallbackListing: ["article[class*='article']", '.article-item-container', "[class*='article-item']"],
    nextPage: ["a[aria-label='Next']", '.pagination a.next', ".pagination [rel='next']"],
    pageSize: ["a[href*='pageSize=120']", "button[data-page-size='120']"],
    resultCount: ["[data-testid='result-count']", '.result-page-headline', 'h1'],
    pagination: ['.pagination', "nav[aria-label='pagination']"],
    fields: {
      link: "a[href*='--id']",
      title: '.article-title',
      price: '.article-price',
      image: 'img',
      country: '.article-seller-country',
      condition: '.article-condition',
    },
  };

  buildSearchUrl(model: string): string {
    const params = new URLSearchParams({
      query: model,
      dosearch: 'true',
      searchexplain: '1',
      sortorder: '5',
      pageSize: String(this.pageSize),
    });
    return `${this.baseUrl}/search/index.htm?${params.toString()}`;
  }

  pageUrl(baseUrl: string, pageNumber: number): string {
    if (MOD_PATH_PATTERN.test(baseUrl)) {
      return baseUrl.replace(MOD_PATH_PATTERN, pageNumber > 1 ? `$1-${pageNumber}$2` : '$1$2');
    }

    const url = new URL(baseUrl);
    if (pageNumber > 1) {
      url.searchParams.set('showpage', String(pageNumber));
    } else {
      url.searchParams.delete('showpage');
    }
    return url.toString();
  }

  protected listingIdFrom(url: string, cardAttributes: Record<string, string>): string | null {
    const fromUrl = url.match(/--id(\d+)\.htm/);
    if (fromUrl) return fromUrl[1];
    return cardAttributes['data-article-id'] || null;
  }
}

/**
 * HTML builders for listing cards and result pages used across tests.
 */

export interface CardOptions {
  id: string;
  title?: string;
  price?: string;
  country?: string;
}

export function chrono24Card({ id, title = `Watch ${id}`, price = '1.000 €', country = 'Alemania' }: CardOptions): string {
  return [
    `<article class="article-item-container" data-article-id="${id}">`,
    `<a href="/omega/watch--id${id}.htm"><img src="https://img.chrono24.com/images/uhren/${id}.jpg"></a>`,
    `<div class="article-title">${title}</div>`,
    `<div class="article-price">${price}</div>`,
    `<div class="article-seller-country">${country}</div>`,
    '</article>',
  ].join('');
}

/** Card markup that only the broader fallback selectors recognise */
export function chrono24BareCard({ id, title = `Watch ${id}`, price = '1.000 €' }: CardOptions): string {
  return `<div class="wt-article-item"><a href="/omega/watch--id${id}.htm"><span class="article-title">${title}</span><span class="article-price">${price}</span></a></div>`;
}

export function resultsPage(cards: string[], options: { nextHref?: string; headline?: string } = {}): string {
  const next = options.nextHref ? `<nav class="pagination"><a aria-label="Next" href="${options.nextHref}">Siguiente</a></nav>` : '';
  const headline = options.headline ? `<h1>${options.headline}</h1>` : '';
  return `<html><body>${headline}<section>${cards.join('')}</section>${next}</body></html>`;
}

export const CHALLENGE_PAGE =
  '<html><head><title>Just a moment...</title></head><body><div id="cf-chl-opt"></div></body></html>';

export function chrono24Cards(ids: string[]): string[] {
  return ids.map(id => chrono24Card({ id }));
}

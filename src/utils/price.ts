/**
 * Price parsing for marketplace result cards.
 * Handles US (1,234.56) and European (1.234,56 / 1 234 €) formats.
 */

const CURRENCY_SYMBOLS: Array<[RegExp, string]> = [
  [/€|\bEUR\b/i, 'EUR'],
  [/£|\bGBP\b/i, 'GBP'],
  [/CHF/i, 'CHF'],
  [/US\$|\bUSD\b/i, 'USD'],
  [/\$/, 'USD'],
];

export function parsePrice(text: string | null | undefined): number | null {
  if (!text) return null;

  const cleaned = text
    .replace(/[^\d.,\s]/g, '')
    .trim()
    .replace(/\s+/g, '');

  if (!cleaned || !/\d/.test(cleaned)) return null;

  let normalized: string;

  if (cleaned.includes(',') && cleaned.includes('.')) {
    // Whichever separator comes last is the decimal separator
    if (cleaned.lastIndexOf(',') < cleaned.lastIndexOf('.')) {
      normalized = cleaned.replace(/,/g, '');
    } else {
      normalized = cleaned.replace(/\./g, '').replace(',', '.');
    }
  } else if (cleaned.includes(',')) {
    const parts = cleaned.split(',');
    if (parts.length === 2 && parts[1].length <= 2) {
      // 2,99 or 1234,5
      normalized = cleaned.replace(',', '.');
    } else {
      normalized = cleaned.replace(/,/g, '');
    }
  } else if (cleaned.includes('.')) {
    const parts = cleaned.split('.');
    const thousandsGrouped = parts.length > 1 && parts.slice(1).every(p => p.length === 3);
    // 1.234 and 12.500.000 are thousands separators on European sites
    normalized = thousandsGrouped ? cleaned.replace(/\./g, '') : cleaned;
  } else {
    normalized = cleaned;
  }

  const price = parseFloat(normalized);
  return Number.isNaN(price) ? null : price;
}

/**
 * Detect the currency from a price label, falling back to the platform default.
 */
export function detectCurrency(text: string | null | undefined, fallback: string): string {
  if (!text) return fallback;

  for (const [pattern, code] of CURRENCY_SYMBOLS) {
    if (pattern.test(text)) {
      return code;
    }
  }
  return fallback;
}

import { describe, it, expect } from 'vitest';
import { detectCurrency, parsePrice } from './price.js';

describe('parsePrice', () => {
  it('should read European thousands separators', () => {
    expect(parsePrice('1.000 €')).toBe(1000);
    expect(parsePrice('€ 12.500,00')).toBe(12500);
    expect(parsePrice('1 234 €')).toBe(1234);
  });

  it('should read US formatting', () => {
    expect(parsePrice('$1,234.56')).toBe(1234.56);
  });

  it('should treat a short comma group as decimals', () => {
    expect(parsePrice('2,99')).toBe(2.99);
  });

  it('should keep a plain decimal point', () => {
    expect(parsePrice('12.5')).toBe(12.5);
  });

  it('should return null for labels without a price', () => {
    expect(parsePrice('Precio a consultar')).toBeNull();
    expect(parsePrice('')).toBeNull();
    expect(parsePrice(null)).toBeNull();
  });
});

describe('detectCurrency', () => {
  it('should recognise currency symbols and codes', () => {
    expect(detectCurrency('1.000 €', 'USD')).toBe('EUR');
    expect(detectCurrency('CHF 3,400', 'EUR')).toBe('CHF');
    expect(detectCurrency('US$ 500', 'EUR')).toBe('USD');
    expect(detectCurrency('£750', 'EUR')).toBe('GBP');
  });

  it('should fall back to the platform currency', () => {
    expect(detectCurrency('4.200', 'EUR')).toBe('EUR');
    expect(detectCurrency(undefined, 'EUR')).toBe('EUR');
  });
});

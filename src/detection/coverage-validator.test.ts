import { describe, it, expect } from 'vitest';
import { CoverageValidator, isCoverageComplete } from './coverage-validator.js';
import { scrapeRun } from '../test-support/runs.js';

const validator = new CoverageValidator({ minItems: 100, minPageCoverage: 0.1, maxChangePercent: 10 });

describe('isCoverageComplete', () => {
  it('should accept a run that walked every advertised page without failures', () => {
    expect(isCoverageComplete(scrapeRun({ pagesAttempted: 4, pagesTotalDetected: 4 }))).toBe(true);
  });

  it('should reject a run with an unknown page count', () => {
    expect(isCoverageComplete(scrapeRun({ pagesTotalDetected: null }))).toBe(false);
  });

  it('should reject a run with failed pages', () => {
    expect(isCoverageComplete(scrapeRun({ pagesAttempted: 4, pagesTotalDetected: 4, pagesFailed: 1 }))).toBe(false);
  });

  it('should reject a run stopped by the page limit', () => {
    expect(
      isCoverageComplete(scrapeRun({ pagesAttempted: 4, pagesTotalDetected: 4, terminatedReason: 'page_limit_reached' }))
    ).toBe(false);
  });
});

describe('CoverageValidator', () => {
  it('should reject a run below the minimum item floor', () => {
    const decision = validator.validate(scrapeRun({ itemsCollected: 99 }), 100);

    expect(decision).toEqual({
      valid: false,
      reason: 'below minimum floor',
      detail: 'collected 99 items, minimum is 100',
    });
  });

  it('should reject a run that attempted too few of the advertised pages', () => {
    const run = scrapeRun({ itemsCollected: 120, pagesAttempted: 1, pagesTotalDetected: 50, terminatedReason: 'page_limit_reached' });

    expect(validator.validate(run, 120)).toEqual({
      valid: false,
      reason: 'insufficient page coverage',
      detail: 'attempted 1 of 50 pages (2%), minimum is 10%',
    });
  });

  it('should skip the page ratio when the page count is unknown', () => {
    const run = scrapeRun({ itemsCollected: 120, pagesAttempted: 1, pagesTotalDetected: null, terminatedReason: 'page_limit_reached' });

    expect(validator.validate(run, 120).valid).toBe(true);
  });

  it('should reject a large swing against yesterday for a run that is not provably complete', () => {
    const run = scrapeRun({
      itemsCollected: 150,
      pagesAttempted: 2,
      pagesTotalDetected: 3,
      terminatedReason: 'page_limit_reached',
    });

    expect(validator.validate(run, 200)).toEqual({
      valid: false,
      reason: 'coverage inconsistent versus prior run',
      detail: 'collected 150 items versus 200 yesterday (25% change), tolerance is 10%',
    });
  });

  it('should accept a large swing when every advertised page was crawled', () => {
    const run = scrapeRun({ itemsCollected: 150, pagesAttempted: 3, pagesTotalDetected: 3 });

    expect(validator.validate(run, 200)).toEqual({
      valid: true,
      reason: 'coverage acceptable',
      detail: 'collected 150 items over 3 pages',
    });
  });

  it('should accept a change inside the tolerance', () => {
    const run = scrapeRun({ itemsCollected: 195, pagesAttempted: 2, pagesTotalDetected: 3, terminatedReason: 'page_limit_reached' });

    expect(validator.validate(run, 200).valid).toBe(true);
  });

  it('should skip the prior-run comparison without a previous count', () => {
    const run = scrapeRun({ itemsCollected: 150, pagesAttempted: 2, pagesTotalDetected: 3, terminatedReason: 'page_limit_reached' });

    expect(validator.validate(run, null).valid).toBe(true);
  });

  it('should apply the rules in order', () => {
    const run = scrapeRun({ itemsCollected: 10, pagesAttempted: 1, pagesTotalDetected: 50 });

    expect(validator.validate(run, 200).reason).toBe('below minimum floor');
  });
});

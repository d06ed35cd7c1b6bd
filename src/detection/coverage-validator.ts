import { CoverageDecision, CoverageSettings, ScrapeRunResult } from '../types/index.js';

/**
 * A run is provably complete when it requested every advertised page,
 * none of them failed, and it stopped because pages ran out.
 */
export function isCoverageComplete(run: ScrapeRunResult): boolean {
  return (
    run.pagesTotalDetected !== null &&
    run.pagesAttempted >= run.pagesTotalDetected &&
    run.pagesFailed === 0 &&
    run.terminatedReason === 'no_more_pages'
  );
}

/**
 * Decides whether a run's snapshot is complete enough to diff against
 * yesterday. Works only on the metadata the Crawl Controller reported;
 * missing page counts stay missing.
 */
export class CoverageValidator {
  constructor(private readonly settings: CoverageSettings) {}

  validate(run: ScrapeRunResult, yesterdayCount: number | null): CoverageDecision {
    const { minItems, minPageCoverage, maxChangePercent } = this.settings;

    if (run.itemsCollected < minItems) {
      return {
        valid: false,
        reason: 'below minimum floor',
        detail: `collected ${run.itemsCollected} items, minimum is ${minItems}`,
      };
    }

    if (run.pagesTotalDetected !== null && run.pagesTotalDetected > 0) {
      const ratio = run.pagesAttempted / run.pagesTotalDetected;
      if (ratio < minPageCoverage) {
        return {
          valid: false,
          reason: 'insufficient page coverage',
          detail: `attempted ${run.pagesAttempted} of ${run.pagesTotalDetected} pages (${formatPercent(ratio * 100)}), minimum is ${formatPercent(minPageCoverage * 100)}`,
        };
      }
    }

    if (yesterdayCount !== null && yesterdayCount > 0) {
      const changePercent = (Math.abs(run.itemsCollected - yesterdayCount) / yesterdayCount) * 100;
      if (changePercent > maxChangePercent && !isCoverageComplete(run)) {
        return {
          valid: false,
          reason: 'coverage inconsistent versus prior run',
          detail: `collected ${run.itemsCollected} items versus ${yesterdayCount} yesterday (${formatPercent(changePercent)} change), tolerance is ${formatPercent(maxChangePercent)}`,
        };
      }
    }

    return {
      valid: true,
      reason: 'coverage acceptable',
      detail: `collected ${run.itemsCollected} items over ${run.pagesAttempted} pages`,
    };
  }
}

function formatPercent(value: number): string {
  return `${Number(value.toFixed(1))}%`;
}

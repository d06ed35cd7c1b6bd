import { Listing, Logger } from '../types/index.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { ResolverError, errorMessage } from '../utils/errors.js';
import { analyzePage } from '../utils/challenge-detector.js';
import { ChallengeResolver } from '../resolver/challenge-resolver-client.js';
import { ExtractionResult, PlatformStrategy } from '../platforms/platform-strategy.js';
import { DEFAULT_OVERLAY_SELECTORS, dismissOverlays } from './overlay-dismisser.js';
import { NavigationResponse, RenderSession } from './render-session.js';
import {
  ActiveNavigationState,
  INITIAL_NAVIGATION_STATE,
  NavigationState,
  StepOutcome,
  TerminalNavigationState,
  isTerminal,
  nextNavigationState,
} from './navigation-state.js';

export interface PageRequest {
  pageNumber: number;
  url: string;
  /** URL of page N-1 when it loaded successfully; needed to click "next" */
  previousPageUrl: string | null;
}

export interface NavigationAttempt {
  pageNumber: number;
  strategy: ActiveNavigationState;
  outcome: StepOutcome;
  itemsFound: number;
  detail?: string;
}

export interface PageNavigationResult {
  pageNumber: number;
  finalState: TerminalNavigationState;
  listings: Listing[];
  /** Cards that parsed into listings, before country exclusion */
  recognizedCount: number;
  attempts: NavigationAttempt[];
  stateTrail: NavigationState[];
  failureReason?: string;
}

interface StepResult {
  outcome: StepOutcome;
  extraction?: ExtractionResult;
  detail?: string;
}

/**
 * Drives one results page through the escalation chain
 * DIRECT → INTERACTIVE_NAV → CHALLENGE_RESCUE until listings are found or
 * every strategy has failed. Never throws for page-scoped problems.
 */
export class PageNavigator {
  private readonly overlaySelectors: readonly string[];

  constructor(
    private readonly session: RenderSession,
    private readonly platform: PlatformStrategy,
    private readonly resolver: ChallengeResolver | null,
    private readonly log: Logger = defaultLogger,
    overlaySelectors: readonly string[] = DEFAULT_OVERLAY_SELECTORS
  ) {
    this.overlaySelectors = overlaySelectors;
  }

  async navigatePage(request: PageRequest): Promise<PageNavigationResult> {
    let state: NavigationState = INITIAL_NAVIGATION_STATE;
    const stateTrail: NavigationState[] = [state];
    const attempts: NavigationAttempt[] = [];
    let extraction: ExtractionResult = { recognized: 0, listings: [] };

    while (!isTerminal(state)) {
      const strategy: ActiveNavigationState = state;
      const step = await this.runStep(strategy, request, stateTrail);

      attempts.push({
        pageNumber: request.pageNumber,
        strategy,
        outcome: step.outcome,
        itemsFound: step.extraction?.listings.length ?? 0,
        detail: step.detail,
      });

      if (step.extraction) {
        extraction = step.extraction;
      }

      state = nextNavigationState(strategy, step.outcome, { rescueAvailable: this.resolver !== null });
      stateTrail.push(state);

      this.log.debug('Navigation step', {
        platform: this.platform.name,
        page: request.pageNumber,
        strategy,
        outcome: step.outcome,
        next: state,
        detail: step.detail,
      });
    }

    if (state === 'SUCCESS') {
      if (stateTrail.length > 2) {
        this.log.info('Page recovered after escalation', {
          platform: this.platform.name,
          page: request.pageNumber,
          trail: stateTrail.join(' → '),
          listings: extraction.listings.length,
        });
      }
      return {
        pageNumber: request.pageNumber,
        finalState: state,
        listings: extraction.listings,
        recognizedCount: extraction.recognized,
        attempts,
        stateTrail,
      };
    }

    const failureReason = attempts
      .map(attempt => `${attempt.strategy}:${attempt.outcome}${attempt.detail ? ` (${attempt.detail})` : ''}`)
      .join(', ');

    this.log.warn('Page failed after all strategies', {
      platform: this.platform.name,
      page: request.pageNumber,
      url: request.url,
      attempts: failureReason,
    });

    return {
      pageNumber: request.pageNumber,
      finalState: state,
      listings: [],
      recognizedCount: 0,
      attempts,
      stateTrail,
      failureReason,
    };
  }

  private async runStep(
    state: ActiveNavigationState,
    request: PageRequest,
    trail: readonly NavigationState[]
  ): Promise<StepResult> {
    try {
      switch (state) {
        case 'DIRECT':
          return await this.direct(request);
        case 'INTERACTIVE_NAV':
          return await this.interactive(request);
        case 'CHALLENGE_RESCUE':
          return await this.rescue(request, trail);
      }
    } catch (error) {
      if (error instanceof ResolverError) {
        this.log.warn('Challenge rescue failed', {
          platform: this.platform.name,
          page: request.pageNumber,
          url: request.url,
          kind: error.kind,
          chain: trail.join(' → '),
          error: error.message,
        });
      }
      return { outcome: 'error', detail: errorMessage(error) };
    }
  }

  private async direct(request: PageRequest): Promise<StepResult> {
    const response = await this.session.navigate(request.url);
    await this.dismissOverlays();
    return this.inspect(request.pageNumber, [this.platform.selectors.listing], response);
  }

  private async interactive(request: PageRequest): Promise<StepResult> {
    if (!request.previousPageUrl) {
      return { outcome: 'unavailable', detail: 'no previous page to navigate from' };
    }

    if (this.session.currentUrl() !== request.previousPageUrl) {
      await this.session.navigate(request.previousPageUrl);
    }
    await this.dismissOverlays();

    let clicked: string | null = null;
    for (const selector of this.platform.selectors.nextPage) {
      if (await this.session.click(selector)) {
        clicked = selector;
        break;
      }
    }
    if (!clicked) {
      return { outcome: 'unavailable', detail: 'no next-page control' };
    }

    await this.dismissOverlays();
    const result = await this.inspect(request.pageNumber, [this.platform.selectors.listing]);
    return { ...result, detail: result.detail ?? `clicked ${clicked}` };
  }

  private async rescue(request: PageRequest, trail: readonly NavigationState[]): Promise<StepResult> {
    if (!this.resolver) {
      return { outcome: 'unavailable', detail: 'no resolver configured' };
    }

    const resolved = await this.resolver.resolve(request.url);

    // Re-render through the browser with the clearance cookies first
    try {
      await this.session.setCookies(resolved.cookies);
      const response = await this.session.navigate(request.url);
      await this.dismissOverlays();
      const rerendered = await this.inspect(request.pageNumber, [this.platform.selectors.listing], response);
      if (rerendered.outcome === 'listings') {
        return { ...rerendered, detail: 'resolver cookies' };
      }
    } catch (error) {
      this.log.warn('Re-render with resolver cookies failed, replacing content', {
        platform: this.platform.name,
        page: request.pageNumber,
        url: request.url,
        chain: trail.join(' → '),
        error: errorMessage(error),
      });
    }

    await this.session.setContent(resolved.html);
    await this.dismissOverlays();
    const replaced = await this.inspect(request.pageNumber, [
      this.platform.selectors.listing,
      this.platform.selectors.fallbackListing,
    ]);
    if (replaced.outcome === 'listings') {
      return { ...replaced, detail: 'content replacement' };
    }
    return replaced;
  }

  /**
   * Query listing selectors in order and classify what the document holds.
   */
  private async inspect(
    pageNumber: number,
    selectorGroups: readonly (readonly string[])[],
    response?: NavigationResponse
  ): Promise<StepResult> {
    for (const selectors of selectorGroups) {
      for (const selector of selectors) {
        const elements = await this.session.queryAll(selector);
        if (elements.length === 0) continue;

        const extraction = this.platform.extractListings(elements, pageNumber);
        if (extraction.recognized > 0) {
          return { outcome: 'listings', extraction };
        }
      }
    }

    const analysis = analyzePage(await this.session.content());
    if (analysis.verdict === 'challenge') {
      return { outcome: 'challenge', detail: `challenge marker "${analysis.marker}"` };
    }
    if (analysis.verdict === 'blocked') {
      return { outcome: 'blocked', detail: `block marker "${analysis.marker}"` };
    }
    if (response && !response.ok) {
      return { outcome: 'blocked', detail: `HTTP ${response.status ?? 'unknown'}` };
    }
    return { outcome: 'empty', detail: 'no listing elements' };
  }

  private async dismissOverlays(): Promise<void> {
    await dismissOverlays(this.session, this.overlaySelectors, this.log);
  }
}

/**
 * Per-page navigation state machine.
 *
 *   DIRECT ──fail──▶ INTERACTIVE_NAV ──fail──▶ CHALLENGE_RESCUE ──fail──▶ PAGE_FAILED
 *     │                    │                          │
 *     └──listings──────────┴──────────listings────────┴──────────▶ SUCCESS
 *
 * Without a configured resolver INTERACTIVE_NAV fails straight to PAGE_FAILED.
 */

export type NavigationState =
  | 'DIRECT'
  | 'INTERACTIVE_NAV'
  | 'CHALLENGE_RESCUE'
  | 'SUCCESS'
  | 'PAGE_FAILED';

/** States that perform work; SUCCESS and PAGE_FAILED are terminal */
export type ActiveNavigationState = Exclude<NavigationState, 'SUCCESS' | 'PAGE_FAILED'>;
export type TerminalNavigationState = Extract<NavigationState, 'SUCCESS' | 'PAGE_FAILED'>;

/**
 * Result of one strategy step:
 * - listings: at least one listing element was recognised
 * - empty: the page rendered but held no listing elements
 * - blocked: non-2xx response or a block page
 * - challenge: an anti-bot interstitial was detected
 * - unavailable: the strategy could not run (no previous page, no next control)
 * - error: the render session or resolver threw
 */
export type StepOutcome = 'listings' | 'empty' | 'blocked' | 'challenge' | 'unavailable' | 'error';

export interface TransitionContext {
  rescueAvailable: boolean;
}

export const INITIAL_NAVIGATION_STATE: ActiveNavigationState = 'DIRECT';

export function isTerminal(state: NavigationState): state is TerminalNavigationState {
  return state === 'SUCCESS' || state === 'PAGE_FAILED';
}

export function nextNavigationState(
  state: ActiveNavigationState,
  outcome: StepOutcome,
  context: TransitionContext
): NavigationState {
  if (outcome === 'listings') {
    return 'SUCCESS';
  }

  switch (state) {
    case 'DIRECT':
      return 'INTERACTIVE_NAV';
    case 'INTERACTIVE_NAV':
      return context.rescueAvailable ? 'CHALLENGE_RESCUE' : 'PAGE_FAILED';
    case 'CHALLENGE_RESCUE':
      return 'PAGE_FAILED';
  }
}

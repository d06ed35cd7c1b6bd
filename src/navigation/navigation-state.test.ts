import { describe, it, expect } from 'vitest';
import { INITIAL_NAVIGATION_STATE, isTerminal, nextNavigationState } from './navigation-state.js';

describe('nextNavigationState', () => {
  const withRescue = { rescueAvailable: true };
  const withoutRescue = { rescueAvailable: false };

  it('should start every page in DIRECT', () => {
    expect(INITIAL_NAVIGATION_STATE).toBe('DIRECT');
  });

  it('should succeed from any active state when listings are found', () => {
    expect(nextNavigationState('DIRECT', 'listings', withRescue)).toBe('SUCCESS');
    expect(nextNavigationState('INTERACTIVE_NAV', 'listings', withoutRescue)).toBe('SUCCESS');
    expect(nextNavigationState('CHALLENGE_RESCUE', 'listings', withRescue)).toBe('SUCCESS');
  });

  it.each(['empty', 'blocked', 'challenge', 'unavailable', 'error'] as const)(
    'should escalate DIRECT to INTERACTIVE_NAV on %s',
    outcome => {
      expect(nextNavigationState('DIRECT', outcome, withRescue)).toBe('INTERACTIVE_NAV');
    }
  );

  it('should escalate INTERACTIVE_NAV to CHALLENGE_RESCUE when a resolver is configured', () => {
    expect(nextNavigationState('INTERACTIVE_NAV', 'challenge', withRescue)).toBe('CHALLENGE_RESCUE');
    expect(nextNavigationState('INTERACTIVE_NAV', 'unavailable', withRescue)).toBe('CHALLENGE_RESCUE');
  });

  it('should fail INTERACTIVE_NAV when no resolver is configured', () => {
    expect(nextNavigationState('INTERACTIVE_NAV', 'challenge', withoutRescue)).toBe('PAGE_FAILED');
  });

  it('should fail the page when the rescue finds nothing', () => {
    expect(nextNavigationState('CHALLENGE_RESCUE', 'empty', withRescue)).toBe('PAGE_FAILED');
    expect(nextNavigationState('CHALLENGE_RESCUE', 'error', withRescue)).toBe('PAGE_FAILED');
  });

  it('should only treat SUCCESS and PAGE_FAILED as terminal', () => {
    expect(isTerminal('SUCCESS')).toBe(true);
    expect(isTerminal('PAGE_FAILED')).toBe(true);
    expect(isTerminal('DIRECT')).toBe(false);
    expect(isTerminal('CHALLENGE_RESCUE')).toBe(false);
  });
});

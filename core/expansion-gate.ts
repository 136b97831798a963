/**
 * Decides whether the menu expansion loop has to run for a structure.
 *
 * The "already expanded" flag is process-lifetime state, carried by callers as
 * an explicit value. Once set it suppresses expansion for every later cache
 * hit in the same session, even one for a different site; that stale-menu
 * behaviour is intentional and covered by tests.
 */

import type { ExpansionOverrides, ExpansionSessionState } from './types';

export type ExpansionReason =
  | 'live-parse'
  | 'already-expanded'
  | 'override'
  | 'cache-trusted';

export interface ExpansionDecision {
  expand: boolean;
  reason: ExpansionReason;
  next: ExpansionSessionState;
}

export function initialExpansionState(): ExpansionSessionState {
  return { expansionDone: false };
}

export function hasOverride(overrides: ExpansionOverrides): boolean {
  return Boolean(overrides.force || overrides.forceFullExpansion || overrides.validateCache);
}

export function decideExpansion(
  state: ExpansionSessionState,
  input: { fromCache: boolean; overrides: ExpansionOverrides },
): ExpansionDecision {
  if (!input.fromCache) {
    return { expand: true, reason: 'live-parse', next: { expansionDone: true } };
  }
  if (state.expansionDone) {
    return { expand: false, reason: 'already-expanded', next: state };
  }
  if (hasOverride(input.overrides)) {
    return { expand: true, reason: 'override', next: { expansionDone: true } };
  }
  return { expand: false, reason: 'cache-trusted', next: state };
}

/**
 * Interval Bounds
 *
 * A bound is either a concrete day or unbounded. Which infinity "unbounded"
 * stands for depends on the side: −∞ as a start, +∞ as an end. Each side has
 * its own ordering so that callers never branch on boundedness themselves.
 */

import {
  type LocalDate,
  tryAddDays,
  compareDates,
  dateBefore,
} from './time-date'

// ============================================================================
// Types
// ============================================================================

export type Unbounded = { readonly kind: 'unbounded' }

export type Bounded = { readonly kind: 'bounded'; readonly date: LocalDate }

export type Bound = Unbounded | Bounded

// ============================================================================
// Construction
// ============================================================================

export const unbounded: Unbounded = Object.freeze({ kind: 'unbounded' })

export function bounded(date: LocalDate): Bounded {
  return Object.freeze({ kind: 'bounded', date })
}

export function boundOf(date: LocalDate | null): Bound {
  return date === null ? unbounded : bounded(date)
}

// ============================================================================
// Accessors
// ============================================================================

export function isBounded(bound: Bound): bound is Bounded {
  return bound.kind === 'bounded'
}

export function dateOfBound(bound: Bound): LocalDate | null {
  return bound.kind === 'bounded' ? bound.date : null
}

export function boundEquals(a: Bound, b: Bound): boolean {
  if (a.kind === 'unbounded' || b.kind === 'unbounded') return a.kind === b.kind
  return a.date === b.date
}

/**
 * Moves a concrete bound by n days; unbounded stays unbounded. Null when the
 * shifted day would leave the calendar, e.g. the day before 0000-01-01.
 */
export function shiftBound(bound: Bound, n: number): Bound | null {
  if (bound.kind === 'unbounded') return bound
  const date = tryAddDays(bound.date, n)
  return date === null ? null : bounded(date)
}

// ============================================================================
// Ordering
// ============================================================================

/** Orders two start bounds, unbounded first. */
export function compareStarts(a: Bound, b: Bound): number {
  if (a.kind === 'unbounded') return b.kind === 'unbounded' ? 0 : -1
  if (b.kind === 'unbounded') return 1
  return compareDates(a.date, b.date)
}

/** Orders two end bounds, unbounded last. */
export function compareEnds(a: Bound, b: Bound): number {
  if (a.kind === 'unbounded') return b.kind === 'unbounded' ? 0 : 1
  if (b.kind === 'unbounded') return -1
  return compareDates(a.date, b.date)
}

export function laterStart(a: Bound, b: Bound): Bound {
  return compareStarts(a, b) >= 0 ? a : b
}

export function earlierEnd(a: Bound, b: Bound): Bound {
  return compareEnds(a, b) <= 0 ? a : b
}

export function laterEnd(a: Bound, b: Bound): Bound {
  return compareEnds(a, b) >= 0 ? a : b
}

/**
 * True when an end bound lies strictly before a start bound, i.e. the span
 * between them holds no day. Only two concrete dates can be apart.
 */
export function endsBeforeStart(end: Bound, start: Bound): boolean {
  return end.kind === 'bounded' && start.kind === 'bounded' && dateBefore(end.date, start.date)
}

/**
 * Meeting Variables
 *
 * One schedulable meeting per index, holding its candidate dates, its
 * tentative assignment during search, and the constraints that mention it.
 */

import type { LocalDate } from './time-date'
import { datesInRange } from './time-date'
import type { Constraint } from './constraints'
import { constraintVariables } from './constraints'

export type Meeting = {
  readonly index: number
  /** Ascending candidate dates. Shrinks during propagation, never grows. */
  domain: LocalDate[]
  /** Set only while search is exploring this meeting's branch. */
  assignment: LocalDate | undefined
  /** Every constraint that mentions this meeting, in input order */
  readonly boundConstraints: readonly Constraint[]
}

/**
 * Groups `all` by the meetings each constraint mentions, in input order.
 * Entry `i` holds the constraints bound to meeting `i`.
 */
export function bindConstraints(nMeetings: number, all: readonly Constraint[]): Constraint[][] {
  const bound: Constraint[][] = Array.from({ length: nMeetings }, () => [])
  for (const c of all) {
    for (const index of new Set(constraintVariables(c))) {
      bound[index]?.push(c)
    }
  }
  return bound
}

/**
 * Builds `nMeetings` meetings, each with the full inclusive range as its domain.
 * Every meeting gets its own domain array.
 */
export function createMeetings(
  nMeetings: number,
  rangeStart: LocalDate,
  rangeEnd: LocalDate,
  constraints: readonly Constraint[]
): Meeting[] {
  const range = datesInRange(rangeStart, rangeEnd)
  const bound = bindConstraints(nMeetings, constraints)
  const meetings: Meeting[] = []
  for (let index = 0; index < nMeetings; index++) {
    meetings.push({
      index,
      domain: [...range],
      assignment: undefined,
      boundConstraints: bound[index] ?? [],
    })
  }
  return meetings
}

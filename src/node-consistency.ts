/**
 * Node Consistency
 *
 * Filters each meeting's domain against its own unary constraints.
 * No propagation: a unary constraint never mentions another meeting.
 */

import type { LocalDate } from './time-date'
import type { Meeting } from './meeting'
import type { Constraint } from './constraints'
import { consistent } from './constraints'

function keepsDate(c: Constraint, meeting: Meeting): ((date: LocalDate) => boolean) | null {
  if (c.kind === 'unary' && c.variable === meeting.index) {
    const { date, operator } = c
    return d => consistent(d, date, operator)
  }
  // `3 < 3` names one meeting twice and filters like a unary constraint
  if (c.kind === 'binary' && c.left === meeting.index && c.right === meeting.index) {
    const { operator } = c
    return d => consistent(d, d, operator)
  }
  return null
}

/**
 * Removes, in place, every domain date that fails one of the meeting's unary
 * constraints. Returns the total number of dates removed.
 */
export function enforceNodeConsistency(meetings: readonly Meeting[]): number {
  let removed = 0

  for (const meeting of meetings) {
    const before = meeting.domain.length
    for (const c of meeting.boundConstraints) {
      const keep = keepsDate(c, meeting)
      if (keep) meeting.domain = meeting.domain.filter(keep)
    }
    removed += before - meeting.domain.length
  }

  return removed
}

/**
 * Backtracking Search
 *
 * Depth-first assignment of dates to meetings. Meetings are taken in
 * ascending index order and dates in ascending calendar order, so the first
 * solution found is the same on every run. Domains are read, never written.
 */

import type { LocalDate } from './time-date'
import type { Meeting } from './meeting'
import { isSatisfiedBy } from './constraints'

export type SearchStats = {
  /** Candidate dates tried across all meetings */
  nodes: number
}

/**
 * True when every constraint of `meeting` whose meetings are all assigned
 * holds under `assignment`. Constraints among earlier meetings were checked
 * when the last of them was assigned.
 */
export function isConsistentAssignment(
  meeting: Meeting,
  assignment: ReadonlyArray<LocalDate | undefined>
): boolean {
  for (const c of meeting.boundConstraints) {
    if (isSatisfiedBy(c, assignment) === false) return false
  }
  return true
}

function undo(meeting: Meeting, assignment: LocalDate[]): void {
  meeting.assignment = undefined
  assignment.pop()
}

/**
 * Iterative depth-first search. `next[i]` is the domain position meeting `i`
 * tries next; the stack depth never exceeds the meeting count.
 */
function backtrack(
  meetings: readonly Meeting[],
  assignment: LocalDate[],
  stats: SearchStats
): LocalDate[] | null {
  const next: number[] = [0]

  while (next.length > 0) {
    const index = next.length - 1
    const meeting = meetings[index]

    if (!meeting) {
      const solution = [...assignment]
      for (const m of meetings) m.assignment = undefined
      return solution
    }

    const position = next[index] ?? 0
    const candidate = meeting.domain[position]

    if (candidate === undefined) {
      // Exhausted: drop this level and undo the previous meeting's choice
      next.pop()
      const previous = meetings[index - 1]
      if (previous) undo(previous, assignment)
      continue
    }

    next[index] = position + 1
    stats.nodes++
    assignment.push(candidate)
    meeting.assignment = candidate

    if (isConsistentAssignment(meeting, assignment)) {
      next.push(0)
    } else {
      undo(meeting, assignment)
    }
  }

  return null
}

/**
 * First assignment (by ascending index, then ascending date) satisfying every
 * constraint bound to `meetings`, or null when none exists.
 * Index `i` of the result is the date of meeting `i`.
 */
export function backtrackSearch(
  meetings: readonly Meeting[],
  stats: SearchStats = { nodes: 0 }
): LocalDate[] | null {
  return backtrack(meetings, [], stats)
}

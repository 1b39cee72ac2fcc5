/**
 * Calendar CSP Solver
 *
 * Public entry point: validates the problem, builds one meeting per index over
 * the inclusive date range, prunes domains with node and arc consistency, then
 * runs backtracking search. Returns the first solution under ascending
 * index/date ordering, or null when the constraints cannot all hold.
 */

import type { LocalDate } from './time-date'
import { isLocalDate, daysBetween, dateBefore, dateAfter } from './time-date'
import type { Constraint } from './constraints'
import { isOperator, constraintVariables, isSatisfiedBy, formatConstraint } from './constraints'
import { InvalidInputError, InvalidRangeError } from './errors'
import { createMeetings } from './meeting'
import { enforceNodeConsistency } from './node-consistency'
import { enforceArcConsistency } from './arc-consistency'
import { backtrackSearch } from './backtracking'

// ============================================================================
// Types
// ============================================================================

export type SolverTraceEvent =
  | { phase: 'validated'; meetings: number; rangeDays: number; constraints: number }
  | { phase: 'nodeConsistency'; removed: number }
  | { phase: 'arcConsistency'; skipped: boolean; consistent: boolean; revisions: number; removed: number }
  | { phase: 'search'; nodes: number; solved: boolean }

export type SolveOptions = {
  /** Run the AC-3 pass before search. Never changes the result. Default true. */
  arcConsistency?: boolean
  onTrace?: (event: SolverTraceEvent) => void
}

export type SolveStats = {
  /** Dates in the inclusive range, i.e. every meeting's starting domain size */
  initialDomainSize: number
  removedByNodeConsistency: number
  removedByArcConsistency: number
  arcRevisions: number
  searchNodes: number
  /** Domain size of each meeting when search began */
  domainSizes: number[]
}

export type SolveReport = {
  solution: LocalDate[] | null
  stats: SolveStats
}

export type AssignmentViolation =
  | { kind: 'length'; expected: number; actual: number }
  | { kind: 'range'; meeting: number; date: string }
  | { kind: 'constraint'; constraint: Constraint }

// ============================================================================
// Validation
// ============================================================================

function isMeetingIndex(value: unknown, nMeetings: number): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < nMeetings
}

function validateConstraint(c: Constraint, position: number, nMeetings: number): void {
  const where = `Constraint ${position}`
  if (c === null || typeof c !== 'object') {
    throw new InvalidInputError(`${where}: expected a constraint object`)
  }
  if (c.kind !== 'unary' && c.kind !== 'binary') {
    throw new InvalidInputError(`${where}: unknown constraint kind`)
  }
  if (!isOperator(c.operator)) {
    throw new InvalidInputError(`${where}: invalid operator '${String(c.operator)}'`)
  }
  for (const index of constraintVariables(c)) {
    if (!isMeetingIndex(index, nMeetings)) {
      throw new InvalidInputError(
        `${where}: meeting index ${String(index)} is outside [0, ${nMeetings})`
      )
    }
  }
  if (c.kind === 'unary' && !isLocalDate(c.date)) {
    throw new InvalidInputError(`${where}: invalid date '${String(c.date)}'`)
  }
}

/**
 * Throws InvalidInputError (or InvalidRangeError for a reversed range) when
 * the problem is malformed. Nothing is built before this passes.
 */
export function validateSolveInput(
  nMeetings: number,
  rangeStart: LocalDate,
  rangeEnd: LocalDate,
  constraints: readonly Constraint[]
): void {
  if (!Number.isInteger(nMeetings) || nMeetings < 0) {
    throw new InvalidInputError(`Meeting count must be a non-negative integer, got ${nMeetings}`)
  }
  if (!isLocalDate(rangeStart)) {
    throw new InvalidInputError(`Invalid range start: '${String(rangeStart)}'`)
  }
  if (!isLocalDate(rangeEnd)) {
    throw new InvalidInputError(`Invalid range end: '${String(rangeEnd)}'`)
  }
  if (dateBefore(rangeEnd, rangeStart)) {
    throw new InvalidRangeError(`Range end ${rangeEnd} is before range start ${rangeStart}`)
  }
  if (!Array.isArray(constraints)) {
    throw new InvalidInputError('Constraints must be an array')
  }
  constraints.forEach((c, i) => validateConstraint(c, i, nMeetings))
}

// ============================================================================
// Tracing
// ============================================================================

function emit(onTrace: SolveOptions['onTrace'], event: SolverTraceEvent): void {
  if (!onTrace) return
  try { onTrace(event) } catch (e) { console.error(`Trace handler error on '${event.phase}':`, e) }
}

// ============================================================================
// Solve
// ============================================================================

/** Like solve(), also reporting how much each phase pruned and searched. */
export function solveWithReport(
  nMeetings: number,
  rangeStart: LocalDate,
  rangeEnd: LocalDate,
  constraints: readonly Constraint[],
  options: SolveOptions = {}
): SolveReport {
  validateSolveInput(nMeetings, rangeStart, rangeEnd, constraints)
  const { arcConsistency = true, onTrace } = options

  const initialDomainSize = daysBetween(rangeStart, rangeEnd) + 1
  emit(onTrace, { phase: 'validated', meetings: nMeetings, rangeDays: initialDomainSize, constraints: constraints.length })

  const meetings = createMeetings(nMeetings, rangeStart, rangeEnd, constraints)

  const removedByNodeConsistency = enforceNodeConsistency(meetings)
  emit(onTrace, { phase: 'nodeConsistency', removed: removedByNodeConsistency })

  const arc = arcConsistency
    ? enforceArcConsistency(meetings, constraints)
    : { consistent: true, revisions: 0, removed: 0 }
  emit(onTrace, { phase: 'arcConsistency', skipped: !arcConsistency, ...arc })

  const stats: SolveStats = {
    initialDomainSize,
    removedByNodeConsistency,
    removedByArcConsistency: arc.removed,
    arcRevisions: arc.revisions,
    searchNodes: 0,
    domainSizes: meetings.map(m => m.domain.length),
  }

  if (!arc.consistent) {
    emit(onTrace, { phase: 'search', nodes: 0, solved: false })
    return { solution: null, stats }
  }

  const search = { nodes: 0 }
  const solution = backtrackSearch(meetings, search)
  stats.searchNodes = search.nodes
  emit(onTrace, { phase: 'search', nodes: search.nodes, solved: solution !== null })

  return { solution, stats }
}

/**
 * Schedules `nMeetings` meetings within `[rangeStart, rangeEnd]` so that every
 * constraint holds. Index `i` of the result is the date of meeting `i`.
 *
 * @returns the first solution under ascending index/date order, or null when
 *          none exists
 * @throws InvalidInputError for a malformed problem
 * @throws InvalidRangeError when rangeEnd is before rangeStart
 */
export function solve(
  nMeetings: number,
  rangeStart: LocalDate,
  rangeEnd: LocalDate,
  constraints: readonly Constraint[],
  options?: SolveOptions
): LocalDate[] | null {
  return solveWithReport(nMeetings, rangeStart, rangeEnd, constraints, options).solution
}

// ============================================================================
// Verification
// ============================================================================

/**
 * Checks an assignment against the problem. Returns every violation found;
 * an empty list means the assignment is a solution.
 */
export function verifyAssignment(
  nMeetings: number,
  rangeStart: LocalDate,
  rangeEnd: LocalDate,
  constraints: readonly Constraint[],
  assignment: readonly string[]
): AssignmentViolation[] {
  validateSolveInput(nMeetings, rangeStart, rangeEnd, constraints)
  const violations: AssignmentViolation[] = []

  if (assignment.length !== nMeetings) {
    violations.push({ kind: 'length', expected: nMeetings, actual: assignment.length })
  }

  const dates: Array<LocalDate | undefined> = []
  for (let meeting = 0; meeting < nMeetings; meeting++) {
    const date = assignment[meeting]
    if (date === undefined) {
      dates.push(undefined)
    } else if (isLocalDate(date) && !dateBefore(date, rangeStart) && !dateAfter(date, rangeEnd)) {
      dates.push(date)
    } else {
      violations.push({ kind: 'range', meeting, date })
      dates.push(undefined)
    }
  }

  for (const constraint of constraints) {
    if (isSatisfiedBy(constraint, dates) === false) {
      violations.push({ kind: 'constraint', constraint })
    }
  }

  return violations
}

/** Human-readable one-line description of a violation. */
export function describeViolation(v: AssignmentViolation): string {
  switch (v.kind) {
    case 'length': return `Expected ${v.expected} dates, got ${v.actual}`
    case 'range': return `Meeting ${v.meeting} date '${v.date}' is outside the range`
    case 'constraint': return `Constraint violated: ${formatConstraint(v.constraint)}`
  }
}

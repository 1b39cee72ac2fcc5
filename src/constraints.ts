/**
 * Constraint Model
 *
 * Unary and binary date constraints between meetings, and the single
 * predicate every pass uses to evaluate them.
 */

import type { LocalDate } from './time-date'
import { dateEquals, dateBefore, dateAfter } from './time-date'

// ============================================================================
// Types
// ============================================================================

export const OPERATORS = ['==', '!=', '<', '<=', '>', '>='] as const

export type Operator = (typeof OPERATORS)[number]

/** Meeting `variable` compared against a fixed calendar date: `variable OP date`. */
export type UnaryConstraint = {
  kind: 'unary'
  variable: number
  operator: Operator
  date: LocalDate
}

/** Two meetings compared against each other: `left OP right`. */
export type BinaryConstraint = {
  kind: 'binary'
  left: number
  right: number
  operator: Operator
}

export type Constraint = UnaryConstraint | BinaryConstraint

// ============================================================================
// Constructors
// ============================================================================

export function unary(variable: number, operator: Operator, date: LocalDate): UnaryConstraint {
  return { kind: 'unary', variable, operator, date }
}

export function binary(left: number, operator: Operator, right: number): BinaryConstraint {
  return { kind: 'binary', left, right, operator }
}

export function isOperator(value: unknown): value is Operator {
  return OPERATORS.some(op => op === value)
}

// ============================================================================
// Evaluation
// ============================================================================

/** True iff `left OP right` holds. */
export function consistent(left: LocalDate, right: LocalDate, op: Operator): boolean {
  switch (op) {
    case '==': return dateEquals(left, right)
    case '!=': return !dateEquals(left, right)
    case '<': return dateBefore(left, right)
    case '<=': return !dateAfter(left, right)
    case '>': return dateAfter(left, right)
    case '>=': return !dateBefore(left, right)
  }
}

/**
 * Operator for the same relation read right-to-left:
 * `consistent(a, b, op) === consistent(b, a, invertOperator(op))`.
 */
export function invertOperator(op: Operator): Operator {
  switch (op) {
    case '<': return '>'
    case '<=': return '>='
    case '>': return '<'
    case '>=': return '<='
    case '==':
    case '!=':
      return op
  }
}

export function constraintVariables(c: Constraint): number[] {
  switch (c.kind) {
    case 'unary': return [c.variable]
    case 'binary': return [c.left, c.right]
  }
}

/**
 * Evaluates `c` against a (possibly partial) assignment indexed by meeting.
 * Returns undefined while any referenced meeting is still unassigned.
 */
export function isSatisfiedBy(
  c: Constraint,
  assignment: ReadonlyArray<LocalDate | undefined>
): boolean | undefined {
  switch (c.kind) {
    case 'unary': {
      const value = assignment[c.variable]
      return value === undefined ? undefined : consistent(value, c.date, c.operator)
    }
    case 'binary': {
      const left = assignment[c.left]
      const right = assignment[c.right]
      if (left === undefined || right === undefined) return undefined
      return consistent(left, right, c.operator)
    }
  }
}

export function formatConstraint(c: Constraint): string {
  switch (c.kind) {
    case 'unary': return `${c.variable} ${c.operator} ${c.date}`
    case 'binary': return `${c.left} ${c.operator} ${c.right}`
  }
}

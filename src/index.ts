/**
 * calendar-csp
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  CspError, CspErrorCode,
  InvalidInputError, InvalidRangeError, ParseError,
} from './errors'
export type { CspErrorCode as CspErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Calendar dates
export type { LocalDate } from './time-date'
export {
  isLeapYear, daysInMonth,
  parseDate, isLocalDate, makeDate,
  yearOf, monthOf, dayOf,
  addDays, daysBetween, datesInRange,
  dateEquals, dateBefore, dateAfter,
} from './time-date'

// Constraint model
export type { Operator, UnaryConstraint, BinaryConstraint, Constraint } from './constraints'
export {
  OPERATORS,
  unary, binary, isOperator,
  consistent, invertOperator,
  constraintVariables, isSatisfiedBy, formatConstraint,
} from './constraints'
export { parseConstraint, parseConstraints } from './constraint-parser'

// Solver (propagation passes and search are reachable via their modules)
export type {
  SolveOptions, SolveReport, SolveStats,
  SolverTraceEvent, AssignmentViolation,
} from './solver'
export {
  solve, solveWithReport, validateSolveInput,
  verifyAssignment, describeViolation,
} from './solver'

/**
 * Constraint Parser
 *
 * Reads the textual constraint form `<meeting> <op> <meeting|YYYY-MM-DD>`,
 * e.g. `0 < 1` or `2 != 2023-01-04`. A single `=` reads as `==`.
 */

import type { Result } from './result'
import { Ok, Err } from './result'
import { ParseError } from './errors'
import { parseDate } from './time-date'
import type { Constraint, Operator } from './constraints'
import { unary, binary, isOperator } from './constraints'

const CONSTRAINT_PATTERN = /^\s*(\d+)\s*(==|!=|<=|>=|<|>|=)\s*(\S+)\s*$/
const INDEX_PATTERN = /^\d+$/

function normalizeOperator(raw: string): Operator | null {
  if (raw === '=') return '=='
  return isOperator(raw) ? raw : null
}

export function parseConstraint(text: string): Result<Constraint, ParseError> {
  const match = CONSTRAINT_PATTERN.exec(text)
  if (!match) return Err(new ParseError(`Invalid constraint: '${text}'`))

  const [, leftPart = '', opPart = '', rightPart = ''] = match
  const operator = normalizeOperator(opPart)
  if (operator === null) return Err(new ParseError(`Invalid operator '${opPart}' in constraint: '${text}'`))

  const left = parseInt(leftPart, 10)

  if (INDEX_PATTERN.test(rightPart)) {
    return Ok(binary(left, operator, parseInt(rightPart, 10)))
  }

  const date = parseDate(rightPart)
  if (!date.ok) return Err(new ParseError(`Invalid constraint: '${text}' (${date.error.message})`))
  return Ok(unary(left, operator, date.value))
}

/** Parses every line; stops at the first malformed one, naming its line number. */
export function parseConstraints(lines: readonly string[]): Result<Constraint[], ParseError> {
  const constraints: Constraint[] = []
  for (const [i, line] of lines.entries()) {
    const parsed = parseConstraint(line)
    if (!parsed.ok) return Err(new ParseError(`Line ${i + 1}: ${parsed.error.message}`))
    constraints.push(parsed.value)
  }
  return Ok(constraints)
}

/**
 * Generators for small calendar CSP problems.
 *
 * Problems stay small enough (at most 4 meetings over at most 4 days) for
 * the brute-force oracle to enumerate every assignment.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import type { LocalDate } from '../../../src/time-date'
import { addDays } from '../../../src/time-date'
import type { Constraint, Operator } from '../../../src/constraints'
import { OPERATORS, unary, binary } from '../../../src/constraints'
import type { Problem } from '../../helpers/brute-force'

export const BASE_DATE = '2023-01-01' as LocalDate

export const operatorGen: Arbitrary<Operator> = fc.constantFrom(...OPERATORS)

/**
 * Constraint over meetings `[0, nMeetings)` for a range of `days` days.
 * Unary dates may fall one day either side of the range.
 */
export function constraintGen(nMeetings: number, days: number): Arbitrary<Constraint> {
  const meetingGen = fc.integer({ min: 0, max: nMeetings - 1 })
  const unaryGen = fc
    .tuple(meetingGen, operatorGen, fc.integer({ min: -1, max: days }))
    .map(([variable, op, offset]) => unary(variable, op, addDays(BASE_DATE, offset)))
  const binaryGen = fc
    .tuple(meetingGen, operatorGen, meetingGen)
    .map(([left, op, right]) => binary(left, op, right))
  return fc.oneof({ arbitrary: unaryGen, weight: 1 }, { arbitrary: binaryGen, weight: 3 })
}

export function problemGen(
  options: { maxMeetings?: number; maxDays?: number; maxConstraints?: number } = {}
): Arbitrary<Problem> {
  const { maxMeetings = 4, maxDays = 4, maxConstraints = 6 } = options
  return fc
    .tuple(fc.integer({ min: 1, max: maxMeetings }), fc.integer({ min: 1, max: maxDays }))
    .chain(([nMeetings, days]) =>
      fc.array(constraintGen(nMeetings, days), { maxLength: maxConstraints }).map(constraints => ({
        nMeetings,
        rangeStart: BASE_DATE,
        rangeEnd: addDays(BASE_DATE, days - 1),
        constraints,
      }))
    )
}

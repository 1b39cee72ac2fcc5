/**
 * Segment 02: Constraint Model Tests
 *
 * The consistency predicate, operator inversion and evaluation of
 * constraints against partial assignments.
 */
import { describe, it, expect } from 'vitest'
import {
  OPERATORS,
  unary,
  binary,
  isOperator,
  consistent,
  invertOperator,
  constraintVariables,
  isSatisfiedBy,
  formatConstraint,
  type Operator,
} from '../src/constraints'
import type { LocalDate } from '../src/time-date'

function date(iso: string): LocalDate {
  return iso as LocalDate
}

const JAN1 = date('2023-01-01')
const JAN2 = date('2023-01-02')
const JAN3 = date('2023-01-03')

describe('Segment 02: Constraint Model', () => {
  describe('consistent', () => {
    const cases: Array<[Operator, boolean, boolean, boolean]> = [
      // op, earlier OP later, same OP same, later OP earlier
      ['==', false, true, false],
      ['!=', true, false, true],
      ['<', true, false, false],
      ['<=', true, true, false],
      ['>', false, false, true],
      ['>=', false, true, true],
    ]

    for (const [op, earlier, same, later] of cases) {
      it(`'${op}' compares dates chronologically`, () => {
        expect(consistent(JAN1, JAN2, op)).toBe(earlier)
        expect(consistent(JAN2, JAN2, op)).toBe(same)
        expect(consistent(JAN3, JAN2, op)).toBe(later)
      })
    }

    it('compares across month boundaries', () => {
      expect(consistent(date('2023-01-31'), date('2023-02-01'), '<')).toBe(true)
    })
  })

  describe('invertOperator', () => {
    it('mirrors ordering operators', () => {
      expect(invertOperator('<')).toBe('>')
      expect(invertOperator('<=')).toBe('>=')
      expect(invertOperator('>')).toBe('<')
      expect(invertOperator('>=')).toBe('<=')
    })

    it('leaves symmetric operators unchanged', () => {
      expect(invertOperator('==')).toBe('==')
      expect(invertOperator('!=')).toBe('!=')
    })

    it('reading the relation right-to-left gives the same answer', () => {
      const dates = [JAN1, JAN2, JAN3]
      for (const op of OPERATORS) {
        for (const a of dates) {
          for (const b of dates) {
            expect(consistent(b, a, invertOperator(op))).toBe(consistent(a, b, op))
          }
        }
      }
    })
  })

  describe('isOperator', () => {
    it('accepts the six operators only', () => {
      for (const op of OPERATORS) expect(isOperator(op)).toBe(true)
      expect(isOperator('=')).toBe(false)
      expect(isOperator('<>')).toBe(false)
      expect(isOperator(1)).toBe(false)
    })
  })

  describe('constructors and variables', () => {
    it('builds tagged constraints', () => {
      expect(unary(2, '>=', JAN2)).toEqual({ kind: 'unary', variable: 2, operator: '>=', date: JAN2 })
      expect(binary(0, '<', 1)).toEqual({ kind: 'binary', left: 0, right: 1, operator: '<' })
    })

    it('lists referenced meetings', () => {
      expect(constraintVariables(unary(3, '==', JAN1))).toEqual([3])
      expect(constraintVariables(binary(4, '!=', 1))).toEqual([4, 1])
    })
  })

  describe('isSatisfiedBy', () => {
    it('is undefined while a referenced meeting is unassigned', () => {
      expect(isSatisfiedBy(binary(0, '<', 1), [JAN1])).toBeUndefined()
      expect(isSatisfiedBy(unary(1, '==', JAN1), [JAN1])).toBeUndefined()
    })

    it('evaluates binary constraints as left OP right', () => {
      expect(isSatisfiedBy(binary(1, '<', 0), [JAN2, JAN1])).toBe(true)
      expect(isSatisfiedBy(binary(0, '<', 1), [JAN2, JAN1])).toBe(false)
    })

    it('evaluates unary constraints against the fixed date', () => {
      expect(isSatisfiedBy(unary(0, '<=', JAN2), [JAN2])).toBe(true)
      expect(isSatisfiedBy(unary(0, '>', JAN2), [JAN2])).toBe(false)
    })
  })

  describe('formatConstraint', () => {
    it('renders the textual form', () => {
      expect(formatConstraint(binary(0, '<=', 1))).toBe('0 <= 1')
      expect(formatConstraint(unary(2, '!=', JAN3))).toBe('2 != 2023-01-03')
    })
  })
})

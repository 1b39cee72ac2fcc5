/**
 * Calendar Date Utilities
 *
 * Pure functions for date parsing, arithmetic, range iteration, and comparison.
 * Uses Julian Day Number for all date arithmetic to avoid month-length edge cases.
 * Zero external dependencies.
 */

import type { Result } from './result'
import { Ok, Err } from './result'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

// ============================================================================
// Errors
// ============================================================================

export { ParseError } from './errors'
import { ParseError } from './errors'

// ============================================================================
// Helpers
// ============================================================================

const DAYS_IN_MONTH = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return DAYS_IN_MONTH[month] ?? 0
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

function toJDN(date: LocalDate): number {
  return dateToJDN(yearOf(date), monthOf(date), dayOf(date))
}

// ============================================================================
// Parsing & Validation
// ============================================================================

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = DATE_PATTERN.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const [, yearPart = '', monthPart = '', dayPart = ''] = match
  const year = parseInt(yearPart, 10)
  const month = parseInt(monthPart, 10)
  const day = parseInt(dayPart, 10)

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(str as LocalDate)
}

/** Type guard: true when `value` is a well-formed, existing calendar date. */
export function isLocalDate(value: unknown): value is LocalDate {
  return typeof value === 'string' && parseDate(value).ok
}

// ============================================================================
// Construction & Component Extraction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const { year, month, day } = jdnToDate(toJDN(date) + n)
  return makeDate(year, month, day)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  return toJDN(b) - toJDN(a)
}

/**
 * Every date from `start` to `end`, both inclusive, ascending.
 * Empty when `end` precedes `start`.
 */
export function datesInRange(start: LocalDate, end: LocalDate): LocalDate[] {
  const count = daysBetween(start, end) + 1
  const dates: LocalDate[] = []
  for (let i = 0; i < count; i++) {
    dates.push(addDays(start, i))
  }
  return dates
}

// ============================================================================
// Comparison
// ============================================================================

// Zero-padded ISO dates sort lexicographically in calendar order.

export function dateEquals(a: LocalDate, b: LocalDate): boolean {
  return a === b
}

export function dateBefore(a: LocalDate, b: LocalDate): boolean {
  return a < b
}

export function dateAfter(a: LocalDate, b: LocalDate): boolean {
  return a > b
}

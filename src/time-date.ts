/**
 * Time & Date Utilities
 *
 * Pure functions for deadline parsing, formatting and arithmetic.
 * Deadlines are wall-clock values in the process timezone; arithmetic is done
 * on the wall-clock fields so it never shifts across DST boundaries.
 */

import { type Result, Ok, Err } from './result'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** ISO 8601 time string: HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** ISO 8601 datetime string: YYYY-MM-DDThh:mm:ss */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

// ============================================================================
// Errors
// ============================================================================

export { ParseError } from './errors'
import { ParseError } from './errors'

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_DAYS[month - 1] ?? 0
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
// Parsing
// ============================================================================

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  const day = parseInt(match[3] ?? '', 10)

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(str as LocalDate)
}

export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = /^(\d{2}):(\d{2})(?::(\d{2}))?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = parseInt(match[1] ?? '', 10)
  const minute = parseInt(match[2] ?? '', 10)
  const second = match[3] ? parseInt(match[3], 10) : 0

  if (hour > 23)
    return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59)
    return Err(new ParseError(`Invalid minute in time: '${str}'`))
  if (second > 59)
    return Err(new ParseError(`Invalid second in time: '${str}'`))

  return Ok(makeTime(hour, minute, second))
}

/**
 * Parse a datetime written either as ISO (`2024-03-01T17:30:00`) or the
 * chat-friendly `2024-03-01 17:30`. Seconds are optional in both.
 */
export function parseDateTime(str: string): Result<LocalDateTime, ParseError> {
  const trimmed = str.trim()
  const sepIdx = trimmed.search(/[T ]/)
  if (sepIdx === -1) return Err(new ParseError(`Invalid datetime format (expected 'YYYY-MM-DD HH:MM'): '${str}'`))

  const dateResult = parseDate(trimmed.substring(0, sepIdx))
  if (!dateResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  const timeResult = parseTime(trimmed.substring(sepIdx + 1))
  if (!timeResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  return Ok(makeDateTime(dateResult.value, timeResult.value))
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second?: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}:${pad2(second ?? 0)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

// ============================================================================
// Component Extraction
// ============================================================================

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

export function timeOf(dt: LocalDateTime): LocalTime {
  return dt.substring(11) as LocalTime
}

function fieldsOf(dt: LocalDateTime) {
  return {
    year: parseInt(dt.substring(0, 4), 10),
    month: parseInt(dt.substring(5, 7), 10),
    day: parseInt(dt.substring(8, 10), 10),
    hour: parseInt(dt.substring(11, 13), 10),
    minute: parseInt(dt.substring(14, 16), 10),
    second: parseInt(dt.substring(17, 19), 10),
  }
}

// ============================================================================
// Formatting
// ============================================================================

/** `YYYY-MM-DD HH:MM`, the form shown to people in messages */
export function formatDeadline(dt: LocalDateTime): string {
  return `${dateOf(dt)} ${dt.substring(11, 16)}`
}

// ============================================================================
// Arithmetic
// ============================================================================

export function compareDateTimes(a: LocalDateTime, b: LocalDateTime): number {
  return a < b ? -1 : a > b ? 1 : 0
}

export function addMinutes(dt: LocalDateTime, n: number): LocalDateTime {
  const f = fieldsOf(dt)
  const d = new Date(Date.UTC(f.year, f.month - 1, f.day, f.hour, f.minute + n, f.second))
  return makeDateTime(
    makeDate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate()),
    makeTime(d.getUTCHours(), d.getUTCMinutes(), d.getUTCSeconds()),
  )
}

// ============================================================================
// Wall Clock
// ============================================================================

/** Epoch ms of a wall-clock datetime in the process timezone */
export function toEpochMs(dt: LocalDateTime): number {
  const f = fieldsOf(dt)
  return new Date(f.year, f.month - 1, f.day, f.hour, f.minute, f.second).getTime()
}

export function fromEpochMs(ms: number): LocalDateTime {
  const d = new Date(ms)
  return makeDateTime(
    makeDate(d.getFullYear(), d.getMonth() + 1, d.getDate()),
    makeTime(d.getHours(), d.getMinutes(), d.getSeconds()),
  )
}

export function now(): LocalDateTime {
  return fromEpochMs(Date.now())
}

/**
 * Task Input
 *
 * Validation for task creation and edits. Everything here runs before any
 * mutation, so a ValidationError leaves the store and the scheduler as they
 * were.
 */

import { ValidationError } from './errors'
import { parseDateTime, type LocalDateTime } from './time-date'

// ============================================================================
// Types
// ============================================================================

/** Explicit user ids, or every assignee-role user */
export type AssigneeSelection = number[] | 'all'

export type CreateTaskInput = {
  actorId: number
  title: string
  description?: string
  /** `YYYY-MM-DD HH:MM` or ISO */
  deadline: string
  intervalMinutes?: number
  assignees: AssigneeSelection
}

export const EDIT_FIELDS = ['title', 'description', 'deadline', 'interval', 'assignees'] as const

export type EditField = (typeof EDIT_FIELDS)[number]

export type TaskEdit =
  | { field: 'title'; value: string }
  | { field: 'description'; value: string }
  | { field: 'deadline'; value: string }
  | { field: 'interval'; value: number }
  | { field: 'assignees'; value: AssigneeSelection }

// ============================================================================
// Validation
// ============================================================================

export function validateTitle(title: string): string {
  const trimmed = title.trim()
  if (trimmed === '') throw new ValidationError('Title must not be empty')
  return trimmed
}

export function validateInterval(minutes: number): number {
  if (!Number.isInteger(minutes) || minutes <= 0) {
    throw new ValidationError(`Interval must be a positive whole number of minutes, got ${minutes}`)
  }
  return minutes
}

export function validateDeadline(deadline: string): LocalDateTime {
  const parsed = parseDateTime(deadline)
  if (!parsed.ok) throw new ValidationError(parsed.error.message)
  return parsed.value
}

export function validateCommentText(text: string): string {
  const trimmed = text.trim()
  if (trimmed === '') throw new ValidationError('Comment must not be empty')
  return trimmed
}

/** Positive integer ids, duplicates dropped, first occurrence order kept. */
export function normalizeAssigneeIds(ids: readonly number[]): number[] {
  const seen = new Set<number>()
  for (const id of ids) {
    if (!Number.isInteger(id) || id <= 0) {
      throw new ValidationError(`Assignee id must be a positive integer, got ${id}`)
    }
    seen.add(id)
  }
  return [...seen]
}

export function isEditField(field: string): field is EditField {
  return EDIT_FIELDS.some((f) => f === field)
}

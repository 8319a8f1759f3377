/**
 * Users
 *
 * Registration input validation, assignee lookup and the plain-text user
 * directory export.
 */

import type { Role, User } from './domain-types'
import { ROLES } from './domain-types'
import { ValidationError } from './errors'

export type RegisterUserInput = {
  id: number
  contact: string
  name: string
  surname: string
  role: Role
  handle?: string
}

/** `@Alice` → `Alice`; blank handles become undefined */
export function normalizeHandle(handle: string | undefined): string | undefined {
  if (handle === undefined) return undefined
  const stripped = handle.trim().replace(/^@/, '')
  return stripped === '' ? undefined : stripped
}

export function validateRegistration(input: RegisterUserInput): User {
  if (!Number.isInteger(input.id) || input.id <= 0) {
    throw new ValidationError(`User id must be a positive integer, got ${input.id}`)
  }
  if (!ROLES.includes(input.role)) {
    throw new ValidationError(`Unknown role: ${input.role}`)
  }
  const contact = input.contact.trim()
  const name = input.name.trim()
  const surname = input.surname.trim()
  if (contact === '') throw new ValidationError('Contact must not be empty')
  if (name === '') throw new ValidationError('Name must not be empty')
  if (surname === '') throw new ValidationError('Surname must not be empty')

  const handle = normalizeHandle(input.handle)
  return {
    id: input.id,
    contact,
    name,
    surname,
    role: input.role,
    ...(handle !== undefined ? { handle } : {}),
  }
}

export function fullName(user: User): string {
  return `${user.name} ${user.surname}`
}

// ============================================================================
// Assignee Lookup
// ============================================================================

export type AssigneeQuery =
  | { type: 'handle'; handle: string }
  | { type: 'id'; id: number }
  | { type: 'name'; name: string; surname: string }

/**
 * `@handle`, a numeric id, or "Name Surname". Anything else is a
 * ValidationError.
 */
export function parseAssigneeQuery(query: string): AssigneeQuery {
  const q = query.trim()
  if (q.startsWith('@')) {
    const handle = q.slice(1)
    if (handle === '') throw new ValidationError('Empty handle')
    return { type: 'handle', handle }
  }
  if (/^\d+$/.test(q)) {
    return { type: 'id', id: parseInt(q, 10) }
  }
  const parts = q.split(/\s+/)
  if (parts.length === 2 && parts[0] && parts[1]) {
    return { type: 'name', name: parts[0], surname: parts[1] }
  }
  throw new ValidationError(`Expected '@handle', a user id or 'Name Surname', got '${query}'`)
}

// ============================================================================
// Directory Export
// ============================================================================

const COLUMN_WIDTH = 20
const DIRECTORY_COLUMNS = ['Handle', 'Contact', 'Name', 'Surname']

function row(cells: string[]): string {
  return cells.map((c) => c.padEnd(COLUMN_WIDTH)).join('').trimEnd()
}

/** Fixed-width table, one user per line, ordered by id. */
export function formatUserDirectory(users: readonly User[]): string {
  const lines = [row(DIRECTORY_COLUMNS), '='.repeat(COLUMN_WIDTH * DIRECTORY_COLUMNS.length)]
  const sorted = [...users].sort((a, b) => a.id - b.id)
  for (const u of sorted) {
    lines.push(row([u.handle ?? 'N/A', u.contact, u.name, u.surname]))
  }
  return lines.join('\n') + '\n'
}

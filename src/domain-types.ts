/**
 * Canonical Domain Types
 *
 * Single source of truth for the business entities. Both adapters store and
 * return these shapes; domain modules import from here rather than defining
 * their own copies.
 */

import type { LocalDateTime } from './time-date'

// ============================================================================
// Shared Discriminated Unions
// ============================================================================

export type Role = 'approver' | 'assignee'

export const ROLES: readonly Role[] = ['approver', 'assignee']

export type AssignmentStatus = 'pending' | 'accepted' | 'completed'

export const ASSIGNMENT_STATUSES: readonly AssignmentStatus[] = ['pending', 'accepted', 'completed']

// ============================================================================
// Domain Entities
// ============================================================================

export type User = {
  id: number
  name: string
  surname: string
  /** Unique contact identifier, e.g. a phone number */
  contact: string
  role: Role
  /** Display handle without the leading `@` */
  handle?: string
}

export type Task = {
  id: number
  title: string
  description: string
  deadline: LocalDateTime
  intervalMinutes: number
  createdBy: number
  createdAt: LocalDateTime
  updatedAt: LocalDateTime
}

export type NewTask = Omit<Task, 'id'>

export type Assignment = {
  taskId: number
  userId: number
  status: AssignmentStatus
  updatedAt: LocalDateTime
}

export type Comment = {
  id: number
  taskId: number
  authorId: number
  text: string
  createdAt: LocalDateTime
}

export type NewComment = Omit<Comment, 'id'>

// ============================================================================
// Read Models
// ============================================================================

export type AssigneeStatus = {
  user: User
  status: AssignmentStatus
}

export type TaskDetail = {
  task: Task
  assignees: AssigneeStatus[]
  comments: Comment[]
  complete: boolean
}

/** A task as seen by one user: their own assignment status, if any */
export type TaskForUser = {
  task: Task
  status: AssignmentStatus | null
}

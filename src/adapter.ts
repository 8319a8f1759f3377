/**
 * Adapter
 *
 * Domain-oriented persistence interface + in-memory mock implementation.
 * All methods are async so synchronous (better-sqlite3) and asynchronous
 * stores share one contract.
 */

import type { Assignment, AssignmentStatus, Comment, NewComment, NewTask, Role, Task, User } from './domain-types'
import type { LocalDateTime } from './time-date'
import { DuplicateKeyError, ForeignKeyError, InvalidDataError, NotFoundError } from './errors'

export type { Assignment, AssignmentStatus, Comment, NewComment, NewTask, Role, Task, User } from './domain-types'

// Re-export errors so adapter consumers can import them from here
export { DuplicateKeyError, ForeignKeyError, InvalidDataError, NotFoundError }

// ============================================================================
// Adapter Interface
// ============================================================================

export interface Adapter {
  transaction<T>(fn: () => Promise<T>): Promise<T>

  // User
  createUser(user: User): Promise<void>
  getUser(id: number): Promise<User | null>
  getUserByContact(contact: string): Promise<User | null>
  getUserByHandle(handle: string): Promise<User | null>
  getUsersByName(name: string, surname: string): Promise<User[]>
  getUsersByRole(role: Role): Promise<User[]>
  getAllUsers(): Promise<User[]>
  updateUser(id: number, changes: Partial<Omit<User, 'id'>>): Promise<void>
  deleteUser(id: number): Promise<void>

  // Task
  createTask(task: NewTask): Promise<number>
  getTask(id: number): Promise<Task | null>
  getAllTasks(): Promise<Task[]>
  updateTask(id: number, changes: Partial<Omit<Task, 'id'>>): Promise<void>
  deleteTask(id: number): Promise<void>

  // Assignment
  createAssignment(assignment: Assignment): Promise<void>
  getAssignment(taskId: number, userId: number): Promise<Assignment | null>
  getAssignmentsByTask(taskId: number): Promise<Assignment[]>
  getAssignmentsByUser(userId: number): Promise<Assignment[]>
  updateAssignmentStatus(taskId: number, userId: number, status: AssignmentStatus, updatedAt: LocalDateTime): Promise<void>
  deleteAssignmentsByTask(taskId: number): Promise<void>

  // Comment
  createComment(comment: NewComment): Promise<number>
  getCommentsByTask(taskId: number): Promise<Comment[]>

  // Lifecycle (persistent adapters only)
  close?(): Promise<void>
}

// ============================================================================
// Mock Adapter
// ============================================================================

function assignmentKey(taskId: number, userId: number): string {
  return `${taskId}:${userId}`
}

export function createMockAdapter(): Adapter {
  // ---- State ----
  let state = {
    users: new Map<number, User>(),
    tasks: new Map<number, Task>(),
    assignments: new Map<string, Assignment>(),
    comments: new Map<number, Comment>(),
    nextTaskId: 1,
    nextCommentId: 1,
  }

  // ---- Transaction ----
  let txDepth = 0
  let snapshot: typeof state | null = null

  // ---- Helpers ----
  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function sameText(a: string, b: string): boolean {
    return a.toLowerCase() === b.toLowerCase()
  }

  function requireText(value: string, field: string) {
    if (value.trim() === '') throw new InvalidDataError(`${field} must not be empty`)
  }

  function requirePositiveInt(value: number, field: string) {
    if (!Number.isInteger(value) || value <= 0) throw new InvalidDataError(`${field} must be a positive integer`)
  }

  function cascadeDeleteAssignments(predicate: (a: Assignment) => boolean) {
    for (const [key, a] of state.assignments) {
      if (predicate(a)) state.assignments.delete(key)
    }
  }

  // ---- Adapter implementation ----
  const adapter: Adapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      const isOutermost = txDepth === 0
      if (isOutermost) {
        snapshot = clone(state)
      }
      txDepth++
      try {
        const result = await fn()
        txDepth--
        if (txDepth === 0) snapshot = null
        return result
      } catch (e) {
        txDepth--
        if (txDepth === 0 && snapshot) {
          state = snapshot
          snapshot = null
        }
        throw e
      }
    },

    // ================================================================
    // User
    // ================================================================
    async createUser(user: User) {
      requireText(user.contact, 'contact')
      if (state.users.has(user.id)) {
        throw new DuplicateKeyError(`User '${user.id}' already exists`)
      }
      for (const u of state.users.values()) {
        if (u.contact === user.contact) {
          throw new DuplicateKeyError(`Contact '${user.contact}' already exists`)
        }
      }
      state.users.set(user.id, clone(user))
    },

    async getUser(id: number) {
      const u = state.users.get(id)
      return u ? clone(u) : null
    },

    async getUserByContact(contact: string) {
      for (const u of state.users.values()) {
        if (u.contact === contact) return clone(u)
      }
      return null
    },

    async getUserByHandle(handle: string) {
      for (const u of state.users.values()) {
        if (u.handle !== undefined && sameText(u.handle, handle)) return clone(u)
      }
      return null
    },

    async getUsersByName(name: string, surname: string) {
      return [...state.users.values()]
        .filter((u) => sameText(u.name, name) && sameText(u.surname, surname))
        .sort((a, b) => a.id - b.id)
        .map(clone)
    },

    async getUsersByRole(role: Role) {
      return [...state.users.values()]
        .filter((u) => u.role === role)
        .sort((a, b) => a.id - b.id)
        .map(clone)
    },

    async getAllUsers() {
      return [...state.users.values()].sort((a, b) => a.id - b.id).map(clone)
    },

    async updateUser(id: number, changes: Partial<Omit<User, 'id'>>) {
      const existing = state.users.get(id)
      if (!existing) throw new NotFoundError(`User '${id}' not found`)
      if (changes.contact !== undefined && changes.contact !== existing.contact) {
        for (const u of state.users.values()) {
          if (u.contact === changes.contact) {
            throw new DuplicateKeyError(`Contact '${changes.contact}' already exists`)
          }
        }
      }
      state.users.set(id, { ...existing, ...changes })
    },

    async deleteUser(id: number) {
      // CASCADE: assignments held by this user
      cascadeDeleteAssignments((a) => a.userId === id)
      // CASCADE: comments written by this user
      for (const [cid, c] of state.comments) {
        if (c.authorId === id) state.comments.delete(cid)
      }
      state.users.delete(id)
    },

    // ================================================================
    // Task
    // ================================================================
    async createTask(task: NewTask) {
      requireText(task.title, 'title')
      requirePositiveInt(task.intervalMinutes, 'intervalMinutes')
      const id = state.nextTaskId++
      state.tasks.set(id, { ...clone(task), id })
      return id
    },

    async getTask(id: number) {
      const t = state.tasks.get(id)
      return t ? clone(t) : null
    },

    async getAllTasks() {
      return [...state.tasks.values()].sort((a, b) => a.id - b.id).map(clone)
    },

    async updateTask(id: number, changes: Partial<Omit<Task, 'id'>>) {
      const existing = state.tasks.get(id)
      if (!existing) throw new NotFoundError(`Task '${id}' not found`)
      if (changes.title !== undefined) requireText(changes.title, 'title')
      if (changes.intervalMinutes !== undefined) requirePositiveInt(changes.intervalMinutes, 'intervalMinutes')
      state.tasks.set(id, { ...existing, ...changes })
    },

    async deleteTask(id: number) {
      // CASCADE: assignments
      cascadeDeleteAssignments((a) => a.taskId === id)
      // CASCADE: comments
      for (const [cid, c] of state.comments) {
        if (c.taskId === id) state.comments.delete(cid)
      }
      state.tasks.delete(id)
    },

    // ================================================================
    // Assignment
    // ================================================================
    async createAssignment(assignment: Assignment) {
      if (!state.tasks.has(assignment.taskId)) {
        throw new ForeignKeyError(`Cannot assign: task '${assignment.taskId}' does not exist`)
      }
      if (!state.users.has(assignment.userId)) {
        throw new ForeignKeyError(`Cannot assign: user '${assignment.userId}' does not exist`)
      }
      const key = assignmentKey(assignment.taskId, assignment.userId)
      if (state.assignments.has(key)) {
        throw new DuplicateKeyError(`Assignment '${key}' already exists`)
      }
      state.assignments.set(key, clone(assignment))
    },

    async getAssignment(taskId: number, userId: number) {
      const a = state.assignments.get(assignmentKey(taskId, userId))
      return a ? clone(a) : null
    },

    async getAssignmentsByTask(taskId: number) {
      return [...state.assignments.values()]
        .filter((a) => a.taskId === taskId)
        .sort((a, b) => a.userId - b.userId)
        .map(clone)
    },

    async getAssignmentsByUser(userId: number) {
      return [...state.assignments.values()]
        .filter((a) => a.userId === userId)
        .sort((a, b) => a.taskId - b.taskId)
        .map(clone)
    },

    async updateAssignmentStatus(taskId: number, userId: number, status: AssignmentStatus, updatedAt: LocalDateTime) {
      const key = assignmentKey(taskId, userId)
      const existing = state.assignments.get(key)
      if (!existing) throw new NotFoundError(`Assignment '${key}' not found`)
      state.assignments.set(key, { ...existing, status, updatedAt })
    },

    async deleteAssignmentsByTask(taskId: number) {
      cascadeDeleteAssignments((a) => a.taskId === taskId)
    },

    // ================================================================
    // Comment
    // ================================================================
    async createComment(comment: NewComment) {
      requireText(comment.text, 'comment text')
      if (!state.tasks.has(comment.taskId)) {
        throw new ForeignKeyError(`Cannot comment: task '${comment.taskId}' does not exist`)
      }
      if (!state.users.has(comment.authorId)) {
        throw new ForeignKeyError(`Cannot comment: user '${comment.authorId}' does not exist`)
      }
      const id = state.nextCommentId++
      state.comments.set(id, { ...clone(comment), id })
      return id
    },

    async getCommentsByTask(taskId: number) {
      return [...state.comments.values()]
        .filter((c) => c.taskId === taskId)
        .sort((a, b) => a.id - b.id)
        .map(clone)
    },
  }

  return adapter
}

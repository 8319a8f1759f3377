/**
 * Consolidated error system for taskping.
 *
 * All error classes extend TaskpingError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from
 * the module they are working with.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const TaskpingErrorCode = {
  // Adapter layer
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  NOT_FOUND: 'NOT_FOUND',
  FOREIGN_KEY: 'FOREIGN_KEY',
  INVALID_DATA: 'INVALID_DATA',

  // Input & commands
  VALIDATION: 'VALIDATION',
  FORBIDDEN: 'FORBIDDEN',

  // Users
  IDENTITY_CONFLICT: 'IDENTITY_CONFLICT',

  // Assignment lifecycle
  INVALID_TRANSITION: 'INVALID_TRANSITION',

  // Delivery & scheduling
  DELIVERY_FAILURE: 'DELIVERY_FAILURE',
  SCHEDULER_FAILURE: 'SCHEDULER_FAILURE',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',
} as const

export type TaskpingErrorCode = (typeof TaskpingErrorCode)[keyof typeof TaskpingErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class TaskpingError extends Error {
  readonly code: TaskpingErrorCode

  constructor(code: TaskpingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TaskpingError'
    this.code = code
  }
}

// ============================================================================
// Adapter Errors
// ============================================================================

export class DuplicateKeyError extends TaskpingError {
  constructor(message: string) {
    super(TaskpingErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class NotFoundError extends TaskpingError {
  constructor(message: string) {
    super(TaskpingErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class ForeignKeyError extends TaskpingError {
  constructor(message: string) {
    super(TaskpingErrorCode.FOREIGN_KEY, message)
    this.name = 'ForeignKeyError'
  }
}

export class InvalidDataError extends TaskpingError {
  constructor(message: string) {
    super(TaskpingErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

// ============================================================================
// Input Errors
// ============================================================================

export class ValidationError extends TaskpingError {
  constructor(message: string) {
    super(TaskpingErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

export class ForbiddenError extends TaskpingError {
  constructor(message: string) {
    super(TaskpingErrorCode.FORBIDDEN, message)
    this.name = 'ForbiddenError'
  }
}

// ============================================================================
// User Errors
// ============================================================================

/** Contact identifier already belongs to a user with a different id */
export class IdentityConflictError extends TaskpingError {
  constructor(message: string) {
    super(TaskpingErrorCode.IDENTITY_CONFLICT, message)
    this.name = 'IdentityConflictError'
  }
}

// ============================================================================
// Assignment Errors
// ============================================================================

export class InvalidTransitionError extends TaskpingError {
  constructor(message: string) {
    super(TaskpingErrorCode.INVALID_TRANSITION, message)
    this.name = 'InvalidTransitionError'
  }
}

// ============================================================================
// Delivery & Scheduling Errors
// ============================================================================

export class DeliveryFailureError extends TaskpingError {
  readonly userId: number

  constructor(userId: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(TaskpingErrorCode.DELIVERY_FAILURE, `Delivery to user ${userId} failed: ${reason}`, { cause })
    this.name = 'DeliveryFailureError'
    this.userId = userId
  }
}

/** Timer subsystem failure. The only fatal condition in the core. */
export class SchedulerError extends TaskpingError {
  constructor(message: string, cause?: unknown) {
    super(TaskpingErrorCode.SCHEDULER_FAILURE, message, { cause })
    this.name = 'SchedulerError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends TaskpingError {
  constructor(message: string) {
    super(TaskpingErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

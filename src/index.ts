/**
 * taskping
 *
 * Public API exports
 */

// Errors
export {
  TaskpingError, TaskpingErrorCode,
  DuplicateKeyError, NotFoundError, ForeignKeyError, InvalidDataError,
  ValidationError, ForbiddenError, IdentityConflictError, InvalidTransitionError,
  DeliveryFailureError, SchedulerError, ParseError,
} from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime } from './time-date'
export {
  parseDate, parseTime, parseDateTime,
  makeDate, makeTime, makeDateTime, dateOf, timeOf,
  formatDeadline, compareDateTimes, addMinutes,
  toEpochMs, fromEpochMs, now,
} from './time-date'

// Domain types
export type {
  Role, AssignmentStatus, User, Task, NewTask, Assignment, Comment, NewComment,
  AssigneeStatus, TaskDetail, TaskForUser,
} from './domain-types'
export { ROLES, ASSIGNMENT_STATUSES } from './domain-types'

// Adapters
export type { Adapter } from './adapter'
export { createMockAdapter } from './adapter'
export type { SqliteAdapter, SqliteExtras } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// Assignment lifecycle & completion
export type { TransitionAction, TransitionOutcome } from './assignment-state'
export { planTransition, applyTransition, canTransition, isTerminal, assertNotRejected } from './assignment-state'
export type { TaskEvaluation } from './completion-evaluator'
export { isComplete, outstanding, evaluateTask } from './completion-evaluator'

// Delivery
export type { Notifier, DeliveryResult } from './notifier'
export { notifyAll, notifyGroup } from './notifier'
export type { MessageTemplates } from './messages'
export { DEFAULT_MESSAGES, renderMessage } from './messages'

// Input
export type { RegisterUserInput, AssigneeQuery } from './users'
export { parseAssigneeQuery, formatUserDirectory } from './users'
export type { AssigneeSelection, CreateTaskInput, TaskEdit, EditField } from './tasks'
export { EDIT_FIELDS } from './tasks'

// Configuration & logging
export type { ReminderMode, TaskpingSettings } from './config'
export { DEFAULT_SETTINGS, loadConfig, loadConfigFromEnvFile } from './config'
export type { Logger, LogLevel } from './logger'
export { configureLogging, getTaskpingLogger } from './logger'

// Engine
export type {
  Taskping, TaskpingConfig, ReminderJob, TickReport, TimerHost,
  TaskpingEvent, TaskpingEventMap, DisarmReason,
} from './public-api'
export { createTaskping } from './public-api'

// Commands
export type { Command, CommandType, CommandResult, EditTaskCommand } from './commands'
export { decodeCommand, dispatchCommand } from './commands'

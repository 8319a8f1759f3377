/**
 * Public API Module
 *
 * Consumer-facing engine that ties the store, the assignment lifecycle, the
 * completion gate and the reminder scheduler together.
 *
 * Every operation that touches the store runs inside one engine-wide
 * critical section together with the arm/disarm it implies. Deliveries are
 * made after the section is released and the mutation is committed.
 */

import type { Adapter } from './adapter'
import { applyTransition, type TransitionOutcome } from './assignment-state'
import { isComplete } from './completion-evaluator'
import { DEFAULT_SETTINGS, type TaskpingSettings } from './config'
import type { Comment, Role, Task, TaskDetail, TaskForUser, User } from './domain-types'
import { ForbiddenError, IdentityConflictError, NotFoundError, ValidationError } from './errors'
import { getTaskpingLogger } from './logger'
import { DEFAULT_MESSAGES, renderMessage, type MessageTemplates } from './messages'
import { notifyAll, type DeliveryResult, type Notifier } from './notifier'
import {
  normalizeAssigneeIds,
  validateCommentText,
  validateDeadline,
  validateInterval,
  validateTitle,
  type AssigneeSelection,
  type CreateTaskInput,
  type TaskEdit,
} from './tasks'
import { addMinutes, formatDeadline, fromEpochMs, toEpochMs, type LocalDateTime } from './time-date'
import {
  formatUserDirectory,
  fullName,
  normalizeHandle,
  parseAssigneeQuery,
  validateRegistration,
  type AssigneeQuery,
  type RegisterUserInput,
} from './users'
import { createCompletionGate } from './internal/completion-gate'
import { createMutex } from './internal/mutex'
import {
  createReminderScheduler,
  globalTimerHost,
  type ReminderJob,
  type TickReport,
  type TimerHost,
} from './internal/reminder-scheduler'
import type { Emit, TaskpingEvent, TaskpingEventMap } from './internal/types'

// ============================================================================
// Error Classes
// ============================================================================

export {
  ValidationError, NotFoundError, ForbiddenError, IdentityConflictError,
  InvalidTransitionError, DeliveryFailureError, SchedulerError,
} from './errors'

// ============================================================================
// Types
// ============================================================================

export type { Adapter } from './adapter'
export type { Notifier } from './notifier'
export type { ReminderJob, TickReport, TimerHost } from './internal/reminder-scheduler'
export type { TaskpingEvent, TaskpingEventMap, DisarmReason } from './internal/types'

export type TaskpingConfig = {
  adapter: Adapter
  notifier: Notifier
  settings?: Partial<TaskpingSettings>
  messages?: Partial<MessageTemplates>
  timers?: TimerHost
}

export type Taskping = {
  registerUser(input: RegisterUserInput): Promise<User>
  updateUserHandle(userId: number, handle: string): Promise<User>
  getUser(id: number): Promise<User | null>
  resolveAssignee(query: string): Promise<User>
  createTask(input: CreateTaskInput): Promise<Task>
  editTask(actorId: number, taskId: number, edit: TaskEdit): Promise<Task>
  deleteTask(actorId: number, taskId: number): Promise<void>
  remindNow(actorId: number, taskId: number): Promise<TickReport>
  acceptTask(userId: number, taskId: number): Promise<TransitionOutcome>
  completeTask(userId: number, taskId: number): Promise<TransitionOutcome>
  addComment(authorId: number, taskId: number, text: string): Promise<Comment>
  getTaskDetail(taskId: number): Promise<TaskDetail | null>
  listTasks(): Promise<Task[]>
  listTasksForUser(userId: number): Promise<TaskForUser[]>
  exportUserDirectory(): Promise<string>
  hydrate(): Promise<void>
  shutdown(): Promise<void>
  isArmed(taskId: number): boolean
  getReminderJob(taskId: number): ReminderJob | undefined
  armedTaskIds(): number[]
  idle(): Promise<void>
  on<E extends TaskpingEvent>(event: E, handler: (payload: TaskpingEventMap[E]) => void): void
}

type HandlerMap = {
  [E in TaskpingEvent]?: Array<(payload: TaskpingEventMap[E]) => void>
}

// ============================================================================
// Implementation
// ============================================================================

export function createTaskping(config: TaskpingConfig): Taskping {
  const { adapter, notifier } = config
  const settings: TaskpingSettings = { ...DEFAULT_SETTINGS, ...config.settings }
  const messages: MessageTemplates = { ...DEFAULT_MESSAGES, ...config.messages }
  const timers = config.timers ?? globalTimerHost
  const logger = getTaskpingLogger('engine')

  validateInterval(settings.defaultIntervalMinutes)
  if (!Number.isInteger(settings.startDelayMs) || settings.startDelayMs <= 0) {
    throw new ValidationError(`Start delay must be a positive number of milliseconds, got ${settings.startDelayMs}`)
  }

  // ========== Events ==========

  const eventHandlers: HandlerMap = {}

  const emit: Emit = (event, payload) => {
    const handlers = eventHandlers[event] ?? []
    for (const handler of handlers) {
      try {
        handler(payload)
      } catch (error) {
        logger.error("Event handler error on '{event}': {error}", { event, error })
      }
    }
  }

  function on<E extends TaskpingEvent>(event: E, handler: (payload: TaskpingEventMap[E]) => void): void {
    const handlers: NonNullable<HandlerMap[E]> = eventHandlers[event] ?? []
    handlers.push(handler)
    eventHandlers[event] = handlers
  }

  // ========== Collaborators ==========

  const mutex = createMutex()

  const render = {
    reminder: (task: Task) =>
      renderMessage(messages.reminder, { title: task.title, deadline: formatDeadline(task.deadline) }),
    completed: (task: Task) => renderMessage(messages.taskCompleted, { title: task.title }),
    assigned: (task: Task) =>
      renderMessage(messages.taskAssigned, { title: task.title, deadline: formatDeadline(task.deadline) }),
    deleted: (task: Task) => renderMessage(messages.taskDeleted, { title: task.title }),
    comment: (task: Task, author: User, text: string) =>
      renderMessage(messages.commentAdded, { title: task.title, author: fullName(author), text }),
  }

  const completionGate = createCompletionGate({ adapter, notifier, render: render.completed, emit })

  const scheduler = createReminderScheduler({
    adapter,
    notifier,
    runExclusive: mutex.runExclusive,
    completionGate,
    renderReminder: render.reminder,
    emit,
    timers,
  })

  // ========== Helpers ==========

  function currentTime(): LocalDateTime {
    return fromEpochMs(timers.now())
  }

  async function requireUser(userId: number): Promise<User> {
    const user = await adapter.getUser(userId)
    if (!user) throw new NotFoundError(`User ${userId} is not registered`)
    return user
  }

  async function requireRole(userId: number, role: Role, action: string): Promise<User> {
    const user = await requireUser(userId)
    if (user.role !== role) {
      throw new ForbiddenError(`User ${userId} is not allowed to ${action}`)
    }
    return user
  }

  async function requireTask(taskId: number): Promise<Task> {
    const task = await adapter.getTask(taskId)
    if (!task) throw new NotFoundError(`Task ${taskId} not found`)
    return task
  }

  async function resolveSelection(selection: AssigneeSelection): Promise<number[]> {
    if (selection === 'all') {
      return (await adapter.getUsersByRole('assignee')).map((u) => u.id)
    }
    const ids = normalizeAssigneeIds(selection)
    for (const id of ids) {
      const user = await requireUser(id)
      if (user.role !== 'assignee') throw new ValidationError(`User ${id} is not an assignee`)
    }
    return ids
  }

  /**
   * Install the job the task should have under the configured mode. In
   * one-shot mode a reminder moment already in the past means no job.
   */
  function armFor(task: Task): void {
    if (settings.reminderMode === 'recurring') {
      scheduler.arm(task.id, {
        mode: 'recurring',
        intervalMinutes: task.intervalMinutes,
        startDelayMs: settings.startDelayMs,
      })
      return
    }
    const fireAt = toEpochMs(addMinutes(task.deadline, -settings.oneShotLeadMinutes))
    const fireInMs = fireAt - timers.now()
    if (fireInMs <= 0) {
      scheduler.disarm(task.id, 'manual')
      logger.debug('One-shot reminder moment for task {taskId} has passed; no job armed', { taskId: task.id })
      return
    }
    scheduler.arm(task.id, { mode: 'one-shot', fireInMs })
  }

  /** Bring the task's job in line with its completion state. */
  async function reconcile(task: Task): Promise<boolean> {
    const assignments = await adapter.getAssignmentsByTask(task.id)
    if (isComplete(assignments)) {
      scheduler.disarm(task.id, 'completed')
      return true
    }
    armFor(task)
    return false
  }

  async function deliver(taskId: number, userIds: readonly number[], message: string): Promise<DeliveryResult[]> {
    if (userIds.length === 0) return []
    const results = await notifyAll(notifier, userIds, message)
    for (const r of results) {
      if (!r.ok) emit('deliveryFailed', { taskId, userId: r.userId, error: r.error })
    }
    return results
  }

  // ========== Users ==========

  async function registerUser(input: RegisterUserInput): Promise<User> {
    const user = validateRegistration(input)
    return mutex.runExclusive(async () => {
      const byContact = await adapter.getUserByContact(user.contact)
      if (byContact) {
        if (byContact.id !== user.id) {
          throw new IdentityConflictError(`Contact ${user.contact} is already registered to a different identity`)
        }
        return byContact
      }
      if (await adapter.getUser(user.id)) {
        throw new IdentityConflictError(`User ${user.id} is already registered with a different contact`)
      }
      await adapter.createUser(user)
      logger.info('Registered user {userId} as {role}', { userId: user.id, role: user.role })
      return user
    })
  }

  async function updateUserHandle(userId: number, handle: string): Promise<User> {
    const normalized = normalizeHandle(handle)
    if (normalized === undefined) throw new ValidationError('Handle must not be empty')
    return mutex.runExclusive(async () => {
      const user = await requireUser(userId)
      await adapter.updateUser(userId, { handle: normalized })
      return { ...user, handle: normalized }
    })
  }

  async function getUser(id: number): Promise<User | null> {
    return adapter.getUser(id)
  }

  async function findCandidates(query: AssigneeQuery): Promise<User[]> {
    switch (query.type) {
      case 'handle': {
        const user = await adapter.getUserByHandle(query.handle)
        return user ? [user] : []
      }
      case 'id': {
        const user = await adapter.getUser(query.id)
        return user ? [user] : []
      }
      case 'name':
        return adapter.getUsersByName(query.name, query.surname)
    }
  }

  async function resolveAssignee(query: string): Promise<User> {
    const candidates = await findCandidates(parseAssigneeQuery(query))
    const assignees = candidates.filter((u) => u.role === 'assignee')
    const [first, ...rest] = assignees
    if (!first) throw new NotFoundError(`No assignee matches '${query}'`)
    if (rest.length > 0) {
      throw new ValidationError(`'${query}' matches ${assignees.length} assignees; use a handle or id`)
    }
    return first
  }

  // ========== Tasks ==========

  async function createTask(input: CreateTaskInput): Promise<Task> {
    const title = validateTitle(input.title)
    const deadline = validateDeadline(input.deadline)
    const intervalMinutes = validateInterval(input.intervalMinutes ?? settings.defaultIntervalMinutes)
    const description = (input.description ?? '').trim()

    const { task, assigneeIds } = await mutex.runExclusive(async () => {
      await requireRole(input.actorId, 'approver', 'create tasks')
      const ids = await resolveSelection(input.assignees)
      const at = currentTime()
      return adapter.transaction(async () => {
        const id = await adapter.createTask({
          title, description, deadline, intervalMinutes,
          createdBy: input.actorId, createdAt: at, updatedAt: at,
        })
        for (const userId of ids) {
          await adapter.createAssignment({ taskId: id, userId, status: 'pending', updatedAt: at })
        }
        const created = await requireTask(id)
        armFor(created)
        return { task: created, assigneeIds: ids }
      })
    })

    logger.info('Created task {taskId} with {count} assignee(s)', { taskId: task.id, count: assigneeIds.length })
    await deliver(task.id, assigneeIds, render.assigned(task))
    return task
  }

  async function editTask(actorId: number, taskId: number, edit: TaskEdit): Promise<Task> {
    const { task, newlyAssigned } = await mutex.runExclusive(async () => {
      await requireRole(actorId, 'approver', 'edit tasks')
      const existing = await requireTask(taskId)
      const at = currentTime()

      return adapter.transaction(async () => {
        let added: number[] = []
        switch (edit.field) {
          case 'title':
            await adapter.updateTask(taskId, { title: validateTitle(edit.value), updatedAt: at })
            break
          case 'description':
            await adapter.updateTask(taskId, { description: edit.value.trim(), updatedAt: at })
            break
          case 'deadline':
            await adapter.updateTask(taskId, { deadline: validateDeadline(edit.value), updatedAt: at })
            break
          case 'interval':
            await adapter.updateTask(taskId, { intervalMinutes: validateInterval(edit.value), updatedAt: at })
            break
          case 'assignees': {
            const ids = await resolveSelection(edit.value)
            const previous = new Set((await adapter.getAssignmentsByTask(taskId)).map((a) => a.userId))
            await adapter.deleteAssignmentsByTask(taskId)
            for (const userId of ids) {
              await adapter.createAssignment({ taskId, userId, status: 'pending', updatedAt: at })
            }
            await adapter.updateTask(taskId, { updatedAt: at })
            completionGate.reset(taskId)
            added = ids.filter((id) => !previous.has(id))
            break
          }
        }
        const updated = await requireTask(taskId)
        // Only timing-relevant edits restart the job
        if (edit.field !== 'title' && edit.field !== 'description') {
          await reconcile(updated)
        }
        logger.info('Edited {field} of task {taskId}', { field: edit.field, taskId: existing.id })
        return { task: updated, newlyAssigned: added }
      })
    })

    await deliver(task.id, newlyAssigned, render.assigned(task))
    return task
  }

  async function deleteTask(actorId: number, taskId: number): Promise<void> {
    const { task, assigneeIds } = await mutex.runExclusive(async () => {
      await requireRole(actorId, 'approver', 'delete tasks')
      const existing = await requireTask(taskId)
      const assignments = await adapter.getAssignmentsByTask(taskId)
      scheduler.disarm(taskId, 'deleted')
      await adapter.deleteTask(taskId)
      completionGate.reset(taskId)
      logger.info('Deleted task {taskId}', { taskId })
      return {
        task: existing,
        assigneeIds: assignments.filter((a) => a.status !== 'completed').map((a) => a.userId),
      }
    })
    await deliver(task.id, assigneeIds, render.deleted(task))
  }

  async function remindNow(actorId: number, taskId: number): Promise<TickReport> {
    await mutex.runExclusive(async () => {
      await requireRole(actorId, 'approver', 'send reminders')
      await requireTask(taskId)
    })
    return scheduler.tick(taskId)
  }

  // ========== Assignments ==========

  async function acceptTask(userId: number, taskId: number): Promise<TransitionOutcome> {
    return mutex.runExclusive(async () => {
      await requireTask(taskId)
      const outcome = await applyTransition(adapter, taskId, userId, 'accept', currentTime())
      logger.debug('Accept by {userId} on task {taskId}: {outcome}', { userId, taskId, outcome: outcome.type })
      return outcome
    })
  }

  async function completeTask(userId: number, taskId: number): Promise<TransitionOutcome> {
    const { outcome, announce } = await mutex.runExclusive(async () => {
      const task = await requireTask(taskId)
      const result = await applyTransition(adapter, taskId, userId, 'complete', currentTime())
      if (result.type !== 'transitioned') {
        return { outcome: result, announce: null }
      }
      const assignments = await adapter.getAssignmentsByTask(taskId)
      if (!isComplete(assignments)) {
        return { outcome: result, announce: null }
      }
      scheduler.disarm(taskId, 'completed')
      return { outcome: result, announce: completionGate.claim(taskId) ? task : null }
    })

    if (announce) await completionGate.announce(announce)
    return outcome
  }

  // ========== Comments ==========

  async function addComment(authorId: number, taskId: number, text: string): Promise<Comment> {
    const body = validateCommentText(text)
    const { comment, task, author, approverIds } = await mutex.runExclusive(async () => {
      const user = await requireUser(authorId)
      const existing = await requireTask(taskId)
      const createdAt = currentTime()
      const id = await adapter.createComment({ taskId, authorId, text: body, createdAt })
      const approvers = await adapter.getUsersByRole('approver')
      return {
        comment: { id, taskId, authorId, text: body, createdAt },
        task: existing,
        author: user,
        approverIds: approvers.map((u) => u.id).filter((id) => id !== authorId),
      }
    })
    await deliver(task.id, approverIds, render.comment(task, author, body))
    return comment
  }

  // ========== Reads ==========

  async function getTaskDetail(taskId: number): Promise<TaskDetail | null> {
    const task = await adapter.getTask(taskId)
    if (!task) return null
    const assignments = await adapter.getAssignmentsByTask(taskId)
    const assignees: TaskDetail['assignees'] = []
    for (const a of assignments) {
      const user = await adapter.getUser(a.userId)
      if (user) assignees.push({ user, status: a.status })
    }
    const comments = await adapter.getCommentsByTask(taskId)
    return { task, assignees, comments, complete: isComplete(assignments) }
  }

  async function listTasks(): Promise<Task[]> {
    return adapter.getAllTasks()
  }

  async function listTasksForUser(userId: number): Promise<TaskForUser[]> {
    await requireUser(userId)
    const assignments = await adapter.getAssignmentsByUser(userId)
    const result: TaskForUser[] = []
    for (const a of assignments) {
      const task = await adapter.getTask(a.taskId)
      if (task) result.push({ task, status: a.status })
    }
    return result.sort((x, y) => x.task.id - y.task.id)
  }

  async function exportUserDirectory(): Promise<string> {
    return formatUserDirectory(await adapter.getAllUsers())
  }

  // ========== Lifecycle ==========
  // Rebuild the in-memory job set from persisted tasks.
  // Call once after createTaskping() when using a persistent adapter.

  async function hydrate(): Promise<void> {
    await mutex.runExclusive(async () => {
      const tasks = await adapter.getAllTasks()
      let armed = 0
      for (const task of tasks) {
        const complete = await reconcile(task)
        // Already announced before the restart
        if (complete) completionGate.claim(task.id)
        else if (scheduler.isArmed(task.id)) armed++
      }
      logger.info('Hydrated {armed} reminder job(s) from {total} task(s)', { armed, total: tasks.length })
    })
  }

  async function shutdown(): Promise<void> {
    scheduler.disarmAll('shutdown')
    await scheduler.idle()
    logger.info('Engine shut down')
  }

  return {
    registerUser,
    updateUserHandle,
    getUser,
    resolveAssignee,
    createTask,
    editTask,
    deleteTask,
    remindNow,
    acceptTask,
    completeTask,
    addComment,
    getTaskDetail,
    listTasks,
    listTasksForUser,
    exportUserDirectory,
    hydrate,
    shutdown,
    isArmed: scheduler.isArmed,
    getReminderJob: scheduler.getJob,
    armedTaskIds: scheduler.armedTaskIds,
    idle: scheduler.idle,
    on,
  }
}

/**
 * Segment 08: Public API Tests
 *
 * The engine: registration, task lifecycle, assignment transitions,
 * comments, read models and events. Timers are faked so armed jobs never
 * outlive a test.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import {
  createTaskping,
  ForbiddenError,
  IdentityConflictError,
  NotFoundError,
  ValidationError,
} from '../src/public-api'
import { createMockAdapter } from '../src/adapter'
import { ALICE, APPROVER, BOB, createHarness, createRecordingNotifier, type Harness } from './helpers/fixtures'

const START_DELAY = 10_000
const MINUTE = 60_000

let h: Harness

beforeEach(async () => {
  vi.useFakeTimers()
  vi.setSystemTime(new Date(2024, 8, 1, 9, 0, 0))
  h = await createHarness({ settings: { startDelayMs: START_DELAY } })
})

afterEach(async () => {
  await h.engine.shutdown()
  vi.useRealTimers()
})

async function auditTask(assignees: number[] | 'all' = [ALICE, BOB]) {
  const task = await h.engine.createTask({
    actorId: APPROVER,
    title: 'Audit Q3',
    deadline: '2024-09-30 18:00',
    intervalMinutes: 30,
    assignees,
  })
  h.notifier.clear()
  return task
}

// ============================================================================
// 1. CONSTRUCTION
// ============================================================================

describe('createTaskping', () => {
  it('rejects a zero start delay', () => {
    expect(() => createTaskping({
      adapter: createMockAdapter(),
      notifier: createRecordingNotifier(),
      settings: { startDelayMs: 0 },
    })).toThrow(new ValidationError('Start delay must be a positive number of milliseconds, got 0'))
  })

  it('rejects a fractional default interval', () => {
    expect(() => createTaskping({
      adapter: createMockAdapter(),
      notifier: createRecordingNotifier(),
      settings: { defaultIntervalMinutes: 1.5 },
    })).toThrow(ValidationError)
  })
})

// ============================================================================
// 2. USERS
// ============================================================================

describe('Users', () => {
  it('registers a user with a normalized handle', async () => {
    const user = await h.engine.registerUser({
      id: 13, contact: ' +10000000013 ', name: 'Carl', surname: 'Cole', role: 'assignee', handle: '@carl',
    })
    expect(user).toEqual({ id: 13, contact: '+10000000013', name: 'Carl', surname: 'Cole', role: 'assignee', handle: 'carl' })
    expect(await h.engine.getUser(13)).toEqual(user)
  })

  it('returns the existing user when the same identity registers again', async () => {
    const again = await h.engine.registerUser({
      id: ALICE, contact: '+10000000011', name: 'Someone', surname: 'Else', role: 'approver',
    })
    expect(again.name).toBe('Alice')
    expect(again.role).toBe('assignee')
  })

  it('rejects a contact owned by a different id', async () => {
    await expect(h.engine.registerUser({
      id: 99, contact: '+10000000011', name: 'Mallory', surname: 'Mask', role: 'assignee',
    })).rejects.toThrow(new IdentityConflictError('Contact +10000000011 is already registered to a different identity'))
  })

  it('rejects an id registered with a different contact', async () => {
    await expect(h.engine.registerUser({
      id: ALICE, contact: '+19999999999', name: 'Alice', surname: 'Able', role: 'assignee',
    })).rejects.toThrow(IdentityConflictError)
  })

  it('rejects an empty name', async () => {
    await expect(h.engine.registerUser({
      id: 14, contact: '+10000000014', name: ' ', surname: 'Cole', role: 'assignee',
    })).rejects.toThrow(new ValidationError('Name must not be empty'))
  })

  it('updates a handle', async () => {
    const user = await h.engine.updateUserHandle(BOB, '@Bobby')
    expect(user.handle).toBe('Bobby')
    expect((await h.engine.getUser(BOB))?.handle).toBe('Bobby')
  })

  it('rejects an empty handle', async () => {
    await expect(h.engine.updateUserHandle(BOB, '@')).rejects.toThrow(ValidationError)
  })

  it('rejects a handle for an unknown user', async () => {
    await expect(h.engine.updateUserHandle(404, 'ghost')).rejects.toThrow(NotFoundError)
  })
})

describe('resolveAssignee', () => {
  it('resolves a handle case-insensitively', async () => {
    expect((await h.engine.resolveAssignee('@ALICE')).id).toBe(ALICE)
  })

  it('resolves a numeric id', async () => {
    expect((await h.engine.resolveAssignee('12')).id).toBe(BOB)
  })

  it('resolves a full name case-insensitively', async () => {
    expect((await h.engine.resolveAssignee('bob baker')).id).toBe(BOB)
  })

  it('ignores users who are not assignees', async () => {
    await expect(h.engine.resolveAssignee(String(APPROVER)))
      .rejects.toThrow(new NotFoundError("No assignee matches '1'"))
  })

  it('refuses an ambiguous name', async () => {
    await h.engine.registerUser({ id: 13, contact: '+10000000013', name: 'Bob', surname: 'Baker', role: 'assignee' })
    await expect(h.engine.resolveAssignee('Bob Baker'))
      .rejects.toThrow(new ValidationError("'Bob Baker' matches 2 assignees; use a handle or id"))
  })

  it('rejects an unparseable query', async () => {
    await expect(h.engine.resolveAssignee('someone')).rejects.toThrow(ValidationError)
  })
})

// ============================================================================
// 3. TASK CREATION
// ============================================================================

describe('createTask', () => {
  it('stores the task, its assignments and arms a job', async () => {
    const task = await h.engine.createTask({
      actorId: APPROVER,
      title: '  Audit Q3 ',
      deadline: '2024-09-30 18:00',
      assignees: [ALICE, BOB],
    })

    expect(task).toEqual({
      id: 1,
      title: 'Audit Q3',
      description: '',
      deadline: '2024-09-30T18:00:00',
      intervalMinutes: 60,
      createdBy: APPROVER,
      createdAt: '2024-09-01T09:00:00',
      updatedAt: '2024-09-01T09:00:00',
    })
    const detail = await h.engine.getTaskDetail(task.id)
    expect(detail?.assignees.map((a) => [a.user.id, a.status])).toEqual([[ALICE, 'pending'], [BOB, 'pending']])
    expect(h.engine.getReminderJob(task.id)).toMatchObject({ mode: 'recurring', intervalMs: 60 * MINUTE })
  })

  it('tells each assignee about the new task', async () => {
    await h.engine.createTask({ actorId: APPROVER, title: 'Audit Q3', deadline: '2024-09-30 18:00', assignees: [BOB] })
    expect(h.notifier.sent).toEqual([
      { userId: BOB, message: '📌 You have been assigned *Audit Q3* (due 2024-09-30 18:00).' },
    ])
  })

  it('assigns every assignee for "all"', async () => {
    const task = await auditTask('all')
    const detail = await h.engine.getTaskDetail(task.id)
    expect(detail?.assignees.map((a) => a.user.id)).toEqual([ALICE, BOB])
  })

  it('ignores duplicate assignees', async () => {
    const task = await auditTask([BOB, BOB])
    const detail = await h.engine.getTaskDetail(task.id)
    expect(detail?.assignees.map((a) => a.user.id)).toEqual([BOB])
  })

  it('arms a job for a task with no assignees', async () => {
    const task = await auditTask([])
    expect(h.engine.isArmed(task.id)).toBe(true)
    expect((await h.engine.getTaskDetail(task.id))?.complete).toBe(false)
  })

  it('is forbidden to assignees', async () => {
    await expect(h.engine.createTask({
      actorId: ALICE, title: 'Mine', deadline: '2024-09-30 18:00', assignees: [BOB],
    })).rejects.toThrow(new ForbiddenError('User 11 is not allowed to create tasks'))
    expect(await h.engine.listTasks()).toEqual([])
  })

  it('validates before touching anything', async () => {
    await expect(h.engine.createTask({
      actorId: APPROVER, title: '', deadline: '2024-09-30 18:00', assignees: [BOB],
    })).rejects.toThrow(new ValidationError('Title must not be empty'))
    await expect(h.engine.createTask({
      actorId: APPROVER, title: 'T', deadline: '2024-02-30 10:00', assignees: [BOB],
    })).rejects.toThrow(new ValidationError("Invalid datetime: '2024-02-30 10:00'"))
    await expect(h.engine.createTask({
      actorId: APPROVER, title: 'T', deadline: '2024-09-30 18:00', intervalMinutes: 0, assignees: [BOB],
    })).rejects.toThrow(new ValidationError('Interval must be a positive whole number of minutes, got 0'))
    expect(await h.engine.listTasks()).toEqual([])
    expect(h.engine.armedTaskIds()).toEqual([])
  })

  it('rejects an unknown assignee without creating the task', async () => {
    await expect(auditTask([ALICE, 404])).rejects.toThrow(new NotFoundError('User 404 is not registered'))
    expect(await h.engine.listTasks()).toEqual([])
  })

  it('rejects an approver as an assignee without creating the task', async () => {
    await expect(auditTask([ALICE, APPROVER])).rejects.toThrow(new ValidationError('User 1 is not an assignee'))
    expect(await h.engine.listTasks()).toEqual([])
    expect(h.engine.armedTaskIds()).toEqual([])
    expect(h.notifier.sent).toEqual([])
  })
})

// ============================================================================
// 4. EDITING
// ============================================================================

describe('editTask', () => {
  it('renames without restarting the job', async () => {
    const task = await auditTask()
    const before = h.engine.getReminderJob(task.id)
    const updated = await h.engine.editTask(APPROVER, task.id, { field: 'title', value: 'Audit Q4' })
    expect(updated.title).toBe('Audit Q4')
    expect(h.engine.getReminderJob(task.id)?.generation).toBe(before?.generation)
  })

  it('updates the description', async () => {
    const task = await auditTask()
    const updated = await h.engine.editTask(APPROVER, task.id, { field: 'description', value: ' Bring receipts ' })
    expect(updated.description).toBe('Bring receipts')
  })

  it('re-arms with a new interval', async () => {
    const task = await auditTask()
    const before = h.engine.getReminderJob(task.id)
    await h.engine.editTask(APPROVER, task.id, { field: 'interval', value: 45 })
    const after = h.engine.getReminderJob(task.id)
    expect(after?.intervalMs).toBe(45 * MINUTE)
    expect(after?.generation).toBeGreaterThan(before?.generation ?? Infinity)
  })

  it('moves the deadline', async () => {
    const task = await auditTask()
    const updated = await h.engine.editTask(APPROVER, task.id, { field: 'deadline', value: '2024-10-15 12:00' })
    expect(updated.deadline).toBe('2024-10-15T12:00:00')
    expect(h.engine.isArmed(task.id)).toBe(true)
  })

  it('leaves the task unchanged on an invalid deadline', async () => {
    const task = await auditTask()
    await expect(h.engine.editTask(APPROVER, task.id, { field: 'deadline', value: 'tomorrow' }))
      .rejects.toThrow(ValidationError)
    expect((await h.engine.getTaskDetail(task.id))?.task.deadline).toBe('2024-09-30T18:00:00')
  })

  it('replaces assignees and notifies only the new ones', async () => {
    const task = await auditTask([ALICE])
    await h.engine.acceptTask(ALICE, task.id)
    await h.engine.editTask(APPROVER, task.id, { field: 'assignees', value: [ALICE, BOB] })

    const detail = await h.engine.getTaskDetail(task.id)
    expect(detail?.assignees.map((a) => [a.user.id, a.status])).toEqual([[ALICE, 'pending'], [BOB, 'pending']])
    expect(h.notifier.sent).toEqual([
      { userId: BOB, message: '📌 You have been assigned *Audit Q3* (due 2024-09-30 18:00).' },
    ])
  })

  it('rejects an approver in a new assignee set and keeps the old one', async () => {
    const task = await auditTask([ALICE])
    await h.engine.acceptTask(ALICE, task.id)
    h.notifier.clear()
    const before = h.engine.getReminderJob(task.id)

    await expect(h.engine.editTask(APPROVER, task.id, { field: 'assignees', value: [BOB, APPROVER] }))
      .rejects.toThrow(new ValidationError('User 1 is not an assignee'))

    const detail = await h.engine.getTaskDetail(task.id)
    expect(detail?.assignees.map((a) => [a.user.id, a.status])).toEqual([[ALICE, 'accepted']])
    expect(h.engine.getReminderJob(task.id)?.generation).toBe(before?.generation)
    expect(h.notifier.sent).toEqual([])
  })

  it('re-arms a completed task given new assignees and announces the next completion too', async () => {
    const task = await auditTask([ALICE])
    await h.engine.completeTask(ALICE, task.id)
    expect(h.engine.isArmed(task.id)).toBe(false)

    await h.engine.editTask(APPROVER, task.id, { field: 'assignees', value: [BOB] })
    expect(h.engine.isArmed(task.id)).toBe(true)

    await h.engine.completeTask(BOB, task.id)
    expect(h.engine.isArmed(task.id)).toBe(false)
    expect(h.notifier.to(APPROVER)).toHaveLength(2)
  })

  it('keeps a completed task disarmed when its interval changes', async () => {
    const task = await auditTask([ALICE])
    await h.engine.completeTask(ALICE, task.id)
    await h.engine.editTask(APPROVER, task.id, { field: 'interval', value: 15 })
    expect(h.engine.isArmed(task.id)).toBe(false)
  })

  it('reports a missing task', async () => {
    await expect(h.engine.editTask(APPROVER, 99, { field: 'title', value: 'x' }))
      .rejects.toThrow(new NotFoundError('Task 99 not found'))
  })

  it('is forbidden to assignees', async () => {
    const task = await auditTask()
    await expect(h.engine.editTask(BOB, task.id, { field: 'title', value: 'x' })).rejects.toThrow(ForbiddenError)
  })
})

// ============================================================================
// 5. DELETION & MANUAL REMINDERS
// ============================================================================

describe('deleteTask', () => {
  it('disarms, deletes and tells unfinished assignees', async () => {
    const task = await auditTask()
    await h.engine.completeTask(ALICE, task.id)
    h.notifier.clear()

    await h.engine.deleteTask(APPROVER, task.id)
    expect(h.engine.isArmed(task.id)).toBe(false)
    expect(await h.engine.getTaskDetail(task.id)).toBeNull()
    expect(h.notifier.sent).toEqual([{ userId: BOB, message: '🗑️ Task *Audit Q3* has been deleted.' }])
  })

  it('reports a missing task', async () => {
    await expect(h.engine.deleteTask(APPROVER, 99)).rejects.toThrow(NotFoundError)
  })
})

describe('remindNow', () => {
  it('reminds outstanding assignees immediately', async () => {
    const task = await auditTask()
    const report = await h.engine.remindNow(APPROVER, task.id)
    expect(report).toEqual({ type: 'reminded', deliveries: [{ userId: ALICE, ok: true }, { userId: BOB, ok: true }] })
    expect(h.notifier.to(ALICE)).toEqual([
      '⏰ Reminder: task *Audit Q3* is due 2024-09-30 18:00. Please mark it complete when done.',
    ])
  })

  it('is forbidden to assignees', async () => {
    const task = await auditTask()
    await expect(h.engine.remindNow(ALICE, task.id)).rejects.toThrow(ForbiddenError)
  })

  it('reports a missing task', async () => {
    await expect(h.engine.remindNow(APPROVER, 99)).rejects.toThrow(NotFoundError)
  })
})

// ============================================================================
// 6. ASSIGNMENT TRANSITIONS
// ============================================================================

describe('Assignment transitions', () => {
  it('accepts once, then reports already accepted', async () => {
    const task = await auditTask()
    expect(await h.engine.acceptTask(ALICE, task.id)).toEqual({ type: 'transitioned', from: 'pending', to: 'accepted' })
    expect(await h.engine.acceptTask(ALICE, task.id)).toEqual({
      type: 'unchanged', status: 'accepted', reason: 'already-accepted',
    })
  })

  it('rejects accepting after completion', async () => {
    const task = await auditTask()
    await h.engine.completeTask(ALICE, task.id)
    expect(await h.engine.acceptTask(ALICE, task.id)).toEqual({
      type: 'rejected', status: 'completed', reason: 'terminal',
    })
  })

  it('keeps the job while others are outstanding', async () => {
    const task = await auditTask()
    await h.engine.completeTask(ALICE, task.id)
    expect(h.engine.isArmed(task.id)).toBe(true)
    expect(h.notifier.to(APPROVER)).toEqual([])
  })

  it('disarms and announces on the last completion', async () => {
    const task = await auditTask()
    await h.engine.completeTask(ALICE, task.id)
    await h.engine.completeTask(BOB, task.id)
    expect(h.engine.isArmed(task.id)).toBe(false)
    expect(h.notifier.sent).toEqual([
      { userId: APPROVER, message: 'The task *Audit Q3* has been completed by all assignees. You can delete it now.' },
    ])
  })

  it('does not announce again on a repeated completion', async () => {
    const task = await auditTask([BOB])
    await h.engine.completeTask(BOB, task.id)
    expect(await h.engine.completeTask(BOB, task.id)).toEqual({
      type: 'unchanged', status: 'completed', reason: 'already-completed',
    })
    expect(h.notifier.to(APPROVER)).toHaveLength(1)
  })

  it('reports a user who is not assigned', async () => {
    const task = await auditTask([ALICE])
    await expect(h.engine.completeTask(BOB, task.id))
      .rejects.toThrow(new NotFoundError(`User ${BOB} is not assigned to task ${task.id}`))
  })

  it('reports a missing task', async () => {
    await expect(h.engine.acceptTask(ALICE, 99)).rejects.toThrow(new NotFoundError('Task 99 not found'))
  })
})

// ============================================================================
// 7. COMMENTS
// ============================================================================

describe('addComment', () => {
  it('stores the comment and tells the approvers', async () => {
    const task = await auditTask()
    const comment = await h.engine.addComment(ALICE, task.id, ' On it ')
    expect(comment).toEqual({ id: 1, taskId: task.id, authorId: ALICE, text: 'On it', createdAt: '2024-09-01T09:00:00' })
    expect(h.notifier.sent).toEqual([
      { userId: APPROVER, message: '💬 New comment on task *Audit Q3* by Alice Able:\n\nOn it' },
    ])
    expect((await h.engine.getTaskDetail(task.id))?.comments).toEqual([comment])
  })

  it('does not echo an approver\'s own comment back', async () => {
    const task = await auditTask()
    await h.engine.addComment(APPROVER, task.id, 'Please hurry')
    expect(h.notifier.sent).toEqual([])
  })

  it('rejects an empty comment', async () => {
    const task = await auditTask()
    await expect(h.engine.addComment(ALICE, task.id, '  ')).rejects.toThrow(new ValidationError('Comment must not be empty'))
  })
})

// ============================================================================
// 8. READ MODELS
// ============================================================================

describe('Read models', () => {
  it('lists an assignee\'s tasks with their own status', async () => {
    const first = await auditTask([ALICE])
    await auditTask([BOB])
    await h.engine.acceptTask(ALICE, first.id)
    const mine = await h.engine.listTasksForUser(ALICE)
    expect(mine.map((t) => [t.task.id, t.status])).toEqual([[first.id, 'accepted']])
  })

  it('returns null detail for a missing task', async () => {
    expect(await h.engine.getTaskDetail(99)).toBeNull()
  })

  it('exports the user directory as a fixed-width table', async () => {
    const row = (cells: string[]) => cells.map((c) => c.padEnd(20)).join('').trimEnd()
    expect(await h.engine.exportUserDirectory()).toBe([
      row(['Handle', 'Contact', 'Name', 'Surname']),
      '='.repeat(80),
      row(['N/A', '+10000000001', 'Rita', 'Rector']),
      row(['alice', '+10000000011', 'Alice', 'Able']),
      row(['N/A', '+10000000012', 'Bob', 'Baker']),
    ].join('\n') + '\n')
  })
})

// ============================================================================
// 9. EVENTS
// ============================================================================

describe('Events', () => {
  it('isolates a throwing handler from the others', async () => {
    const seen: number[] = []
    h.engine.on('taskCompleted', () => {
      throw new Error('handler bug')
    })
    h.engine.on('taskCompleted', ({ taskId }) => {
      seen.push(taskId)
    })
    const task = await auditTask([BOB])
    await h.engine.completeTask(BOB, task.id)
    expect(seen).toEqual([task.id])
  })

  it('reports delivery failures', async () => {
    const failures: number[] = []
    h.engine.on('deliveryFailed', ({ userId }) => {
      failures.push(userId)
    })
    h.notifier.failing.add(BOB)
    await auditTask()
    expect(failures).toEqual([BOB])
  })

  it('reports armed and disarmed jobs', async () => {
    const log: string[] = []
    h.engine.on('jobArmed', ({ taskId }) => log.push(`armed ${taskId}`))
    h.engine.on('jobDisarmed', ({ taskId, reason }) => log.push(`disarmed ${taskId} ${reason}`))
    const task = await auditTask()
    await h.engine.deleteTask(APPROVER, task.id)
    expect(log).toEqual([`armed ${task.id}`, `disarmed ${task.id} deleted`])
  })
})

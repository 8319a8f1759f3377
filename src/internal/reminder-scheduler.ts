/**
 * Reminder Scheduler
 *
 * Owns the keyed set of reminder jobs (task id → job). At most one job per
 * task exists; `arm` replaces, `disarm` is idempotent. Each tick looks the
 * task up, disarms itself when the task is gone or complete, and otherwise
 * reminds every outstanding assignee.
 *
 * Ticks take the engine's critical section only for the read-and-decide
 * phase. Deliveries happen after it is released, and only if the job that
 * fired is still the installed one.
 *
 * Events go through the injected `emit`; the engine owns the handlers.
 */

import type { Adapter } from '../adapter'
import type { ReminderMode } from '../config'
import type { Task } from '../domain-types'
import { evaluateTask } from '../completion-evaluator'
import { SchedulerError } from '../errors'
import { getTaskpingLogger } from '../logger'
import { notifyAll, type DeliveryResult, type Notifier } from '../notifier'
import type { CompletionGate } from './completion-gate'
import type { DisarmReason, Emit } from './types'

// ============================================================================
// Timer Host
// ============================================================================

export type TimerHandle = ReturnType<typeof setTimeout>

/** The timer subsystem. Defaults to the global timers, looked up per call. */
export interface TimerHost {
  setTimeout(fn: () => void, ms: number): TimerHandle
  clearTimeout(handle: TimerHandle): void
  now(): number
}

export const globalTimerHost: TimerHost = {
  setTimeout: (fn, ms) => setTimeout(fn, ms),
  clearTimeout: (handle) => clearTimeout(handle),
  now: () => Date.now(),
}

/** Longest delay one timer holds. Longer waits are chained. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1

// ============================================================================
// Types
// ============================================================================

export type ArmOptions =
  | { mode: 'recurring'; intervalMinutes: number; startDelayMs: number }
  | { mode: 'one-shot'; fireInMs: number }

export type ReminderJob = {
  taskId: number
  mode: ReminderMode
  /** Interval between recurring ticks; 0 for one-shot jobs */
  intervalMs: number
  generation: number
  armedAt: number
  nextFireAt: number
  ticks: number
}

export type TickReport =
  | { type: 'stale' }
  | { type: 'task-missing' }
  | { type: 'completed'; announced: boolean }
  | { type: 'reminded'; deliveries: DeliveryResult[] }
  | { type: 'superseded' }
  | { type: 'failed'; error: unknown }

type InternalJob = ReminderJob & {
  handle: TimerHandle | null
}

type ReminderSchedulerDeps = {
  adapter: Adapter
  notifier: Notifier
  runExclusive: <T>(fn: () => Promise<T>) => Promise<T>
  completionGate: CompletionGate
  renderReminder: (task: Task) => string
  emit: Emit
  timers?: TimerHost
}

export type ReminderScheduler = ReturnType<typeof createReminderScheduler>

export function createReminderScheduler(deps: ReminderSchedulerDeps) {
  const { adapter, notifier, runExclusive, completionGate, renderReminder, emit } = deps
  const timers = deps.timers ?? globalTimerHost
  const logger = getTaskpingLogger('scheduler')

  const jobs = new Map<number, InternalJob>()
  const inFlight = new Set<Promise<TickReport>>()
  let generationCounter = 0

  // ========== Timer plumbing ==========

  function clearHandle(job: InternalJob): void {
    if (job.handle === null) return
    timers.clearTimeout(job.handle)
    job.handle = null
  }

  function isCurrent(taskId: number, generation: number): boolean {
    return jobs.get(taskId)?.generation === generation
  }

  function startTimer(fn: () => void, ms: number): TimerHandle {
    try {
      return timers.setTimeout(fn, ms)
    } catch (e) {
      throw new SchedulerError(`Timer subsystem failed to create a timeout of ${ms}ms`, e)
    }
  }

  /** Wake at `nextFireAt`, in steps of at most MAX_TIMER_DELAY_MS. */
  function scheduleWake(job: InternalJob): void {
    const { taskId, generation } = job
    const delay = Math.min(Math.max(0, job.nextFireAt - timers.now()), MAX_TIMER_DELAY_MS)
    job.handle = startTimer(() => onWake(taskId, generation), delay)
  }

  function onWake(taskId: number, generation: number): void {
    const job = jobs.get(taskId)
    if (!job || job.generation !== generation) return
    job.handle = null
    try {
      if (timers.now() < job.nextFireAt) scheduleWake(job)
      else fire(job)
    } catch (error) {
      logger.error('Could not reschedule the reminder job for task {taskId}: {error}', { taskId, error })
      emit('error', { taskId, error })
      remove(taskId, 'timer-failure')
    }
  }

  function fire(job: InternalJob): void {
    const { taskId, generation } = job
    job.ticks++
    if (job.mode === 'one-shot') {
      remove(taskId, 'fired')
    } else {
      job.nextFireAt = timers.now() + job.intervalMs
      scheduleWake(job)
    }
    track(tick(taskId, generation))
  }

  function track(p: Promise<TickReport>): void {
    inFlight.add(p)
    void p.finally(() => inFlight.delete(p))
  }

  function remove(taskId: number, reason: DisarmReason): boolean {
    const job = jobs.get(taskId)
    if (!job) return false
    clearHandle(job)
    jobs.delete(taskId)
    logger.debug('Disarmed reminder job for task {taskId} ({reason})', { taskId, reason })
    emit('jobDisarmed', { taskId, reason })
    return true
  }

  // ========== Operations ==========

  /**
   * Install a job for `taskId`, replacing any existing one. Timing restarts
   * from now: the first recurring tick comes `startDelayMs` later, then one
   * every interval. Throws SchedulerError if the timer host fails.
   */
  function arm(taskId: number, options: ArmOptions): ReminderJob {
    const previous = jobs.get(taskId)
    if (previous) {
      clearHandle(previous)
      jobs.delete(taskId)
    }

    const generation = ++generationCounter
    const armedAt = timers.now()
    const firstDelay = options.mode === 'recurring' ? options.startDelayMs : Math.max(0, options.fireInMs)
    const job: InternalJob = {
      taskId,
      mode: options.mode,
      intervalMs: options.mode === 'recurring' ? options.intervalMinutes * 60_000 : 0,
      generation,
      armedAt,
      nextFireAt: armedAt + firstDelay,
      ticks: 0,
      handle: null,
    }

    scheduleWake(job)
    jobs.set(taskId, job)

    logger.debug('Armed {mode} reminder job for task {taskId}, first tick in {delay}ms', {
      mode: job.mode, taskId, delay: firstDelay,
    })
    emit('jobArmed', { taskId, mode: job.mode, intervalMs: job.intervalMs, nextFireAt: job.nextFireAt })
    return snapshot(job)
  }

  /** Cancel the job for `taskId`. Absent jobs are fine; returns whether one existed. */
  function disarm(taskId: number, reason: DisarmReason = 'manual'): boolean {
    return remove(taskId, reason)
  }

  function disarmAll(reason: DisarmReason = 'shutdown'): void {
    for (const taskId of [...jobs.keys()]) remove(taskId, reason)
  }

  /**
   * One reminder cycle for `taskId`. Timer-driven ticks pass the generation
   * that fired so a replaced job's tick is dropped. Never rejects.
   */
  async function tick(taskId: number, generation?: number): Promise<TickReport> {
    try {
      const decision = await runExclusive(async () => {
        if (generation !== undefined && !isCurrent(taskId, generation) && jobs.has(taskId)) {
          return { type: 'stale' as const }
        }
        const evaluation = await evaluateTask(adapter, taskId)
        if (!evaluation.exists) {
          remove(taskId, 'task-missing')
          logger.info('Task {taskId} no longer exists; reminder job dropped', { taskId })
          return { type: 'task-missing' as const }
        }
        if (evaluation.complete) {
          remove(taskId, 'completed')
          return { type: 'completed' as const, task: evaluation.task, claimed: completionGate.claim(taskId) }
        }
        return {
          type: 'remind' as const,
          task: evaluation.task,
          recipients: evaluation.outstanding.map((a) => a.userId),
          generation: jobs.get(taskId)?.generation ?? null,
        }
      })

      switch (decision.type) {
        case 'stale':
        case 'task-missing':
          return decision
        case 'completed':
          if (decision.claimed) await completionGate.announce(decision.task)
          return { type: 'completed', announced: decision.claimed }
        case 'remind': {
          // An edit or delete between the decision and now replaced the job
          if ((jobs.get(taskId)?.generation ?? null) !== decision.generation) {
            return { type: 'superseded' }
          }
          const deliveries = await deliverReminders(decision.task, decision.recipients)
          return { type: 'reminded', deliveries }
        }
      }
    } catch (error) {
      logger.error('Reminder tick for task {taskId} failed: {error}', { taskId, error })
      emit('error', { taskId, error })
      return { type: 'failed', error }
    }
  }

  async function deliverReminders(task: Task, recipients: number[]): Promise<DeliveryResult[]> {
    if (recipients.length === 0) {
      logger.debug('Task {taskId} has no outstanding assignees to remind', { taskId: task.id })
      return []
    }
    const results = await notifyAll(notifier, recipients, renderReminder(task))
    for (const r of results) {
      if (r.ok) emit('reminderSent', { taskId: task.id, userId: r.userId })
      else emit('deliveryFailed', { taskId: task.id, userId: r.userId, error: r.error })
    }
    logger.info('Reminded {count} assignee(s) of task {taskId}', { count: recipients.length, taskId: task.id })
    return results
  }

  // ========== Queries ==========

  function snapshot(job: InternalJob): ReminderJob {
    const { handle: _handle, ...rest } = job
    return { ...rest }
  }

  function getJob(taskId: number): ReminderJob | undefined {
    const job = jobs.get(taskId)
    return job ? snapshot(job) : undefined
  }

  function isArmed(taskId: number): boolean {
    return jobs.has(taskId)
  }

  function armedTaskIds(): number[] {
    return [...jobs.keys()].sort((a, b) => a - b)
  }

  /** Resolves once every tick already started has finished. */
  async function idle(): Promise<void> {
    while (inFlight.size > 0) {
      await Promise.all([...inFlight])
    }
  }

  return {
    arm,
    disarm,
    disarmAll,
    tick,
    getJob,
    isArmed,
    armedTaskIds,
    idle,
  }
}

/**
 * Internal Types
 *
 * Shapes shared between the engine and its internal collaborators.
 */

import type { ReminderMode } from '../config'
import type { DeliveryFailureError } from '../errors'

export type DisarmReason = 'completed' | 'deleted' | 'task-missing' | 'fired' | 'shutdown' | 'manual' | 'timer-failure'

export type TaskpingEventMap = {
  jobArmed: { taskId: number; mode: ReminderMode; intervalMs: number; nextFireAt: number }
  jobDisarmed: { taskId: number; reason: DisarmReason }
  reminderSent: { taskId: number; userId: number }
  deliveryFailed: { taskId: number; userId: number; error: DeliveryFailureError }
  taskCompleted: { taskId: number; title: string }
  error: { taskId?: number; error: unknown }
}

export type TaskpingEvent = keyof TaskpingEventMap

export type Emit = <E extends TaskpingEvent>(event: E, payload: TaskpingEventMap[E]) => void

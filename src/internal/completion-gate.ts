/**
 * Completion Gate
 *
 * Guarantees the "task completed" announcement goes out once per completion.
 * `claim` is a synchronous check-and-set and must run inside the engine's
 * critical section; `announce` does the delivery afterwards, outside it.
 */

import type { Adapter } from '../adapter'
import type { Task } from '../domain-types'
import { notifyGroup, type DeliveryResult, type Notifier } from '../notifier'
import { getTaskpingLogger } from '../logger'
import type { Emit } from './types'

type CompletionGateDeps = {
  adapter: Adapter
  notifier: Notifier
  render: (task: Task) => string
  emit: Emit
}

export type CompletionGate = ReturnType<typeof createCompletionGate>

export function createCompletionGate(deps: CompletionGateDeps) {
  const { adapter, notifier, render, emit } = deps
  const logger = getTaskpingLogger('completion')

  const claimed = new Set<number>()

  function claim(taskId: number): boolean {
    if (claimed.has(taskId)) return false
    claimed.add(taskId)
    return true
  }

  /** Forget a claim, e.g. when new assignees make the task incomplete again. */
  function reset(taskId: number): void {
    claimed.delete(taskId)
  }

  async function announce(task: Task): Promise<DeliveryResult[]> {
    logger.info('Task {taskId} completed by all assignees', { taskId: task.id })
    emit('taskCompleted', { taskId: task.id, title: task.title })
    const results = await notifyGroup(adapter, notifier, 'approver', render(task))
    for (const r of results) {
      if (!r.ok) emit('deliveryFailed', { taskId: task.id, userId: r.userId, error: r.error })
    }
    return results
  }

  return {
    claim,
    reset,
    announce,
  }
}

/**
 * Completion Evaluator
 *
 * A task is complete iff it has at least one assignment and every assignment
 * is completed. Zero assignments is never complete.
 */

import type { Adapter } from './adapter'
import type { Assignment, Task } from './domain-types'

export type TaskEvaluation =
  | { exists: false }
  | { exists: true; task: Task; complete: boolean; outstanding: Assignment[] }

export function isComplete(assignments: readonly Assignment[]): boolean {
  return assignments.length > 0 && assignments.every((a) => a.status === 'completed')
}

export function outstanding(assignments: readonly Assignment[]): Assignment[] {
  return assignments.filter((a) => a.status !== 'completed')
}

export async function evaluateTask(adapter: Adapter, taskId: number): Promise<TaskEvaluation> {
  const task = await adapter.getTask(taskId)
  if (!task) return { exists: false }
  const assignments = await adapter.getAssignmentsByTask(taskId)
  return {
    exists: true,
    task,
    complete: isComplete(assignments),
    outstanding: outstanding(assignments),
  }
}

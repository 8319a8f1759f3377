/**
 * Assignment State Machine
 *
 * pending → accepted → completed, with pending → completed allowed directly.
 * completed is terminal. Repeating a move that already happened is a no-op
 * outcome, not an error.
 */

import type { Adapter } from './adapter'
import type { AssignmentStatus } from './domain-types'
import { InvalidTransitionError, NotFoundError } from './errors'
import type { LocalDateTime } from './time-date'

export { InvalidTransitionError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type TransitionAction = 'accept' | 'complete'

export type TransitionOutcome =
  | { type: 'transitioned'; from: AssignmentStatus; to: AssignmentStatus }
  | { type: 'unchanged'; status: AssignmentStatus; reason: 'already-accepted' | 'already-completed' }
  | { type: 'rejected'; status: AssignmentStatus; reason: 'terminal' }

// ============================================================================
// Transition Table
// ============================================================================

const TRANSITIONS: Record<TransitionAction, Partial<Record<AssignmentStatus, AssignmentStatus>>> = {
  accept: { pending: 'accepted' },
  complete: { pending: 'completed', accepted: 'completed' },
}

export function isTerminal(status: AssignmentStatus): boolean {
  return status === 'completed'
}

export function canTransition(from: AssignmentStatus, to: AssignmentStatus): boolean {
  return Object.values(TRANSITIONS).some((table) => table[from] === to)
}

/** Decide what `action` does to an assignment currently in `status`. */
export function planTransition(status: AssignmentStatus, action: TransitionAction): TransitionOutcome {
  const target = TRANSITIONS[action][status]
  if (target !== undefined) {
    return { type: 'transitioned', from: status, to: target }
  }
  if (action === 'accept' && status === 'accepted') {
    return { type: 'unchanged', status, reason: 'already-accepted' }
  }
  if (action === 'complete' && status === 'completed') {
    return { type: 'unchanged', status, reason: 'already-completed' }
  }
  return { type: 'rejected', status, reason: 'terminal' }
}

/**
 * Read the assignment, plan the move and persist it when it changes anything.
 * Missing assignments are reported as NotFoundError.
 */
export async function applyTransition(
  adapter: Adapter,
  taskId: number,
  userId: number,
  action: TransitionAction,
  at: LocalDateTime,
): Promise<TransitionOutcome> {
  const assignment = await adapter.getAssignment(taskId, userId)
  if (!assignment) {
    throw new NotFoundError(`User ${userId} is not assigned to task ${taskId}`)
  }
  const outcome = planTransition(assignment.status, action)
  if (outcome.type === 'transitioned') {
    await adapter.updateAssignmentStatus(taskId, userId, outcome.to, at)
  }
  return outcome
}

/** For callers that prefer an exception over a rejected outcome. */
export function assertNotRejected(outcome: TransitionOutcome, action: TransitionAction): void {
  if (outcome.type === 'rejected') {
    throw new InvalidTransitionError(`Cannot ${action} an assignment that is already ${outcome.status}`)
  }
}

/**
 * Notifier
 *
 * Delivery contract consumed by the core. The transport behind it (chat bot,
 * SMS, email) is out of scope; the core only needs per-recipient success or
 * failure, and never lets a failure escape.
 */

import type { Adapter } from './adapter'
import type { Role } from './domain-types'
import { DeliveryFailureError } from './errors'
import { getTaskpingLogger } from './logger'

export { DeliveryFailureError } from './errors'

/**
 * Per-user delivery. Group messages (to every user of a role) are fanned out
 * by `notifyGroup` over the adapter, so implementations never see roles.
 */
export interface Notifier {
  /** Resolves once delivered; rejects on failure. */
  notify(userId: number, message: string): Promise<void>
}

export type DeliveryResult =
  | { userId: number; ok: true }
  | { userId: number; ok: false; error: DeliveryFailureError }

const logger = getTaskpingLogger('notifier')

/**
 * Deliver `message` to every recipient independently. Recipients are tried
 * in order; a failure for one never prevents delivery to the rest.
 */
export async function notifyAll(
  notifier: Notifier,
  userIds: readonly number[],
  message: string,
): Promise<DeliveryResult[]> {
  const results: DeliveryResult[] = []
  for (const userId of userIds) {
    try {
      await notifier.notify(userId, message)
      results.push({ userId, ok: true })
    } catch (e) {
      const error = new DeliveryFailureError(userId, e)
      logger.error('Delivery to user {userId} failed: {reason}', { userId, reason: error.message })
      results.push({ userId, ok: false, error })
    }
  }
  return results
}

export async function notifyGroup(
  adapter: Adapter,
  notifier: Notifier,
  role: Role,
  message: string,
): Promise<DeliveryResult[]> {
  const users = await adapter.getUsersByRole(role)
  return notifyAll(notifier, users.map((u) => u.id), message)
}

/**
 * Shared test fixtures: a recording notifier, datetime literals and a seeded
 * engine with one approver and two assignees.
 */

import { createMockAdapter, type Adapter } from '../../src/adapter'
import type { Notifier } from '../../src/notifier'
import { createTaskping, type Taskping, type TaskpingConfig } from '../../src/public-api'
import { parseDateTime, type LocalDateTime } from '../../src/time-date'

export function dt(str: string): LocalDateTime {
  const parsed = parseDateTime(str)
  if (!parsed.ok) throw parsed.error
  return parsed.value
}

export type SentMessage = { userId: number; message: string }

export type RecordingNotifier = Notifier & {
  sent: SentMessage[]
  /** Recipients whose deliveries reject */
  failing: Set<number>
  to(userId: number): string[]
  clear(): void
}

export function createRecordingNotifier(): RecordingNotifier {
  const sent: SentMessage[] = []
  const failing = new Set<number>()
  return {
    sent,
    failing,
    async notify(userId, message) {
      if (failing.has(userId)) throw new Error(`chat ${userId} unreachable`)
      sent.push({ userId, message })
    },
    to(userId) {
      return sent.filter((m) => m.userId === userId).map((m) => m.message)
    },
    clear() {
      sent.length = 0
    },
  }
}

export const APPROVER = 1
export const ALICE = 11
export const BOB = 12

export type Harness = {
  adapter: Adapter
  notifier: RecordingNotifier
  engine: Taskping
}

/** Engine over the in-memory adapter with one approver and two assignees registered. */
export async function createHarness(overrides: Partial<TaskpingConfig> = {}): Promise<Harness> {
  const adapter = overrides.adapter ?? createMockAdapter()
  const notifier = createRecordingNotifier()
  const engine = createTaskping({ notifier, ...overrides, adapter })
  await engine.registerUser({ id: APPROVER, contact: '+10000000001', name: 'Rita', surname: 'Rector', role: 'approver' })
  await engine.registerUser({ id: ALICE, contact: '+10000000011', name: 'Alice', surname: 'Able', role: 'assignee', handle: 'alice' })
  await engine.registerUser({ id: BOB, contact: '+10000000012', name: 'Bob', surname: 'Baker', role: 'assignee' })
  return { adapter, notifier, engine }
}

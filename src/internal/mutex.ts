/**
 * Mutex
 *
 * Serializes async critical sections in arrival order. Not reentrant: a
 * section must not call runExclusive on the same mutex.
 */

export type Mutex = {
  runExclusive<T>(fn: () => Promise<T>): Promise<T>
  isLocked(): boolean
}

export function createMutex(): Mutex {
  let tail: Promise<void> = Promise.resolve()
  let pending = 0

  function runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    pending++
    const result = tail.then(fn)
    tail = result.then(
      () => { pending-- },
      () => { pending-- },
    )
    return result
  }

  return {
    runExclusive,
    isLocked: () => pending > 0,
  }
}

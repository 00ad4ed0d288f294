import { AsyncLocalStorage } from 'node:async_hooks'

/**
 * Per-attempt information published by the resilience wrappers. Component
 * hooks read it to size their own I/O timeouts.
 */
export interface CallContext {
  attempt: number
  maxAttempts: number
  /** Advisory deadline for this attempt's I/O, in ms */
  timeoutMs?: number
}

const storage = new AsyncLocalStorage<CallContext>()

export function runWithCallContext<T>(context: CallContext, fn: () => T): T {
  return storage.run(context, fn)
}

export function currentCallContext(): CallContext | undefined {
  return storage.getStore()
}

/**
 * Abort signal honouring the current timeout advisory, if one is set.
 */
export function advisoryTimeoutSignal(): AbortSignal | undefined {
  const timeoutMs = storage.getStore()?.timeoutMs
  return timeoutMs === undefined ? undefined : AbortSignal.timeout(timeoutMs)
}

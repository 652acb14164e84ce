// src/cloud/latency-race.ts — Cancellable task-vs-timer race
//
// The task gets its own AbortSignal. When the timer wins, the signal aborts
// so the task can stop cooperatively; nothing is killed. When the caller's
// signal aborts, the race rejects with REQUEST_CANCELLED and the timer is
// cleared. The task's late settlement is always observed, so a losing task
// never produces an unhandled rejection.

import { latencyTimeout, requestCancelled } from "./errors.js"

export type RaceOutcome<T> =
  | { kind: "completed"; value: T; elapsedMs: number }
  | { kind: "failed"; error: unknown; elapsedMs: number }
  | { kind: "timeout"; elapsedMs: number }

export interface RaceOptions {
  /** Caller cancellation */
  signal?: AbortSignal
  clock?: () => number
}

/**
 * Race `task` against a `timeoutMs` timer. `timeoutMs <= 0` disables the timer
 * (the race then only waits for the task or the caller's abort).
 */
export function raceAgainstTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  opts: RaceOptions = {},
): Promise<RaceOutcome<T>> {
  const clock = opts.clock ?? Date.now
  const parent = opts.signal

  if (parent?.aborted) {
    return Promise.reject(requestCancelled(parent.reason))
  }

  const controller = new AbortController()
  const start = clock()

  return new Promise<RaceOutcome<T>>((resolve, reject) => {
    let settled = false
    let timer: ReturnType<typeof setTimeout> | undefined

    const onParentAbort = (): void => {
      if (settled) return
      settled = true
      cleanup()
      controller.abort(parent?.reason)
      reject(requestCancelled(parent?.reason))
    }

    const cleanup = (): void => {
      if (timer !== undefined) clearTimeout(timer)
      parent?.removeEventListener("abort", onParentAbort)
    }

    const finish = (outcome: RaceOutcome<T>): void => {
      if (settled) return
      settled = true
      cleanup()
      resolve(outcome)
    }

    parent?.addEventListener("abort", onParentAbort, { once: true })

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        const elapsedMs = clock() - start
        finish({ kind: "timeout", elapsedMs })
        controller.abort(latencyTimeout(timeoutMs, elapsedMs))
      }, timeoutMs)
    }

    let running: Promise<T>
    try {
      running = task(controller.signal)
    } catch (err) {
      running = Promise.reject(err)
    }

    running.then(
      (value) => finish({ kind: "completed", value, elapsedMs: clock() - start }),
      (error: unknown) => finish({ kind: "failed", error, elapsedMs: clock() - start }),
    )
  })
}

/** Forward aborts from `parent` to `child`. Returns the unlink function. */
export function linkAbort(parent: AbortSignal | undefined, child: AbortController): () => void {
  if (!parent) return () => {}
  if (parent.aborted) {
    child.abort(parent.reason)
    return () => {}
  }
  const onAbort = (): void => child.abort(parent.reason)
  parent.addEventListener("abort", onAbort, { once: true })
  return () => parent.removeEventListener("abort", onAbort)
}

// tests/routing/latency-race.test.ts — Task vs. timer race with cooperative cancellation
import { describe, it, expect } from "vitest"
import { linkAbort, raceAgainstTimeout } from "../../src/cloud/latency-race.js"
import { isRoutingError } from "../../src/cloud/errors.js"
import { delay } from "./helpers.js"

describe("raceAgainstTimeout", () => {
  it("completes when the task beats the timer", async () => {
    const outcome = await raceAgainstTimeout(async () => "done", 1_000)
    expect(outcome.kind).toBe("completed")
    if (outcome.kind === "completed") expect(outcome.value).toBe("done")
  })

  it("reports a task failure as an outcome rather than a rejection", async () => {
    const outcome = await raceAgainstTimeout(async () => { throw new Error("bad") }, 1_000)
    expect(outcome.kind).toBe("failed")
    if (outcome.kind === "failed") expect(outcome.error).toEqual(new Error("bad"))
  })

  it("captures a synchronous throw from the task factory", async () => {
    const outcome = await raceAgainstTimeout<string>(() => { throw new Error("sync") }, 1_000)
    expect(outcome.kind).toBe("failed")
  })

  it("times out and aborts the task's signal with LATENCY_TIMEOUT", async () => {
    const seen: { signal?: AbortSignal } = {}
    const outcome = await raceAgainstTimeout(async (signal) => {
      seen.signal = signal
      await delay(500, signal)
      return "late"
    }, 30)

    expect(outcome.kind).toBe("timeout")
    expect(outcome.elapsedMs).toBeGreaterThanOrEqual(25)
    expect(outcome.elapsedMs).toBeLessThan(400)
    expect(seen.signal?.aborted).toBe(true)
    expect(isRoutingError(seen.signal?.reason, "LATENCY_TIMEOUT")).toBe(true)
  })

  it("uses the injected clock for elapsed time", async () => {
    let now = 100
    const outcome = await raceAgainstTimeout(async () => {
      now = 175
      return 1
    }, 0, { clock: () => now })
    expect(outcome).toEqual({ kind: "completed", value: 1, elapsedMs: 75 })
  })

  it("rejects immediately when the caller already aborted", async () => {
    const controller = new AbortController()
    controller.abort()
    let started = false
    await expect(raceAgainstTimeout(async () => { started = true }, 100, { signal: controller.signal }))
      .rejects.toMatchObject({ code: "REQUEST_CANCELLED" })
    expect(started).toBe(false)
  })

  it("rejects with REQUEST_CANCELLED and aborts the task when the caller aborts", async () => {
    const controller = new AbortController()
    const seen: { signal?: AbortSignal } = {}
    const race = raceAgainstTimeout(async (signal) => {
      seen.signal = signal
      await delay(500, signal)
    }, 1_000, { signal: controller.signal })

    controller.abort("user")
    await expect(race).rejects.toMatchObject({ code: "REQUEST_CANCELLED" })
    expect(seen.signal?.aborted).toBe(true)
  })
})

describe("linkAbort", () => {
  it("forwards a parent abort to the child", () => {
    const parent = new AbortController()
    const child = new AbortController()
    linkAbort(parent.signal, child)
    parent.abort("stop")
    expect(child.signal.aborted).toBe(true)
    expect(child.signal.reason).toBe("stop")
  })

  it("stops forwarding once unlinked", () => {
    const parent = new AbortController()
    const child = new AbortController()
    const unlink = linkAbort(parent.signal, child)
    unlink()
    parent.abort()
    expect(child.signal.aborted).toBe(false)
  })

  it("aborts the child at once when the parent is already aborted", () => {
    const parent = new AbortController()
    parent.abort()
    const child = new AbortController()
    linkAbort(parent.signal, child)
    expect(child.signal.aborted).toBe(true)
  })
})

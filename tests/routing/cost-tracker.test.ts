// tests/routing/cost-tracker.test.ts — Cumulative cloud spend
import { describe, it, expect } from "vitest"
import * as fc from "fast-check"
import { CloudCostTracker } from "../../src/cloud/cost-tracker.js"
import { isRoutingError } from "../../src/cloud/errors.js"

describe("CloudCostTracker", () => {
  it("accumulates totals per provider", () => {
    const tracker = new CloudCostTracker()
    tracker.recordRequest("openai", 100, 50, 0.25)
    tracker.recordRequest("anthropic", 10, 5, 0.5)
    tracker.recordRequest("openai", 1, 2, 0.25)

    const summary = tracker.summary()
    expect(summary.totalCostUSD).toBe(1)
    expect(summary.totalInputTokens).toBe(111)
    expect(summary.totalOutputTokens).toBe(57)
    expect(summary.totalRequests).toBe(3)
    expect(summary.requestsByProvider).toEqual({ openai: 2, anthropic: 1 })
    expect(summary.costByProvider).toEqual({ openai: 0.5, anthropic: 0.5 })
  })

  it("returns frozen snapshots that do not change with later records", () => {
    const tracker = new CloudCostTracker()
    tracker.recordRequest("openai", 1, 1, 0.5)
    const before = tracker.summary()
    tracker.recordRequest("openai", 1, 1, 0.5)

    expect(before.totalCostUSD).toBe(0.5)
    expect(Object.isFrozen(before)).toBe(true)
    expect(Object.isFrozen(before.costByProvider)).toBe(true)
  })

  it("rejects negative or non-finite usage", () => {
    const tracker = new CloudCostTracker()
    for (const args of [[-1, 0, 0], [0, -1, 0], [0, 0, -0.1], [0, 0, Number.NaN], [Infinity, 0, 0]] as const) {
      let caught: unknown
      try {
        tracker.recordRequest("p", args[0], args[1], args[2])
      } catch (err) {
        caught = err
      }
      expect(isRoutingError(caught, "INVALID_USAGE")).toBe(true)
    }
    expect(tracker.summary().totalRequests).toBe(0)
  })

  it("treats a budget of zero or less as unlimited", () => {
    const tracker = new CloudCostTracker()
    tracker.recordRequest("p", 0, 0, 1_000)
    expect(tracker.wouldExceedBudget(1_000, 0)).toBe(false)
    expect(tracker.wouldExceedBudget(1_000, -5)).toBe(false)
  })

  it("flags a projected cost strictly above the remaining budget", () => {
    const tracker = new CloudCostTracker()
    tracker.recordRequest("p", 0, 0, 0.5)
    expect(tracker.wouldExceedBudget(0.5, 1)).toBe(false)
    expect(tracker.wouldExceedBudget(0.51, 1)).toBe(true)
  })

  it("keeps the total equal to the per-provider sum for decimal costs", () => {
    const tracker = new CloudCostTracker()
    const records: Array<[string, number]> = [
      ["a", 0.712], ["b", 0.33], ["c", 0.456], ["a", 0.67], ["b", 0.91], ["c", 0.456],
    ]
    for (const [provider, cost] of records) tracker.recordRequest(provider, 1, 1, cost)

    const summary = tracker.summary()
    expect(summary.costByProvider).toEqual({ a: 1.382, b: 1.24, c: 0.912 })
    expect(summary.totalCostUSD).toBe(Object.values(summary.costByProvider).reduce((x, y) => x + y, 0))
  })

  it("admits spend that lands exactly on the cap", () => {
    const tracker = new CloudCostTracker()
    tracker.recordRequest("p", 0, 0, 0.1)
    expect(tracker.wouldExceedBudget(0.2, 0.3)).toBe(false)
    tracker.recordRequest("p", 0, 0, 0.2)
    expect(tracker.hasReachedBudget(0.3)).toBe(true)
    expect(tracker.wouldExceedBudget(0.000001, 0.3)).toBe(true)
  })

  it("hasReachedBudget treats a budget of zero or less as unlimited", () => {
    const tracker = new CloudCostTracker()
    tracker.recordRequest("p", 0, 0, 5)
    expect(tracker.hasReachedBudget(0)).toBe(false)
    expect(tracker.hasReachedBudget(5.000001)).toBe(false)
  })

  it("reset clears everything", () => {
    const tracker = new CloudCostTracker()
    tracker.recordRequest("p", 3, 4, 0.5)
    tracker.reset()
    expect(tracker.summary()).toEqual({
      totalCostUSD: 0,
      totalInputTokens: 0,
      totalOutputTokens: 0,
      totalRequests: 0,
      requestsByProvider: {},
      costByProvider: {},
    })
  })

  // --- Properties ---

  const record = fc.record({
    provider: fc.constantFrom("a", "b", "c"),
    input: fc.nat({ max: 10_000 }),
    output: fc.nat({ max: 10_000 }),
    cost: fc.double({ min: 0, max: 10, noNaN: true }),
  })

  it("total cost equals the sum of per-provider costs", () => {
    fc.assert(fc.property(fc.array(record, { maxLength: 50 }), (records) => {
      const tracker = new CloudCostTracker()
      for (const r of records) tracker.recordRequest(r.provider, r.input, r.output, r.cost)

      const summary = tracker.summary()
      const byProvider = Object.values(summary.costByProvider).reduce((a, b) => a + b, 0)
      expect(summary.totalCostUSD).toBe(byProvider)
      const requests = Object.values(summary.requestsByProvider).reduce((a, b) => a + b, 0)
      expect(requests).toBe(records.length)
    }))
  })

  it("total cost never decreases between records", () => {
    fc.assert(fc.property(fc.array(record, { maxLength: 50 }), (records) => {
      const tracker = new CloudCostTracker()
      let previous = 0
      for (const r of records) {
        tracker.recordRequest(r.provider, r.input, r.output, r.cost)
        const total = tracker.summary().totalCostUSD
        expect(total).toBeGreaterThanOrEqual(previous)
        previous = total
      }
    }))
  })

  it("budget gate keeps admitted spend within the cap", () => {
    fc.assert(fc.property(
      fc.integer({ min: 10_000, max: 5_000_000 }),
      fc.array(fc.integer({ min: 0, max: 2_000_000 }), { maxLength: 40 }),
      (capMicro, costsMicro) => {
        const cap = capMicro / 1_000_000
        const tracker = new CloudCostTracker()
        for (const micro of costsMicro) {
          const cost = micro / 1_000_000
          if (!tracker.wouldExceedBudget(cost, cap)) tracker.recordRequest("p", 0, 0, cost)
        }
        expect(tracker.summary().totalCostUSD).toBeLessThanOrEqual(cap)
      },
    ))
  })
})

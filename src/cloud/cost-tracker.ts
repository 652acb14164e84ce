// src/cloud/cost-tracker.ts — Cumulative cloud spend tracker
//
// Process-lifetime counters of cloud spend and token usage per provider.
// Spend is held in whole micro-USD per provider; USD values exist only in
// snapshots, and the snapshot total is derived from the per-provider values
// it carries. Every mutation runs in one synchronous section, so concurrent
// requests on the event loop never interleave inside a write.

import { RoutingError } from "./errors.js"
import { microToUSD } from "./pricing.js"

export interface CostSummary {
  readonly totalCostUSD: number
  readonly totalInputTokens: number
  readonly totalOutputTokens: number
  readonly totalRequests: number
  readonly requestsByProvider: Readonly<Record<string, number>>
  readonly costByProvider: Readonly<Record<string, number>>
}

/** USD → whole micro-USD, rounded to the nearest unit */
export function usdToMicro(usd: number): number {
  return Math.round(usd * 1_000_000)
}

export class CloudCostTracker {
  private totalCostMicro = 0
  private totalInputTokens = 0
  private totalOutputTokens = 0
  private totalRequests = 0
  private requestsByProvider = new Map<string, number>()
  private costMicroByProvider = new Map<string, number>()

  recordRequest(providerId: string, inputTokens: number, outputTokens: number, costUSD: number): void {
    assertNonNegative("inputTokens", inputTokens)
    assertNonNegative("outputTokens", outputTokens)
    assertNonNegative("costUSD", costUSD)

    const costMicro = usdToMicro(costUSD)
    this.totalCostMicro += costMicro
    this.totalInputTokens += inputTokens
    this.totalOutputTokens += outputTokens
    this.totalRequests++
    this.requestsByProvider.set(providerId, (this.requestsByProvider.get(providerId) ?? 0) + 1)
    this.costMicroByProvider.set(providerId, (this.costMicroByProvider.get(providerId) ?? 0) + costMicro)
  }

  summary(): CostSummary {
    const costByProvider: Record<string, number> = {}
    for (const [providerId, micro] of this.costMicroByProvider) {
      costByProvider[providerId] = microToUSD(micro)
    }
    // Summed in the snapshot's own key order so the total matches its parts exactly
    const totalCostUSD = Object.values(costByProvider).reduce((sum, usd) => sum + usd, 0)

    return Object.freeze({
      totalCostUSD,
      totalInputTokens: this.totalInputTokens,
      totalOutputTokens: this.totalOutputTokens,
      totalRequests: this.totalRequests,
      requestsByProvider: Object.freeze(Object.fromEntries(this.requestsByProvider)),
      costByProvider: Object.freeze(costByProvider),
    })
  }

  /** budgetUSD <= 0 means unlimited */
  wouldExceedBudget(costUSD: number, budgetUSD: number): boolean {
    if (budgetUSD <= 0) return false
    return this.totalCostMicro + usdToMicro(costUSD) > usdToMicro(budgetUSD)
  }

  /** True once recorded spend is at or above a positive budget */
  hasReachedBudget(budgetUSD: number): boolean {
    if (budgetUSD <= 0) return false
    return this.totalCostMicro >= usdToMicro(budgetUSD)
  }

  reset(): void {
    this.totalCostMicro = 0
    this.totalInputTokens = 0
    this.totalOutputTokens = 0
    this.totalRequests = 0
    this.requestsByProvider.clear()
    this.costMicroByProvider.clear()
  }
}

function assertNonNegative(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new RoutingError("INVALID_USAGE", `${field} must be a finite non-negative number, got ${value}`, { field, value })
  }
}

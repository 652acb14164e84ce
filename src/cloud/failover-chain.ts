// src/cloud/failover-chain.ts — Priority-ordered cloud providers with per-provider circuit breakers
//
// Circuit model (no persisted HALF_OPEN state):
//   CLOSED    isCircuitOpen=false
//   OPEN      isCircuitOpen=true and cooldown not yet elapsed → skipped
//   HALF_OPEN inferred: isCircuitOpen=true and cooldown elapsed → flag cleared,
//             exactly one trial in flight; everyone else skips the entry until
//             it settles. A failed trial reopens at once because
//             consecutiveFailures is still >= threshold. A cancelled trial
//             reopens without counting a failure.

import type { EventRouter } from "../events/router.js"
import { createProviderFailoverEvent } from "../events/routing-events.js"
import { noProviderAvailable, requestCancelled } from "./errors.js"
import type {
  CallOptions,
  CloudGenerationOptions,
  CloudGenerationResult,
  CloudProvider,
} from "./types.js"

// --- Types ---

export interface FailoverChainConfig {
  failureThreshold: number  // Consecutive failures before the circuit opens (default: 3)
  cooldownMs: number        // OPEN → trial delay (default: 60000)
}

const DEFAULT_FAILOVER_CONFIG: FailoverChainConfig = {
  failureThreshold: 3,
  cooldownMs: 60_000,
}

export interface ProviderEntry {
  provider: CloudProvider
  priority: number
  consecutiveFailures: number
  lastFailureTime?: number
  isCircuitOpen: boolean
  /** A half-open trial call is running */
  trialInFlight: boolean
}

/** How an attempt was admitted: through a closed circuit or as the half-open trial */
type Admission = "closed" | "trial"

export interface ProviderHealth {
  readonly providerId: string
  readonly displayName: string
  readonly priority: number
  readonly consecutiveFailures: number
  readonly lastFailureTime?: number
  readonly isCircuitOpen: boolean
  /** Open circuit whose cooldown has elapsed; the next attempt is its trial */
  readonly cooldownElapsed: boolean
}

export interface StreamSelection {
  providerId: string
  stream: AsyncIterable<string>
}

export interface FailoverChainOptions {
  clock?: () => number
  events?: EventRouter
  sessionId?: string
}

// --- ProviderFailoverChain ---

export class ProviderFailoverChain {
  private entries: ProviderEntry[] = []
  private config: FailoverChainConfig
  private clock: () => number
  private events?: EventRouter
  private sessionId?: string

  constructor(config?: Partial<FailoverChainConfig>, opts?: FailoverChainOptions) {
    this.config = { ...DEFAULT_FAILOVER_CONFIG, ...config }
    this.clock = opts?.clock ?? Date.now
    this.events = opts?.events
    this.sessionId = opts?.sessionId
  }

  /**
   * Insert a provider and re-sort by descending priority.
   * Array.prototype.sort is stable, so equal priorities keep insertion order.
   * Re-adding an existing providerId replaces its entry (and resets its circuit).
   */
  addProvider(provider: CloudProvider, priority = 0): void {
    this.entries = this.entries.filter(e => e.provider.providerId !== provider.providerId)
    this.entries.push({
      provider,
      priority,
      consecutiveFailures: 0,
      isCircuitOpen: false,
      trialInFlight: false,
    })
    this.entries.sort((a, b) => b.priority - a.priority)
  }

  removeProvider(providerId: string): boolean {
    const before = this.entries.length
    this.entries = this.entries.filter(e => e.provider.providerId !== providerId)
    return this.entries.length < before
  }

  /** Provider ids in the order they will be tried */
  providers(): string[] {
    return this.entries.map(e => e.provider.providerId)
  }

  /** Look up a registered provider handle by id */
  find(providerId: string): CloudProvider | undefined {
    return this.entries.find(e => e.provider.providerId === providerId)?.provider
  }

  async generate(
    prompt: string,
    options: CloudGenerationOptions,
    call?: CallOptions,
  ): Promise<CloudGenerationResult> {
    let lastError: Error | undefined

    // Snapshot: concurrent add/remove does not disturb this walk
    for (const entry of [...this.entries]) {
      if (call?.signal?.aborted) throw requestCancelled(call.signal.reason)
      const admission = this.tryAcquire(entry)
      if (!admission) continue

      try {
        const result = await entry.provider.generate(prompt, options, call)
        this.recordSuccess(entry, admission)
        return result
      } catch (err) {
        // Caller cancellation is not the provider's fault
        if (call?.signal?.aborted) {
          if (admission === "trial") this.abandonTrial(entry)
          throw requestCancelled(call.signal.reason)
        }
        lastError = err instanceof Error ? err : new Error(String(err))
        this.recordFailure(entry, lastError, admission)
      }
    }

    throw noProviderAvailable(lastError)
  }

  /**
   * Streaming cannot be retried once tokens have been yielded, so failover
   * here only selects the first provider that is not cooling down and whose
   * availability check passes. The chosen stream is returned unmodified.
   */
  async generateStream(
    prompt: string,
    options: CloudGenerationOptions,
    call?: CallOptions,
  ): Promise<StreamSelection> {
    let lastError: Error | undefined

    for (const entry of [...this.entries]) {
      if (call?.signal?.aborted) throw requestCancelled(call.signal.reason)
      const admission = this.tryAcquire(entry)
      if (!admission) continue

      let available = false
      try {
        available = await entry.provider.isAvailable()
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err))
      }
      if (admission === "trial") {
        // The availability check is the trial: passing it leaves the circuit closed
        if (available) entry.trialInFlight = false
        else this.abandonTrial(entry)
      }
      if (!available) continue

      return {
        providerId: entry.provider.providerId,
        stream: entry.provider.generateStream(prompt, options, call),
      }
    }

    throw noProviderAvailable(lastError)
  }

  /** Read-only snapshot of every entry's circuit state. Never mutates. */
  healthStatus(): readonly ProviderHealth[] {
    const now = this.clock()
    return Object.freeze(this.entries.map(entry => Object.freeze({
      providerId: entry.provider.providerId,
      displayName: entry.provider.displayName,
      priority: entry.priority,
      consecutiveFailures: entry.consecutiveFailures,
      lastFailureTime: entry.lastFailureTime,
      isCircuitOpen: entry.isCircuitOpen,
      cooldownElapsed: entry.isCircuitOpen && this.cooldownElapsed(entry, now),
    })))
  }

  // --- Private helpers ---

  /**
   * Admits an attempt, or returns null when the entry must be skipped.
   * An open, cooled-down circuit admits a single trial.
   */
  private tryAcquire(entry: ProviderEntry): Admission | null {
    if (entry.trialInFlight) return null
    if (!entry.isCircuitOpen) return "closed"
    if (!this.cooldownElapsed(entry, this.clock())) return null
    entry.isCircuitOpen = false
    entry.trialInFlight = true
    return "trial"
  }

  /** Trial ended without a verdict: reopen so the next request gets the trial */
  private abandonTrial(entry: ProviderEntry): void {
    entry.trialInFlight = false
    entry.isCircuitOpen = true
  }

  private cooldownElapsed(entry: ProviderEntry, now: number): boolean {
    if (entry.lastFailureTime === undefined) return true
    return now - entry.lastFailureTime >= this.config.cooldownMs
  }

  private recordSuccess(entry: ProviderEntry, admission: Admission): void {
    if (admission === "trial") entry.trialInFlight = false
    entry.consecutiveFailures = 0
    entry.isCircuitOpen = false
  }

  private recordFailure(entry: ProviderEntry, error: Error, admission: Admission): void {
    if (admission === "trial") entry.trialInFlight = false
    entry.consecutiveFailures++
    entry.lastFailureTime = this.clock()
    const opened = entry.consecutiveFailures >= this.config.failureThreshold
    entry.isCircuitOpen = opened

    if (opened) {
      console.warn(
        `[failover] circuit OPEN for ${entry.provider.providerId} after ${entry.consecutiveFailures} consecutive failures: ${error.message}`,
      )
    }

    this.events?.publish(createProviderFailoverEvent({
      providerId: entry.provider.providerId,
      error: error.message,
      consecutiveFailures: entry.consecutiveFailures,
      circuitOpened: opened,
    }, { sessionId: this.sessionId }))
  }
}

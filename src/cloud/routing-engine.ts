// src/cloud/routing-engine.ts — Per-request on-device/cloud routing
//
// Modes:
//   always_local   local capability only; handoff signal reported, never acted on
//   always_cloud   budget pre-check → explicit provider | failover chain | default provider
//   hybrid_auto    local first (optionally raced against maxLocalLatencyMs);
//                  timeout, low confidence or local error → cloud (hybrid_fallback)
//   hybrid_manual  as always_local; the caller escalates on the surfaced handoff
//
// Every successful generate() publishes exactly one RoutingEvent after the
// result is known and before it is returned. Streaming routes the selection
// only; a started stream never switches target.

import type { EventRouter } from "../events/router.js"
import {
  createCloudCostEvent,
  createLatencyTimeoutEvent,
  createRoutingEvent,
} from "../events/routing-events.js"
import { CloudCostTracker, type CostSummary } from "./cost-tracker.js"
import {
  RoutingError,
  budgetExceeded,
  isRoutingError,
  localGenerationFailed,
  noProviderAvailable,
  requestCancelled,
} from "./errors.js"
import type { ProviderFailoverChain } from "./failover-chain.js"
import { linkAbort, raceAgainstTimeout, type RaceOutcome } from "./latency-race.js"
import { measureStream } from "./measured-stream.js"
import { DEFAULT_ROUTING_POLICY, resolvePolicy } from "./policy.js"
import { PricingTable, estimatePromptTokens } from "./pricing.js"
import { CloudProviderManager } from "./provider-manager.js"
import type {
  CloudDefaults,
  CloudGenerationOptions,
  CloudGenerationResult,
  CloudProvider,
  HandoffReason,
  LLMGenerationOptions,
  LLMGenerationResult,
  LocalCapability,
  RoutedGenerationResult,
  RoutedStreamingResult,
  RoutingDecision,
  RoutingPolicy,
  RoutingRequest,
} from "./types.js"

// --- Options ---

export interface RoutingEngineOptions {
  local: LocalCapability
  events: EventRouter
  costTracker?: CloudCostTracker
  failoverChain?: ProviderFailoverChain | null
  providers?: CloudProviderManager
  defaultPolicy?: Partial<RoutingPolicy>
  cloudDefaults?: Partial<CloudDefaults>
  pricing?: PricingTable
  sessionId?: string
  clock?: () => number
}

export const DEFAULT_CLOUD_DEFAULTS: CloudDefaults = {
  model: "gpt-4o-mini",
  maxTokens: 1024,
  temperature: 0.7,
}

interface EngineOutcome {
  routed: RoutedGenerationResult
  costUSD?: number
}

type SelectedStream = Omit<RoutedStreamingResult, "result">

// --- RoutingEngine ---

export class RoutingEngine {
  private local: LocalCapability
  private events: EventRouter
  private costTracker: CloudCostTracker
  private failoverChain: ProviderFailoverChain | null
  private providers: CloudProviderManager
  private defaultPolicy: RoutingPolicy
  private cloudDefaults: CloudDefaults
  private pricing: PricingTable
  private sessionId?: string
  private clock: () => number

  constructor(options: RoutingEngineOptions) {
    this.local = options.local
    this.events = options.events
    this.costTracker = options.costTracker ?? new CloudCostTracker()
    this.failoverChain = options.failoverChain ?? null
    this.providers = options.providers ?? new CloudProviderManager()
    this.defaultPolicy = resolvePolicy(DEFAULT_ROUTING_POLICY, options.defaultPolicy)
    this.cloudDefaults = { ...DEFAULT_CLOUD_DEFAULTS, ...options.cloudDefaults }
    this.pricing = options.pricing ?? new PricingTable()
    this.sessionId = options.sessionId
    this.clock = options.clock ?? Date.now
  }

  // --- Configuration ---

  /** Applies to requests started after this call; in-flight requests keep their copy. */
  setDefaultPolicy(policy: Partial<RoutingPolicy>): void {
    this.defaultPolicy = resolvePolicy(this.defaultPolicy, policy)
  }

  getDefaultPolicy(): RoutingPolicy {
    return this.defaultPolicy
  }

  setFailoverChain(chain: ProviderFailoverChain | null): void {
    this.failoverChain = chain
  }

  getFailoverChain(): ProviderFailoverChain | null {
    return this.failoverChain
  }

  cloudCostSummary(): CostSummary {
    return this.costTracker.summary()
  }

  resetCloudCosts(): void {
    this.costTracker.reset()
  }

  // --- Generation ---

  async generate(request: RoutingRequest): Promise<RoutedGenerationResult> {
    const policy = resolvePolicy(this.defaultPolicy, request.policy)
    throwIfAborted(request.signal)
    const start = this.clock()

    let outcome: EngineOutcome
    switch (policy.mode) {
      case "always_local":
      case "hybrid_manual":
        outcome = { routed: await this.generateLocal(request, policy) }
        break
      case "always_cloud":
        outcome = await this.generateCloud(request, policy)
        break
      case "hybrid_auto":
        outcome = await this.generateHybridAuto(request, policy)
        break
    }

    this.emitRoutingTelemetry(outcome.routed.routingDecision, this.clock() - start, outcome.costUSD, false)
    return outcome.routed
  }

  async generateStream(request: RoutingRequest): Promise<RoutedStreamingResult> {
    const policy = resolvePolicy(this.defaultPolicy, request.policy)
    throwIfAborted(request.signal)
    const start = this.clock()

    let selected: SelectedStream
    switch (policy.mode) {
      case "always_local":
      case "hybrid_manual":
        selected = this.streamLocal(request, policy)
        break
      case "always_cloud":
        selected = await this.streamCloud(request, policy)
        break
      case "hybrid_auto":
        selected = await this.streamHybridAuto(request, policy)
        break
    }

    const { routingDecision } = selected
    this.emitRoutingTelemetry(routingDecision, this.clock() - start, undefined, true)

    const measured = measureStream(selected.stream, {
      framework: routingDecision.executionTarget === "on_device" ? "local" : "cloud",
      modelUsed: routingDecision.cloudModel,
      startedAt: start,
      clock: this.clock,
    })
    return { stream: measured.stream, result: measured.result, routingDecision }
  }

  // --- Private: Local ---

  private async generateLocal(request: RoutingRequest, policy: RoutingPolicy): Promise<RoutedGenerationResult> {
    const options = optionsWithConfidence(request.options, policy.confidenceThreshold)
    let result: LLMGenerationResult
    try {
      result = await this.local.generate(request.prompt, options, { signal: request.signal })
    } catch (err) {
      if (request.signal?.aborted) throw requestCancelled(request.signal.reason)
      throw localGenerationFailed(err)
    }
    return wrapLocalResult(result, policy)
  }

  // --- Private: Cloud ---

  private async generateCloud(request: RoutingRequest, policy: RoutingPolicy): Promise<EngineOutcome> {
    const cloudOpts = this.cloudOptions(request)
    this.enforceBudget(request, policy, cloudOpts)

    const cloudResult = await this.invokeCloud(request, cloudOpts)
    const costUSD = this.actualCostUSD(cloudResult)

    this.costTracker.recordRequest(cloudResult.providerId, cloudResult.inputTokens, cloudResult.outputTokens, costUSD)
    this.events.publish(createCloudCostEvent({
      providerId: cloudResult.providerId,
      model: cloudResult.model,
      inputTokens: cloudResult.inputTokens,
      outputTokens: cloudResult.outputTokens,
      costUSD,
      cumulativeTotalUSD: this.costTracker.summary().totalCostUSD,
    }, { sessionId: this.sessionId }))

    const generationResult: LLMGenerationResult = {
      text: cloudResult.text,
      inputTokens: cloudResult.inputTokens,
      tokensUsed: cloudResult.outputTokens,
      modelUsed: cloudResult.model,
      latencyMs: cloudResult.latencyMs,
      framework: "cloud",
      tokensPerSecond: cloudResult.latencyMs > 0
        ? cloudResult.outputTokens / (cloudResult.latencyMs / 1000)
        : 0,
    }

    return {
      routed: {
        generationResult,
        routingDecision: freezeDecision({
          executionTarget: "cloud",
          policy,
          cloudProviderId: cloudResult.providerId,
          cloudModel: cloudResult.model,
        }),
      },
      costUSD,
    }
  }

  /**
   * Provider-reported cost when it is a finite non-negative number, otherwise
   * the pricing-table estimate for the reported usage. The call has already
   * been paid for, so a bad report never fails the request.
   */
  private actualCostUSD(cloudResult: CloudGenerationResult): number {
    const reported = cloudResult.estimatedCostUSD
    if (reported !== undefined) {
      if (Number.isFinite(reported) && reported >= 0) return reported
      console.warn(
        `[routing] ignoring invalid cost ${reported} reported by ${cloudResult.providerId}, using the pricing table`,
      )
    }
    return this.pricing.costUSD(cloudResult.providerId, cloudResult.model, {
      inputTokens: cloudResult.inputTokens,
      outputTokens: cloudResult.outputTokens,
    }) ?? 0
  }

  private async invokeCloud(request: RoutingRequest, cloudOpts: CloudGenerationOptions): Promise<CloudGenerationResult> {
    const call = { signal: request.signal }

    if (request.cloudProviderId === undefined && this.failoverChain) {
      return this.failoverChain.generate(request.prompt, cloudOpts, call)
    }

    const provider = request.cloudProviderId !== undefined
      ? this.resolveProvider(request.cloudProviderId)
      : this.providers.getDefault()

    try {
      return await provider.generate(request.prompt, cloudOpts, call)
    } catch (err) {
      if (request.signal?.aborted) throw requestCancelled(request.signal.reason)
      throw noProviderAvailable(err instanceof Error ? err : new Error(String(err)))
    }
  }

  /** Explicit provider: manager registry first, then the failover chain's entries */
  private resolveProvider(providerId: string): CloudProvider {
    if (this.providers.has(providerId)) return this.providers.get(providerId)
    const fromChain = this.failoverChain?.find(providerId)
    if (fromChain) return fromChain
    throw new RoutingError("PROVIDER_NOT_FOUND", `cloud provider not registered: ${providerId}`, { providerId })
  }

  /**
   * Fails before any network call when the projected cost would push spend
   * past the cap, or when spend has already reached it.
   */
  private enforceBudget(request: RoutingRequest, policy: RoutingPolicy, cloudOpts: CloudGenerationOptions): void {
    if (policy.costCapUSD <= 0) return

    const projectedUSD = request.estimatedCostUSD
      ?? this.pricing.costUSD(request.cloudProviderId, cloudOpts.model, {
        inputTokens: estimatePromptTokens(request.prompt) + estimatePromptTokens(cloudOpts.systemPrompt ?? ""),
        outputTokens: cloudOpts.maxTokens,
      })
      ?? 0

    const { totalCostUSD } = this.costTracker.summary()
    if (
      this.costTracker.hasReachedBudget(policy.costCapUSD)
      || this.costTracker.wouldExceedBudget(projectedUSD, policy.costCapUSD)
    ) {
      throw budgetExceeded(totalCostUSD, policy.costCapUSD, projectedUSD)
    }
  }

  private cloudOptions(request: RoutingRequest): CloudGenerationOptions {
    return {
      model: request.cloudModel ?? this.cloudDefaults.model,
      maxTokens: request.options?.maxTokens ?? this.cloudDefaults.maxTokens,
      temperature: request.options?.temperature ?? this.cloudDefaults.temperature,
      systemPrompt: request.options?.systemPrompt,
    }
  }

  // --- Private: Hybrid Auto ---

  private async generateHybridAuto(request: RoutingRequest, policy: RoutingPolicy): Promise<EngineOutcome> {
    let reason: HandoffReason
    let localConfidence = 0

    if (policy.maxLocalLatencyMs > 0) {
      const options = optionsWithConfidence(request.options, policy.confidenceThreshold)
      const outcome = await raceAgainstTimeout(
        (signal) => this.local.generate(request.prompt, options, { signal }),
        policy.maxLocalLatencyMs,
        { signal: request.signal, clock: this.clock },
      )

      switch (outcome.kind) {
        case "completed": {
          const routed = wrapLocalResult(outcome.value, policy)
          if (!routed.routingDecision.cloudHandoffTriggered) return { routed }
          reason = "rolling_window_degradation"
          localConfidence = routed.routingDecision.onDeviceConfidence
          break
        }
        case "failed":
          console.warn(`[routing] local generation failed, falling back to cloud: ${errorMessage(outcome.error)}`)
          reason = "rolling_window_degradation"
          break
        case "timeout":
          this.events.publish(createLatencyTimeoutEvent({
            maxLatencyMs: policy.maxLocalLatencyMs,
            actualLatencyMs: outcome.elapsedMs,
            streaming: false,
          }, { sessionId: this.sessionId }))
          reason = "first_token_low_confidence"
          break
      }
    } else {
      try {
        const routed = await this.generateLocal(request, policy)
        if (!routed.routingDecision.cloudHandoffTriggered) return { routed }
        reason = "rolling_window_degradation"
        localConfidence = routed.routingDecision.onDeviceConfidence
      } catch (err) {
        if (isRoutingError(err, "REQUEST_CANCELLED")) throw err
        console.warn(`[routing] local generation failed, falling back to cloud: ${errorMessage(err)}`)
        reason = "rolling_window_degradation"
      }
    }

    const cloud = await this.generateCloud(request, policy)
    return {
      routed: {
        generationResult: cloud.routed.generationResult,
        routingDecision: freezeDecision({
          executionTarget: "hybrid_fallback",
          policy,
          onDeviceConfidence: localConfidence,
          cloudHandoffTriggered: true,
          handoffReason: reason,
          cloudProviderId: cloud.routed.routingDecision.cloudProviderId,
          cloudModel: cloud.routed.routingDecision.cloudModel,
        }),
      },
      costUSD: cloud.costUSD,
    }
  }

  // --- Private: Streaming ---

  private streamLocal(request: RoutingRequest, policy: RoutingPolicy): SelectedStream {
    let stream: AsyncIterable<string>
    try {
      stream = this.local.generateStream(
        request.prompt,
        optionsWithConfidence(request.options, policy.confidenceThreshold),
        { signal: request.signal },
      )
    } catch (err) {
      if (request.signal?.aborted) throw requestCancelled(request.signal.reason)
      throw localGenerationFailed(err)
    }
    return { stream, routingDecision: freezeDecision({ executionTarget: "on_device", policy }) }
  }

  private async streamCloud(request: RoutingRequest, policy: RoutingPolicy): Promise<SelectedStream> {
    const cloudOpts = this.cloudOptions(request)
    this.enforceBudget(request, policy, cloudOpts)
    const call = { signal: request.signal }

    let providerId: string
    let stream: AsyncIterable<string>
    if (request.cloudProviderId === undefined && this.failoverChain) {
      const selection = await this.failoverChain.generateStream(request.prompt, cloudOpts, call)
      providerId = selection.providerId
      stream = selection.stream
    } else {
      const provider = request.cloudProviderId !== undefined
        ? this.resolveProvider(request.cloudProviderId)
        : this.providers.getDefault()
      providerId = provider.providerId
      stream = provider.generateStream(request.prompt, cloudOpts, call)
    }

    return {
      stream,
      routingDecision: freezeDecision({
        executionTarget: "cloud",
        policy,
        cloudProviderId: providerId,
        cloudModel: cloudOpts.model,
      }),
    }
  }

  /**
   * Pull the first local token (raced against maxLocalLatencyMs when bounded).
   * A token in time keeps the stream on-device; a timeout or start-up error
   * closes the local stream and selects a cloud stream instead.
   */
  private async streamHybridAuto(request: RoutingRequest, policy: RoutingPolicy): Promise<SelectedStream> {
    const localAbort = new AbortController()
    const unlink = linkAbort(request.signal, localAbort)
    const options = optionsWithConfidence(request.options, policy.confidenceThreshold)

    let iterator: AsyncIterator<string> | undefined
    let outcome: RaceOutcome<IteratorResult<string>>
    try {
      const local = this.local.generateStream(request.prompt, options, { signal: localAbort.signal })[Symbol.asyncIterator]()
      iterator = local
      outcome = await raceAgainstTimeout(() => local.next(), policy.maxLocalLatencyMs, {
        signal: request.signal,
        clock: this.clock,
      })
    } catch (err) {
      if (isRoutingError(err, "REQUEST_CANCELLED")) {
        unlink()
        closeQuietly(iterator)
        throw err
      }
      outcome = { kind: "failed", error: err, elapsedMs: 0 }
    }

    let reason: HandoffReason
    switch (outcome.kind) {
      case "completed": {
        const first = outcome.value
        const decision = freezeDecision({ executionTarget: "on_device", policy })
        if (first.done || !iterator) {
          unlink()
          return { stream: emptyStream(), routingDecision: decision }
        }
        return { stream: prependToken(first.value, iterator, unlink), routingDecision: decision }
      }
      case "timeout":
        this.events.publish(createLatencyTimeoutEvent({
          maxLatencyMs: policy.maxLocalLatencyMs,
          actualLatencyMs: outcome.elapsedMs,
          streaming: true,
        }, { sessionId: this.sessionId }))
        reason = "first_token_low_confidence"
        break
      case "failed":
        console.warn(`[routing] local stream failed to start, falling back to cloud: ${errorMessage(outcome.error)}`)
        reason = "rolling_window_degradation"
        break
    }

    localAbort.abort(requestCancelled("local stream superseded by cloud fallback"))
    unlink()
    closeQuietly(iterator)

    const cloud = await this.streamCloud(request, policy)
    return {
      stream: cloud.stream,
      routingDecision: freezeDecision({
        executionTarget: "hybrid_fallback",
        policy,
        onDeviceConfidence: 0,
        cloudHandoffTriggered: true,
        handoffReason: reason,
        cloudProviderId: cloud.routingDecision.cloudProviderId,
        cloudModel: cloud.routingDecision.cloudModel,
      }),
    }
  }

  // --- Telemetry ---

  private emitRoutingTelemetry(
    decision: RoutingDecision,
    latencyMs: number,
    estimatedCostUSD: number | undefined,
    streaming: boolean,
  ): void {
    this.events.publish(createRoutingEvent({
      routingMode: decision.policy.mode,
      executionTarget: decision.executionTarget,
      confidence: decision.onDeviceConfidence,
      cloudHandoffTriggered: decision.cloudHandoffTriggered,
      handoffReason: decision.handoffReason,
      cloudProviderId: decision.cloudProviderId,
      cloudModel: decision.cloudModel,
      latencyMs,
      estimatedCostUSD,
      streaming,
    }, { sessionId: this.sessionId }))
  }
}

// --- Helpers ---

function optionsWithConfidence(options: LLMGenerationOptions | undefined, threshold: number): LLMGenerationOptions {
  return { ...options, confidenceThreshold: threshold }
}

/**
 * Local results request a handoff when they say so explicitly or report a
 * confidence below the policy threshold.
 */
function wrapLocalResult(result: LLMGenerationResult, policy: RoutingPolicy): RoutedGenerationResult {
  const lowConfidence = result.confidence !== undefined && result.confidence < policy.confidenceThreshold
  const handoff = result.handoffRequested === true || lowConfidence
  const reported = result.handoffReason !== undefined && result.handoffReason !== "none" ? result.handoffReason : undefined
  const handoffReason: HandoffReason = handoff ? reported ?? "rolling_window_degradation" : "none"

  return {
    generationResult: {
      ...result,
      framework: result.framework ?? "local",
      handoffRequested: handoff,
      handoffReason,
    },
    routingDecision: freezeDecision({
      executionTarget: "on_device",
      policy,
      onDeviceConfidence: result.confidence ?? 1.0,
      cloudHandoffTriggered: handoff,
      handoffReason,
    }),
  }
}

function freezeDecision(
  fields: Pick<RoutingDecision, "executionTarget" | "policy"> & Partial<RoutingDecision>,
): RoutingDecision {
  return Object.freeze({
    onDeviceConfidence: 1.0,
    cloudHandoffTriggered: false,
    handoffReason: "none" as const,
    ...fields,
  })
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw requestCancelled(signal.reason)
}

async function* prependToken(
  first: string,
  iterator: AsyncIterator<string>,
  onFinish: () => void,
): AsyncGenerator<string> {
  try {
    yield first
    while (true) {
      const next = await iterator.next()
      if (next.done) return
      yield next.value
    }
  } finally {
    onFinish()
    // Consumer stopped early: let the local stream release its resources
    await iterator.return?.()
  }
}

async function* emptyStream(): AsyncGenerator<string> {
  // no tokens
}

function closeQuietly(iterator: AsyncIterator<string> | undefined): void {
  iterator?.return?.().catch((err: unknown) => {
    console.warn(`[routing] closing local stream failed: ${errorMessage(err)}`)
  })
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

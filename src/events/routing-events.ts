// src/events/routing-events.ts — Core event kinds emitted by the routing layer
//
// Closed set of fixed-shape records. Each carries typed fields for in-process
// subscribers plus the flattened `properties` map used by telemetry.

import { ulid } from "ulid"
import type { EventCategory, EventDestination, EventProperties, SDKEvent } from "./types.js"
import { toProperties } from "./types.js"
import type { ExecutionTarget, HandoffReason, RoutingMode } from "../cloud/types.js"

// --- Event Kinds ---

export interface RoutingEvent extends SDKEvent {
  readonly type: "routing_decision"
  readonly routingMode: RoutingMode
  readonly executionTarget: ExecutionTarget
  readonly confidence: number
  readonly cloudHandoffTriggered: boolean
  readonly handoffReason: HandoffReason
  readonly cloudProviderId?: string
  readonly cloudModel?: string
  readonly latencyMs: number
  readonly estimatedCostUSD?: number
  readonly streaming: boolean
}

export interface CloudCostEvent extends SDKEvent {
  readonly type: "cloud_cost"
  readonly providerId: string
  readonly model?: string
  readonly inputTokens: number
  readonly outputTokens: number
  readonly costUSD: number
  readonly cumulativeTotalUSD: number
}

export interface ProviderFailoverEvent extends SDKEvent {
  readonly type: "provider_failover"
  readonly providerId: string
  readonly error: string
  readonly consecutiveFailures: number
  readonly circuitOpened: boolean
}

export interface LatencyTimeoutEvent extends SDKEvent {
  readonly type: "latency_timeout"
  readonly maxLatencyMs: number
  readonly actualLatencyMs: number
  readonly streaming: boolean
}

export type CoreEvent = RoutingEvent | CloudCostEvent | ProviderFailoverEvent | LatencyTimeoutEvent

export type CoreEventType = CoreEvent["type"]

const CORE_EVENT_TYPES: ReadonlySet<string> = new Set<CoreEventType>([
  "routing_decision",
  "cloud_cost",
  "provider_failover",
  "latency_timeout",
])

export function isCoreEvent(event: SDKEvent): event is CoreEvent {
  return CORE_EVENT_TYPES.has(event.type)
}

// --- Factories ---

interface Envelope {
  id: string
  category: EventCategory
  timestamp: number
  sessionId?: string
  destination: EventDestination
  properties: EventProperties
}

interface EnvelopeOptions {
  sessionId?: string
  timestamp?: number
}

function envelope(
  category: EventCategory,
  properties: Record<string, string | number | boolean | undefined>,
  options: EnvelopeOptions,
): Envelope {
  return {
    id: ulid(),
    category,
    timestamp: options.timestamp ?? Date.now(),
    sessionId: options.sessionId,
    destination: "all",
    properties: Object.freeze(toProperties(properties)),
  }
}

export function createRoutingEvent(
  fields: Omit<RoutingEvent, keyof SDKEvent>,
  options: EnvelopeOptions = {},
): RoutingEvent {
  return Object.freeze({
    ...envelope("llm", {
      routing_mode: fields.routingMode,
      execution_target: fields.executionTarget,
      confidence: fields.confidence,
      cloud_handoff_triggered: fields.cloudHandoffTriggered,
      handoff_reason: fields.handoffReason,
      cloud_provider_id: fields.cloudProviderId,
      cloud_model: fields.cloudModel,
      latency_ms: fields.latencyMs.toFixed(1),
      estimated_cost_usd: fields.estimatedCostUSD?.toFixed(6),
      streaming: fields.streaming,
    }, options),
    type: "routing_decision" as const,
    ...fields,
  })
}

export function createCloudCostEvent(
  fields: Omit<CloudCostEvent, keyof SDKEvent>,
  options: EnvelopeOptions = {},
): CloudCostEvent {
  return Object.freeze({
    ...envelope("performance", {
      provider_id: fields.providerId,
      model: fields.model,
      input_tokens: fields.inputTokens,
      output_tokens: fields.outputTokens,
      cost_usd: fields.costUSD.toFixed(6),
      cumulative_total_usd: fields.cumulativeTotalUSD.toFixed(6),
    }, options),
    type: "cloud_cost" as const,
    ...fields,
  })
}

export function createProviderFailoverEvent(
  fields: Omit<ProviderFailoverEvent, keyof SDKEvent>,
  options: EnvelopeOptions = {},
): ProviderFailoverEvent {
  return Object.freeze({
    ...envelope("network", {
      provider_id: fields.providerId,
      error: fields.error,
      consecutive_failures: fields.consecutiveFailures,
      circuit_opened: fields.circuitOpened,
    }, options),
    type: "provider_failover" as const,
    ...fields,
  })
}

export function createLatencyTimeoutEvent(
  fields: Omit<LatencyTimeoutEvent, keyof SDKEvent>,
  options: EnvelopeOptions = {},
): LatencyTimeoutEvent {
  return Object.freeze({
    ...envelope("performance", {
      max_latency_ms: fields.maxLatencyMs,
      actual_latency_ms: fields.actualLatencyMs.toFixed(1),
      streaming: fields.streaming,
    }, options),
    type: "latency_timeout" as const,
    ...fields,
  })
}

/**
 * SDK event contract.
 *
 * Every event the core emits is a frozen value implementing `SDKEvent`. The
 * `destination` tag decides where the Event Router delivers it: the live
 * subscriber bus, the telemetry pipeline, or both. `properties` is the
 * flattened, insertion-ordered string map that telemetry serializes.
 */

import { ulid } from "ulid"

// ---------------------------------------------------------------------------
// Categories & destinations
// ---------------------------------------------------------------------------

export type EventCategory =
  | "sdk"
  | "llm"
  | "model"
  | "network"
  | "performance"
  | "error"

export type EventDestination = "public_only" | "analytics_only" | "all"

/** Insertion-ordered string→string map; JS object key order is insertion order for non-index keys. */
export type EventProperties = Readonly<Record<string, string>>

// ---------------------------------------------------------------------------
// SDKEvent
// ---------------------------------------------------------------------------

export interface SDKEvent {
  /** ULID, unique per occurrence */
  readonly id: string
  /** Event type tag (e.g. "routing_decision") */
  readonly type: string
  readonly category: EventCategory
  /** Unix milliseconds */
  readonly timestamp: number
  readonly sessionId?: string
  readonly destination: EventDestination
  readonly properties: EventProperties
}

export interface CreateEventOptions {
  sessionId?: string
  destination?: EventDestination
  timestamp?: number
}

/**
 * Build a generic SDK event. Destination defaults to "all".
 * The returned value and its properties are frozen.
 */
export function createSDKEvent(
  type: string,
  category: EventCategory,
  properties: Record<string, string>,
  options: CreateEventOptions = {},
): SDKEvent {
  return Object.freeze({
    id: ulid(),
    type,
    category,
    timestamp: options.timestamp ?? Date.now(),
    sessionId: options.sessionId,
    destination: options.destination ?? "all",
    properties: Object.freeze({ ...properties }),
  })
}

// ---------------------------------------------------------------------------
// Serialization (telemetry wire shape)
// ---------------------------------------------------------------------------

export interface SerializedEvent {
  id: string
  type: string
  category: EventCategory
  timestamp: number
  session_id?: string
  destination: EventDestination
  properties: Record<string, string>
}

/** Flatten an event into the shape handed to the telemetry sink. Typed extras are dropped. */
export function serializeEvent(event: SDKEvent): SerializedEvent {
  const serialized: SerializedEvent = {
    id: event.id,
    type: event.type,
    category: event.category,
    timestamp: event.timestamp,
    destination: event.destination,
    properties: { ...event.properties },
  }
  if (event.sessionId !== undefined) {
    serialized.session_id = event.sessionId
  }
  return serialized
}

// ---------------------------------------------------------------------------
// Property helpers
// ---------------------------------------------------------------------------

/**
 * Drop undefined values and stringify the rest, preserving key order.
 * Numbers are rendered with `String()`; booleans as "true"/"false".
 */
export function toProperties(
  values: Record<string, string | number | boolean | undefined>,
): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(values)) {
    if (value === undefined) continue
    out[key] = String(value)
  }
  return out
}

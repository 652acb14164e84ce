// src/events/router.ts — Dual-destination Event Router
//
// One publish entry point for every event kind. The destination tag decides
// delivery:
//   public_only    → live subscribers
//   analytics_only → telemetry sink
//   all            → both
// Subscriber delivery is synchronous and isolated per handler. Telemetry
// hand-off happens on a later microtask and is never awaited by publishers.

import { ulid } from "ulid"
import type { SDKEvent } from "./types.js"
import { serializeEvent } from "./types.js"
import type { TelemetrySink } from "./telemetry-sink.js"
import { isCoreEvent, type CoreEvent, type CoreEventType } from "./routing-events.js"

export type EventHandler = (event: SDKEvent) => void

export interface EventRouterOptions {
  sink?: TelemetrySink | null
}

export class EventRouter {
  private subscribers = new Map<string, EventHandler>()
  private sink: TelemetrySink | null
  private inFlight = new Set<Promise<void>>()

  constructor(options: EventRouterOptions = {}) {
    this.sink = options.sink ?? null
  }

  /** Replace the telemetry sink. `null` disables telemetry delivery. */
  setTelemetrySink(sink: TelemetrySink | null): void {
    this.sink = sink
  }

  subscribe(handler: EventHandler): string {
    const id = ulid()
    this.subscribers.set(id, handler)
    return id
  }

  unsubscribe(subscriptionId: string): boolean {
    return this.subscribers.delete(subscriptionId)
  }

  /** Subscribe to a single core event kind with a narrowed handler. */
  on<T extends CoreEventType>(
    type: T,
    handler: (event: Extract<CoreEvent, { type: T }>) => void,
  ): string {
    return this.subscribe((event) => {
      if (isCoreEvent(event) && isOfType(event, type)) {
        handler(event)
      }
    })
  }

  get subscriberCount(): number {
    return this.subscribers.size
  }

  publish(event: SDKEvent): void {
    if (event.destination !== "analytics_only") {
      this.deliverPublic(event)
    }
    if (event.destination !== "public_only") {
      this.dispatchTelemetry(event)
    }
  }

  /** Wait for every telemetry hand-off started so far to settle. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight))
    }
  }

  /** Clear all subscribers. Intended for test isolation. */
  reset(): void {
    this.subscribers.clear()
  }

  // --- Private ---

  private deliverPublic(event: SDKEvent): void {
    // Snapshot so handlers may (un)subscribe while we iterate
    const handlers = Array.from(this.subscribers.values())
    for (const handler of handlers) {
      try {
        handler(event)
      } catch (err) {
        console.warn(`[events] subscriber threw on ${event.type}: ${errorMessage(err)}`)
      }
    }
  }

  private dispatchTelemetry(event: SDKEvent): void {
    const sink = this.sink
    if (!sink) return

    const delivery: Promise<void> = Promise.resolve()
      .then(() => sink.send(serializeEvent(event)))
      .catch((err: unknown) => {
        console.warn(`[events] telemetry delivery failed for ${event.type} (${event.id}): ${errorMessage(err)}`)
      })
      .finally(() => {
        this.inFlight.delete(delivery)
      })
    this.inFlight.add(delivery)
  }
}

function isOfType<T extends CoreEventType>(
  event: CoreEvent,
  type: T,
): event is Extract<CoreEvent, { type: T }> {
  return event.type === type
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

// src/boot/routing-core-boot.ts — Wires the routing core from configuration
//
// config → event router (+ HTTP telemetry sink when an endpoint is set)
//        → cost tracker → failover chain → provider manager → engine

import type { RoutingCoreConfig } from "../config.js"
import { EventRouter } from "../events/router.js"
import { HttpTelemetrySink } from "../events/telemetry-sink.js"
import { ResilientHttpClient, type FetchLike } from "../shared/http-client.js"
import { CloudCostTracker } from "../cloud/cost-tracker.js"
import { ProviderFailoverChain } from "../cloud/failover-chain.js"
import { CloudProviderManager } from "../cloud/provider-manager.js"
import { PricingTable } from "../cloud/pricing.js"
import { RoutingEngine } from "../cloud/routing-engine.js"
import type { CloudProvider, LocalCapability } from "../cloud/types.js"

export interface ProviderRegistration {
  provider: CloudProvider
  /** Failover priority; higher is tried first (default: 0) */
  priority?: number
  makeDefault?: boolean
}

export interface RoutingCoreDeps {
  local: LocalCapability
  providers?: ProviderRegistration[]
  pricing?: PricingTable
  /** Transport override for the telemetry client */
  fetchImpl?: FetchLike
  clock?: () => number
}

export interface RoutingCore {
  engine: RoutingEngine
  events: EventRouter
  costTracker: CloudCostTracker
  failoverChain: ProviderFailoverChain
  providers: CloudProviderManager
  telemetry: HttpTelemetrySink | null
  /** Drain pending telemetry and stop the flush timer */
  shutdown(): Promise<void>
}

export function createRoutingCore(config: RoutingCoreConfig, deps: RoutingCoreDeps): RoutingCore {
  let telemetry: HttpTelemetrySink | null = null
  if (config.telemetry.endpoint) {
    const http = new ResilientHttpClient(
      {
        maxRetries: config.telemetry.maxRetries,
        baseDelayMs: 500,
        redactPatterns: config.telemetry.apiKey ? [new RegExp(escapeRegExp(config.telemetry.apiKey), "g")] : [],
      },
      deps.fetchImpl,
    )
    telemetry = new HttpTelemetrySink(http, {
      endpoint: config.telemetry.endpoint,
      apiKey: config.telemetry.apiKey,
      batchSize: config.telemetry.batchSize,
      flushIntervalMs: config.telemetry.flushIntervalMs,
    })
    console.log(`[boot] telemetry enabled: endpoint=${config.telemetry.endpoint}, batch=${config.telemetry.batchSize}`)
  } else {
    console.log("[boot] telemetry disabled (TELEMETRY_ENDPOINT not set)")
  }

  const events = new EventRouter({ sink: telemetry })
  const costTracker = new CloudCostTracker()
  const failoverChain = new ProviderFailoverChain(config.failover, {
    clock: deps.clock,
    events,
    sessionId: config.sessionId,
  })
  const providers = new CloudProviderManager()

  for (const reg of deps.providers ?? []) {
    providers.register(reg.provider, { makeDefault: reg.makeDefault })
    failoverChain.addProvider(reg.provider, reg.priority ?? 0)
  }

  const engine = new RoutingEngine({
    local: deps.local,
    events,
    costTracker,
    failoverChain: providers.size > 0 ? failoverChain : null,
    providers,
    defaultPolicy: config.policy,
    cloudDefaults: config.cloud,
    pricing: deps.pricing,
    sessionId: config.sessionId,
    clock: deps.clock,
  })

  console.log(
    `[boot] routing core ready: mode=${config.policy.mode}, providers=${failoverChain.providers().join(",") || "none"}`,
  )

  return {
    engine,
    events,
    costTracker,
    failoverChain,
    providers,
    telemetry,
    async shutdown() {
      await events.drain()
      if (telemetry) {
        const result = await telemetry.shutdown()
        console.log(`[boot] telemetry flushed: sent=${result.sent}, dropped=${result.dropped}`)
      }
    },
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

// src/index.ts — Public surface of the hybrid routing core

// Routing
export { RoutingEngine, DEFAULT_CLOUD_DEFAULTS } from "./cloud/routing-engine.js"
export type { RoutingEngineOptions } from "./cloud/routing-engine.js"
export { DEFAULT_ROUTING_POLICY, RoutingPolicySchema, resolvePolicy, validatePolicy } from "./cloud/policy.js"
export type { RoutingPolicyInput } from "./cloud/policy.js"
export { raceAgainstTimeout, linkAbort } from "./cloud/latency-race.js"
export type { RaceOutcome, RaceOptions } from "./cloud/latency-race.js"
export { measureStream } from "./cloud/measured-stream.js"
export type { MeasuredStream, StreamMeasureOptions } from "./cloud/measured-stream.js"
export type * from "./cloud/types.js"

// Cloud providers and spend
export { CloudProviderManager } from "./cloud/provider-manager.js"
export { ProviderFailoverChain } from "./cloud/failover-chain.js"
export type {
  FailoverChainConfig,
  FailoverChainOptions,
  ProviderEntry,
  ProviderHealth,
  StreamSelection,
} from "./cloud/failover-chain.js"
export { CloudCostTracker, usdToMicro } from "./cloud/cost-tracker.js"
export type { CostSummary } from "./cloud/cost-tracker.js"
export {
  DEFAULT_PRICING,
  PricingTable,
  calculateCostMicro,
  calculateTotalCostMicro,
  estimateCostUSD,
  estimatePromptTokens,
  findPricing,
  microToUSD,
} from "./cloud/pricing.js"
export type { MicroPricingEntry, TokenUsage } from "./cloud/pricing.js"

// Errors
export {
  RoutingError,
  isRoutingError,
  budgetExceeded,
  latencyTimeout,
  localGenerationFailed,
  noProviderAvailable,
  requestCancelled,
} from "./cloud/errors.js"
export type { RoutingErrorCode } from "./cloud/errors.js"

// Events
export { EventRouter } from "./events/router.js"
export type { EventHandler, EventRouterOptions } from "./events/router.js"
export { createSDKEvent, serializeEvent } from "./events/types.js"
export type {
  CreateEventOptions,
  EventCategory,
  EventDestination,
  EventProperties,
  SDKEvent,
  SerializedEvent,
} from "./events/types.js"
export {
  createCloudCostEvent,
  createLatencyTimeoutEvent,
  createProviderFailoverEvent,
  createRoutingEvent,
  isCoreEvent,
} from "./events/routing-events.js"
export type {
  CloudCostEvent,
  CoreEvent,
  CoreEventType,
  LatencyTimeoutEvent,
  ProviderFailoverEvent,
  RoutingEvent,
} from "./events/routing-events.js"
export { HttpTelemetrySink } from "./events/telemetry-sink.js"
export type { FlushResult, HttpTelemetrySinkConfig, TelemetrySink } from "./events/telemetry-sink.js"

// Transport
export { ResilientHttpClient } from "./shared/http-client.js"
export type { FetchLike, HttpRequest, HttpResponse, IHttpClient, ResilientHttpConfig } from "./shared/http-client.js"

// Config and boot
export { loadConfig } from "./config.js"
export type { Env, RoutingCoreConfig } from "./config.js"
export { createRoutingCore } from "./boot/routing-core-boot.js"
export type { ProviderRegistration, RoutingCore, RoutingCoreDeps } from "./boot/routing-core-boot.js"

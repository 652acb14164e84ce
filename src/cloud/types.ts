// src/cloud/types.ts — Routing, local capability and cloud provider types

// --- Routing Policy ---

export type RoutingMode = "always_local" | "always_cloud" | "hybrid_auto" | "hybrid_manual"

export interface RoutingPolicy {
  readonly mode: RoutingMode
  /** 0.0–1.0; local results below this request a cloud handoff */
  readonly confidenceThreshold: number
  /** Local time budget in ms for hybrid_auto. 0 = unbounded */
  readonly maxLocalLatencyMs: number
  /** Cumulative cloud spend cap in USD. 0 = unbounded */
  readonly costCapUSD: number
}

// --- Routing Decision ---

export type ExecutionTarget = "on_device" | "cloud" | "hybrid_fallback"

export type HandoffReason = "none" | "first_token_low_confidence" | "rolling_window_degradation"

export interface RoutingDecision {
  readonly executionTarget: ExecutionTarget
  readonly policy: RoutingPolicy
  /** Confidence reported by the local capability; 1.0 when not measured */
  readonly onDeviceConfidence: number
  readonly cloudHandoffTriggered: boolean
  readonly handoffReason: HandoffReason
  readonly cloudProviderId?: string
  readonly cloudModel?: string
}

// --- Local Capability ---

export interface LLMGenerationOptions {
  maxTokens?: number
  temperature?: number
  topP?: number
  stopSequences?: string[]
  systemPrompt?: string
  /** Injected by the routing engine from the active policy */
  confidenceThreshold?: number
}

export interface LLMGenerationResult {
  text: string
  /** Output tokens */
  tokensUsed: number
  inputTokens?: number
  modelUsed?: string
  latencyMs?: number
  /** "local" for on-device results, "cloud" for results produced by a cloud provider */
  framework?: string
  tokensPerSecond?: number
  /** Streaming only: request start to first token */
  timeToFirstTokenMs?: number
  /** Self-reported confidence (0.0–1.0) */
  confidence?: number
  handoffRequested?: boolean
  handoffReason?: HandoffReason
}

export interface CallOptions {
  signal?: AbortSignal
}

/** On-device inference capability consumed by the routing engine */
export interface LocalCapability {
  generate(prompt: string, options: LLMGenerationOptions, call?: CallOptions): Promise<LLMGenerationResult>
  generateStream(prompt: string, options: LLMGenerationOptions, call?: CallOptions): AsyncIterable<string>
}

// --- Cloud Provider ---

export interface CloudGenerationOptions {
  model: string
  maxTokens: number
  temperature: number
  systemPrompt?: string
}

export interface CloudGenerationResult {
  text: string
  inputTokens: number
  outputTokens: number
  latencyMs: number
  providerId: string
  model: string
  estimatedCostUSD?: number
}

export interface CloudProvider {
  readonly providerId: string
  readonly displayName: string
  generate(prompt: string, options: CloudGenerationOptions, call?: CallOptions): Promise<CloudGenerationResult>
  generateStream(prompt: string, options: CloudGenerationOptions, call?: CallOptions): AsyncIterable<string>
  isAvailable(): Promise<boolean>
}

/** Defaults applied when building CloudGenerationOptions from local options */
export interface CloudDefaults {
  model: string
  maxTokens: number
  temperature: number
}

// --- Routed Results ---

export interface RoutedGenerationResult {
  generationResult: LLMGenerationResult
  routingDecision: RoutingDecision
}

export interface RoutedStreamingResult {
  stream: AsyncIterable<string>
  /** Settles once the stream ends: text, token count and timings; rejects if the stream fails */
  result: Promise<LLMGenerationResult>
  routingDecision: RoutingDecision
}

export interface RoutingRequest {
  prompt: string
  options?: LLMGenerationOptions
  /** Per-call override of the engine default */
  policy?: Partial<RoutingPolicy>
  /** Route cloud calls to this provider instead of the failover chain */
  cloudProviderId?: string
  cloudModel?: string
  /** Caller's projection of the request cost, used by the budget pre-check */
  estimatedCostUSD?: number
  signal?: AbortSignal
}

// tests/routing/helpers.ts — In-process fakes for the local capability and cloud providers

import type {
  CallOptions,
  CloudGenerationOptions,
  CloudGenerationResult,
  CloudProvider,
  LLMGenerationOptions,
  LLMGenerationResult,
  LocalCapability,
} from "../../src/cloud/types.js"

/** Resolve after `ms`, or reject with the signal's reason when it aborts first. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason)
      return
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort)
      resolve()
    }, ms)
    const onAbort = (): void => {
      clearTimeout(timer)
      reject(signal?.reason)
    }
    signal?.addEventListener("abort", onAbort, { once: true })
  })
}

// --- Local capability ---

export interface FakeLocalBehavior {
  result?: Partial<LLMGenerationResult>
  error?: Error
  delayMs?: number
  tokens?: string[]
  /** Delay before the first streamed token */
  firstTokenDelayMs?: number
}

export class FakeLocal implements LocalCapability {
  generateCalls: Array<{ prompt: string; options: LLMGenerationOptions }> = []
  streamCalls = 0
  abortedSignals = 0
  streamClosed = false

  constructor(public behavior: FakeLocalBehavior = {}) {}

  async generate(prompt: string, options: LLMGenerationOptions, call?: CallOptions): Promise<LLMGenerationResult> {
    this.generateCalls.push({ prompt, options })
    call?.signal?.addEventListener("abort", () => { this.abortedSignals++ }, { once: true })
    if (this.behavior.delayMs) await delay(this.behavior.delayMs, call?.signal)
    if (this.behavior.error) throw this.behavior.error
    return {
      text: `local:${prompt}`,
      tokensUsed: 5,
      ...this.behavior.result,
    }
  }

  async *generateStream(_prompt: string, _options: LLMGenerationOptions, call?: CallOptions): AsyncGenerator<string> {
    this.streamCalls++
    try {
      if (this.behavior.firstTokenDelayMs) await delay(this.behavior.firstTokenDelayMs, call?.signal)
      if (this.behavior.error) throw this.behavior.error
      for (const token of this.behavior.tokens ?? ["local-a", "local-b"]) {
        yield token
      }
    } finally {
      this.streamClosed = true
    }
  }
}

// --- Cloud provider ---

export interface FakeProviderBehavior {
  fail?: boolean
  available?: boolean
  delayMs?: number
  inputTokens?: number
  outputTokens?: number
  estimatedCostUSD?: number
  tokens?: string[]
}

export class FakeCloudProvider implements CloudProvider {
  readonly displayName: string
  calls = 0
  streamCalls = 0
  lastOptions?: CloudGenerationOptions

  constructor(
    readonly providerId: string,
    public behavior: FakeProviderBehavior = {},
  ) {
    this.displayName = `Fake ${providerId}`
  }

  async generate(prompt: string, options: CloudGenerationOptions, call?: CallOptions): Promise<CloudGenerationResult> {
    this.calls++
    this.lastOptions = options
    if (this.behavior.delayMs) await delay(this.behavior.delayMs, call?.signal)
    if (this.behavior.fail) throw new Error(`${this.providerId} unavailable`)
    return {
      text: `${this.providerId}:${prompt}`,
      inputTokens: this.behavior.inputTokens ?? 10,
      outputTokens: this.behavior.outputTokens ?? 20,
      latencyMs: 100,
      providerId: this.providerId,
      model: options.model,
      estimatedCostUSD: this.behavior.estimatedCostUSD,
    }
  }

  async *generateStream(_prompt: string, _options: CloudGenerationOptions): AsyncGenerator<string> {
    this.streamCalls++
    for (const token of this.behavior.tokens ?? [`${this.providerId}-1`, `${this.providerId}-2`]) {
      yield token
    }
  }

  async isAvailable(): Promise<boolean> {
    return this.behavior.available ?? !this.behavior.fail
  }
}

export async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = []
  for await (const token of stream) out.push(token)
  return out
}

/** Manually advanced clock for circuit-breaker tests */
export class ManualClock {
  constructor(public now = 1_000_000) {}
  advance(ms: number): void {
    this.now += ms
  }
  readonly read = (): number => this.now
}

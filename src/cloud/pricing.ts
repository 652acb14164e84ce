// src/cloud/pricing.ts — Integer Micro-USD Pricing Table
// All prices in micro-USD per million tokens. 1 USD = 1,000,000 micro-USD.
// Costs are computed in integers and converted to USD once at the boundary.

// --- Types ---

export interface MicroPricingEntry {
  provider: string
  model: string
  input_micro_per_million: number   // micro-USD per 1M input tokens
  output_micro_per_million: number  // micro-USD per 1M output tokens
}

export interface TokenUsage {
  inputTokens: number
  outputTokens: number
}

/** Rough chars-per-token ratio used when only the prompt text is known */
export const CHARS_PER_TOKEN = 4

// --- Cost Calculation ---

/**
 * Cost in micro-USD, rounded up so estimates never undershoot.
 * Throws if the intermediate product leaves the safe integer range.
 */
export function calculateCostMicro(tokens: number, priceMicroPerMillion: number): number {
  const product = tokens * priceMicroPerMillion
  if (product > Number.MAX_SAFE_INTEGER) {
    throw new Error(`cost overflow: tokens(${tokens}) * price(${priceMicroPerMillion}) exceeds MAX_SAFE_INTEGER`)
  }
  return Math.ceil(product / 1_000_000)
}

export function calculateTotalCostMicro(usage: TokenUsage, pricing: MicroPricingEntry): number {
  return calculateCostMicro(usage.inputTokens, pricing.input_micro_per_million)
    + calculateCostMicro(usage.outputTokens, pricing.output_micro_per_million)
}

export function microToUSD(micro: number): number {
  return micro / 1_000_000
}

export function estimateCostUSD(usage: TokenUsage, pricing: MicroPricingEntry): number {
  return microToUSD(calculateTotalCostMicro(usage, pricing))
}

/** Token estimate for a prompt string: ceil(chars / 4) */
export function estimatePromptTokens(prompt: string): number {
  return Math.ceil(prompt.length / CHARS_PER_TOKEN)
}

// --- Default Pricing Table ---

export const DEFAULT_PRICING: readonly MicroPricingEntry[] = [
  // OpenAI
  {
    provider: "openai",
    model: "gpt-4o",
    input_micro_per_million: 2_500_000,   // $2.50/1M input
    output_micro_per_million: 10_000_000, // $10.00/1M output
  },
  {
    provider: "openai",
    model: "gpt-4o-mini",
    input_micro_per_million: 150_000,     // $0.15/1M input
    output_micro_per_million: 600_000,    // $0.60/1M output
  },
  // Anthropic
  {
    provider: "anthropic",
    model: "claude-3-5-sonnet",
    input_micro_per_million: 3_000_000,
    output_micro_per_million: 15_000_000,
  },
  {
    provider: "anthropic",
    model: "claude-3-5-haiku",
    input_micro_per_million: 800_000,
    output_micro_per_million: 4_000_000,
  },
]

// --- Lookup ---

/** Exact provider:model match first, then the first entry for the model under any provider */
export function findPricing(
  provider: string | undefined,
  model: string,
  entries: readonly MicroPricingEntry[] = DEFAULT_PRICING,
): MicroPricingEntry | undefined {
  if (provider !== undefined) {
    const exact = entries.find(e => e.provider === provider && e.model === model)
    if (exact) return exact
  }
  return entries.find(e => e.model === model)
}

export class PricingTable {
  private entries: MicroPricingEntry[]

  constructor(entries: readonly MicroPricingEntry[] = DEFAULT_PRICING) {
    this.entries = [...entries]
  }

  /** Add or replace the entry for provider:model */
  set(entry: MicroPricingEntry): void {
    this.entries = this.entries.filter(e => !(e.provider === entry.provider && e.model === entry.model))
    this.entries.push(entry)
  }

  find(provider: string | undefined, model: string): MicroPricingEntry | undefined {
    return findPricing(provider, model, this.entries)
  }

  /** Cost in USD for a known model, undefined when the model is not priced */
  costUSD(provider: string | undefined, model: string, usage: TokenUsage): number | undefined {
    const pricing = this.find(provider, model)
    return pricing ? estimateCostUSD(usage, pricing) : undefined
  }
}

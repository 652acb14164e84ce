// src/cloud/errors.ts — Typed routing errors

/** Error codes for routing operations */
export type RoutingErrorCode =
  | "BUDGET_EXCEEDED"
  | "NO_PROVIDER_AVAILABLE"
  | "LATENCY_TIMEOUT"
  | "LOCAL_GENERATION_FAILED"
  | "PROVIDER_NOT_FOUND"
  | "INVALID_POLICY"
  | "INVALID_USAGE"
  | "CONFIG_INVALID"
  | "REQUEST_CANCELLED"

/** Typed error for all routing operations */
export class RoutingError extends Error {
  readonly name = "RoutingError"
  readonly code: RoutingErrorCode
  readonly context: Record<string, unknown>

  constructor(code: RoutingErrorCode, message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(`[routing] ${code}: ${message}`, options)
    this.code = code
    this.context = context
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    }
  }
}

export function isRoutingError(err: unknown, code?: RoutingErrorCode): err is RoutingError {
  return err instanceof RoutingError && (code === undefined || err.code === code)
}

// --- Constructors ---

export function budgetExceeded(currentUSD: number, capUSD: number, projectedUSD: number): RoutingError {
  return new RoutingError(
    "BUDGET_EXCEEDED",
    `cloud spend $${currentUSD.toFixed(6)} + projected $${projectedUSD.toFixed(6)} exceeds cap $${capUSD.toFixed(6)}`,
    { currentUSD, capUSD, projectedUSD },
  )
}

export function noProviderAvailable(lastError?: Error): RoutingError {
  return new RoutingError(
    "NO_PROVIDER_AVAILABLE",
    lastError ? `all cloud providers failed or are circuit-open (last: ${lastError.message})` : "no cloud provider available",
    { lastError },
    { cause: lastError },
  )
}

export function latencyTimeout(maxMs: number, actualMs: number): RoutingError {
  return new RoutingError(
    "LATENCY_TIMEOUT",
    `local generation exceeded ${maxMs}ms (${actualMs.toFixed(1)}ms elapsed)`,
    { maxMs, actualMs },
  )
}

export function localGenerationFailed(cause: unknown): RoutingError {
  const message = cause instanceof Error ? cause.message : String(cause)
  return new RoutingError("LOCAL_GENERATION_FAILED", message, { cause }, { cause })
}

export function requestCancelled(reason?: unknown): RoutingError {
  return new RoutingError("REQUEST_CANCELLED", "routing request was cancelled", { reason }, { cause: reason })
}

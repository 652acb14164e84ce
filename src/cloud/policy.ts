// src/cloud/policy.ts — Routing policy defaults, schema and resolution

import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { RoutingError } from "./errors.js"
import type { RoutingPolicy } from "./types.js"

export const RoutingPolicySchema = Type.Object({
  mode: Type.Union([
    Type.Literal("always_local"),
    Type.Literal("always_cloud"),
    Type.Literal("hybrid_auto"),
    Type.Literal("hybrid_manual"),
  ]),
  confidenceThreshold: Type.Number({ minimum: 0, maximum: 1 }),
  maxLocalLatencyMs: Type.Integer({ minimum: 0 }),
  costCapUSD: Type.Number({ minimum: 0 }),
})

export type RoutingPolicyInput = Static<typeof RoutingPolicySchema>

export const DEFAULT_ROUTING_POLICY: RoutingPolicy = Object.freeze({
  mode: "hybrid_manual",
  confidenceThreshold: 0.7,
  maxLocalLatencyMs: 0,
  costCapUSD: 0,
})

/** Throws INVALID_POLICY with the first schema violation. */
export function validatePolicy(candidate: unknown): RoutingPolicy {
  if (Value.Check(RoutingPolicySchema, candidate)) {
    return Object.freeze({ ...candidate })
  }
  const first = Value.Errors(RoutingPolicySchema, candidate).First()
  const detail = first ? `${first.path || "/"}: ${first.message}` : "invalid policy"
  throw new RoutingError("INVALID_POLICY", detail, { policy: candidate })
}

/**
 * Merge a per-call override onto a base policy and freeze the result.
 * The returned value is the request's own copy.
 */
export function resolvePolicy(base: RoutingPolicy, override?: Partial<RoutingPolicy>): RoutingPolicy {
  const merged: Record<string, unknown> = { ...base }
  if (override) {
    for (const [key, value] of Object.entries(override)) {
      if (value !== undefined) merged[key] = value
    }
  }
  return validatePolicy(merged)
}

// src/config.ts — Configuration loader from environment variables

import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { RoutingError } from "./cloud/errors.js"
import { RoutingPolicySchema } from "./cloud/policy.js"

const RoutingCoreConfigSchema = Type.Object({
  policy: RoutingPolicySchema,
  failover: Type.Object({
    failureThreshold: Type.Integer({ minimum: 1 }),
    cooldownMs: Type.Integer({ minimum: 0 }),
  }),
  cloud: Type.Object({
    model: Type.String({ minLength: 1 }),
    maxTokens: Type.Integer({ minimum: 1 }),
    temperature: Type.Number({ minimum: 0, maximum: 2 }),
  }),
  telemetry: Type.Object({
    /** Collector URL; telemetry is disabled when absent */
    endpoint: Type.Optional(Type.String({ minLength: 1 })),
    apiKey: Type.Optional(Type.String()),
    batchSize: Type.Integer({ minimum: 1 }),
    flushIntervalMs: Type.Integer({ minimum: 0 }),
    maxRetries: Type.Integer({ minimum: 0 }),
  }),
  sessionId: Type.Optional(Type.String({ minLength: 1 })),
})

export type RoutingCoreConfig = Static<typeof RoutingCoreConfigSchema>

export type Env = Record<string, string | undefined>

/** Parse an integer from an environment variable, failing fast on NaN. */
function parseIntEnv(env: Env, key: string, fallback: number): number {
  const raw = env[key]
  if (raw === undefined || raw.trim() === "") return fallback
  const value = Number(raw)
  if (!Number.isInteger(value)) {
    throw new RoutingError("CONFIG_INVALID", `${key} must be a valid integer (got "${raw}")`, { key, value: raw })
  }
  return value
}

function parseFloatEnv(env: Env, key: string, fallback: number): number {
  const raw = env[key]
  if (raw === undefined || raw.trim() === "") return fallback
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new RoutingError("CONFIG_INVALID", `${key} must be a valid number (got "${raw}")`, { key, value: raw })
  }
  return value
}

function optionalEnv(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim()
  return raw ? raw : undefined
}

export function loadConfig(env: Env = process.env): RoutingCoreConfig {
  const candidate = {
    policy: {
      mode: optionalEnv(env, "ROUTING_MODE") ?? "hybrid_manual",
      confidenceThreshold: parseFloatEnv(env, "ROUTING_CONFIDENCE_THRESHOLD", 0.7),
      maxLocalLatencyMs: parseIntEnv(env, "ROUTING_MAX_LOCAL_LATENCY_MS", 0),
      costCapUSD: parseFloatEnv(env, "ROUTING_COST_CAP_USD", 0),
    },
    failover: {
      failureThreshold: parseIntEnv(env, "FAILOVER_THRESHOLD", 3),
      cooldownMs: parseIntEnv(env, "FAILOVER_COOLDOWN_MS", 60_000),
    },
    cloud: {
      model: optionalEnv(env, "CLOUD_DEFAULT_MODEL") ?? "gpt-4o-mini",
      maxTokens: parseIntEnv(env, "CLOUD_DEFAULT_MAX_TOKENS", 1024),
      temperature: parseFloatEnv(env, "CLOUD_DEFAULT_TEMPERATURE", 0.7),
    },
    telemetry: {
      endpoint: optionalEnv(env, "TELEMETRY_ENDPOINT"),
      apiKey: optionalEnv(env, "TELEMETRY_API_KEY"),
      batchSize: parseIntEnv(env, "TELEMETRY_BATCH_SIZE", 20),
      flushIntervalMs: parseIntEnv(env, "TELEMETRY_FLUSH_INTERVAL_MS", 5_000),
      maxRetries: parseIntEnv(env, "TELEMETRY_MAX_RETRIES", 2),
    },
    sessionId: optionalEnv(env, "SESSION_ID"),
  }

  if (Value.Check(RoutingCoreConfigSchema, candidate)) {
    return candidate
  }

  const first = Value.Errors(RoutingCoreConfigSchema, candidate).First()
  const detail = first ? `${first.path}: ${first.message}` : "invalid configuration"
  throw new RoutingError("CONFIG_INVALID", detail, { path: first?.path })
}

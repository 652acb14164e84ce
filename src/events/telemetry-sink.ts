// src/events/telemetry-sink.ts — Telemetry sink contract + batched HTTP sink
//
// The Event Router hands serialized events to a TelemetrySink off the calling
// path. HttpTelemetrySink buffers them and POSTs batches to a collector.
// Delivery is best-effort: a failed batch is logged and dropped.

import type { SerializedEvent } from "./types.js"
import type { IHttpClient } from "../shared/http-client.js"

export interface TelemetrySink {
  send(event: SerializedEvent): void | Promise<void>
}

export interface HttpTelemetrySinkConfig {
  endpoint: string
  apiKey?: string
  /** Flush when this many events are buffered (default: 20) */
  batchSize?: number
  /** Periodic flush interval in ms; 0 disables the timer (default: 5000) */
  flushIntervalMs?: number
  /** Events beyond this are dropped oldest-first (default: 1000) */
  maxBufferSize?: number
}

const DEFAULT_BATCH_SIZE = 20
const DEFAULT_FLUSH_INTERVAL_MS = 5_000
const DEFAULT_MAX_BUFFER_SIZE = 1_000

export interface FlushResult {
  sent: number
  dropped: number
}

export class HttpTelemetrySink implements TelemetrySink {
  private buffer: SerializedEvent[] = []
  private config: Required<Omit<HttpTelemetrySinkConfig, "apiKey">> & { apiKey?: string }
  private timer: ReturnType<typeof setInterval> | null = null
  private flushing: Promise<FlushResult> | null = null
  private closed = false

  constructor(
    private readonly http: IHttpClient,
    config: HttpTelemetrySinkConfig,
  ) {
    this.config = {
      endpoint: config.endpoint,
      apiKey: config.apiKey,
      batchSize: config.batchSize ?? DEFAULT_BATCH_SIZE,
      flushIntervalMs: config.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS,
      maxBufferSize: config.maxBufferSize ?? DEFAULT_MAX_BUFFER_SIZE,
    }

    if (this.config.flushIntervalMs > 0) {
      this.timer = setInterval(() => {
        this.flush().catch((err: unknown) => {
          console.warn(`[telemetry] periodic flush failed: ${err instanceof Error ? err.message : String(err)}`)
        })
      }, this.config.flushIntervalMs)
      this.timer.unref()
    }
  }

  get pending(): number {
    return this.buffer.length
  }

  async send(event: SerializedEvent): Promise<void> {
    if (this.closed) return

    this.buffer.push(event)
    if (this.buffer.length > this.config.maxBufferSize) {
      const overflow = this.buffer.length - this.config.maxBufferSize
      this.buffer.splice(0, overflow)
      console.warn(`[telemetry] buffer full, dropped ${overflow} oldest event(s)`)
    }

    if (this.buffer.length >= this.config.batchSize) {
      await this.flush()
    }
  }

  /**
   * POST everything buffered, one batch at a time.
   * Concurrent callers share the flush in progress.
   */
  flush(): Promise<FlushResult> {
    if (this.flushing) return this.flushing
    this.flushing = this.flushAll().finally(() => {
      this.flushing = null
    })
    return this.flushing
  }

  /** Stop the timer and flush what is left. Later sends are ignored. */
  async shutdown(): Promise<FlushResult> {
    this.closed = true
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    return this.flush()
  }

  // --- Private ---

  private async flushAll(): Promise<FlushResult> {
    const result: FlushResult = { sent: 0, dropped: 0 }

    while (this.buffer.length > 0) {
      const batch = this.buffer.splice(0, this.config.batchSize)
      try {
        await this.post(batch)
        result.sent += batch.length
      } catch (err) {
        result.dropped += batch.length
        console.warn(`[telemetry] dropped batch of ${batch.length}: ${err instanceof Error ? err.message : String(err)}`)
      }
    }

    return result
  }

  private async post(batch: SerializedEvent[]): Promise<void> {
    const headers: Record<string, string> = { "Content-Type": "application/json" }
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`
    }

    const res = await this.http.request({
      url: this.config.endpoint,
      method: "POST",
      headers,
      body: JSON.stringify({ events: batch }),
    })

    if (res.status < 200 || res.status >= 300) {
      throw new Error(`collector rejected batch: HTTP ${res.status}`)
    }
  }
}

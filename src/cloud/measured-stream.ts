// src/cloud/measured-stream.ts — Token stream pass-through with a final generation result
//
// Passes every token through unchanged while counting them. When the stream
// ends (or the consumer stops early) `result` resolves with the text seen so
// far and its timings; when the stream throws, `result` rejects with the same
// error the consumer receives.

import type { LLMGenerationResult } from "./types.js"

export interface StreamMeasureOptions {
  framework: "local" | "cloud"
  modelUsed?: string
  /** Clock reading when the request started; latencies are measured from it */
  startedAt: number
  clock: () => number
}

export interface MeasuredStream {
  stream: AsyncIterable<string>
  result: Promise<LLMGenerationResult>
}

class Deferred<T> {
  readonly promise: Promise<T>
  resolve: (value: T) => void = () => {}
  reject: (reason: unknown) => void = () => {}

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve
      this.reject = reject
    })
  }
}

export function measureStream(source: AsyncIterable<string>, opts: StreamMeasureOptions): MeasuredStream {
  const deferred = new Deferred<LLMGenerationResult>()
  // Failures also reach the consumer through the stream; an unread result stays quiet
  void deferred.promise.catch(() => undefined)

  async function* measured(): AsyncGenerator<string> {
    let text = ""
    let tokens = 0
    let firstTokenAt: number | undefined

    try {
      for await (const token of source) {
        if (firstTokenAt === undefined) firstTokenAt = opts.clock()
        text += token
        tokens++
        yield token
      }
    } catch (err) {
      deferred.reject(err)
      throw err
    } finally {
      // No-op after a rejection
      const latencyMs = opts.clock() - opts.startedAt
      deferred.resolve({
        text,
        tokensUsed: tokens,
        modelUsed: opts.modelUsed,
        latencyMs,
        timeToFirstTokenMs: firstTokenAt === undefined ? undefined : firstTokenAt - opts.startedAt,
        framework: opts.framework,
        tokensPerSecond: latencyMs > 0 ? tokens / (latencyMs / 1000) : 0,
      })
    }
  }

  return { stream: measured(), result: deferred.promise }
}

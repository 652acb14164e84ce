// src/shared/http-client.ts
// ResilientHttpClient: fetch wrapper with exponential backoff for transient failures.
// 5xx, 429 and network errors are retried; other 4xx responses are returned as-is.

export interface HttpRequest {
  url: string
  method: "GET" | "POST" | "PUT" | "DELETE"
  headers?: Record<string, string>
  body?: string
}

export interface HttpResponse {
  status: number
  headers: Record<string, string>
  body: string
}

export interface IHttpClient {
  request(req: HttpRequest): Promise<HttpResponse>
}

export interface ResilientHttpConfig {
  maxRetries: number
  baseDelayMs: number
  /** Patterns scrubbed from error messages (API keys, tokens) */
  redactPatterns: RegExp[]
}

export type FetchLike = (url: string, init: { method: string; headers?: Record<string, string>; body?: string }) => Promise<Response>

export class ResilientHttpClient implements IHttpClient {
  constructor(
    private readonly config: ResilientHttpConfig,
    private readonly fetchImpl: FetchLike = (url, init) => fetch(url, init),
    private readonly sleep: (ms: number) => Promise<void> = (ms) => new Promise(r => setTimeout(r, ms)),
  ) {}

  async request(req: HttpRequest): Promise<HttpResponse> {
    let lastError: Error | undefined

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = this.config.baseDelayMs * Math.pow(2, attempt - 1)
        await this.sleep(delay)
      }

      try {
        const resp = await this.fetchImpl(req.url, {
          method: req.method,
          headers: req.headers,
          body: req.body,
        })

        const body = await resp.text()
        const headers: Record<string, string> = {}
        resp.headers.forEach((v, k) => { headers[k] = v })

        const transient = resp.status >= 500 || resp.status === 429
        if (transient && attempt < this.config.maxRetries) {
          lastError = new Error(this.redact(`HTTP ${resp.status}: ${body.slice(0, 200)}`))
          continue
        }

        return { status: resp.status, headers, body }
      } catch (err) {
        lastError = new Error(this.redact(err instanceof Error ? err.message : String(err)))
        if (attempt >= this.config.maxRetries) break
      }
    }

    throw lastError ?? new Error("Request failed after retries")
  }

  private redact(message: string): string {
    let out = message
    for (const pattern of this.config.redactPatterns) {
      out = out.replace(pattern, "[REDACTED]")
    }
    return out
  }
}

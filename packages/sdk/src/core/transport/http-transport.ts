import {
  additiveJitter,
  createBackoff,
  type DelayPolicy,
  exponential,
  type RandomSource,
  systemRandom,
} from "@renderscreenshot/backoff"
import { type Clock, SystemClock } from "@renderscreenshot/clock"
import { type Logger, NullLogger } from "@renderscreenshot/logger"
import {
  createRetryExecutor,
  type RetryConfig,
  type RetryExecutor,
} from "@renderscreenshot/retry"
import { isJsonObject, type JsonObject } from "../../ports/json"
import type {
  BinaryResponse,
  BodyRequestOptions,
  HttpTransport,
  QueryRequestOptions,
} from "../../ports/transport"
import { ApiError } from "../errors/api-error"
import { classifyResponse } from "../errors/classify"
import { isRetryableError } from "../errors/predicates"
import { toNetworkError } from "./network-error"
import {
  MAX_RETRY_DELAY_MS,
  parseOptions,
  type TransportOptions,
  type TransportOptionsInput,
  transportOptionsSchema,
} from "./transport-options"

export type HttpTransportDeps = {
  clock?: Clock
  logger?: Logger
  fetch?: typeof fetch
  random?: RandomSource
}

type Method = "GET" | "POST" | "DELETE"

type PreparedRequest = {
  method: Method
  path: string
  url: string
  headers: Headers
  body: string | undefined
  signal: AbortSignal | undefined
}

type RawResponse = {
  status: number
  headers: Headers
  body: Uint8Array
}

export function createHttpTransport(
  deps: HttpTransportDeps,
  options: TransportOptionsInput,
): HttpTransport {
  return new FetchHttpTransport(deps, parseOptions(transportOptionsSchema, options))
}

const decoder = new TextDecoder()

function decodeJsonObject(body: Uint8Array): JsonObject {
  const text = decoder.decode(body)
  if (text.length === 0) return {}

  try {
    const parsed: unknown = JSON.parse(text)
    return isJsonObject(parsed) ? parsed : { body: text }
  } catch {
    return { body: text }
  }
}

function decodeErrorBody(body: Uint8Array): unknown {
  try {
    return JSON.parse(decoder.decode(body))
  } catch {
    return {}
  }
}

export class FetchHttpTransport implements HttpTransport {
  readonly baseUrl: string

  private readonly clock: Clock
  private readonly logger: Logger
  private readonly fetch: typeof fetch
  private readonly executor: RetryExecutor
  private readonly backoff: DelayPolicy

  constructor(
    deps: HttpTransportDeps,
    private readonly options: TransportOptions,
  ) {
    this.baseUrl = options.baseUrl
    this.clock = deps.clock ?? new SystemClock()
    this.logger = (deps.logger ?? new NullLogger()).child({ module: "http-transport" })
    this.fetch = deps.fetch ?? ((input, init) => fetch(input, init))
    this.executor = createRetryExecutor({ clock: this.clock })

    const { retryDelayMs } = options
    this.backoff = createBackoff({
      delay: exponential({ base: { milliseconds: retryDelayMs } }),
      jitter: additiveJitter(
        { spread: { milliseconds: retryDelayMs * 0.5 } },
        deps.random ?? systemRandom,
      ),
      min: { milliseconds: 0 },
      max: { milliseconds: MAX_RETRY_DELAY_MS },
    })
  }

  async get(path: string, options: QueryRequestOptions = {}): Promise<JsonObject> {
    const raw = await this.send(this.prepare("GET", path, options))
    return decodeJsonObject(raw.body)
  }

  async post(path: string, options: BodyRequestOptions = {}): Promise<JsonObject> {
    const raw = await this.send(this.prepare("POST", path, options))
    return decodeJsonObject(raw.body)
  }

  async delete(path: string, options: QueryRequestOptions = {}): Promise<JsonObject> {
    const raw = await this.send(this.prepare("DELETE", path, options))
    return decodeJsonObject(raw.body)
  }

  async getBinary(path: string, options: QueryRequestOptions = {}): Promise<BinaryResponse> {
    const raw = await this.send(this.prepare("GET", path, options))
    return { body: raw.body, headers: raw.headers }
  }

  async postBinary(path: string, options: BodyRequestOptions = {}): Promise<BinaryResponse> {
    const raw = await this.send(this.prepare("POST", path, options))
    return { body: raw.body, headers: raw.headers }
  }

  private prepare(
    method: Method,
    path: string,
    options: QueryRequestOptions & BodyRequestOptions,
  ): PreparedRequest {
    const body = this.serializeBody(options.body)

    const headers = new Headers({
      Authorization: `Bearer ${this.options.apiKey}`,
      "User-Agent": this.options.userAgent,
    })
    if (body !== undefined) {
      headers.set("Content-Type", "application/json")
    }
    for (const [name, value] of Object.entries(options.headers ?? {})) {
      headers.set(name, value)
    }

    const query = new URLSearchParams(options.query).toString()
    const url = `${this.baseUrl}${path}${query ? `?${query}` : ""}`

    return { method, path, url, headers, body, signal: options.signal }
  }

  private serializeBody(body: unknown): string | undefined {
    if (body === undefined) return undefined

    try {
      return JSON.stringify(body)
    } catch (err) {
      throw ApiError.invalidRequest("failed to serialize request body", 0, err)
    }
  }

  private async send(req: PreparedRequest): Promise<RawResponse> {
    const log = this.logger.child({ method: req.method, path: req.path })

    const config: RetryConfig<RawResponse> = {
      maxAttempts: this.options.maxRetries + 1,
      delay: this.backoff,
      delayHint: {
        delayFor: (error) =>
          error instanceof ApiError && error.retryAfter > 0
            ? error.retryAfter * 1000
            : undefined,
      },
      errorPredicate: { shouldRetry: (error) => isRetryableError(error) },
      observer: {
        onAttempt: (ctx) => log.debug("sending request", { attempt: ctx.attempt }),
        onRetry: (error, info) =>
          log.warn("retrying request", {
            attempt: info.attempt,
            delayMs: info.nextDelayMs,
            ...(error instanceof ApiError && { code: error.code, status: error.httpStatus }),
          }),
        onExhausted: (error, info) => {
          if (isRetryableError(error)) {
            log.error("request failed after retries", { attempt: info.attempt, err: error })
          } else {
            log.debug("request failed", { attempt: info.attempt, err: error })
          }
        },
      },
      ...(req.signal && { signal: req.signal }),
    }

    return this.executor.execute(() => this.attempt(req), config)
  }

  private async attempt(req: PreparedRequest): Promise<RawResponse> {
    const startedAt = this.clock.nowMs()
    const raw = await this.exchange(req)

    this.logger.trace("response received", {
      method: req.method,
      path: req.path,
      status: raw.status,
      durationMs: this.clock.nowMs() - startedAt,
    })

    if (raw.status >= 400) {
      throw classifyResponse({
        status: raw.status,
        body: decodeErrorBody(raw.body),
        retryAfter: raw.headers.get("Retry-After"),
        requestId: raw.headers.get("X-Request-Id"),
      })
    }

    return raw
  }

  private async exchange(req: PreparedRequest): Promise<RawResponse> {
    const timeoutSignal = AbortSignal.timeout(this.options.timeoutMs)
    const signal = req.signal ? AbortSignal.any([req.signal, timeoutSignal]) : timeoutSignal

    try {
      const response = await this.fetch(req.url, {
        method: req.method,
        headers: req.headers,
        signal,
        ...(req.body !== undefined && { body: req.body }),
      })
      const body = new Uint8Array(await response.arrayBuffer())

      return { status: response.status, headers: response.headers, body }
    } catch (err) {
      throw toNetworkError(err, timeoutSignal, req.signal)
    }
  }
}

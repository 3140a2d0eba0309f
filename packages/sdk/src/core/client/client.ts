import type { JsonObject } from "../../ports/json"
import type { BinaryResponse, HttpTransport, RequestOptions } from "../../ports/transport"
import { buildSignedUrl } from "../signing/request-signer"
import { createHttpTransport, type HttpTransportDeps } from "../transport/http-transport"
import { parseOptions } from "../transport/transport-options"
import { CacheManager } from "./cache-manager"
import { type ClientOptions, type ClientOptionsInput, clientOptionsSchema } from "./client-options"

/** Screenshot parameters as the API accepts them, e.g. `{ url, width, format }` */
export type ScreenshotParams = Readonly<Record<string, unknown>>

export type BatchRequest = {
  url: string
  options?: ScreenshotParams
}

export type GenerateUrlOptions = {
  expiresAt: Date
  /** Overrides the client's signingKey */
  signingKey?: string
  /** Overrides the client's publicKeyId */
  publicKeyId?: string
}

const SCREENSHOT_PATH = "/v1/screenshot"
const BATCH_PATH = "/v1/batch"

/**
 * Entry point to the RenderScreenshot API.
 *
 * @example
 * ```ts
 * const client = new RenderScreenshotClient({ apiKey: "rs_live_..." })
 * const png = await client.take({ url: "https://example.com", width: 1280 })
 * ```
 */
export class RenderScreenshotClient {
  private readonly options: ClientOptions
  private readonly transport: HttpTransport
  private cacheManager: CacheManager | undefined

  constructor(options: ClientOptionsInput, deps: HttpTransportDeps = {}) {
    this.options = parseOptions(clientOptionsSchema, options)
    this.transport = createHttpTransport(deps, this.options)
  }

  get baseUrl(): string {
    return this.transport.baseUrl
  }

  /** Renders a screenshot and returns the image or PDF bytes. */
  async take(params: ScreenshotParams, options: RequestOptions = {}): Promise<Uint8Array> {
    const response = await this.takeWithHeaders(params, options)
    return response.body
  }

  /** Like `take`, keeping response headers such as cache and usage metadata. */
  async takeWithHeaders(
    params: ScreenshotParams,
    options: RequestOptions = {},
  ): Promise<BinaryResponse> {
    return this.transport.postBinary(SCREENSHOT_PATH, { ...options, body: params })
  }

  /** Renders a screenshot and returns its JSON description (hosted image URL etc.). */
  async takeJson(params: ScreenshotParams, options: RequestOptions = {}): Promise<JsonObject> {
    return this.transport.post(SCREENSHOT_PATH, {
      ...options,
      body: params,
      headers: { Accept: "application/json", ...options.headers },
    })
  }

  /**
   * Builds a signed screenshot URL that can be handed to browsers without
   * exposing the API key.
   */
  generateUrl(params: Readonly<Record<string, string>>, options: GenerateUrlOptions): string {
    return buildSignedUrl({
      baseUrl: this.baseUrl,
      params,
      expiresAt: options.expiresAt,
      secret: options.signingKey || this.options.signingKey || "",
      keyId: options.publicKeyId || this.options.publicKeyId || "",
    })
  }

  /** Queues the same options for several URLs. */
  async batch(
    urls: readonly string[],
    batchOptions?: ScreenshotParams,
    options: RequestOptions = {},
  ): Promise<JsonObject> {
    return this.transport.post(BATCH_PATH, {
      ...options,
      body: { urls, ...(batchOptions && { options: batchOptions }) },
    })
  }

  /** Queues URLs with per-URL options. */
  async batchAdvanced(
    requests: readonly BatchRequest[],
    options: RequestOptions = {},
  ): Promise<JsonObject> {
    const formatted = requests.map((req) => ({
      url: req.url,
      ...Object.fromEntries(
        Object.entries(req.options ?? {}).filter(([key]) => key !== "url"),
      ),
    }))

    return this.transport.post(BATCH_PATH, { ...options, body: { requests: formatted } })
  }

  async getBatch(batchId: string, options: RequestOptions = {}): Promise<JsonObject> {
    return this.transport.get(`${BATCH_PATH}/${encodeURIComponent(batchId)}`, options)
  }

  async presets(options: RequestOptions = {}): Promise<JsonObject> {
    return this.transport.get("/v1/presets", options)
  }

  async preset(presetId: string, options: RequestOptions = {}): Promise<JsonObject> {
    return this.transport.get(`/v1/presets/${encodeURIComponent(presetId)}`, options)
  }

  async devices(options: RequestOptions = {}): Promise<JsonObject> {
    return this.transport.get("/v1/devices", options)
  }

  async usage(options: RequestOptions = {}): Promise<JsonObject> {
    return this.transport.get("/v1/usage", options)
  }

  get cache(): CacheManager {
    this.cacheManager ??= new CacheManager(this.transport)
    return this.cacheManager
  }
}

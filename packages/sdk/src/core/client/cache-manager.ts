import type { JsonObject } from "../../ports/json"
import type { HttpTransport, RequestOptions } from "../../ports/transport"
import { isNotFound } from "../errors/predicates"

const PURGE_PATH = "/v1/cache/purge"

function cachePath(key: string): string {
  return `/v1/cache/${encodeURIComponent(key)}`
}

/** RFC 3339, UTC, whole seconds */
function formatInstant(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z")
}

export class CacheManager {
  constructor(private readonly transport: HttpTransport) {}

  /** Cached screenshot bytes, or null when the key is unknown. */
  async get(key: string, options: RequestOptions = {}): Promise<Uint8Array | null> {
    try {
      const response = await this.transport.getBinary(cachePath(key), options)
      return response.body
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }
  }

  /** False when the key was already absent. */
  async delete(key: string, options: RequestOptions = {}): Promise<boolean> {
    try {
      await this.transport.delete(cachePath(key), options)
      return true
    } catch (err) {
      if (isNotFound(err)) return false
      throw err
    }
  }

  async purge(keys: readonly string[], options: RequestOptions = {}): Promise<JsonObject> {
    return this.transport.post(PURGE_PATH, { ...options, body: { keys } })
  }

  /** Purges entries whose source URL matches a glob pattern. */
  async purgeUrl(pattern: string, options: RequestOptions = {}): Promise<JsonObject> {
    return this.transport.post(PURGE_PATH, { ...options, body: { url: pattern } })
  }

  async purgeBefore(before: Date, options: RequestOptions = {}): Promise<JsonObject> {
    return this.transport.post(PURGE_PATH, {
      ...options,
      body: { before: formatInstant(before) },
    })
  }

  /** Purges entries whose storage path matches a glob pattern. */
  async purgePattern(pattern: string, options: RequestOptions = {}): Promise<JsonObject> {
    return this.transport.post(PURGE_PATH, { ...options, body: { pattern } })
  }
}

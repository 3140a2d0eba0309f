import type { JsonObject } from "./json"

export type BinaryResponse = {
  body: Uint8Array
  headers: Headers
}

export type RequestOptions = {
  /** Merged last; may override the defaults */
  headers?: Record<string, string>
  signal?: AbortSignal
}

export type QueryRequestOptions = RequestOptions & {
  query?: Record<string, string>
}

export type BodyRequestOptions = RequestOptions & {
  /** Serialized as JSON */
  body?: unknown
}

/**
 * Authenticated HTTP access to the API.
 *
 * Every method either resolves with the decoded response or rejects with an
 * `ApiError` (or an `AbortError` when the caller's signal fires).
 */
export interface HttpTransport {
  readonly baseUrl: string

  get(path: string, options?: QueryRequestOptions): Promise<JsonObject>
  post(path: string, options?: BodyRequestOptions): Promise<JsonObject>
  delete(path: string, options?: QueryRequestOptions): Promise<JsonObject>
  getBinary(path: string, options?: QueryRequestOptions): Promise<BinaryResponse>
  postBinary(path: string, options?: BodyRequestOptions): Promise<BinaryResponse>
}

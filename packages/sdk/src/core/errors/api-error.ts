import { BaseError } from "@renderscreenshot/errors"
import { type ApiErrorCode, isRetryableCode } from "./error-codes"

export type ApiErrorInit = {
  /** 0 when no HTTP exchange completed */
  httpStatus: number
  code: ApiErrorCode
  requestId?: string
  /** Seconds; 0 when the server gave no hint */
  retryAfter?: number
  cause?: unknown
}

function isRetryable(code: string, httpStatus: number): boolean {
  return isRetryableCode(code) || (httpStatus >= 500 && httpStatus <= 599)
}

/**
 * The single error shape surfaced by every SDK operation.
 */
export class ApiError extends BaseError<ApiErrorCode> {
  readonly httpStatus: number
  readonly requestId: string | undefined
  readonly retryAfter: number

  constructor(message: string, init: ApiErrorInit) {
    const retryAfter = init.retryAfter ?? 0

    super(message, {
      code: init.code,
      cause: init.cause,
      isRetryable: isRetryable(init.code, init.httpStatus),
      context: {
        httpStatus: init.httpStatus,
        retryAfter,
        ...(init.requestId ? { requestId: init.requestId } : {}),
      },
    })

    this.httpStatus = init.httpStatus
    this.requestId = init.requestId || undefined
    this.retryAfter = retryAfter
  }

  static timeout(cause: unknown): ApiError {
    return new ApiError("Request timed out", { httpStatus: 408, code: "timeout", cause })
  }

  static connection(detail: string, cause: unknown): ApiError {
    return new ApiError(`Failed to connect to server: ${detail}`, {
      httpStatus: 0,
      code: "connection_error",
      cause,
    })
  }

  static invalidRequest(message: string, httpStatus: number, cause?: unknown): ApiError {
    return new ApiError(message, {
      httpStatus,
      code: "invalid_request",
      ...(cause !== undefined && { cause }),
    })
  }

  static unauthorized(message: string, httpStatus: number): ApiError {
    return new ApiError(message, { httpStatus, code: "unauthorized" })
  }

  /** `renderscreenshot: <message> (status=…, code=…, request_id=…)` */
  describe(): string {
    const prefix = `renderscreenshot: ${this.message}`

    if (this.requestId) {
      return `${prefix} (status=${this.httpStatus}, code=${this.code}, request_id=${this.requestId})`
    }
    if (this.httpStatus > 0) {
      return `${prefix} (status=${this.httpStatus}, code=${this.code})`
    }
    return `${prefix} (code=${this.code})`
  }

  override toString(): string {
    return this.describe()
  }
}

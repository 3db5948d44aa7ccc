import type { z } from "zod"
import logger from "../config/logger"
import { DEFAULT_NWS_API_BASE, DEFAULT_USER_AGENT } from "../config/env"

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>

export interface NWSClientOptions {
  baseUrl?: string
  userAgent?: string
  fetch?: FetchFn
}

export class NWSRequestError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = "NWSRequestError"
  }
}

/**
 * 美国国家气象局 API 的请求封装。
 * 实例无状态，可被多个并发的工具调用共享。
 */
export class NWSClient {
  readonly baseUrl: string
  private readonly headers: Record<string, string>
  private readonly fetchFn: FetchFn

  constructor(options: NWSClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_NWS_API_BASE
    this.headers = {
      "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
      Accept: "application/geo+json",
    }
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init))
  }

  // GET 请求并按 schema 严格解析 JSON，任何失败都抛出 NWSRequestError
  async request<T>(url: string, schema: z.ZodType<T>): Promise<T> {
    logger.info(`Making request to: ${url}`)

    let response: Response
    try {
      response = await this.fetchFn(url, { headers: this.headers })
    } catch (error) {
      throw new NWSRequestError(`Request failed: ${errorMessage(error)}`, url, undefined, { cause: error })
    }

    logger.debug(`Received response: ${response.status} ${response.statusText} (${url})`)

    // 只有 200 视为成功，其余 2xx 同样按失败处理
    if (response.status !== 200) {
      throw new NWSRequestError(`Request failed with status: ${response.status}`, url, response.status)
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      throw new NWSRequestError(`Failed to parse response: ${errorMessage(error)}`, url, response.status, {
        cause: error,
      })
    }

    const parsed = schema.safeParse(body)
    if (!parsed.success) {
      throw new NWSRequestError(`Failed to parse response: ${parsed.error.message}`, url, response.status, {
        cause: parsed.error,
      })
    }
    return parsed.data
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

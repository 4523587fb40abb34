import type { Milliseconds } from "@repoproxy/clock"
import {
  DEFAULT_CONTENT_TYPE,
  fingerprintFromHeaders,
  type UpstreamProbe,
} from "../model/cache.model"
import { ProxyError } from "../model/proxy.errors"
import type { UpstreamClient } from "../services/upstream-client"

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>

export type UpstreamClientFetchDeps = {
  /** @default globalThis.fetch */
  fetch?: FetchFn
}

export type UpstreamClientFetchOptions = {
  probeTimeoutMs: Milliseconds
  /** Bounds the wait for response headers. */
  fetchTimeoutMs: Milliseconds
  /**
   * Longest pause between two body chunks of a GET before the download is
   * aborted.
   * @default fetchTimeoutMs
   */
  bodyIdleTimeoutMs?: Milliseconds
  userAgent?: string
}

export class UpstreamClientFetch implements UpstreamClient {
  private readonly fetchFn: FetchFn

  constructor(
    deps: UpstreamClientFetchDeps,
    private readonly opts: UpstreamClientFetchOptions,
  ) {
    this.fetchFn = deps.fetch ?? ((input, init) => fetch(input, init))
  }

  async probe(url: string): Promise<UpstreamProbe> {
    const response = await this.send(url, "HEAD", this.opts.probeTimeoutMs, new AbortController())

    return {
      ...fingerprintFromHeaders(response.headers),
      contentType: response.headers.get("content-type") ?? DEFAULT_CONTENT_TYPE,
    }
  }

  /** The returned body errors with `upstream_unreachable` when it stalls. */
  async fetch(url: string): Promise<Response> {
    const controller = new AbortController()
    const response = await this.send(url, "GET", this.opts.fetchTimeoutMs, controller)

    if (response.body === null) return response

    const idleMs = this.opts.bodyIdleTimeoutMs ?? this.opts.fetchTimeoutMs

    const body = withIdleTimeout(response.body, idleMs, () => {
      const error = ProxyError.upstreamUnreachable({
        url,
        method: "GET",
        cause: new Error(`No body data within ${idleMs}ms`),
      })
      controller.abort(error)
      return error
    })

    return new Response(body, {
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
    })
  }

  private async send(
    url: string,
    method: "HEAD" | "GET",
    timeoutMs: Milliseconds,
    controller: AbortController,
  ): Promise<Response> {
    const timer = setTimeout(() => {
      controller.abort(new Error(`No response headers within ${timeoutMs}ms`))
    }, timeoutMs)

    try {
      return await this.fetchFn(url, {
        method,
        headers: this.requestHeaders(),
        redirect: "follow",
        signal: controller.signal,
      })
    } catch (err) {
      throw ProxyError.upstreamUnreachable({ url, method, cause: err })
    } finally {
      clearTimeout(timer)
    }
  }

  private requestHeaders(): Record<string, string> {
    return {
      "Accept-Encoding": "identity",
      ...(this.opts.userAgent !== undefined && { "User-Agent": this.opts.userAgent }),
    }
  }
}

/**
 * Re-emits `body`, erroring the stream and cancelling the source when no
 * chunk arrives within `idleMs`.
 */
function withIdleTimeout(
  body: ReadableStream<Uint8Array>,
  idleMs: Milliseconds,
  onTimeout: () => Error,
): ReadableStream<Uint8Array> {
  const reader = body.getReader()

  return new ReadableStream<Uint8Array>({
    pull: async (controller) => {
      const result = await readWithin(reader, idleMs)

      if (result === "timeout") {
        const error = onTimeout()
        controller.error(error)
        await reader.cancel(error)
        return
      }

      if (result.done) {
        controller.close()
        return
      }

      controller.enqueue(result.value)
    },
    cancel: async (reason) => {
      await reader.cancel(reason)
    },
  })
}

async function readWithin(
  reader: ReadableStreamDefaultReader<Uint8Array>,
  ms: Milliseconds,
): Promise<ReadableStreamReadResult<Uint8Array> | "timeout"> {
  let timer: ReturnType<typeof setTimeout> | undefined

  const timeout = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), ms)
  })

  try {
    return await Promise.race([reader.read(), timeout])
  } finally {
    clearTimeout(timer)
  }
}

import {
  DEFAULT_CONTENT_TYPE,
  fingerprintFromHeaders,
  type UpstreamProbe,
} from "../domains/proxy/model/cache.model"
import { ProxyError } from "../domains/proxy/model/proxy.errors"
import type { UpstreamClient } from "../domains/proxy/services/upstream-client"

export type FakeResource = {
  body: string
  status?: number
  statusText?: string
  headers?: Record<string, string>
}

/** In-process upstream. Records every probe and fetch by URL. */
export class FakeUpstream implements UpstreamClient {
  readonly probes: string[] = []
  readonly fetches: string[] = []

  private readonly resources = new Map<string, FakeResource>()
  private readonly unreachable = new Set<string>()

  serve(url: string, resource: FakeResource): this {
    this.resources.set(url, resource)
    this.unreachable.delete(url)
    return this
  }

  disconnect(url: string): this {
    this.unreachable.add(url)
    return this
  }

  async probe(url: string): Promise<UpstreamProbe> {
    this.probes.push(url)

    if (this.unreachable.has(url)) {
      throw ProxyError.upstreamUnreachable({ url, method: "HEAD", cause: new Error("ECONNREFUSED") })
    }

    const headers = this.headersFor(url)

    return {
      ...fingerprintFromHeaders(headers),
      contentType: headers.get("content-type") ?? DEFAULT_CONTENT_TYPE,
    }
  }

  async fetch(url: string): Promise<Response> {
    this.fetches.push(url)

    if (this.unreachable.has(url)) {
      throw ProxyError.upstreamUnreachable({ url, method: "GET", cause: new Error("ECONNREFUSED") })
    }

    const resource = this.resources.get(url)

    if (!resource) return new Response("missing", { status: 404, statusText: "Not Found" })

    return new Response(resource.body, {
      status: resource.status ?? 200,
      statusText: resource.statusText ?? "OK",
      headers: this.headersFor(url),
    })
  }

  private headersFor(url: string): Headers {
    const resource = this.resources.get(url)
    if (!resource) return new Headers()

    return new Headers({
      "content-length": String(new TextEncoder().encode(resource.body).byteLength),
      ...resource.headers,
    })
  }
}

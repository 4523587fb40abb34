import type { UpstreamProbe } from "../model/cache.model"

export interface UpstreamClient {
  /**
   * Header-only request. Rejects with `upstream_unreachable` on transport
   * failure or timeout; the response status is not evaluated.
   */
  probe(url: string): Promise<UpstreamProbe>

  /**
   * Full request. Rejects with `upstream_unreachable` on transport failure or
   * when headers do not arrive in time; any status resolves.
   */
  fetch(url: string): Promise<Response>
}

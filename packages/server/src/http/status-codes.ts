import type { ContentfulStatusCode } from "hono/utils/http-status"

/** Status codes that may carry a response body. */
export type StatusCode = ContentfulStatusCode

export function isErrorStatus(status: number): status is StatusCode {
  return Number.isInteger(status) && status >= 400 && status <= 599
}

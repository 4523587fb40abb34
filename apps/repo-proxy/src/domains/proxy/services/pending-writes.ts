import type { Logger } from "@repoproxy/logger"

export type PendingWritesDeps = {
  logger: Logger
}

/**
 * Cache writes that outlive their request. Shutdown drains them so a blob
 * being copied is still published.
 */
export class PendingWrites {
  private readonly inflight = new Set<Promise<void>>()

  constructor(private readonly deps: PendingWritesDeps) {}

  get size(): number {
    return this.inflight.size
  }

  track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch((err: unknown) => {
        this.deps.logger.error("Detached cache write failed", { err })
      })
      .finally(() => {
        this.inflight.delete(tracked)
      })

    this.inflight.add(tracked)
  }

  /**
   * Resolves once every tracked write has settled, including writes started
   * while draining. Resolves early with `false` when `signal` aborts.
   */
  async drain(signal?: AbortSignal): Promise<boolean> {
    if (!signal) {
      while (this.inflight.size > 0) await Promise.allSettled([...this.inflight])
      return true
    }

    if (signal.aborted) return false

    let onAbort: () => void = () => {}
    const aborted = new Promise<false>((resolve) => {
      onAbort = () => resolve(false)
      signal.addEventListener("abort", onAbort, { once: true })
    })

    try {
      while (this.inflight.size > 0) {
        const settled = Promise.allSettled([...this.inflight]).then(() => true)

        if (!(await Promise.race([settled, aborted]))) return false
      }

      return true
    } finally {
      signal.removeEventListener("abort", onAbort)
    }
  }
}

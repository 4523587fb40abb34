import type { Logger } from "@repoproxy/logger"
import { type MockProxy, mock } from "vitest-mock-extended"
import { PendingWrites } from "../pending-writes"

function deferred(): { promise: Promise<void>; resolve: () => void; reject: (err: Error) => void } {
  let resolve: () => void = () => {}
  let reject: (err: Error) => void = () => {}
  const promise = new Promise<void>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

describe("PendingWrites", () => {
  let logger: MockProxy<Logger>
  let pending: PendingWrites

  beforeEach(() => {
    logger = mock<Logger>()
    pending = new PendingWrites({ logger })
  })

  it("drains immediately when nothing is tracked", async () => {
    await expect(pending.drain()).resolves.toBe(true)
  })

  it("waits for tracked writes and forgets them once settled", async () => {
    const write = deferred()
    pending.track(write.promise)

    expect(pending.size).toBe(1)

    const drained = pending.drain()
    write.resolve()

    await expect(drained).resolves.toBe(true)
    expect(pending.size).toBe(0)
  })

  it("logs a rejected write instead of failing the drain", async () => {
    const write = deferred()
    pending.track(write.promise)

    write.reject(new Error("disk full"))

    await expect(pending.drain()).resolves.toBe(true)
    expect(logger.error).toHaveBeenCalledWith("Detached cache write failed", {
      err: new Error("disk full"),
    })
  })

  it("includes writes tracked while draining", async () => {
    const first = deferred()
    const second = deferred()
    pending.track(first.promise)

    const drained = pending.drain()

    pending.track(second.promise)
    first.resolve()
    await Promise.resolve()
    second.resolve()

    await expect(drained).resolves.toBe(true)
    expect(pending.size).toBe(0)
  })

  it("listens for abort once per drain and detaches afterwards", async () => {
    const first = deferred()
    const second = deferred()
    const controller = new AbortController()
    const add = vi.spyOn(controller.signal, "addEventListener")
    const remove = vi.spyOn(controller.signal, "removeEventListener")
    pending.track(first.promise)

    const drained = pending.drain(controller.signal)

    pending.track(second.promise)
    first.resolve()
    await Promise.resolve()
    second.resolve()

    await expect(drained).resolves.toBe(true)
    expect(add).toHaveBeenCalledTimes(1)
    expect(remove).toHaveBeenCalledTimes(1)
    expect(remove.mock.calls[0]?.[1]).toBe(add.mock.calls[0]?.[1])
  })

  it("gives up when the signal aborts", async () => {
    pending.track(deferred().promise)
    const controller = new AbortController()

    const drained = pending.drain(controller.signal)
    controller.abort()

    await expect(drained).resolves.toBe(false)
    expect(pending.size).toBe(1)
  })
})

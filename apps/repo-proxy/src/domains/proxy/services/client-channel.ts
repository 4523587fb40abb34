/**
 * Response body fed by a producer that must keep running when the client goes
 * away. `push` waits while the client's queue is full and becomes a no-op once
 * the client has cancelled.
 */
export class ClientChannel {
  readonly stream: ReadableStream<Uint8Array>

  private controller: ReadableStreamDefaultController<Uint8Array> | undefined
  private waiter: (() => void) | undefined
  private settled = false
  private cancelled = false

  constructor(highWaterMark = 4) {
    this.stream = new ReadableStream<Uint8Array>(
      {
        start: (controller) => {
          this.controller = controller
        },
        pull: () => {
          this.wake()
        },
        cancel: () => {
          this.cancelled = true
          this.settled = true
          this.wake()
        },
      },
      new CountQueuingStrategy({ highWaterMark }),
    )
  }

  /** True once the client cancelled the body. */
  get detached(): boolean {
    return this.cancelled
  }

  async push(chunk: Uint8Array): Promise<void> {
    const controller = this.controller
    if (this.settled || !controller) return

    controller.enqueue(chunk)

    while (!this.settled && (controller.desiredSize ?? 0) <= 0) {
      await new Promise<void>((resolve) => {
        this.waiter = resolve
      })
    }
  }

  close(): void {
    if (this.settled) return

    this.settled = true
    this.controller?.close()
  }

  fail(reason: unknown): void {
    if (this.settled) return

    this.settled = true
    this.controller?.error(reason)
    this.wake()
  }

  private wake(): void {
    const waiter = this.waiter
    this.waiter = undefined
    waiter?.()
  }
}

/**
 * In-process commit queue. Each `runExclusive` call waits for the one
 * queued before it, so callers run one at a time in call order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve()

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail
    let release = (): void => undefined
    this.tail = new Promise<void>((resolve) => {
      release = resolve
    })

    await previous
    try {
      return await fn()
    } finally {
      release()
    }
  }
}

/**
 * Serializes persistence tasks within one process, in call order.
 */
export class Mutex {
  private tail: Promise<unknown> = Promise.resolve()

  /**
   * Run `task` once every earlier task has settled. The returned promise
   * settles with the task's own result or error.
   */
  runExclusive<R>(task: () => Promise<R>): Promise<R> {
    const result = this.tail.then(task)
    // The queue only waits for settlement; the caller receives the error.
    this.tail = result.catch(() => undefined)
    return result
  }
}

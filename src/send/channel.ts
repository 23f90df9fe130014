/**
 * Bounded one-way event channel. A slow consumer never blocks the producer:
 * once the buffer is full, the oldest droppable event makes room. Events
 * that are not droppable are always delivered, even past capacity.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = []
  private waiters: Array<(result: IteratorResult<T>) => void> = []
  private closed = false
  private capacity: number
  private droppable: (event: T) => boolean
  dropped = 0

  constructor(capacity: number, droppable: (event: T) => boolean) {
    this.capacity = Math.max(1, capacity)
    this.droppable = droppable
  }

  get isClosed(): boolean {
    return this.closed
  }

  get length(): number {
    return this.buffer.length
  }

  push(event: T): void {
    if (this.closed) return

    const waiter = this.waiters.shift()
    if (waiter) {
      waiter({ value: event, done: false })
      return
    }

    if (this.buffer.length >= this.capacity) {
      const oldest = this.buffer.findIndex(this.droppable)
      if (oldest >= 0) {
        this.buffer.splice(oldest, 1)
        this.dropped++
      } else if (this.droppable(event)) {
        this.dropped++
        return
      }
    }
    this.buffer.push(event)
  }

  /** Ends the stream once buffered events are drained. */
  close(): void {
    this.closed = true
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true })
    }
  }

  next(): Promise<IteratorResult<T>> {
    const event = this.buffer.shift()
    if (event !== undefined) return Promise.resolve({ value: event, done: false })
    if (this.closed) return Promise.resolve({ value: undefined, done: true })
    return new Promise(resolve => this.waiters.push(resolve))
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: () => {
        this.close()
        this.buffer = []
        return Promise.resolve({ value: undefined, done: true })
      }
    }
  }
}

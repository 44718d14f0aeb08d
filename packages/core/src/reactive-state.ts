/** ReactiveState options */
export interface ReactiveStateOptions<T> {
  /** Custom equality; a `set()` with an equal value notifies nobody */
  equals?: (a: T, b: T) => boolean
  /** Tag used when logging listener failures */
  name?: string
}

export type StateListener<T> = (value: T, previous: T) => void

/**
 * Synchronous observable cell, similar to Signal.State.
 *
 * - get() returns the current value
 * - set() stores a new value and, if it changed, calls every listener in
 *   subscription order before returning
 */
export class ReactiveState<T> {
  private currentValue: T
  private readonly equals: (a: T, b: T) => boolean
  private readonly name: string
  private readonly listeners = new Set<StateListener<T>>()

  constructor(initialValue: T, options?: ReactiveStateOptions<T>) {
    this.currentValue = initialValue
    this.equals = options?.equals ?? ((a, b) => a === b)
    this.name = options?.name ?? 'ReactiveState'
  }

  get(): T {
    return this.currentValue
  }

  /**
   * @returns whether the value changed
   */
  set(newValue: T): boolean {
    if (this.equals(this.currentValue, newValue)) {
      return false
    }

    const previous = this.currentValue
    this.currentValue = newValue

    // Snapshot so a listener that unsubscribes mid-loop does not skip its neighbour
    for (const listener of [...this.listeners]) {
      try {
        listener(newValue, previous)
      } catch (err) {
        console.error(`[${this.name}] Listener error:`, err)
      }
    }

    return true
  }

  /**
   * @returns a function that removes the listener again
   */
  subscribe(listener: StateListener<T>): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /** Current listener count (for debugging) */
  get subscriberCount(): number {
    return this.listeners.size
  }
}

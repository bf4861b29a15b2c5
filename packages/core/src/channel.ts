import { channelSymbol } from "./symbols"
import type { Tributary } from "./types"

type ChannelState<T> =
  | { readonly kind: "open"; readonly observers: Set<Tributary.Observer<T>> }
  | { readonly kind: "fired"; readonly value: T }

class ChannelImpl<T> implements Tributary.Channel<T> {
  readonly [channelSymbol] = true as const
  private state: ChannelState<T> = { kind: "open", observers: new Set() }

  constructor(private readonly options?: Tributary.ChannelOptions) {}

  get fired(): boolean {
    return this.state.kind === "fired"
  }

  get value(): T | undefined {
    return this.state.kind === "fired" ? this.state.value : undefined
  }

  subscribe(observer: Tributary.Observer<T>): () => void {
    const state = this.state
    if (state.kind === "fired") {
      this.deliver([observer], state.value)
      return () => {}
    }

    // wrapped so the same function can be subscribed twice
    const entry: Tributary.Observer<T> = (value) => observer(value)
    state.observers.add(entry)
    return () => {
      state.observers.delete(entry)
    }
  }

  fire(value: T): boolean {
    const state = this.state
    if (state.kind === "fired") return false

    this.state = { kind: "fired", value }
    const observers = Array.from(state.observers)
    state.observers.clear()
    this.deliver(observers, value)
    return true
  }

  toPromise(): Promise<T> {
    return new Promise<T>((resolve) => {
      this.subscribe(resolve)
    })
  }

  private deliver(observers: Tributary.Observer<T>[], value: T): void {
    const failures: unknown[] = []
    for (const observer of observers) {
      try {
        observer(value)
      } catch (err) {
        failures.push(err)
      }
    }
    if (failures.length === 0) return

    const onObserverError = this.options?.onObserverError
    if (onObserverError) {
      for (const failure of failures) onObserverError(failure)
      return
    }
    if (failures.length === 1) throw failures[0]
    throw new AggregateError(failures, "Channel observers failed")
  }
}

/**
 * Creates a single-shot broadcast channel.
 *
 * Observers registered before `fire` are called once with the value; observers
 * registered afterwards are called immediately with the stored value.
 *
 * @example
 * ```typescript
 * const done = createChannel<string>()
 * done.subscribe((v) => console.log("early", v))
 * done.fire("ok")
 * done.subscribe((v) => console.log("late", v))
 * ```
 */
export function createChannel<T>(options?: Tributary.ChannelOptions): Tributary.Channel<T> {
  return new ChannelImpl<T>(options)
}

export function isChannel(value: unknown): value is Tributary.Channel<unknown> {
  return typeof value === "object" && value !== null && channelSymbol in value
}

import { IllegalStateError } from "./errors"

/**
 * Fan-in barrier whose participant count grows while it is running.
 *
 * The counter starts at 1: the self slot, held until the owner's own processing
 * is done. Children add a slot each through `increment` and give it back through
 * `decrement`. Extra gates (an external completion link) hold a slot of their own.
 * `onZero` runs once, on the step that brings the count to zero.
 */
export class CompletionCounter {
  private pending = 1
  private selfReleased = false
  private zero = false

  constructor(
    private readonly onZero: () => void,
    private readonly ownerId?: string
  ) {}

  get count(): number {
    return this.pending
  }

  get done(): boolean {
    return this.zero
  }

  increment(): void {
    if (this.zero) {
      throw new IllegalStateError(
        `Cannot register a child: context ${this.ownerId ?? "<unknown>"} already completed`,
        this.ownerId
      )
    }
    this.pending++
  }

  decrement(): void {
    if (this.pending === 0) {
      throw new IllegalStateError(
        `Completion counter underflow on context ${this.ownerId ?? "<unknown>"}`,
        this.ownerId
      )
    }
    this.pending--
    if (this.pending === 0) {
      this.zero = true
      this.onZero()
    }
  }

  release(): void {
    if (this.selfReleased) return
    this.selfReleased = true
    this.decrement()
  }

  /**
   * Holds one more slot until the returned function is called. Calling it
   * again is a no-op.
   */
  gate(): () => void {
    this.increment()
    let open = false
    return () => {
      if (open) return
      open = true
      this.decrement()
    }
  }
}

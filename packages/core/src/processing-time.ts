import type { Tributary } from "./types"

class ProcessingTimeImpl implements Tributary.ProcessingTime {
  private elapsed = 0
  private count = 0

  constructor(private readonly clock: () => number) {}

  get total(): number {
    return this.elapsed
  }

  get branches(): number {
    return this.count
  }

  addBranchTime(startedAt: number): void {
    this.elapsed += Math.max(0, this.clock() - startedAt)
    this.count++
  }
}

export function createProcessingTime(clock: () => number): Tributary.ProcessingTime {
  return new ProcessingTimeImpl(clock)
}

import type { Tributary } from "./types"

class ProcessorsTraceImpl implements Tributary.ProcessorsTrace {
  private readonly executed: string[] = []

  constructor(readonly enabled: boolean) {}

  addExecutedProcessor(location: Tributary.ComponentLocation): void {
    if (!this.enabled) return
    this.executed.push(location.path)
  }

  getExecutedProcessors(): readonly string[] {
    return [...this.executed]
  }
}

const disabledTrace: Tributary.ProcessorsTrace = new ProcessorsTraceImpl(false)

/**
 * Returns an append-only trace of visited locations. A disabled trace is a
 * shared instance that records nothing.
 */
export function createProcessorsTrace(enabled: boolean): Tributary.ProcessorsTrace {
  return enabled ? new ProcessorsTraceImpl(true) : disabledTrace
}

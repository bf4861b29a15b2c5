import { describe, it, expect, vi } from "vitest"
import { consoleTransport, memory, isMemoryTransport, type Devtools } from "../src"

function testEvent(overrides?: Partial<Devtools.Event>): Devtools.Event {
  return {
    id: "1",
    type: "context:complete",
    timestamp: Date.UTC(2024, 0, 1, 12, 30, 45, 123),
    contextId: "ctx-1",
    correlationId: "corr-1",
    location: "orders/source",
    duration: 12.34,
    ...overrides,
  }
}

describe("memory transport", () => {
  it("delivers batches to subscribers until unsubscribed", () => {
    const mem = memory()
    const listener = vi.fn()
    const off = mem.subscribe(listener)

    mem.send([testEvent()])
    off()
    mem.send([testEvent()])

    expect(listener).toHaveBeenCalledTimes(1)
  })

  it("is identified by isMemoryTransport", () => {
    expect(isMemoryTransport(memory())).toBe(true)
    expect(isMemoryTransport(consoleTransport())).toBe(false)
  })
})

describe("console transport", () => {
  it("formats pretty lines", () => {
    const lines: string[] = []
    const transport = consoleTransport({ write: (line) => lines.push(line) })

    transport.send([testEvent()])

    expect(lines).toEqual([
      "[12:30:45.123] ✓ context:complete ctx-1 orders/source (12.3ms)",
    ])
  })

  it("formats compact lines", () => {
    const lines: string[] = []
    const transport = consoleTransport({ format: "compact", write: (line) => lines.push(line) })

    transport.send([testEvent({ type: "context:create", duration: undefined })])

    expect(lines).toEqual(["▶ ctx-1"])
  })

  it("formats json lines", () => {
    const lines: string[] = []
    const transport = consoleTransport({ format: "json", write: (line) => lines.push(line) })
    const event = testEvent({ status: "success" })

    transport.send([event])

    expect(JSON.parse(lines[0] ?? "{}")).toEqual(event)
  })

  it("writes to console.log by default", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {})
    consoleTransport({ format: "compact" }).send([testEvent()])

    expect(log).toHaveBeenCalledWith("✓ ctx-1 12ms")
    log.mockRestore()
  })
})

import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { propagation, trace } from "@opentelemetry/api"
import { W3CTraceContextPropagator } from "@opentelemetry/core"
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
} from "@opentelemetry/sdk-trace-base"
import { createRuntime } from "@tributary/core"
import { createOtel, extractContext, injectContext, getContextSpan } from "../src"

const orders = {
  flow: { name: "orders" },
  location: { path: "orders/source" },
}

describe("Context propagation", () => {
  let exporter: InMemorySpanExporter
  let provider: BasicTracerProvider

  beforeEach(() => {
    exporter = new InMemorySpanExporter()
    provider = new BasicTracerProvider()
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter))
    propagation.setGlobalPropagator(new W3CTraceContextPropagator())
  })

  afterEach(async () => {
    exporter.reset()
    propagation.disable()
    await provider.shutdown()
  })

  it("extractContext parses W3C traceparent header", () => {
    const headers = {
      traceparent: "00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01",
    }

    const spanContext = trace.getSpanContext(extractContext(headers))

    expect(spanContext?.traceId).toBe("0af7651916cd43dd8448eb211c80319c")
    expect(spanContext?.spanId).toBe("b7ad6b7169203331")
  })

  it("injectContext writes the context span into W3C headers", () => {
    const runtime = createRuntime({
      extensions: [createOtel({ tracer: provider.getTracer("test") })],
    })
    const ctx = runtime.createContext(orders)
    const headers: Record<string, string> = {}

    injectContext(ctx, headers)
    const span = getContextSpan(ctx)
    ctx.success()

    expect(headers.traceparent).toMatch(/^00-[a-f0-9]{32}-[a-f0-9]{16}-0[01]$/)
    expect(headers.traceparent).toContain(`-${span?.spanContext().spanId}-`)
  })

  it("injectContext leaves headers untouched for untraced contexts", () => {
    const runtime = createRuntime({
      extensions: [createOtel({ tracer: provider.getTracer("test"), contextFilter: () => false })],
    })
    const ctx = runtime.createContext(orders)
    const headers: Record<string, string> = {}

    injectContext(ctx, headers)
    ctx.success()

    expect(headers).toEqual({})
  })

  it("getContextSpan returns undefined without the extension", () => {
    const ctx = createRuntime().createContext(orders)
    expect(getContextSpan(ctx)).toBeUndefined()
    ctx.success()
  })
})

import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { BasicTracerProvider } from "@opentelemetry/sdk-trace-base"
import {
  AggregationTemporality,
  DataPointType,
  InMemoryMetricExporter,
  MeterProvider,
  PeriodicExportingMetricReader,
  type MetricData,
} from "@opentelemetry/sdk-metrics"
import { createRuntime, type Tributary } from "@tributary/core"
import { createOtel } from "../src"

const orders: Tributary.FlowContextOptions = {
  flow: { name: "orders" },
  location: { path: "orders/source" },
}

describe("OTel metrics", () => {
  let tracerProvider: BasicTracerProvider
  let metricExporter: InMemoryMetricExporter
  let meterProvider: MeterProvider
  let now: number

  beforeEach(() => {
    tracerProvider = new BasicTracerProvider()
    metricExporter = new InMemoryMetricExporter(AggregationTemporality.CUMULATIVE)
    meterProvider = new MeterProvider()
    meterProvider.addMetricReader(
      new PeriodicExportingMetricReader({
        exporter: metricExporter,
        exportIntervalMillis: 60_000,
      })
    )
    now = 1000
  })

  afterEach(async () => {
    await tracerProvider.shutdown()
    await meterProvider.shutdown()
  })

  async function runtime(): Promise<Tributary.Runtime> {
    const rt = createRuntime({
      clock: () => now,
      extensions: [
        createOtel({
          tracer: tracerProvider.getTracer("test"),
          meter: meterProvider.getMeter("test"),
        }),
      ],
    })
    await rt.ready
    return rt
  }

  async function collect(name: string): Promise<MetricData | undefined> {
    await meterProvider.forceFlush()
    return metricExporter
      .getMetrics()
      .flatMap((rm) => rm.scopeMetrics)
      .flatMap((sm) => sm.metrics)
      .find((m) => m.descriptor.name === name)
  }

  function histogramSum(metric: MetricData | undefined): number | undefined {
    if (metric?.dataPointType !== DataPointType.HISTOGRAM) return undefined
    return metric.dataPoints[0]?.value.sum
  }

  it("records response and completion durations separately", async () => {
    const rt = await runtime()
    const root = rt.createContext(orders)
    const child = root.createChild()

    now = 1040
    root.success()
    now = 1100
    child.success()

    expect(histogramSum(await collect("tributary.context.completion_ms"))).toBe(200)
    const response = await collect("tributary.context.response_ms")
    expect(histogramSum(response)).toBe(140)
    expect(response?.dataPoints.length).toBe(1)
    const point = response?.dataPoints[0]?.value
    expect(typeof point === "object" ? point.count : undefined).toBe(2)
  })

  it("counts failed contexts by error type", async () => {
    const rt = await runtime()
    await rt.createContext(orders).error(new TypeError("bad payload"))
    await rt.createContext(orders).error(new TypeError("bad payload"))
    rt.createContext(orders).success()

    const errors = await collect("tributary.context.errors")
    expect(errors?.dataPointType).toBe(DataPointType.SUM)
    expect(errors?.dataPoints[0]?.value).toBe(2)
    expect(errors?.dataPoints[0]?.attributes).toEqual({
      "context.location": "orders/source",
      "error.type": "TypeError",
    })
  })
})

import type { Meter, Histogram, Counter } from "@opentelemetry/api"

export interface OtelMetrics {
  readonly responseHistogram: Histogram
  readonly completionHistogram: Histogram
  readonly errorCounter: Counter
}

export function createMetrics(meter: Meter): OtelMetrics {
  return {
    responseHistogram: meter.createHistogram("tributary.context.response_ms", {
      description: "Time from context creation to response in milliseconds",
      unit: "ms",
    }),
    completionHistogram: meter.createHistogram("tributary.context.completion_ms", {
      description: "Time from context creation to completion of its subtree in milliseconds",
      unit: "ms",
    }),
    errorCounter: meter.createCounter("tributary.context.errors", {
      description: "Number of failed contexts",
    }),
  }
}

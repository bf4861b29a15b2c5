import {
  trace,
  context,
  SpanStatusCode,
  type Span,
} from "@opentelemetry/api"
import type { Tributary } from "@tributary/core"
import type { OtelExtension } from "./types"
import { getSpanFromContext, seekSpan, setSpanInContext } from "./span"
import { createMetrics, type OtelMetrics } from "./metrics"

function getSpanName(ctx: Tributary.EventContext, options: OtelExtension.Options): string {
  if (options.spanName) {
    return options.spanName(ctx)
  }
  return ctx.originatingLocation.path
}

function recordFailure(span: Span, err: unknown): void {
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: err instanceof Error ? err.message : String(err),
  })
  span.recordException(err instanceof Error ? err : new Error(String(err)))
}

/**
 * Creates an OpenTelemetry extension that opens one span per event context.
 *
 * The span starts when the context is created, under the span of the nearest
 * traced ancestor; its status is set on response and it ends on completion, so
 * a parent span always ends after the spans of its children.
 *
 * @example
 * ```typescript
 * const runtime = createRuntime({
 *   extensions: [createOtel({ tracer: trace.getTracer("orders") })]
 * })
 * ```
 */
export function createOtel(options: OtelExtension.Options): Tributary.Extension {
  const { tracer, meter, contextFilter } = options

  let metrics: OtelMetrics | undefined
  if (meter) {
    metrics = createMetrics(meter)
  }

  let clock: () => number = Date.now
  const traced = (ctx: Tributary.EventContext): boolean => !contextFilter || contextFilter(ctx)

  return {
    name: "otel",

    init: (runtime) => {
      clock = runtime.config.clock
    },

    onCreate: (ctx) => {
      if (!traced(ctx)) return

      const parentSpan = ctx.getParentContext()
        ? seekSpan(ctx.data)
        : undefined
      const parentContext = parentSpan
        ? trace.setSpan(context.active(), parentSpan)
        : context.active()

      const span = tracer.startSpan(getSpanName(ctx, options), {
        attributes: {
          "context.id": ctx.id,
          "context.correlation_id": ctx.correlationId,
          "context.correlation_from_source": ctx.isCorrelationIdFromSource(),
          "context.location": ctx.originatingLocation.path,
        },
      }, parentContext)
      setSpanInContext(ctx.data, span)
    },

    onResponse: (ctx, outcome) => {
      const span = getSpanFromContext(ctx.data)
      if (!span) return

      const attributes = { "context.location": ctx.originatingLocation.path }
      metrics?.responseHistogram.record(clock() - ctx.receivedTime, attributes)

      if (outcome.status === "success") {
        span.setStatus({ code: SpanStatusCode.OK })
        return
      }
      recordFailure(span, outcome.error)
      metrics?.errorCounter.add(1, {
        ...attributes,
        "error.type": outcome.error instanceof Error ? outcome.error.constructor.name : "unknown",
      })
    },

    onComplete: (ctx) => {
      const span = getSpanFromContext(ctx.data)
      if (!span) return

      metrics?.completionHistogram.record(clock() - ctx.receivedTime, {
        "context.location": ctx.originatingLocation.path,
      })
      span.end()
    },

    wrapHandle: async (next, _error, ctx) => {
      const span = getSpanFromContext(ctx.data)
      if (!span) return next()

      span.addEvent("exception_handler.start")
      try {
        await next()
        span.addEvent("exception_handler.end")
      } catch (err) {
        span.addEvent("exception_handler.failed", {
          "exception.message": err instanceof Error ? err.message : String(err),
        })
        throw err
      }
    },
  }
}

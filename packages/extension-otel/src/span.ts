import type { Span } from "@opentelemetry/api"
import type { Tributary } from "@tributary/core"

export const SPAN_KEY = Symbol("otel.span")

function isSpan(value: unknown): value is Span {
  return typeof value === "object" && value !== null && "spanContext" in value && "end" in value
}

export function getSpanFromContext(data: Tributary.ContextData): Span | undefined {
  const value = data.get(SPAN_KEY)
  return isSpan(value) ? value : undefined
}

/** Nearest span on this context or one of its ancestors. */
export function seekSpan(data: Tributary.ContextData): Span | undefined {
  const value = data.seek(SPAN_KEY)
  return isSpan(value) ? value : undefined
}

export function setSpanInContext(data: Tributary.ContextData, span: Span): void {
  data.set(SPAN_KEY, span)
}

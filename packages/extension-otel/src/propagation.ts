import { propagation, context, trace, type Context, type Span } from "@opentelemetry/api"
import type { Tributary } from "@tributary/core"
import { getSpanFromContext } from "./span"

/**
 * Extract trace context from incoming headers.
 * Use with inbound connectors to continue distributed traces.
 *
 * @example
 * ```typescript
 * const incomingCtx = extractContext(request.headers)
 * ```
 */
export function extractContext(headers: Record<string, string>): Context {
  return propagation.extract(context.active(), headers)
}

/**
 * Inject the span of an event context into outgoing headers.
 *
 * @example
 * ```typescript
 * const headers: Record<string, string> = {}
 * injectContext(ctx, headers)
 * await fetch(url, { headers })
 * ```
 */
export function injectContext(
  ctx: Tributary.EventContext,
  headers: Record<string, string>
): void {
  const span = getSpanFromContext(ctx.data)
  if (span) {
    propagation.inject(trace.setSpan(context.active(), span), headers)
  }
}

/**
 * Get the span of an event context.
 * Useful for adding attributes or events while the context is open.
 *
 * @example
 * ```typescript
 * const span = getContextSpan(ctx)
 * span?.setAttribute('order.id', orderId)
 * ```
 */
export function getContextSpan(ctx: Tributary.EventContext): Span | undefined {
  return getSpanFromContext(ctx.data)
}

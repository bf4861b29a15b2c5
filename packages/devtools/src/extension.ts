import { randomUUID } from "node:crypto"
import type { Tributary } from "@tributary/core"
import type { Devtools } from "./types"

const DEFAULT_MAX_QUEUE_SIZE = 1000

function toErrorInfo(err: unknown): Devtools.ErrorInfo {
  return {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  }
}

function warnTransportError(err: unknown, transport: Devtools.Transport): void {
  const message = err instanceof Error ? err.message : String(err)
  process.emitWarning(`devtools transport "${transport.name}" failed: ${message}`, "DevtoolsWarning")
}

function describeContext(ctx: Tributary.EventContext) {
  return {
    contextId: ctx.id,
    correlationId: ctx.correlationId,
    location: ctx.originatingLocation.path,
    parentId: ctx.parentId,
  }
}

/**
 * Creates a devtools extension that streams context lifecycle events to transports.
 *
 * Events are batched per microtask. A transport that throws does not stop the
 * others; its error goes to `onTransportError` (a process warning by default).
 *
 * @example
 * ```typescript
 * import { createDevtools, memory } from '@tributary/devtools'
 * import { createRuntime } from '@tributary/core'
 *
 * const mem = memory()
 * const runtime = createRuntime({
 *   extensions: [createDevtools({ transports: [mem] })]
 * })
 *
 * mem.subscribe((events) => console.log(events))
 * ```
 */
export function createDevtools(options?: Devtools.Options): Tributary.Extension {
  const transports = options?.transports ?? []
  const maxQueueSize = options?.maxQueueSize ?? DEFAULT_MAX_QUEUE_SIZE
  const serialize = options?.serialize
  const clock = options?.clock ?? Date.now
  const onTransportError = options?.onTransportError ?? warnTransportError

  let queue: Devtools.Event[] = []
  let scheduled = false

  function flush(): void {
    const batch = queue
    queue = []
    scheduled = false
    if (batch.length === 0) return

    const toSend = serialize ? batch.map(serialize) : batch

    for (const transport of transports) {
      try {
        transport.send(toSend)
      } catch (err) {
        onTransportError(err, transport)
      }
    }
  }

  function emit(event: Omit<Devtools.Event, "id" | "timestamp">): void {
    queue.push({ id: randomUUID(), timestamp: clock(), ...event })

    if (queue.length > maxQueueSize) {
      queue.shift()
    }

    if (!scheduled) {
      scheduled = true
      queueMicrotask(flush)
    }
  }

  return {
    name: "devtools",

    onCreate: (ctx) => {
      emit({ type: "context:create", ...describeContext(ctx) })
    },

    onResponse: (ctx, outcome) => {
      emit({
        type: "context:response",
        ...describeContext(ctx),
        status: outcome.status,
        duration: clock() - ctx.receivedTime,
        error: outcome.status === "failure" ? toErrorInfo(outcome.error) : undefined,
      })
    },

    onComplete: (ctx) => {
      emit({
        type: "context:complete",
        ...describeContext(ctx),
        duration: clock() - ctx.receivedTime,
      })
    },

    onError: (err, ctx) => {
      emit({ type: "error", ...describeContext(ctx), error: toErrorInfo(err) })
    },

    dispose: () => {
      if (queue.length > 0) {
        flush()
      }
      for (const transport of transports) {
        transport.dispose?.()
      }
    },
  }
}

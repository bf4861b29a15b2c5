import type { Tributary } from "./types"
import { EventContextImpl, type ContextHost } from "./context"
import { InvalidArgumentError } from "./errors"
import { assertLocation, generateId, resolveCorrelation } from "./identity"

const resolvedHandler: Tributary.ExceptionHandler = {
  handle: () => {},
}

function isBridged(options: Tributary.CreateContextOptions): options is Tributary.BridgedContextOptions {
  return "id" in options
}

function assertFlag(name: string, value: unknown): boolean {
  if (value === undefined) return false
  if (typeof value !== "boolean") {
    throw new InvalidArgumentError(`${name} must be a boolean`, name)
  }
  return value
}

function resolveConfig(options?: Tributary.RuntimeOptions): Tributary.RuntimeConfig {
  const serverId = options?.serverId ?? generateId()
  if (typeof serverId !== "string" || serverId.length === 0) {
    throw new InvalidArgumentError("serverId must be a non-empty string", "serverId")
  }

  for (const ext of options?.extensions ?? []) {
    if (typeof ext.name !== "string" || ext.name.length === 0) {
      throw new InvalidArgumentError("extension must have a name", "extensions")
    }
  }

  return {
    serverId,
    flowTrace: assertFlag("flowTrace", options?.flowTrace),
    processingTime: assertFlag("processingTime", options?.processingTime),
    exceptionHandler: options?.exceptionHandler ?? resolvedHandler,
    clock: options?.clock ?? Date.now,
  }
}

class RuntimeImpl implements Tributary.Runtime, ContextHost {
  readonly config: Tributary.RuntimeConfig
  readonly extensions: Tributary.Extension[]
  readonly ready: Promise<void>

  constructor(options?: Tributary.RuntimeOptions) {
    this.config = resolveConfig(options)
    this.extensions = options?.extensions ?? []
    this.ready = this.init()
  }

  private async init(): Promise<void> {
    for (const ext of this.extensions) {
      if (ext.init) {
        await ext.init(this)
      }
    }
  }

  createContext<R = unknown>(options: Tributary.CreateContextOptions): Tributary.EventContext<R> {
    if (options === null || typeof options !== "object") {
      throw new InvalidArgumentError("context options are required", "options")
    }
    assertLocation(options.location)
    if (!isBridged(options) && (options.flow === null || typeof options.flow !== "object")) {
      throw new InvalidArgumentError("flow is required", "flow")
    }
    const correlation = resolveCorrelation(options.correlationId)

    const ctx = isBridged(options)
      ? new EventContextImpl<R>(this, {
          id: options.id,
          serverId: options.serverId ?? this.config.serverId,
          correlation,
          location: options.location,
          exceptionHandler: options.exceptionHandler,
          externalCompletion: options.externalCompletion,
        })
      : new EventContextImpl<R>(this, {
          id: generateId(),
          serverId: this.config.serverId,
          correlation,
          location: options.location,
          flow: options.flow,
          exceptionHandler: options.flow.exceptionHandler ?? this.config.exceptionHandler,
          externalCompletion: options.externalCompletion,
        })

    this.attach(ctx)
    return ctx
  }

  attach(ctx: Tributary.EventContext): void {
    for (const ext of this.extensions) {
      const { onResponse, onComplete } = ext
      if (onResponse) {
        ctx.onResponse((outcome) => onResponse.call(ext, ctx, outcome))
      }
      if (onComplete) {
        ctx.onComplete(() => onComplete.call(ext, ctx))
      }
    }

    for (const ext of this.extensions) {
      if (!ext.onCreate) continue
      try {
        ext.onCreate(ctx)
      } catch (err) {
        this.reportError(err, ctx)
      }
    }
  }

  async handle(error: unknown, ctx: Tributary.EventContext): Promise<void> {
    let next = async (): Promise<void> => {
      await ctx.exceptionHandler.handle(error, ctx)
    }

    for (let i = this.extensions.length - 1; i >= 0; i--) {
      const ext = this.extensions[i]
      if (ext?.wrapHandle) {
        const currentNext = next
        next = ext.wrapHandle.bind(ext, currentNext, error, ctx)
      }
    }

    await next()
  }

  reportError(error: unknown, ctx: Tributary.EventContext): void {
    const reporters = this.extensions.filter((ext) => ext.onError !== undefined)
    if (reporters.length === 0) {
      throw error
    }
    for (const ext of reporters) {
      ext.onError?.(error, ctx)
    }
  }

  async dispose(): Promise<void> {
    for (const ext of this.extensions) {
      if (ext.dispose) {
        await ext.dispose(this)
      }
    }
  }
}

/**
 * Creates the runtime that builds event contexts and carries their configuration.
 *
 * The runtime is returned synchronously; `ready` resolves once every extension's
 * `init` has run. Creating contexts does not wait for `ready`.
 *
 * @example
 * ```typescript
 * const runtime = createRuntime({
 *   flowTrace: true,
 *   extensions: [createDevtools({ transports: [consoleTransport()] })]
 * })
 *
 * const ctx = runtime.createContext({
 *   flow: { name: "orders" },
 *   location: { path: "orders/listener" },
 * })
 * ctx.onComplete(() => ack())
 * ctx.success()
 * ```
 */
export function createRuntime(options?: Tributary.RuntimeOptions): Tributary.Runtime {
  return new RuntimeImpl(options)
}

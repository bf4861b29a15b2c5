import type { Tracer, Meter } from "@opentelemetry/api"
import type { Tributary } from "@tributary/core"

export namespace OtelExtension {
  export interface Options {
    /** Tracer for span creation (required) */
    readonly tracer: Tracer
    /** Meter for metrics (optional) */
    readonly meter?: Meter
    /** Filter contexts to trace (default: all) */
    readonly contextFilter?: (ctx: Tributary.EventContext) => boolean
    /** Custom span name formatter (default: the originating location path) */
    readonly spanName?: (ctx: Tributary.EventContext) => string
  }
}

import type { Devtools } from "../types"

interface ConsoleOptions {
  readonly format?: "pretty" | "json" | "compact"
  readonly write?: (line: string) => void
}

const ICONS: Record<Devtools.EventType, string> = {
  "context:create": "▶",
  "context:response": "↩",
  "context:complete": "✓",
  error: "✗",
}

function formatPretty(event: Devtools.Event): string {
  const time = new Date(event.timestamp).toISOString().slice(11, 23)
  const icon = ICONS[event.type]
  const duration = event.duration !== undefined ? ` (${event.duration.toFixed(1)}ms)` : ""
  const status = event.status ? ` ${event.status}` : ""
  const error = event.error ? ` ${event.error.message}` : ""

  return `[${time}] ${icon} ${event.type.padEnd(16)} ${event.contextId} ${event.location}${status}${duration}${error}`
}

function formatCompact(event: Devtools.Event): string {
  const duration = event.duration !== undefined ? ` ${event.duration.toFixed(0)}ms` : ""
  return `${ICONS[event.type]} ${event.contextId}${duration}`
}

/**
 * Creates a console transport for debugging.
 *
 * @example
 * ```typescript
 * const runtime = createRuntime({
 *   extensions: [createDevtools({ transports: [consoleTransport({ format: 'pretty' })] })]
 * })
 * ```
 */
export function consoleTransport(options?: ConsoleOptions): Devtools.Transport {
  const format = options?.format ?? "pretty"
  const write = options?.write ?? ((line: string) => globalThis.console.log(line))

  return {
    name: "console",

    send(events) {
      for (const event of events) {
        switch (format) {
          case "json":
            write(JSON.stringify(event))
            break
          case "compact":
            write(formatCompact(event))
            break
          case "pretty":
          default:
            write(formatPretty(event))
            break
        }
      }
    },
  }
}

import type { Devtools } from "../types"

/**
 * Options for the HTTP transport.
 * @internal
 */
interface HttpTransportOptions {
  readonly url: string
  readonly headers?: Record<string, string>
  readonly onError?: (error: unknown) => void
}

/**
 * Creates an HTTP transport for cross-process event streaming.
 * Events are sent via POST to the specified URL without waiting for the reply.
 * Failed requests go to `onError` (a process warning by default).
 *
 * @example
 * ```typescript
 * const runtime = createRuntime({
 *   extensions: [createDevtools({ transports: [httpTransport({ url: 'http://localhost:3001/events' })] })]
 * })
 * ```
 */
export function httpTransport(options: HttpTransportOptions): Devtools.Transport {
  const onError = options.onError ?? ((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err)
    process.emitWarning(`devtools http transport failed: ${message}`, "DevtoolsWarning")
  })

  return {
    name: "http",
    send(events) {
      void fetch(options.url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...options.headers },
        body: JSON.stringify(events),
      }).catch(onError)
    },
  }
}

export namespace Devtools {
  export type EventType =
    | "context:create"
    | "context:response"
    | "context:complete"
    | "error"

  export interface Event {
    readonly id: string
    readonly type: EventType
    readonly timestamp: number
    readonly contextId: string
    readonly correlationId: string
    readonly location: string
    readonly parentId?: string
    readonly status?: "success" | "failure"
    /** Milliseconds since the context was created. */
    readonly duration?: number
    readonly error?: ErrorInfo
  }

  export interface ErrorInfo {
    readonly message: string
    readonly stack?: string
  }

  export interface Transport {
    readonly name: string
    send(events: readonly Event[]): void
    dispose?(): void
  }

  export interface MemoryTransport extends Transport {
    subscribe(callback: (events: readonly Event[]) => void): () => void
  }

  export interface Options {
    readonly transports?: readonly Transport[]
    readonly maxQueueSize?: number
    readonly serialize?: (event: Event) => Event
    readonly clock?: () => number
    readonly onTransportError?: (error: unknown, transport: Transport) => void
  }
}

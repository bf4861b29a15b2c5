import type { channelSymbol, contextSymbol } from "./symbols"

export type MaybePromise<T> = T | Promise<T>

export type ContextState = "pending" | "succeeded" | "failed"

export namespace Tributary {
  export interface ComponentLocation {
    readonly path: string
    readonly fileName?: string
    readonly line?: number
  }

  export interface FlowConstruct {
    readonly name: string
    readonly exceptionHandler?: ExceptionHandler
  }

  /**
   * Policy invoked once per `error()` call. The returned promise gates the
   * response of the failed context.
   */
  export interface ExceptionHandler {
    handle(error: unknown, ctx: EventContext): MaybePromise<void>
  }

  export type Outcome<R = unknown> =
    | { readonly status: "success"; readonly result: R | undefined }
    | { readonly status: "failure"; readonly error: unknown }

  export type Observer<T> = (value: T) => void

  export interface ChannelOptions {
    /** Receives observer failures after delivery. Without it, `fire` rethrows them. */
    onObserverError?: (error: unknown) => void
  }

  /**
   * Single-shot broadcast signal. Late subscribers get the stored value replayed.
   */
  export interface Channel<T> {
    readonly [channelSymbol]: true
    readonly fired: boolean
    readonly value: T | undefined
    subscribe(observer: Observer<T>): () => void
    fire(value: T): boolean
    toPromise(): Promise<T>
  }

  export type ExternalCompletion = Channel<void> | PromiseLike<unknown>

  export interface ProcessingTime {
    readonly total: number
    readonly branches: number
    addBranchTime(startedAt: number): void
  }

  export interface ProcessorsTrace {
    readonly enabled: boolean
    addExecutedProcessor(location: ComponentLocation): void
    getExecutedProcessors(): readonly string[]
  }

  /**
   * Per-context storage. `seek` walks the parent chain.
   */
  export interface ContextData {
    get(key: string | symbol): unknown
    set(key: string | symbol, value: unknown): void
    has(key: string | symbol): boolean
    delete(key: string | symbol): boolean
    seek(key: string | symbol): unknown
  }

  export interface EventContext<R = unknown> {
    readonly [contextSymbol]: true
    readonly id: string
    readonly correlationId: string
    readonly serverId: string
    readonly receivedTime: number
    readonly originatingLocation: ComponentLocation
    readonly flow: FlowConstruct | undefined
    readonly parentId: string | undefined
    readonly exceptionHandler: ExceptionHandler
    readonly state: ContextState
    /** True once `success` or `error` has been called. */
    readonly terminated: boolean
    /** True once the completion channel fired. */
    readonly completed: boolean
    /**
     * Open slots on the completion counter: the self slot until the context
     * responds, one per child that has not completed, and one while an
     * external completion link has not signaled.
     */
    readonly pendingCount: number
    readonly data: ContextData
    readonly beforeResponse: Channel<Outcome<R>>
    readonly response: Channel<Outcome<R>>
    readonly completion: Channel<void>

    /** @returns false when the context was already terminated */
    success(result?: R): boolean
    error(error: unknown): Promise<void>
    createChild<C = unknown>(options?: CreateChildOptions): EventContext<C>

    /** The parent while it is still reachable. Undefined for a root. */
    getParentContext(): EventContext | undefined
    /** The context itself for a root; for a child, the root while it is still reachable. */
    getRootContext(): EventContext | undefined
    getProcessorsTrace(): ProcessorsTrace
    getProcessingTime(): ProcessingTime | undefined
    isCorrelationIdFromSource(): boolean
    addExecutedProcessor(location: ComponentLocation): void
    addBranchTime(startedAt: number): void

    onBeforeResponse(observer: Observer<Outcome<R>>): () => void
    onResponse(observer: Observer<Outcome<R>>): () => void
    onComplete(observer: () => void): () => void
  }

  export interface CreateChildOptions {
    location?: ComponentLocation
    correlationId?: string
    exceptionHandler?: ExceptionHandler
  }

  export interface FlowContextOptions {
    flow: FlowConstruct
    location: ComponentLocation
    correlationId?: string
    externalCompletion?: ExternalCompletion
  }

  /** Used when bridging a connector boundary, where the id is already known. */
  export interface BridgedContextOptions {
    id: string
    serverId?: string
    location: ComponentLocation
    correlationId?: string
    externalCompletion?: ExternalCompletion
    exceptionHandler: ExceptionHandler
  }

  export type CreateContextOptions = FlowContextOptions | BridgedContextOptions

  export interface RuntimeOptions {
    serverId?: string
    /** Record visited locations on each context tree. Default: false */
    flowTrace?: boolean
    /** Accumulate processing time on each context tree. Default: false */
    processingTime?: boolean
    exceptionHandler?: ExceptionHandler
    extensions?: Extension[]
    clock?: () => number
  }

  export interface RuntimeConfig {
    readonly serverId: string
    readonly flowTrace: boolean
    readonly processingTime: boolean
    readonly exceptionHandler: ExceptionHandler
    readonly clock: () => number
  }

  export interface Runtime {
    readonly ready: Promise<void>
    readonly config: RuntimeConfig
    readonly extensions: readonly Extension[]
    createContext<R = unknown>(options: CreateContextOptions): EventContext<R>
    dispose(): Promise<void>
  }

  export interface Extension {
    readonly name: string
    init?(runtime: Runtime): MaybePromise<void>
    onCreate?(ctx: EventContext): void
    wrapHandle?(
      next: () => Promise<void>,
      error: unknown,
      ctx: EventContext
    ): Promise<void>
    onResponse?(ctx: EventContext, outcome: Outcome): void
    onComplete?(ctx: EventContext): void
    onError?(error: unknown, ctx: EventContext): void
    dispose?(runtime: Runtime): MaybePromise<void>
  }

  export namespace Utils {
    /**
     * Extract the result type of a context.
     * @example
     * type Result = Tributary.Utils.ResultOf<typeof ctx> // Order
     */
    export type ResultOf<C> = C extends EventContext<infer R> ? R : never

    export type ChannelValue<C> = C extends Channel<infer T> ? T : never
  }
}

import { contextSymbol } from "./symbols"
import type { Tributary, ContextState } from "./types"
import { createChannel, isChannel } from "./channel"
import { CompletionCounter } from "./counter"
import { ContextDataImpl } from "./data"
import { HandlerFailureError } from "./errors"
import { assertLocation, childId, resolveCorrelation, type Correlation } from "./identity"
import { createProcessingTime } from "./processing-time"
import { createProcessorsTrace } from "./trace"

/**
 * What a context needs from the runtime that created it.
 */
export interface ContextHost {
  readonly config: Tributary.RuntimeConfig
  attach(ctx: Tributary.EventContext): void
  handle(error: unknown, ctx: Tributary.EventContext): Promise<void>
  reportError(error: unknown, ctx: Tributary.EventContext): void
}

export interface ContextInit {
  id: string
  serverId: string
  correlation: Correlation
  location: Tributary.ComponentLocation
  flow?: Tributary.FlowConstruct
  exceptionHandler: Tributary.ExceptionHandler
  externalCompletion?: Tributary.ExternalCompletion
}

/**
 * Non-owning links to the ancestors. A pending child still keeps its parent
 * reachable through `releaseParent`, which closes over the parent's counter.
 */
interface Lineage {
  parentId: string
  parent: WeakRef<EventContextImpl<unknown>>
  root: WeakRef<EventContextImpl<unknown>>
  trace: Tributary.ProcessorsTrace
  processingTime: Tributary.ProcessingTime | undefined
}

export class EventContextImpl<R> implements Tributary.EventContext<R> {
  readonly [contextSymbol] = true as const
  readonly id: string
  readonly serverId: string
  readonly correlationId: string
  readonly receivedTime: number
  readonly originatingLocation: Tributary.ComponentLocation
  readonly flow: Tributary.FlowConstruct | undefined
  readonly exceptionHandler: Tributary.ExceptionHandler
  readonly data: Tributary.ContextData
  readonly beforeResponse: Tributary.Channel<Tributary.Outcome<R>>
  readonly response: Tributary.Channel<Tributary.Outcome<R>>
  readonly completion: Tributary.Channel<void>

  private _state: ContextState = "pending"
  private childSequence = 0
  private readonly correlationFromSource: boolean
  private readonly counter: CompletionCounter
  private readonly lineage: Lineage | undefined
  private releaseParent: (() => void) | undefined
  private readonly trace: Tributary.ProcessorsTrace
  private readonly processingTime: Tributary.ProcessingTime | undefined

  constructor(
    private readonly host: ContextHost,
    init: ContextInit,
    lineage?: Lineage,
    releaseParent?: () => void
  ) {
    this.id = init.id
    this.serverId = init.serverId
    this.correlationId = init.correlation.correlationId
    this.correlationFromSource = init.correlation.fromSource
    this.originatingLocation = init.location
    this.flow = init.flow
    this.exceptionHandler = init.exceptionHandler
    this.receivedTime = host.config.clock()
    this.lineage = lineage
    this.releaseParent = releaseParent

    if (lineage) {
      this.trace = lineage.trace
      this.processingTime = lineage.processingTime
    } else {
      this.trace = createProcessorsTrace(host.config.flowTrace)
      this.processingTime = host.config.processingTime
        ? createProcessingTime(host.config.clock)
        : undefined
    }

    this.data = new ContextDataImpl(() => this.lineage?.parent.deref()?.data)

    const onObserverError = (err: unknown) => this.host.reportError(err, this)
    this.beforeResponse = createChannel({ onObserverError })
    this.response = createChannel({ onObserverError })
    this.completion = createChannel({ onObserverError })

    this.counter = new CompletionCounter(() => this.complete(), this.id)

    if (init.externalCompletion) {
      this.linkExternalCompletion(init.externalCompletion)
    }
  }

  get state(): ContextState {
    return this._state
  }

  get terminated(): boolean {
    return this._state !== "pending"
  }

  get completed(): boolean {
    return this.completion.fired
  }

  get pendingCount(): number {
    return this.counter.count
  }

  get parentId(): string | undefined {
    return this.lineage?.parentId
  }

  success(result?: R): boolean {
    if (this._state !== "pending") return false
    this._state = "succeeded"
    this.respond({ status: "success", result })
    return true
  }

  error(error: unknown): Promise<void> {
    if (this._state !== "pending") return Promise.resolve()
    this._state = "failed"

    const outcome: Tributary.Outcome<R> = { status: "failure", error }
    return this.host.handle(error, this).then(
      () => {
        this.respond(outcome)
      },
      (handlerError: unknown) => {
        const observerErrors: unknown[] = []
        try {
          this.respond(outcome)
        } catch (observerError) {
          observerErrors.push(observerError)
        }
        throw new HandlerFailureError(this.id, error, handlerError, observerErrors)
      }
    )
  }

  createChild<C = unknown>(options?: Tributary.CreateChildOptions): Tributary.EventContext<C> {
    const location = options?.location ?? this.originatingLocation
    assertLocation(location)

    const correlation = options?.correlationId !== undefined
      ? resolveCorrelation(options.correlationId)
      : { correlationId: this.correlationId, fromSource: this.correlationFromSource }

    const releaseParent = this.counter.gate()

    const child = new EventContextImpl<C>(
      this.host,
      {
        id: childId(this.id, ++this.childSequence),
        serverId: this.serverId,
        correlation,
        location,
        flow: this.flow,
        exceptionHandler: options?.exceptionHandler ?? this.exceptionHandler,
      },
      {
        parentId: this.id,
        parent: new WeakRef<EventContextImpl<unknown>>(this),
        root: this.lineage?.root ?? new WeakRef<EventContextImpl<unknown>>(this),
        trace: this.trace,
        processingTime: this.processingTime,
      },
      releaseParent
    )

    try {
      this.host.attach(child)
    } catch (err) {
      // the caller never receives the child, so nothing else can release its slot
      releaseParent()
      throw err
    }
    return child
  }

  getParentContext(): Tributary.EventContext | undefined {
    return this.lineage?.parent.deref()
  }

  getRootContext(): Tributary.EventContext | undefined {
    return this.lineage ? this.lineage.root.deref() : this
  }

  getProcessorsTrace(): Tributary.ProcessorsTrace {
    return this.trace
  }

  getProcessingTime(): Tributary.ProcessingTime | undefined {
    return this.processingTime
  }

  isCorrelationIdFromSource(): boolean {
    return this.correlationFromSource
  }

  addExecutedProcessor(location: Tributary.ComponentLocation): void {
    this.trace.addExecutedProcessor(location)
  }

  addBranchTime(startedAt: number): void {
    this.processingTime?.addBranchTime(startedAt)
  }

  onBeforeResponse(observer: Tributary.Observer<Tributary.Outcome<R>>): () => void {
    return this.beforeResponse.subscribe(observer)
  }

  onResponse(observer: Tributary.Observer<Tributary.Outcome<R>>): () => void {
    return this.response.subscribe(observer)
  }

  onComplete(observer: () => void): () => void {
    return this.completion.subscribe(observer)
  }

  private respond(outcome: Tributary.Outcome<R>): void {
    try {
      this.addBranchTime(this.receivedTime)
      try {
        this.beforeResponse.fire(outcome)
      } finally {
        this.response.fire(outcome)
      }
    } finally {
      this.counter.release()
    }
  }

  private complete(): void {
    try {
      this.completion.fire(undefined)
    } finally {
      const release = this.releaseParent
      this.releaseParent = undefined
      release?.()
    }
  }

  private linkExternalCompletion(link: Tributary.ExternalCompletion): void {
    const open = this.counter.gate()
    if (isChannel(link)) {
      link.subscribe(open)
      return
    }
    void Promise.resolve(link).then(open, (err: unknown) => {
      open()
      this.host.reportError(err, this)
    })
  }
}

export function isEventContext(value: unknown): value is Tributary.EventContext {
  return typeof value === "object" && value !== null && contextSymbol in value
}

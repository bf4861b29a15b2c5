export type { Tributary, ContextState, MaybePromise } from "./types"
export { channelSymbol, contextSymbol } from "./symbols"
export { createChannel, isChannel } from "./channel"
export { CompletionCounter } from "./counter"
export { isEventContext } from "./context"
export { createRuntime } from "./runtime"
export { InvalidArgumentError, IllegalStateError, HandlerFailureError } from "./errors"

export const VERSION = "0.1.0"

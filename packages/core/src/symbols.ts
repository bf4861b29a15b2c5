export const channelSymbol: unique symbol = Symbol.for("@tributary/core/channel")
export const contextSymbol: unique symbol = Symbol.for("@tributary/core/context")

export const memoryTransportSymbol: unique symbol = Symbol.for("@tributary/devtools/memory")

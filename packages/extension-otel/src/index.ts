export { createOtel } from "./extension"
export { extractContext, injectContext, getContextSpan } from "./propagation"
export { SPAN_KEY } from "./span"
export type { OtelExtension } from "./types"

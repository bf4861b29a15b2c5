export { memory, isMemoryTransport } from "./memory"
export { consoleTransport } from "./console"
export { httpTransport } from "./http"

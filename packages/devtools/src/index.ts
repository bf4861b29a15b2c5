export { createDevtools } from "./extension"
export {
  memory,
  isMemoryTransport,
  consoleTransport,
  httpTransport,
} from "./transports"
export type { Devtools } from "./types"

import { createRuntime } from "../src/runtime"
import type { Tributary } from "../src/types"

export const orders: Tributary.FlowConstruct = { name: "orders" }

export function at(path: string): Tributary.ComponentLocation {
  return { path }
}

export function rootOf<R = unknown>(
  runtime: Tributary.Runtime = createRuntime(),
  options?: Partial<Tributary.FlowContextOptions>
): Tributary.EventContext<R> {
  return runtime.createContext<R>({ flow: orders, location: at("orders/source"), ...options })
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export interface Deferred<T> {
  promise: Promise<T>
  resolve(value: T): void
  reject(reason: unknown): void
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {}
  let reject: (reason: unknown) => void = () => {}
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

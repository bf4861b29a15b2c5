import { randomUUID } from "node:crypto"
import { InvalidArgumentError } from "./errors"
import type { Tributary } from "./types"

export interface Correlation {
  readonly correlationId: string
  readonly fromSource: boolean
}

export function generateId(): string {
  return randomUUID()
}

export function childId(parentId: string, sequence: number): string {
  return `${parentId}_${sequence}`
}

export function resolveCorrelation(correlationId: string | undefined): Correlation {
  if (correlationId === undefined) {
    return { correlationId: generateId(), fromSource: false }
  }
  if (typeof correlationId !== "string" || correlationId.length === 0) {
    throw new InvalidArgumentError("correlationId must be a non-empty string", "correlationId")
  }
  return { correlationId, fromSource: true }
}

export function assertLocation(location: unknown): asserts location is Tributary.ComponentLocation {
  if (location === null || location === undefined) {
    throw new InvalidArgumentError("location is required", "location")
  }
  if (typeof location !== "object" || !("path" in location) || typeof location.path !== "string") {
    throw new InvalidArgumentError("location must have a string path", "location")
  }
}

// src/rpc/errors.ts — Typed RPC error and wire envelope

/** Status codes carried by every failed internal call */
export type RpcStatusCode =
  | "INVALID_ARGUMENT"
  | "NOT_FOUND"
  | "FAILED_PRECONDITION"
  | "UNIMPLEMENTED"
  | "RESOURCE_EXHAUSTED"
  | "INTERNAL"
  | "UNAVAILABLE"

export const RPC_STATUS_CODES: readonly RpcStatusCode[] = [
  "INVALID_ARGUMENT",
  "NOT_FOUND",
  "FAILED_PRECONDITION",
  "UNIMPLEMENTED",
  "RESOURCE_EXHAUSTED",
  "INTERNAL",
  "UNAVAILABLE",
]

/** HTTP status used on the wire for each code */
export const HTTP_STATUS_BY_CODE = {
  INVALID_ARGUMENT: 400,
  NOT_FOUND: 404,
  FAILED_PRECONDITION: 412,
  UNIMPLEMENTED: 501,
  RESOURCE_EXHAUSTED: 429,
  INTERNAL: 500,
  UNAVAILABLE: 503,
} as const satisfies Record<RpcStatusCode, number>

export type RpcHttpStatus = (typeof HTTP_STATUS_BY_CODE)[RpcStatusCode]

/** Error body written for every failed call */
export interface RpcErrorEnvelope {
  code: RpcStatusCode
  message: string
}

export class RpcError extends Error {
  readonly name = "RpcError"
  readonly code: RpcStatusCode

  constructor(code: RpcStatusCode, message: string) {
    super(message)
    this.code = code
  }

  get httpStatus(): RpcHttpStatus {
    return HTTP_STATUS_BY_CODE[this.code]
  }

  toJSON(): RpcErrorEnvelope {
    return { code: this.code, message: this.message }
  }
}

export function isRpcStatusCode(value: unknown): value is RpcStatusCode {
  return typeof value === "string" && RPC_STATUS_CODES.some(code => code === value)
}

/** Narrow a decoded JSON body to an error envelope */
export function isRpcErrorEnvelope(value: unknown): value is RpcErrorEnvelope {
  if (typeof value !== "object" || value === null) return false
  const code: unknown = Reflect.get(value, "code")
  const message: unknown = Reflect.get(value, "message")
  return isRpcStatusCode(code) && typeof message === "string"
}

/**
 * Parse an error body received from a peer.
 * Returns null when the text is not a well-formed envelope.
 */
export function parseRpcErrorEnvelope(text: string): RpcErrorEnvelope | null {
  let decoded: unknown
  try {
    decoded = JSON.parse(text)
  } catch {
    return null
  }
  return isRpcErrorEnvelope(decoded) ? decoded : null
}

/**
 * Classify anything thrown by a handler. RpcErrors keep their code;
 * everything else becomes INTERNAL, prefixed with what was being attempted.
 */
export function toRpcError(err: unknown, context?: string): RpcError {
  if (err instanceof RpcError) return err
  const detail = err instanceof Error ? err.message : String(err)
  return new RpcError("INTERNAL", context ? `${context}: ${detail}` : detail)
}

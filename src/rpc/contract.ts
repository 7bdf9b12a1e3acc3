// src/rpc/contract.ts — Service contracts and method descriptors
//
// A contract is the declared method surface of one backend service. Servers
// bind handlers to it, the gateway builds its forwarding table from it and the
// SDK addresses methods through it. Nothing else enumerates methods.

import { Value } from "@sinclair/typebox/value"
import type { Static, TSchema } from "@sinclair/typebox"
import { RpcError } from "./errors.js"

export type MethodKind = "unary" | "server_stream"

export interface ServiceContract<M extends Record<string, MethodKind> = Record<string, MethodKind>> {
  /** Fully qualified service name, used in the call path */
  service: string
  methods: M
}

export function defineContract<const M extends Record<string, MethodKind>>(
  service: string,
  methods: M,
): ServiceContract<M> {
  return { service, methods }
}

/** Path a method is served on, relative to the server root */
export function methodPath(contract: ServiceContract, method: string): string {
  return `/rpc/${contract.service}/${method}`
}

export function hasMethod(contract: ServiceContract, method: string): boolean {
  return Object.prototype.hasOwnProperty.call(contract.methods, method)
}

/** Metadata key naming the target service on calls made through the gateway */
export const ROUTING_HEADER = "x-target-service"

// --- Call context ---

export interface CallContext {
  /** Lower-cased request headers */
  metadata: Record<string, string>
  /** Aborted when the caller goes away */
  signal: AbortSignal
}

// --- Bound methods ---

export interface UnaryMethod {
  kind: "unary"
  invoke(payload: unknown, ctx: CallContext): Promise<unknown>
}

export interface StreamMethod {
  kind: "server_stream"
  invoke(payload: unknown, ctx: CallContext): AsyncIterable<unknown>
}

export type BoundMethod = UnaryMethod | StreamMethod

/** Handler table a server must provide for a contract */
export type ServiceImplementation<C extends ServiceContract> = {
  [K in keyof C["methods"]]: C["methods"][K] extends "server_stream" ? StreamMethod : UnaryMethod
}

function validate<T extends TSchema>(schema: T, payload: unknown): Static<T> {
  if (Value.Check(schema, payload)) return payload
  const first = Value.Errors(schema, payload).First()
  const where = first?.path ? ` at ${first.path}` : ""
  throw new RpcError("INVALID_ARGUMENT", `Invalid request${where}: ${first?.message ?? "schema mismatch"}`)
}

/** Bind a request/response handler behind a request schema */
export function unary<T extends TSchema>(
  request: T,
  handler: (req: Static<T>, ctx: CallContext) => Promise<unknown>,
): UnaryMethod {
  return {
    kind: "unary",
    invoke: (payload, ctx) => {
      const req = validate(request, payload)
      return handler(req, ctx)
    },
  }
}

/** Bind a server-streaming handler behind a request schema */
export function serverStream<T extends TSchema>(
  request: T,
  handler: (req: Static<T>, ctx: CallContext) => AsyncIterable<unknown>,
): StreamMethod {
  return {
    kind: "server_stream",
    invoke: (payload, ctx) => handler(validate(request, payload), ctx),
  }
}

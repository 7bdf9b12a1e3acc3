// src/rpc/client.ts — Typed caller for one service contract
//
// Each call opens its own request; nothing is pooled or reused. Responses are
// checked against the caller's schema, and error envelopes are rebuilt into
// RpcError with the peer's code and message.

import { Value } from "@sinclair/typebox/value"
import type { Static, TSchema } from "@sinclair/typebox"
import { RpcError, isRpcErrorEnvelope, parseRpcErrorEnvelope } from "./errors.js"
import { methodPath } from "./contract.js"
import type { ServiceContract } from "./contract.js"
import { parseSSEJson } from "./sse.js"

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface RpcClientOptions {
  /** host:port or a full http(s) URL */
  address: string
  /** Extra request headers sent on every call (routing metadata) */
  metadata?: Record<string, string>
  fetch?: FetchLike
}

export interface CallOptions {
  signal?: AbortSignal
}

export function baseUrlFor(address: string): string {
  const trimmed = address.replace(/\/+$/, "")
  return /^https?:\/\//.test(trimmed) ? trimmed : `http://${trimmed}`
}

type MethodsOfKind<C extends ServiceContract, K extends string> = {
  [M in keyof C["methods"]]: C["methods"][M] extends K ? M : never
}[keyof C["methods"]] & string

export class RpcClient<C extends ServiceContract> {
  private readonly baseUrl: string
  private readonly metadata: Record<string, string>
  private readonly _fetch: FetchLike

  constructor(
    private readonly contract: C,
    options: RpcClientOptions,
  ) {
    this.baseUrl = baseUrlFor(options.address)
    this.metadata = options.metadata ?? {}
    this._fetch = options.fetch ?? globalThis.fetch
  }

  async call<T extends TSchema>(
    method: MethodsOfKind<C, "unary">,
    payload: unknown,
    response: T,
    options?: CallOptions,
  ): Promise<Static<T>> {
    const res = await this.send(method, payload, options?.signal)
    const body: unknown = await res.json()
    return expectShape(response, body, `${this.contract.service}/${method}`)
  }

  async *stream<T extends TSchema>(
    method: MethodsOfKind<C, "server_stream">,
    payload: unknown,
    fragment: T,
    options?: CallOptions,
  ): AsyncGenerator<Static<T>> {
    const controller = new AbortController()
    const outer = options?.signal
    if (outer) {
      if (outer.aborted) controller.abort()
      else outer.addEventListener("abort", () => controller.abort(), { once: true })
    }

    let completed = false
    try {
      const res = await this.send(method, payload, controller.signal)
      if (!res.body) {
        throw new RpcError("INTERNAL", `Empty stream from ${this.contract.service}/${method}`)
      }
      for await (const ev of parseSSEJson(res.body)) {
        if (ev.event === "error") {
          throw isRpcErrorEnvelope(ev.data)
            ? new RpcError(ev.data.code, ev.data.message)
            : new RpcError("INTERNAL", `Malformed stream error from ${this.contract.service}/${method}`)
        }
        if (ev.event === "chunk") {
          yield expectShape(fragment, ev.data, `${this.contract.service}/${method}`)
        }
      }
      completed = true
    } finally {
      // Consumer stopped early or something failed: close the request
      if (!completed) controller.abort()
    }
  }

  private async send(method: string, payload: unknown, signal?: AbortSignal): Promise<Response> {
    let res: Response
    try {
      res = await this._fetch(`${this.baseUrl}${methodPath(this.contract, method)}`, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...this.metadata },
        body: JSON.stringify(payload),
        signal,
      })
    } catch (err) {
      throw new RpcError("UNAVAILABLE", `Cannot reach ${this.baseUrl}: ${err instanceof Error ? err.message : String(err)}`)
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "")
      const envelope = parseRpcErrorEnvelope(text)
      if (envelope) throw new RpcError(envelope.code, envelope.message)
      throw new RpcError("INTERNAL", `Unexpected HTTP ${res.status} from ${this.baseUrl}: ${text.slice(0, 200)}`)
    }
    return res
  }
}

function expectShape<T extends TSchema>(schema: T, value: unknown, where: string): Static<T> {
  if (Value.Check(schema, value)) return value
  const first = Value.Errors(schema, value).First()
  throw new RpcError("INTERNAL", `Malformed response from ${where}: ${first?.path ?? ""} ${first?.message ?? ""}`.trim())
}

// src/sdk/platform.ts — PlatformClient, the single entry point for workflows
//
// Every call goes to the gateway's internal listener with x-target-service
// set, so workflows only ever know one address.
//
//   const platform = new PlatformClient()
//   const session = await platform.sessions.getOrCreate("user-123")
//   const reply = await platform.models.chat({ messages: [{ role: "user", content: "Hello" }] })

import type { FetchLike, RpcClientOptions } from "../rpc/client.js"
import { ROUTING_HEADER } from "../rpc/contract.js"
import { ModelClient } from "./models.js"
import { SessionClient } from "./sessions.js"

export const DEFAULT_GATEWAY_ADDR = "localhost:50051"

export interface PlatformClientConfig {
  /** Gateway RPC address; defaults to GANTRY_GATEWAY_URL, then localhost:50051 */
  gatewayUrl?: string
  fetch?: FetchLike
}

export class PlatformClient {
  readonly gatewayUrl: string
  private readonly _fetch?: FetchLike
  private _sessions?: SessionClient
  private _models?: ModelClient

  constructor(config: PlatformClientConfig = {}) {
    this.gatewayUrl = config.gatewayUrl || process.env.GANTRY_GATEWAY_URL || DEFAULT_GATEWAY_ADDR
    this._fetch = config.fetch
  }

  get sessions(): SessionClient {
    if (!this._sessions) this._sessions = new SessionClient(this.clientOptions("sessions"))
    return this._sessions
  }

  get models(): ModelClient {
    if (!this._models) this._models = new ModelClient(this.clientOptions("models"))
    return this._models
  }

  private clientOptions(service: string): RpcClientOptions {
    return {
      address: this.gatewayUrl,
      metadata: { [ROUTING_HEADER]: service },
      fetch: this._fetch,
    }
  }
}

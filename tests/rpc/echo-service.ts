// tests/rpc/echo-service.ts — Small contract used to exercise the RPC layer

import { Type } from "@sinclair/typebox"
import { defineContract, serverStream, unary } from "../../src/rpc/contract.js"
import type { ServiceImplementation } from "../../src/rpc/contract.js"
import { RpcError } from "../../src/rpc/errors.js"

export const ECHO_CONTRACT = defineContract("test.Echo", {
  Say: "unary",
  Count: "server_stream",
  Fail: "unary",
  Hold: "server_stream",
})

export const SayResponse = Type.Object({ echo: Type.String() })
export const CountChunk = Type.Object({ i: Type.Integer() })

export interface EchoFixture {
  service: ServiceImplementation<typeof ECHO_CONTRACT>
  /** Streams whose generator has been closed */
  closed: () => number
  /** Abort signals seen by Hold calls, in arrival order */
  signals: AbortSignal[]
  /** Let every open Hold stream send its second chunk and finish */
  release: () => void
}

export function createEchoService(): EchoFixture {
  let closed = 0
  const signals: AbortSignal[] = []
  let open: () => void = () => {}
  const gate = new Promise<void>((resolve) => {
    open = resolve
  })
  const service: ServiceImplementation<typeof ECHO_CONTRACT> = {
    Say: unary(Type.Object({ text: Type.String({ minLength: 1 }) }), async (req, ctx) => ({
      echo: ctx.metadata["x-shout"] ? req.text.toUpperCase() : req.text,
    })),

    Count: serverStream(
      Type.Object({ n: Type.Integer({ minimum: 0 }), fail_at: Type.Optional(Type.Integer()) }),
      async function* (req) {
        if (req.n === 0) throw new RpcError("FAILED_PRECONDITION", "nothing to count")
        try {
          for (let i = 0; i < req.n; i++) {
            if (i === req.fail_at) throw new Error("exploded")
            yield { i }
          }
        } finally {
          closed++
        }
      },
    ),

    Fail: unary(Type.Object({}), async () => {
      throw new Error("disk on fire")
    }),

    Hold: serverStream(Type.Object({}), async function* (_req, ctx) {
      signals.push(ctx.signal)
      yield { i: 0 }
      await new Promise<void>((resolve) => {
        ctx.signal.addEventListener("abort", () => resolve(), { once: true })
        void gate.then(resolve)
      })
      if (!ctx.signal.aborted) yield { i: 1 }
    }),
  }
  return { service, closed: () => closed, signals, release: () => open() }
}

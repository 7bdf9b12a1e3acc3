// src/rpc/server.ts — Hono app serving one service contract
//
// POST /rpc/<Service>/<Method> with a JSON body. Unary methods answer with a
// JSON body; server-streaming methods answer with text/event-stream, one
// `chunk` event per fragment and an `error` event if the stream fails midway.
// Failures before the first fragment are answered with an error envelope and
// the mapped HTTP status.

import { Hono } from "hono"
import type { Context } from "hono"
import { streamSSE } from "hono/streaming"
import { RpcError, toRpcError } from "./errors.js"
import { CallPool, callPoolMiddleware } from "./concurrency.js"
import type { WorkerPoolConfig } from "./concurrency.js"
import { methodPath } from "./contract.js"
import type {
  BoundMethod,
  CallContext,
  ServiceContract,
  ServiceImplementation,
  StreamMethod,
} from "./contract.js"

export interface RpcServerOptions {
  /** Log prefix, e.g. "sessions" */
  name: string
  pool?: Partial<WorkerPoolConfig>
}

export function rpcErrorResponse(c: Context, err: RpcError): Response {
  return c.json(err.toJSON(), err.httpStatus)
}

/** Build the call context for a request; the signal follows the caller's connection */
export function callContextFor(c: Context): { ctx: CallContext; controller: AbortController } {
  const controller = new AbortController()
  const upstream = c.req.raw.signal
  if (upstream.aborted) {
    controller.abort()
  } else {
    upstream.addEventListener("abort", () => controller.abort(), { once: true })
  }
  return { ctx: { metadata: c.req.header(), signal: controller.signal }, controller }
}

function logFailure(name: string, method: string, err: RpcError): void {
  if (err.code !== "INTERNAL") return
  console.error(
    JSON.stringify({
      metric: `${name}.handler_error`,
      method,
      code: err.code,
      error: err.message,
    }),
  )
}

async function readPayload(c: Context): Promise<unknown> {
  const text = await c.req.text()
  if (text === "") return {}
  try {
    return JSON.parse(text)
  } catch {
    throw new RpcError("INVALID_ARGUMENT", "Request body must be a JSON object")
  }
}

async function serveStream(
  c: Context,
  name: string,
  method: string,
  bound: StreamMethod,
  payload: unknown,
): Promise<Response> {
  const { ctx, controller } = callContextFor(c)

  let iterator: AsyncIterator<unknown>
  let first: IteratorResult<unknown>
  try {
    iterator = bound.invoke(payload, ctx)[Symbol.asyncIterator]()
    first = await iterator.next()
  } catch (err) {
    const rpcErr = toRpcError(err)
    logFailure(name, method, rpcErr)
    return rpcErrorResponse(c, rpcErr)
  }

  return streamSSE(c, async (stream) => {
    let finished = false
    stream.onAbort(() => controller.abort())
    try {
      let step = first
      while (!step.done) {
        await stream.writeSSE({ event: "chunk", data: JSON.stringify(step.value) })
        if (controller.signal.aborted) break
        step = await iterator.next()
      }
      finished = step.done === true
    } catch (err) {
      if (!controller.signal.aborted) {
        const rpcErr = toRpcError(err)
        logFailure(name, method, rpcErr)
        await stream.writeSSE({ event: "error", data: JSON.stringify(rpcErr.toJSON()) })
      }
    } finally {
      if (!finished) {
        controller.abort()
        await iterator.return?.()
      }
    }
  })
}

export function createRpcServer<C extends ServiceContract>(
  contract: C,
  implementation: ServiceImplementation<C>,
  options: RpcServerOptions,
): Hono {
  const app = new Hono()
  const pool = new CallPool(options.pool)

  app.get("/health", (c) =>
    c.json({ status: "healthy", service: contract.service, uptime: process.uptime(), pool: pool.stats() }),
  )

  app.use("/rpc/*", callPoolMiddleware(pool))

  const methods: Array<[string, BoundMethod]> = Object.entries<BoundMethod>(implementation)
  for (const [method, bound] of methods) {
    app.post(methodPath(contract, method), async (c) => {
      let payload: unknown
      try {
        payload = await readPayload(c)
      } catch (err) {
        return rpcErrorResponse(c, toRpcError(err))
      }

      if (bound.kind === "server_stream") {
        return serveStream(c, options.name, method, bound, payload)
      }

      const { ctx } = callContextFor(c)
      try {
        const result = await bound.invoke(payload, ctx)
        return c.body(JSON.stringify(result), 200, { "Content-Type": "application/json" })
      } catch (err) {
        const rpcErr = toRpcError(err)
        logFailure(options.name, method, rpcErr)
        return rpcErrorResponse(c, rpcErr)
      }
    })
  }

  app.notFound((c) =>
    rpcErrorResponse(c, new RpcError("UNIMPLEMENTED", `Method ${c.req.path} is not implemented by ${contract.service}`)),
  )

  app.onError((err, c) => {
    const rpcErr = toRpcError(err)
    logFailure(options.name, c.req.path, rpcErr)
    return rpcErrorResponse(c, rpcErr)
  })

  return app
}

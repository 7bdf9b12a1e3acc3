// src/boot/gateway.ts — Gateway entry point
// One component, two listeners: external HTTP (clients → workflows) and
// internal RPC (workflows → platform services).

import { loadConfig } from "../config.js"
import { createGateway } from "../gateway/server.js"
import { installShutdown, listen } from "./serve.js"

async function main() {
  console.log("[gateway] booting...")
  const config = loadConfig()
  const gateway = createGateway(config)

  const http = listen(gateway.httpApp, "gateway", config.gateway.httpPort, config.gateway.host)
  const rpc = listen(gateway.rpcApp, "gateway", config.gateway.rpcPort, config.gateway.host)
  console.log(`[gateway] external HTTP (clients → workflows): port ${config.gateway.httpPort}`)
  console.log(`[gateway] internal RPC (workflows → platform services): port ${config.gateway.rpcPort}`)

  installShutdown("gateway", [http, rpc])
}

main().catch((err) => {
  console.error("[gateway] fatal:", err)
  process.exit(1)
})

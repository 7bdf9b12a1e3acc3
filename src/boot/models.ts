// src/boot/models.ts — Model service entry point

import { loadConfig } from "../config.js"
import { ModelRegistry } from "../models/model-registry.js"
import { PromptRegistry } from "../models/prompt-registry.js"
import { createProviderAdapters } from "../models/providers/index.js"
import { ModelResolver } from "../models/resolver.js"
import { MODEL_CONTRACT } from "../models/schema.js"
import { createModelService } from "../models/service.js"
import { createRpcServer } from "../rpc/server.js"
import { installShutdown, listen } from "./serve.js"

async function main() {
  console.log("[models] booting...")
  const config = loadConfig()

  const adapters = createProviderAdapters(config.models)
  if (adapters.length === 0) {
    console.warn("[models] no providers configured (set OPENAI_API_KEY and/or ANTHROPIC_API_KEY); chat will fail")
  } else {
    console.log(`[models] providers: ${adapters.map(a => a.id).join(", ")}`)
  }

  const registry = new ModelRegistry()
  const service = createModelService({
    resolver: new ModelResolver(adapters, registry),
    registry,
    prompts: new PromptRegistry(),
  })
  const app = createRpcServer(MODEL_CONTRACT, service, { name: "models", pool: config.workerPool })

  const server = listen(app, "models", config.models.port)
  installShutdown("models", [server])
}

main().catch((err) => {
  console.error("[models] fatal:", err)
  process.exit(1)
})

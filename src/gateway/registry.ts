// src/gateway/registry.ts — Service and workflow address directory
// Registrations live for the process lifetime; there is no removal.

import { RpcError } from "../rpc/errors.js"

class AddressBook {
  private readonly entries = new Map<string, string[]>()

  constructor(private readonly kind: "service" | "workflow") {}

  /** Idempotent append; returns false when the address was already present */
  add(name: string, address: string): boolean {
    const addresses = this.entries.get(name)
    if (!addresses) {
      this.entries.set(name, [address])
      return true
    }
    if (addresses.includes(address)) return false
    addresses.push(address)
    return true
  }

  /** First registered address; later ones are never used */
  first(name: string): string | undefined {
    return this.entries.get(name)?.[0]
  }

  all(name: string): string[] {
    return [...(this.entries.get(name) ?? [])]
  }

  names(): string[] {
    return [...this.entries.keys()]
  }

  label(): string {
    return this.kind
  }
}

export class ServiceRegistry {
  private readonly services = new AddressBook("service")
  private readonly workflows = new AddressBook("workflow")

  registerService(name: string, address: string): void {
    if (this.services.add(name, address)) {
      console.log(`[gateway] registered ${this.services.label()} ${name} → ${address}`)
    }
  }

  registerWorkflow(apiPath: string, address: string): void {
    if (this.workflows.add(apiPath, address)) {
      console.log(`[gateway] registered ${this.workflows.label()} ${apiPath} → ${address}`)
    }
  }

  resolveService(name: string): string {
    const address = this.services.first(name)
    if (address === undefined) throw new RpcError("NOT_FOUND", `Service '${name}' not found`)
    return address
  }

  resolveWorkflow(apiPath: string): string {
    const address = this.workflows.first(apiPath)
    if (address === undefined) throw new RpcError("NOT_FOUND", `Workflow '${apiPath}' not registered`)
    return address
  }

  hasService(name: string): boolean {
    return this.services.first(name) !== undefined
  }

  serviceAddresses(name: string): string[] {
    return this.services.all(name)
  }

  workflowAddresses(apiPath: string): string[] {
    return this.workflows.all(apiPath)
  }

  /** Snapshot for /health */
  describe(): { services: string[]; workflows: string[] } {
    return { services: this.services.names(), workflows: this.workflows.names() }
  }
}

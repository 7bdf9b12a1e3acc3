// src/sdk/workflow.ts — Deployment metadata for workflow handlers
//
//   export const assistant = defineWorkflow(
//     { name: "patient-assistant", api_path: "/patient-assistant", autoscaling: { max_replicas: 20 } },
//     async (input: { user_id: string; message: string }) => { ... },
//   )
//
// The returned function behaves exactly like the handler; deployment tooling
// reads `assistant.metadata` to place it behind the gateway.

export type ResponseMode = "sync" | "async" | "stream"

export interface AutoscalingConfig {
  min_replicas: number
  max_replicas: number
  /** Concurrent requests per replica before scaling out */
  target_ongoing_requests: number
  target_cpu_percent?: number
}

export const DEFAULT_AUTOSCALING: Readonly<AutoscalingConfig> = Object.freeze({
  min_replicas: 1,
  max_replicas: 10,
  target_ongoing_requests: 10,
})

export interface WorkflowOptions {
  name: string
  /** Public HTTP path on the gateway, e.g. "/patient-assistant" */
  api_path: string
  /** Default: "sync" */
  response_mode?: ResponseMode
  /** Merged over DEFAULT_AUTOSCALING */
  autoscaling?: Partial<AutoscalingConfig>
  /** Passed to the deployment target untouched (GPU, memory, ...) */
  deployment?: Record<string, unknown>
}

export interface WorkflowMetadata {
  name: string
  api_path: string
  response_mode: ResponseMode
  autoscaling: AutoscalingConfig
  deployment_config?: Record<string, unknown>
}

export type Workflow<A extends unknown[], R> = ((...args: A) => R) & {
  readonly metadata: WorkflowMetadata
}

/** Wrap a handler and attach its deployment metadata; calling it runs the handler unchanged */
export function defineWorkflow<A extends unknown[], R>(
  options: WorkflowOptions,
  handler: (...args: A) => R,
): Workflow<A, R> {
  const metadata: WorkflowMetadata = {
    name: options.name,
    api_path: options.api_path,
    response_mode: options.response_mode ?? "sync",
    autoscaling: { ...DEFAULT_AUTOSCALING, ...options.autoscaling },
  }
  if (options.deployment) metadata.deployment_config = options.deployment

  const run = (...args: A): R => handler(...args)
  return Object.assign(run, { metadata })
}

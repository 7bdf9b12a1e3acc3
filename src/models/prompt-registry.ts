// src/models/prompt-registry.ts — Append-only versioned system prompts

import type { Prompt, PromptMetadata } from "./schema.js"

export interface PromptRegistryOptions {
  now?: () => Date
}

/** Version 0 (or omitted) asks for the latest */
export const LATEST_VERSION = 0

export class PromptRegistry {
  /** name → versions, index i holds version i + 1; Map order is first-registration order */
  private readonly prompts = new Map<string, Prompt[]>()
  private readonly now: () => Date

  constructor(options: PromptRegistryOptions = {}) {
    this.now = options.now ?? (() => new Date())
  }

  register(name: string, content: string, metadata: Partial<PromptMetadata> = {}): Prompt {
    const versions = this.prompts.get(name) ?? []
    const prompt = freeze({
      name,
      version: versions.length + 1,
      content,
      metadata: {
        author: metadata.author ?? "",
        reviewed_by: metadata.reviewed_by ?? "",
        tags: [...(metadata.tags ?? [])],
      },
      created_at: this.now().toISOString(),
    })
    versions.push(prompt)
    this.prompts.set(name, versions)
    return prompt
  }

  /** 1-based version, or latest for 0; undefined when the name or version is unknown */
  get(name: string, version: number = LATEST_VERSION): Prompt | undefined {
    const versions = this.prompts.get(name)
    if (!versions || versions.length === 0) return undefined
    if (version <= LATEST_VERSION) return versions[versions.length - 1]
    return versions[version - 1]
  }

  /** Highest version of every name */
  listLatest(): Prompt[] {
    const latest: Prompt[] = []
    for (const versions of this.prompts.values()) {
      const last = versions[versions.length - 1]
      if (last) latest.push(last)
    }
    return latest
  }
}

function freeze(prompt: Prompt): Prompt {
  Object.freeze(prompt.metadata.tags)
  Object.freeze(prompt.metadata)
  return Object.freeze(prompt)
}

// src/cloud/provider-manager.ts — Registry of named cloud providers

import { RoutingError, noProviderAvailable } from "./errors.js"
import type { CloudProvider } from "./types.js"

export class CloudProviderManager {
  private providers = new Map<string, CloudProvider>()
  private defaultId: string | null = null

  /** The first registered provider becomes the default unless another is marked. */
  register(provider: CloudProvider, opts?: { makeDefault?: boolean }): void {
    this.providers.set(provider.providerId, provider)
    if (opts?.makeDefault || this.defaultId === null) {
      this.defaultId = provider.providerId
    }
  }

  unregister(providerId: string): boolean {
    const removed = this.providers.delete(providerId)
    if (removed && this.defaultId === providerId) {
      const next = this.providers.keys().next()
      this.defaultId = next.done ? null : next.value
    }
    return removed
  }

  has(providerId: string): boolean {
    return this.providers.has(providerId)
  }

  get(providerId: string): CloudProvider {
    const provider = this.providers.get(providerId)
    if (!provider) {
      throw new RoutingError("PROVIDER_NOT_FOUND", `cloud provider not registered: ${providerId}`, { providerId })
    }
    return provider
  }

  getDefault(): CloudProvider {
    if (this.defaultId === null) throw noProviderAvailable()
    return this.get(this.defaultId)
  }

  setDefault(providerId: string): void {
    this.get(providerId)
    this.defaultId = providerId
  }

  list(): CloudProvider[] {
    return Array.from(this.providers.values())
  }

  get size(): number {
    return this.providers.size
  }
}

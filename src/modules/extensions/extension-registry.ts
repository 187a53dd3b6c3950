/**
 * ExtensionRegistry: resolves (domain, capability) to a handler.
 *
 * Built once at plan-or-project setup and read-only afterwards, so a single
 * registry can be shared by every plan without locking. Resolution is a pure
 * lookup.
 *
 * Usage:
 * ```typescript
 * const registry = new ExtensionRegistryBuilder()
 *   .register('java', 'outline', javaOutliner)
 *   .register('java', 'triage', javaTriager)
 *   .build()
 * const outliner = registry.tryResolve('java', 'outline')
 * ```
 */

import { ExtensionNotFoundError, ValidationError } from '../../core/errors.js'
import { CAPABILITIES, type Capability, type CapabilityHandlers, type ExtensionMap } from './types.js'

function isCapability(value: string): value is Capability {
  return CAPABILITIES.some((c) => c === value)
}

// ---------------------------------------------------------------------------
// ExtensionRegistry
// ---------------------------------------------------------------------------

export class ExtensionRegistry {
  private readonly _handlers: ReadonlyMap<string, Partial<CapabilityHandlers>>

  /** Use ExtensionRegistryBuilder or createExtensionRegistry() */
  constructor(handlers: ReadonlyMap<string, Partial<CapabilityHandlers>>) {
    this._handlers = new Map(
      [...handlers].map(([domain, caps]) => [domain, Object.freeze({ ...caps })]),
    )
    Object.freeze(this)
  }

  /**
   * Resolve the handler for a domain and capability.
   * @throws {ExtensionNotFoundError} if the domain lacks the capability
   */
  resolve<C extends Capability>(domain: string, capability: C): CapabilityHandlers[C] {
    const handler = this._handlers.get(domain)?.[capability]
    if (handler === undefined) {
      throw new ExtensionNotFoundError(domain, capability)
    }
    return handler
  }

  /** Resolve a handler, or undefined when none is registered */
  tryResolve<C extends Capability>(domain: string, capability: C): CapabilityHandlers[C] | undefined {
    return this._handlers.get(domain)?.[capability]
  }

  has(domain: string, capability: Capability): boolean {
    return this.tryResolve(domain, capability) !== undefined
  }

  /** Domains with at least one registered capability, sorted */
  domains(): string[] {
    return [...this._handlers.keys()].sort()
  }

  /** Capabilities registered for a domain, in canonical order */
  capabilitiesOf(domain: string): Capability[] {
    return CAPABILITIES.filter((c) => this.has(domain, c))
  }
}

// ---------------------------------------------------------------------------
// ExtensionRegistryBuilder
// ---------------------------------------------------------------------------

export class ExtensionRegistryBuilder {
  private readonly _handlers = new Map<string, Partial<CapabilityHandlers>>()
  private _built = false

  /**
   * Register a handler. Registering the same (domain, capability) twice is an error.
   * @throws {ValidationError} on an empty domain, unknown capability, duplicate, or after build()
   */
  register<C extends Capability>(domain: string, capability: C, handler: CapabilityHandlers[C]): this {
    if (this._built) {
      throw new ValidationError('Extension registry is already built', { domain, capability })
    }
    if (domain.trim() === '') {
      throw new ValidationError('Extension domain must not be empty', { capability })
    }
    if (!isCapability(capability)) {
      throw new ValidationError(`Unknown capability "${String(capability)}"`, { domain })
    }
    const existing = this._handlers.get(domain) ?? {}
    if (existing[capability] !== undefined) {
      throw new ValidationError(`Duplicate '${capability}' extension for domain '${domain}'`, {
        domain,
        capability,
      })
    }
    const updated: Partial<CapabilityHandlers> = { ...existing }
    updated[capability] = handler
    this._handlers.set(domain, updated)
    return this
  }

  build(): ExtensionRegistry {
    this._built = true
    return new ExtensionRegistry(this._handlers)
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Build a registry from a static domain → capabilities map.
 */
export function createExtensionRegistry(map: ExtensionMap = {}): ExtensionRegistry {
  const builder = new ExtensionRegistryBuilder()
  for (const [domain, caps] of Object.entries(map)) {
    if (caps.outline !== undefined) builder.register(domain, 'outline', caps.outline)
    if (caps.triage !== undefined) builder.register(domain, 'triage', caps.triage)
    if (caps.change_type_agent !== undefined) builder.register(domain, 'change_type_agent', caps.change_type_agent)
  }
  return builder.build()
}

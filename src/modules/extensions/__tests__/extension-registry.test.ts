/**
 * Unit tests for ExtensionRegistry
 */

import { describe, it, expect } from 'vitest'
import { ExtensionRegistryBuilder, createExtensionRegistry } from '../extension-registry.js'
import type { ChangeTypeAgent, Outliner, Triager } from '../types.js'
import { ExtensionNotFoundError, ValidationError } from '../../../core/errors.js'

const outliner: Outliner = { outline: () => [] }
const triager: Triager = { triage: () => ({ decision: 'ACCEPT' }) }
const agent: ChangeTypeAgent = { executorFor: (changeType) => `java-${changeType}` }

describe('ExtensionRegistry', () => {
  it('resolves a registered handler', () => {
    const registry = new ExtensionRegistryBuilder().register('java', 'outline', outliner).build()
    expect(registry.resolve('java', 'outline')).toBe(outliner)
  })

  it('throws ExtensionNotFoundError for a missing capability', () => {
    const registry = createExtensionRegistry({ java: { outline: outliner } })
    expect(() => registry.resolve('java', 'triage')).toThrow(ExtensionNotFoundError)
    expect(() => registry.resolve('rust', 'outline')).toThrow(
      "No 'outline' extension registered for domain 'rust'",
    )
  })

  it('tryResolve returns undefined instead of throwing', () => {
    const registry = createExtensionRegistry({ java: { triage: triager } })
    expect(registry.tryResolve('java', 'triage')).toBe(triager)
    expect(registry.tryResolve('java', 'change_type_agent')).toBeUndefined()
  })

  it('lists domains and their capabilities', () => {
    const registry = createExtensionRegistry({
      plugin: { change_type_agent: agent },
      java: { triage: triager, outline: outliner },
    })
    expect(registry.domains()).toEqual(['java', 'plugin'])
    expect(registry.capabilitiesOf('java')).toEqual(['outline', 'triage'])
    expect(registry.capabilitiesOf('missing')).toEqual([])
  })

  it('is frozen after build', () => {
    const builder = new ExtensionRegistryBuilder().register('java', 'outline', outliner)
    const registry = builder.build()
    expect(Object.isFrozen(registry)).toBe(true)
    expect(() => builder.register('java', 'triage', triager)).toThrow(ValidationError)
    expect(registry.has('java', 'triage')).toBe(false)
  })

  it('rejects duplicate registrations', () => {
    const builder = new ExtensionRegistryBuilder().register('java', 'outline', outliner)
    expect(() => builder.register('java', 'outline', outliner)).toThrow(
      "Duplicate 'outline' extension for domain 'java'",
    )
  })

  it('rejects an empty domain', () => {
    expect(() => new ExtensionRegistryBuilder().register(' ', 'triage', triager)).toThrow(ValidationError)
  })
})

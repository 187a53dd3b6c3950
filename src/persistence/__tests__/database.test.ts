/**
 * Unit tests for the SQLite connection wrapper.
 */

import { describe, it, expect } from 'vitest'
import { DatabaseWrapper } from '../database.js'

describe('DatabaseWrapper', () => {
  it('refuses access before it is opened', () => {
    const wrapper = new DatabaseWrapper(':memory:')
    expect(wrapper.isOpen).toBe(false)
    expect(() => wrapper.db).toThrow('SQLite plan store at :memory: is not open')
  })

  it('opens once, migrates, and closes', () => {
    const wrapper = new DatabaseWrapper(':memory:')
    wrapper.open()
    const db = wrapper.db
    wrapper.open()

    expect(wrapper.db).toBe(db)
    const table = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'plan_artifacts'")
      .get()
    expect(table?.name).toBe('plan_artifacts')
    expect(db.pragma('foreign_keys', { simple: true })).toBe(1)

    wrapper.close()
    wrapper.close()
    expect(wrapper.isOpen).toBe(false)
  })
})

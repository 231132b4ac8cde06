import { describe, it, expect, vi, beforeEach } from 'vitest'
import type { Pool } from '@tilecrawl/db'

const { createPool, ensureSchema, acquireAdvisoryLock } = vi.hoisted(() => ({
  createPool: vi.fn(),
  ensureSchema: vi.fn(),
  acquireAdvisoryLock: vi.fn(),
}))

vi.mock('@tilecrawl/db', () => ({ createPool, ensureSchema, acquireAdvisoryLock }))

import { ConfigurationError } from '../crawler/errors.js'
import { runHarvest } from '../harvest.js'
import { ScriptedTransport, testSession } from '../crawler/__tests__/helpers/fakes.js'

function fakePool() {
  return {
    query: vi.fn(async () => ({ rows: [], rowCount: 0 })),
    connect: vi.fn(),
    end: vi.fn(async () => {}),
  }
}

const session = testSession(
  new ScriptedTransport(() => {
    throw new Error('no requests expected')
  })
)

describe('runHarvest', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    ensureSchema.mockResolvedValue(undefined)
  })

  it('requires a tile file when no tiles are given', async () => {
    await expect(runHarvest({ session, env: {} })).rejects.toBeInstanceOf(ConfigurationError)
    expect(createPool).not.toHaveBeenCalled()
  })

  it('returns null without crawling when the lock is held elsewhere', async () => {
    const pool = fakePool()
    acquireAdvisoryLock.mockResolvedValue(null)

    const result = await runHarvest({ session, env: {}, tiles: [], pool: pool as unknown as Pool })

    expect(result).toBeNull()
    expect(ensureSchema).toHaveBeenCalledWith(pool)
    expect(pool.query).not.toHaveBeenCalled()
    expect(pool.end).not.toHaveBeenCalled()
  })

  it('creates, uses and closes its own pool', async () => {
    const pool = fakePool()
    createPool.mockReturnValue(pool)
    const release = vi.fn(async () => true)
    acquireAdvisoryLock.mockResolvedValue({ key: 1n, release })

    const summary = await runHarvest({
      session,
      env: { DATABASE_URL: 'postgres://localhost/test' },
      tiles: [],
    })

    expect(createPool).toHaveBeenCalledWith('postgres://localhost/test')
    expect(summary).toMatchObject({ tilesProcessed: 0, stopReason: 'completed', startCursor: 0, endCursor: 0 })
    expect(release).toHaveBeenCalledTimes(1)
    expect(pool.end).toHaveBeenCalledTimes(1)
  })
})

import { describe, it, expect, vi } from 'vitest'
import { ensureSchema, readSchemaSql } from '../schema.js'

describe('schema', () => {
  it('ships idempotent DDL for every crawl table', async () => {
    const sql = await readSchemaSql('001_crawl_state.sql')
    expect(sql).toContain('CREATE TABLE IF NOT EXISTS crawl_tiles')
    expect(sql).toContain('CREATE TABLE IF NOT EXISTS crawl_cursor')
    expect(sql).toContain('CREATE TABLE IF NOT EXISTS crawl_records')
    expect(sql).not.toMatch(/CREATE TABLE (?!IF NOT EXISTS)/)
  })

  it('applies the schema files through the given connection', async () => {
    const db = { query: vi.fn().mockResolvedValue({ rows: [] }) }
    await ensureSchema(db)

    expect(db.query).toHaveBeenCalledTimes(1)
    expect(String(db.query.mock.calls[0][0])).toContain('crawl_records')
  })
})

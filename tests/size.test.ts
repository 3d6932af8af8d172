import { describe, it, expect } from 'vitest'
import { Value } from '@sinclair/typebox/value'
import { MalformedInputError, SizeReport, SizeTable, parseSizeReport } from '../src/index.js'

const REPORT = JSON.stringify({
  'file-size': 4096,
  'text-section-size': 2048,
  crates: [
    { name: 'std', size: 900 },
    { name: 'serde', size: 301 },
    { name: 'app', size: 120 },
  ],
})

describe('parseSizeReport', () => {
  it('reads the crate list', () => {
    const report = parseSizeReport(REPORT)
    expect(report.crates).toHaveLength(3)
    expect(report['file-size']).toBe(4096)
  })

  it('accepts extra fields', () => {
    const text = JSON.stringify({ crates: [{ name: 'app', size: 1 }], 'build-info': 'release' })
    expect(parseSizeReport(text).crates).toEqual([{ name: 'app', size: 1 }])
  })

  it('rejects text that is not JSON', () => {
    expect(() => parseSizeReport('{crates:')).toThrow(MalformedInputError)
  })

  it('rejects a report without crates', () => {
    expect(() => parseSizeReport('{"file-size": 10}')).toThrow(MalformedInputError)
  })

  it('rejects negative or fractional sizes', () => {
    expect(() => parseSizeReport('{"crates":[{"name":"app","size":-1}]}')).toThrow(MalformedInputError)
    expect(() => parseSizeReport('{"crates":[{"name":"app","size":1.5}]}')).toThrow(MalformedInputError)
  })

  it('matches the SizeReport schema', () => {
    expect(Value.Check(SizeReport, JSON.parse(REPORT))).toBe(true)
    expect(Value.Check(SizeReport, { crates: [{ name: '', size: 1 }] })).toBe(false)
  })
})

describe('SizeTable', () => {
  it('looks up sizes by short-name', () => {
    const table = SizeTable.parse(REPORT)
    expect(table.get('serde')).toBe(301)
    expect(table.get('log')).toBeUndefined()
    expect(table.size).toBe(3)
  })

  it('adds onto an entry, creating it when absent', () => {
    const table = SizeTable.parse(REPORT)
    table.add('app', 30)
    table.add('app_cli', 5)
    expect(table.get('app')).toBe(150)
    expect(table.get('app_cli')).toBe(5)
  })

  it('floor-divides by node count once', () => {
    const table = SizeTable.parse(REPORT)
    table.normalize(new Map([['serde', 2], ['app', 1]]))
    table.normalize(new Map([['serde', 2]]))
    expect(table.isNormalized).toBe(true)
    expect(table.entries()).toEqual([['std', 900], ['serde', 150], ['app', 120]])
  })
})

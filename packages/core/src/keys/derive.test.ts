import { describe, it, expect } from 'vitest'
import { derivePurposeKey, keyIdOf, purposePassword } from './derive.js'

const MASTER = new Uint8Array(32).fill(0xab)

describe('derivePurposeKey', () => {
  it('returns a 32-byte key', () => {
    const result = derivePurposeKey(MASTER, 'data')
    expect(result).toBeInstanceOf(Uint8Array)
    expect(result.length).toBe(32)
  })

  it('produces different keys for data and metadata', () => {
    const data = derivePurposeKey(MASTER, 'data')
    const metadata = derivePurposeKey(MASTER, 'metadata')
    expect(Buffer.from(data).equals(Buffer.from(metadata))).toBe(false)
  })

  it('is deterministic', () => {
    const a = derivePurposeKey(MASTER, 'data')
    const b = derivePurposeKey(MASTER, 'data')
    expect(Buffer.from(a).equals(Buffer.from(b))).toBe(true)
  })

  it('depends on the master key', () => {
    const other = new Uint8Array(32).fill(0xcd)
    const a = derivePurposeKey(MASTER, 'data')
    const b = derivePurposeKey(other, 'data')
    expect(Buffer.from(a).equals(Buffer.from(b))).toBe(false)
  })
})

describe('keyIdOf', () => {
  it('is 16 lowercase hex characters', () => {
    expect(keyIdOf(MASTER)).toMatch(/^[0-9a-f]{16}$/)
  })

  it('differs between keys', () => {
    expect(keyIdOf(MASTER)).not.toBe(keyIdOf(new Uint8Array(32)))
  })
})

describe('purposePassword', () => {
  it('is the hex encoding of the derived key', () => {
    expect(purposePassword(MASTER, 'metadata')).toBe(
      Buffer.from(derivePurposeKey(MASTER, 'metadata')).toString('hex'),
    )
  })
})

import { describe, expect, it } from 'vitest'

import { convertAidToBvid, isBvid } from '../src/utils/bvid.js'

describe('convertAidToBvid', () => {
  it('converts known ids', () => {
    expect(convertAidToBvid(12345)).toBe('BV18x411c74Q')
    expect(convertAidToBvid(170001)).toBe('BV17x411w7KC')
  })

  it('does not wrap for aids past 32 bits', () => {
    expect(convertAidToBvid(2 ** 31)).toBe('BV1cu4k1L7Cy')
    expect(convertAidToBvid(3000000000)).toBe('BV1pf461h7XH')
  })

  it('produces a valid bvid', () => {
    expect(isBvid(convertAidToBvid(99999999))).toBe(true)
  })

  it('rejects non positive ids', () => {
    expect(() => convertAidToBvid(0)).toThrow('aid must be a positive integer but received 0')
    expect(() => convertAidToBvid(1.5)).toThrow()
  })
})

describe('isBvid', () => {
  it('checks the shape', () => {
    expect(isBvid('BV17x411w7KC')).toBe(true)
    expect(isBvid('BV17x411w7K')).toBe(false)
    expect(isBvid('av170001')).toBe(false)
  })
})

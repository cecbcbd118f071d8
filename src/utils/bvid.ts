'use strict'

const TABLE = 'fZodR9XQDSUm21yCkr6zBqiveYah8bt4xsWpHnJE7jL5VG3guMTKNPAwcF'
const SLOTS = [11, 10, 3, 8, 4, 6]
const XOR = 177451812n
const ADD = 8728348608n
const BASE = 58n

const bvidRegex = /^BV1[0-9A-Za-z]{9}$/

export const isBvid = (value: string) => bvidRegex.test(value)

/** Legacy av → BV mapping. Computed on bigint, a 32 bit xor would wrap for large aids. */
export function convertAidToBvid(aid: number) {
  if (!Number.isSafeInteger(aid) || aid <= 0) throw Error(`aid must be a positive integer but received ${aid}`)

  const z = (BigInt(aid) ^ XOR) + ADD
  const chars = [...'BV1  4 1 7  ']
  SLOTS.forEach((slot, i) => {
    chars[slot] = TABLE[Number((z / BASE ** BigInt(i)) % BASE)]
  })
  return chars.join('')
}

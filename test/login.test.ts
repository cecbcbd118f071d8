import { describe, expect, it, vi } from 'vitest'

import Api from '../src/utils/api.js'
import login, { QrStatus } from '../src/utils/login.js'
import { ApiError, CancelledError } from '../src/utils/errors.js'

import type { QrCode, QrPollResult } from '../src/interfaces/api.js'

class ScriptedApi extends Api {
  polls: string[] = []

  constructor(private readonly states: QrPollResult[]) {
    super()
  }

  async getQrCode(): Promise<QrCode> {
    return { url: 'https://passport.test/qr?key=k1', qrcodeKey: 'k1' }
  }

  async pollQrCode(qrcodeKey: string): Promise<QrPollResult> {
    this.polls.push(qrcodeKey)
    return this.states[Math.min(this.polls.length, this.states.length) - 1]
  }
}

const state = (code: number, cookies = ''): QrPollResult => ({ code, message: '', cookies })

describe('login', () => {
  it('returns the cookies once the scan is confirmed', async () => {
    const api = new ScriptedApi([state(QrStatus.NOT_SCANNED), state(QrStatus.SCANNED), state(QrStatus.CONFIRMED, 'SESSDATA=test-secret')])
    const printQrCode = vi.fn()

    const cookies = await login(api, { pollIntervalMs: 0, printQrCode })

    expect(cookies).toBe('SESSDATA=test-secret')
    expect(printQrCode).toHaveBeenCalledWith('https://passport.test/qr?key=k1')
    expect(api.polls).toEqual(['k1', 'k1', 'k1'])
  })

  it('fails when the QR code expires', async () => {
    const api = new ScriptedApi([state(QrStatus.EXPIRED)])

    await expect(login(api, { pollIntervalMs: 0, printQrCode: vi.fn() })).rejects.toThrow('QR code expired')
  })

  it('fails on an unknown state', async () => {
    const api = new ScriptedApi([state(-1)])

    await expect(login(api, { pollIntervalMs: 0, printQrCode: vi.fn() })).rejects.toBeInstanceOf(ApiError)
  })

  it('fails when the confirmation carries no cookie', async () => {
    const api = new ScriptedApi([state(QrStatus.CONFIRMED)])

    await expect(login(api, { pollIntervalMs: 0, printQrCode: vi.fn() })).rejects.toThrow('no cookie in login response')
  })

  it('stops polling when cancelled', async () => {
    const api = new ScriptedApi([state(QrStatus.NOT_SCANNED)])
    const controller = new AbortController()
    setTimeout(() => controller.abort(), 30)

    await expect(login(api, { pollIntervalMs: 5, printQrCode: vi.fn(), signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError,
    )
  })
})

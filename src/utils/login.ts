'use strict'
import qrcode from 'qrcode-terminal'

import helper from './common.js'
import { ApiError } from './errors.js'

import type Api from './api.js'

export enum QrStatus {
  CONFIRMED = 0,
  EXPIRED = 86038,
  SCANNED = 86090,
  NOT_SCANNED = 86101,
}

interface LoginOptions {
  signal?: AbortSignal
  pollIntervalMs?: number
  printQrCode?: (url: string) => void
}

const printToTerminal = (url: string) => qrcode.generate(url, { small: true })

/** Shows a QR code and resolves with the cookie string once the scan is confirmed in the app. */
export default async function login(api: Api, { signal, pollIntervalMs = 2000, printQrCode = printToTerminal }: LoginOptions = {}) {
  const { url, qrcodeKey } = await api.getQrCode()

  printQrCode(url)
  helper.msg('Scan the QR code with the Bilibili app')

  let scanned = false

  for (;;) {
    await helper.sleep(pollIntervalMs, signal)

    const { code, message, cookies } = await api.pollQrCode(qrcodeKey)

    switch (code) {
      case QrStatus.CONFIRMED:
        if (!cookies) throw new ApiError(code, 'no cookie in login response', 'qrcode/poll')
        helper.msg('Login success', 'success')
        return cookies
      case QrStatus.SCANNED:
        if (!scanned) helper.msg('QR code scanned, waiting for confirmation')
        scanned = true
        break
      case QrStatus.NOT_SCANNED:
        break
      case QrStatus.EXPIRED:
        throw new ApiError(code, 'QR code expired', 'qrcode/poll')
      default:
        throw new ApiError(code, message, 'qrcode/poll')
    }
  }
}

'use strict'
import path from 'path'
import fsPromise from 'fs/promises'

import helper from './common.js'
import SpinnerProgress from './progress.js'
import { CancelledError, FileTooLargeError, HttpStatusError, ReadTimeoutError } from './errors.js'

import type { FileHandle } from 'fs/promises'
import type { ReadableStreamDefaultReader, ReadableStreamReadResult } from 'stream/web'
import type { FetchFn } from './api.js'
import type { ProgressReporter } from '../interfaces/common.js'

export const BUFFER_SIZE = 1024 * 1024

export const READ_TIMEOUT_MS = 30 * 1000

export const TRANSFER_TIMEOUT_MS = 24 * 60 * 60 * 1000

export const PART_SUFFIX = '.part'

export const partPathOf = (filePath: string) => `${filePath}${PART_SUFFIX}`

/** -1 when the header is missing or not a plain integer. */
export function getContentLength(headers: Headers) {
  const value = headers.get('content-length')?.trim()
  if (!value || !/^\d+$/.test(value)) return -1
  return Number(value)
}

interface TransferEngineParams {
  headers?: () => Record<string, string>
  fetchFn?: FetchFn
  // bytes, 0 disables the check
  maxFileSize?: number
  readTimeoutMs?: number
  transferTimeoutMs?: number
  createProgress?: () => ProgressReporter
}

export default class TransferEngine {
  headers: () => Record<string, string>

  fetchFn: FetchFn

  maxFileSize: number

  readTimeoutMs: number

  transferTimeoutMs: number

  createProgress: () => ProgressReporter

  constructor({
    headers = () => ({}),
    fetchFn = fetch,
    maxFileSize = 0,
    readTimeoutMs = READ_TIMEOUT_MS,
    transferTimeoutMs = TRANSFER_TIMEOUT_MS,
    createProgress = () => new SpinnerProgress(),
  }: TransferEngineParams = {}) {
    this.headers = headers
    this.fetchFn = fetchFn
    this.maxFileSize = maxFileSize
    this.readTimeoutMs = readTimeoutMs
    this.transferTimeoutMs = transferTimeoutMs
    this.createProgress = createProgress
  }

  /**
   * One attempt: streams `url` into `filePath.part`, renamed to `filePath` at end of stream.
   * `filePath` only ever holds a complete body. A failed attempt leaves the part file
   * behind; the next attempt truncates it.
   */
  async transferOnce(filePath: string, url: string, signal?: AbortSignal) {
    if (signal?.aborted) throw new CancelledError()

    const fileName = path.basename(filePath)
    const partPath = partPathOf(filePath)
    const file = await fsPromise.open(partPath, 'w')

    try {
      const res = await this.get(url, signal)
      if (!res.ok) {
        await res.body?.cancel()
        throw new HttpStatusError(res.status, url)
      }

      const total = getContentLength(res.headers)
      if (this.maxFileSize > 0 && total >= this.maxFileSize) {
        await res.body?.cancel()
        throw new FileTooLargeError(fileName, total, this.maxFileSize)
      }

      helper.msg(`Downloading ${fileName}`)

      const progress = this.createProgress()
      progress.start(fileName, total)

      try {
        if (res.body) {
          const reader: ReadableStreamDefaultReader<Uint8Array> = res.body.getReader()
          await this.pump(reader, file, progress, signal)
        }
        progress.finish()
      } catch (error) {
        progress.fail()
        throw error
      }
    } finally {
      await file.close()
    }

    await fsPromise.rename(partPath, filePath)
  }

  private async get(url: string, signal?: AbortSignal) {
    const timeout = AbortSignal.timeout(this.transferTimeoutMs)
    const transferSignal = signal ? AbortSignal.any([signal, timeout]) : timeout

    try {
      return await this.fetchFn(url, { headers: this.headers(), signal: transferSignal })
    } catch (error) {
      if (signal?.aborted) throw new CancelledError()
      throw error
    }
  }

  private async pump(reader: ReadableStreamDefaultReader<Uint8Array>, file: FileHandle, progress: ProgressReporter, signal?: AbortSignal) {
    const buffer = Buffer.allocUnsafe(BUFFER_SIZE)
    let used = 0

    try {
      for (;;) {
        const { done, value } = await this.readWithTimeout(reader, signal)
        if (done) break

        progress.advance(value.byteLength)

        let offset = 0
        while (offset < value.byteLength) {
          const size = Math.min(BUFFER_SIZE - used, value.byteLength - offset)
          buffer.set(value.subarray(offset, offset + size), used)
          used += size
          offset += size

          if (used === BUFFER_SIZE) {
            await file.write(buffer, 0, used)
            used = 0
          }
        }
      }

      if (used > 0) await file.write(buffer, 0, used)
    } catch (error) {
      await reader.cancel().catch((cancelError: unknown) => {
        helper.msg(`fail to close response stream: ${helper.errorMessage(cancelError)}`, 'warn')
      })
      throw error
    }
  }

  /** Races a single read against the read timeout and the abort signal. */
  private readWithTimeout(reader: ReadableStreamDefaultReader<Uint8Array>, signal?: AbortSignal) {
    return new Promise<ReadableStreamReadResult<Uint8Array>>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError())
        return
      }

      const cleanup = () => {
        clearTimeout(timer)
        signal?.removeEventListener('abort', onAbort)
      }

      const onAbort = () => {
        cleanup()
        reject(new CancelledError())
      }

      const timer = setTimeout(() => {
        cleanup()
        reject(new ReadTimeoutError(this.readTimeoutMs))
      }, this.readTimeoutMs)

      signal?.addEventListener('abort', onAbort, { once: true })

      reader.read().then(
        (result) => {
          cleanup()
          resolve(result)
        },
        (error: unknown) => {
          cleanup()
          reject(signal?.aborted ? new CancelledError() : error)
        },
      )
    })
  }
}

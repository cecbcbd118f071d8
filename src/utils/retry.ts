'use strict'
import path from 'path'

import helper from './common.js'
import { DownloadFailedError, EmptyUrlListError, FileTooLargeError, isCancelled } from './errors.js'

import type { RetryPolicy } from '../interfaces/common.js'

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  backoff: () => 1000,
}

export interface Transferer {
  transferOnce(filePath: string, url: string, signal?: AbortSignal): Promise<void>
}

interface TransferControllerParams {
  engine: Transferer
  policy?: RetryPolicy
}

// size belongs to the content, not to the mirror
const isFatal = (error: unknown) => error instanceof FileTooLargeError || isCancelled(error)

/**
 * Several urls are independent mirrors: each one is tried once, in order.
 * A single url is retried according to the policy.
 */
export default class TransferController {
  engine: Transferer

  policy: RetryPolicy

  constructor({ engine, policy = DEFAULT_RETRY_POLICY }: TransferControllerParams) {
    this.engine = engine
    this.policy = policy
  }

  async transfer(filePath: string, urls: string[], signal?: AbortSignal) {
    const fileName = path.basename(filePath)

    if (urls.length === 0) throw new EmptyUrlListError(fileName)

    if (urls.length > 1) {
      await this.tryMirrors(filePath, urls, signal)
    } else {
      await this.retrySingle(filePath, urls[0], signal)
    }
  }

  private async tryMirrors(filePath: string, urls: string[], signal?: AbortSignal) {
    const fileName = path.basename(filePath)
    let lastError: unknown

    for (const [index, url] of urls.entries()) {
      try {
        await this.engine.transferOnce(filePath, url, signal)
        return
      } catch (error) {
        if (isFatal(error)) throw error

        lastError = error
        helper.msg(`Download ${fileName} failed at url ${index + 1}/${urls.length}, try next URL: ${helper.errorMessage(error)}`, 'fail')
      }
    }

    throw new DownloadFailedError(fileName, urls.length, { cause: lastError })
  }

  private async retrySingle(filePath: string, url: string, signal?: AbortSignal) {
    const fileName = path.basename(filePath)
    const { maxAttempts, backoff } = this.policy
    let lastError: unknown

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await this.engine.transferOnce(filePath, url, signal)
        return
      } catch (error) {
        if (isFatal(error)) throw error

        lastError = error
        helper.msg(`Download ${fileName} failed (${attempt}/${maxAttempts}), try again later: ${helper.errorMessage(error)}`, 'fail')

        if (attempt < maxAttempts) await helper.sleep(backoff(attempt), signal)
      }
    }

    throw new DownloadFailedError(fileName, maxAttempts, { cause: lastError })
  }
}

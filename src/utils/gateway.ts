'use strict'
import PQueue from 'p-queue'

import helper from './common.js'
import { CancelledError } from './errors.js'

import type Api from './api.js'

export interface RateLimiter {
  acquire(signal?: AbortSignal): Promise<void>
}

interface RequestLimiterParams {
  // one permit per interval, burst 1
  intervalMs?: number
  // random cooldown after every permit, whole seconds
  jitterSeconds?: [number, number]
}

/**
 * Token bucket on top of p-queue's interval cap, followed by a random
 * cooldown so that requests never leave at a fixed cadence.
 */
export class RequestLimiter implements RateLimiter {
  queue: PQueue

  jitterSeconds: [number, number]

  constructor({ intervalMs = 1000, jitterSeconds = [1, 3] }: RequestLimiterParams = {}) {
    this.queue = new PQueue({ interval: intervalMs, intervalCap: 1 })
    this.jitterSeconds = jitterSeconds
  }

  async acquire(signal?: AbortSignal) {
    if (signal?.aborted) throw new CancelledError('cancelled before rate limit permit')

    await this.permit(signal)

    const [min, max] = this.jitterSeconds
    await helper.wait(helper.randomInt(min, max), signal)
  }

  private permit(signal?: AbortSignal) {
    const granted = this.queue.add(() => undefined, { signal })
    if (!signal) return granted

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => reject(new CancelledError('cancelled while waiting for rate limit permit'))
      signal.addEventListener('abort', onAbort, { once: true })

      granted.then(
        () => {
          signal.removeEventListener('abort', onAbort)
          resolve()
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort)
          reject(signal.aborted ? new CancelledError('cancelled while waiting for rate limit permit') : error)
        },
      )
    })
  }
}

interface GatewayParams {
  api: Api
  limiter: RateLimiter
}

/** Every platform request goes through `acquireAccess`. */
export default class Gateway {
  api: Api

  limiter: RateLimiter

  constructor({ api, limiter }: GatewayParams) {
    this.api = api
    this.limiter = limiter
  }

  async acquireAccess(signal?: AbortSignal) {
    await this.limiter.acquire(signal)
    return this.api
  }
}

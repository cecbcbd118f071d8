import fs from 'fs'
import os from 'os'
import path from 'path'
import { ReadableStream } from 'stream/web'

import type { FetchFn } from '../src/utils/api.js'
import type { RateLimiter } from '../src/utils/gateway.js'
import type { ProgressReporter } from '../src/interfaces/common.js'

export const unlimited: RateLimiter = {
  acquire: async () => undefined,
}

export const tmpDir = () => fs.mkdtempSync(path.join(os.tmpdir(), 'bili-collector-'))

export const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } })

export const ok = (data: unknown) => jsonResponse({ code: 0, message: '0', data })

export function streamResponse(chunks: Uint8Array[], headers: Record<string, string> = {}) {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      chunks.forEach((chunk) => controller.enqueue(chunk))
      controller.close()
    },
  })
  return new Response(body, { headers })
}

/** A body that never delivers a chunk. */
export function stalledResponse(headers: Record<string, string> = {}) {
  return new Response(new ReadableStream<Uint8Array>({ start() {} }), { headers })
}

/** Delivers `chunk`, then fails the way a dropped connection does. */
export function brokenResponse(chunk: Uint8Array, headers: Record<string, string> = {}) {
  let sent = false
  const body = new ReadableStream<Uint8Array>({
    pull(controller) {
      if (sent) {
        controller.error(new Error('socket hang up'))
        return
      }
      sent = true
      controller.enqueue(chunk)
    },
  })
  return new Response(body, { headers })
}

export interface FakeFetch {
  fetchFn: FetchFn
  calls: URL[]
  inits: (RequestInit | undefined)[]
}

export function fakeFetch(route: (url: URL) => Response | Promise<Response>): FakeFetch {
  const calls: URL[] = []
  const inits: (RequestInit | undefined)[] = []

  const fetchFn: FetchFn = async (input, init) => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url)
    calls.push(url)
    inits.push(init)
    return route(url)
  }

  return { fetchFn, calls, inits }
}

export class RecordingProgress implements ProgressReporter {
  events: string[] = []

  total = 0

  received = 0

  start(name: string, total: number) {
    this.total = total
    this.events.push(`start:${name}`)
  }

  advance(bytes: number) {
    this.received += bytes
  }

  finish() {
    this.events.push('finish')
  }

  fail() {
    this.events.push('fail')
  }
}

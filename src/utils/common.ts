'use strict'

import chalk from 'chalk'

import { CancelledError } from './errors.js'

/** types */
import type { LogMsgType } from '../interfaces/common.js'

export default {
  msg(msg: string, msgType: LogMsgType = 'info') {
    const { log } = console

    const type = ` ${msgType.toUpperCase()} `

    switch (msgType) {
      case 'warn':
        log(chalk.bgYellow(type), chalk.yellow(msg))
        break
      case 'info':
        log(chalk.bgBlue(type), chalk.blue(msg))
        break
      case 'success':
        log(chalk.bgGreen(type), chalk.green(msg))
        break
      case 'fail':
        log(chalk.bgRed(type), chalk.red(msg))
        break
      case 'error':
        log(chalk.bgRed(type), chalk.bgRed.yellow(msg))
        break
      case 'title':
        log(chalk.bgMagenta(type), chalk.white(msg))
        break
      default:
        log(msg)
        break
    }
  },

  wait: (seconds: number, signal?: AbortSignal) => sleep(seconds * 1000, signal),

  sleep,

  /** Uniform integer in [min, max]. */
  randomInt(min: number, max: number) {
    return min + Math.floor(Math.random() * (max - min + 1))
  },

  errorMessage(error: unknown) {
    return error instanceof Error ? error.message : String(error)
  },

  formatBytes(bytes: number) {
    if (bytes < 0) return 'unknown'

    const units = ['B', 'KiB', 'MiB', 'GiB']
    let value = bytes
    let unit = 0
    while (value >= 1024 && unit < units.length - 1) {
      value /= 1024
      unit++
    }

    return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`
  },
}

function sleep(ms: number, signal?: AbortSignal) {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError())
      return
    }

    const onAbort = () => {
      clearTimeout(timer)
      reject(new CancelledError())
    }

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)

    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

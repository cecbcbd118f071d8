'use strict'
import ora from 'ora'

import helper from './common.js'

import type { Ora } from 'ora'
import type { ProgressReporter } from '../interfaces/common.js'

/** Spinner showing received bytes; repaints at most every `refreshMs`. */
export default class SpinnerProgress implements ProgressReporter {
  spinner?: Ora

  name = ''

  total = -1

  received = 0

  lastRender = 0

  refreshMs = 200

  start(name: string, total: number) {
    this.name = name
    this.total = total
    this.received = 0
    this.lastRender = 0
    this.spinner = ora(this.text).start()
  }

  advance(bytes: number) {
    this.received += bytes

    const now = Date.now()
    if (!this.spinner || now - this.lastRender < this.refreshMs) return

    this.lastRender = now
    this.spinner.text = this.text
  }

  finish() {
    this.spinner?.succeed(`${this.name} ${helper.formatBytes(this.received)}`)
    this.spinner = undefined
  }

  fail() {
    this.spinner?.fail(`${this.name} interrupted at ${helper.formatBytes(this.received)}`)
    this.spinner = undefined
  }

  get text() {
    const received = helper.formatBytes(this.received)
    if (this.total <= 0) return `${this.name} ${received}`

    const percent = ((this.received / this.total) * 100).toFixed(1)
    return `${this.name} ${received} / ${helper.formatBytes(this.total)} (${percent}%)`
  }
}

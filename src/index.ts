#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander'

import helper from './utils/common.js'
import { isCancelled } from './utils/errors.js'

import { loginCommand } from './commands/login.js'
import { exportHistoryCommand } from './commands/history.js'
import { searchCommand, singleCommand, toViewCommand } from './commands/download.js'

const controller = new AbortController()

process.once('SIGINT', () => {
  helper.msg('Interrupted, stopping ...', 'warn')
  controller.abort()
})

const parseInteger = (value: string) => {
  const parsed = Number(value)
  if (!Number.isSafeInteger(parsed) || parsed < 0) throw new InvalidArgumentError('must be a non-negative integer')
  return parsed
}

const run =
  <A extends unknown[]>(fn: (...args: A) => Promise<void>) =>
  async (...args: A) => {
    try {
      await fn(...args)
    } catch (error) {
      helper.msg(isCancelled(error) ? 'Cancelled' : helper.errorMessage(error), 'error')
      process.exitCode = 1
    }
  }

const { signal } = controller

const program = new Command()

program.name('bili-collector').description('Download Bilibili videos and keep a download history').version('1.0.0')

program
  .command('login')
  .description('Log in by scanning a QR code and store the cookies in the config file')
  .option('-c, --config <path>', 'config file', 'config.json')
  .action(run((options: { config: string }) => loginCommand(options, signal)))

const download = program.command('download').description('Download videos')

download
  .command('single')
  .description('Download a single video by BVID/AID')
  .option('--bvid <bvid>', 'BV id of the video')
  .option('--aid <aid>', 'av id of the video', parseInteger)
  .option('-f, --force', 'download even if it is in the history')
  .option('-c, --config <path>', 'config file', 'config.json')
  .action(run((options: { config: string; bvid?: string; aid?: number; force?: boolean }) => singleCommand(options, signal)))

download
  .command('to-view')
  .description('Download every video of the watch later list')
  .option('-f, --force', 'download even if it is in the history')
  .option('-c, --config <path>', 'config file', 'config.json')
  .action(run((options: { config: string; force?: boolean }) => toViewCommand(options, signal)))

download
  .command('search')
  .description('Search and download videos')
  .argument('<keyword>', 'search keyword')
  .option('-m, --max-items <n>', 'maximum number of videos', parseInteger, 200)
  .option('--max-duration <minutes>', 'skip longer videos, 0 disables', parseInteger, 60)
  .option('-f, --force', 'download even if it is in the history')
  .option('-c, --config <path>', 'config file', 'config.json')
  .action(
    run((keyword: string, options: { config: string; maxItems: number; maxDuration: number; force?: boolean }) =>
      searchCommand(keyword, options, signal),
    ),
  )

program
  .command('history')
  .description('Download history')
  .command('export')
  .description('Write the download history to an Excel workbook')
  .argument('<file>', 'output .xlsx file')
  .option('-c, --config <path>', 'config file', 'config.json')
  .action(run((file: string, options: { config: string }) => exportHistoryCommand(file, options)))

await program.parseAsync()

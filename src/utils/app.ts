'use strict'
import cookie from 'cookie'

import Api from './api.js'
import Search from './search.js'
import History from './history.js'
import fileSys from './fileSys.js'
import Downloader from './downloader.js'
import TransferEngine from './transfer.js'
import TransferController from './retry.js'
import FFmpeg, { ProcessRunner } from './ffmpeg.js'
import Gateway, { RequestLimiter } from './gateway.js'
import { ConfigError } from './errors.js'

import type { AppSettings } from '../interfaces/setting.js'

export interface App {
  setting: AppSettings
  api: Api
  gateway: Gateway
  history: History
  search: Search
  downloader: Downloader
}

export function hasCredential(cookies: string) {
  return Boolean(cookie.parse(cookies).SESSDATA)
}

/**
 * Everything a download command needs. Fails before any request when the
 * account is not logged in or ffmpeg can't be run.
 */
export async function createApp(configPath: string): Promise<App> {
  const setting = await fileSys.getAppSetting(configPath)
  if (!hasCredential(setting.cookies)) throw new ConfigError('please login first')

  const ffmpeg = new FFmpeg({ runner: new ProcessRunner(setting.ffmpeg) })
  await ffmpeg.checkAvailable()

  await fileSys.makeDirIfNotExist(setting.output)

  const api = new Api({ cookies: setting.cookies })
  const gateway = new Gateway({ api, limiter: new RequestLimiter() })
  const history = new History(setting.historyDb)

  const engine = new TransferEngine({ headers: () => api.headers, maxFileSize: setting.maxFileSize })
  const controller = new TransferController({ engine })
  const downloader = new Downloader({ gateway, controller, ffmpeg, history, outputPath: setting.output })
  const search = new Search({ gateway, history })

  return { setting, api, gateway, history, search, downloader }
}

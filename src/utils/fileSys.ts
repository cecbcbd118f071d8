'use strict'

import fs from 'fs'
import path from 'path'
import fsPromise from 'fs/promises'
import { z } from 'zod'

import helper from './common.js'
import { ConfigError } from './errors.js'

import type { AppSettings } from '../interfaces/setting.js'

const executableExtension = process.platform === 'win32' ? '.exe' : ''

const appSettingSchema = z.object({
  cookies: z.string().default(''),
  output: z.string().min(1).default('./output'),
  ffmpeg: z.string().min(1).default(`ffmpeg${executableExtension}`),
  historyDb: z.string().min(1).default('./bili-collector.db'),
  maxFileSize: z
    .number()
    .int()
    .nonnegative()
    .default(1024 * 1024 * 1024),
})

const fileSys = {
  //#region 檔案路徑
  appConfigPath: path.join('./config.json'),
  //#endregion

  //#region 設定
  defaultAppSetting(): AppSettings {
    return appSettingSchema.parse({})
  },

  /** A missing file yields the defaults, a malformed one is a ConfigError. */
  async getAppSetting(
    this: {
      appConfigPath: string
      getTxtFile(filePath: string): Promise<string | null>
      defaultAppSetting(): AppSettings
    },
    filePath = this.appConfigPath,
  ): Promise<AppSettings> {
    const content = await this.getTxtFile(filePath)
    if (content === null) return this.defaultAppSetting()

    let json: unknown
    try {
      json = JSON.parse(content)
    } catch (error) {
      throw new ConfigError(`config file ${filePath} is not valid JSON`, { cause: error })
    }

    const result = appSettingSchema.safeParse(json)
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
      throw new ConfigError(`invalid config file ${filePath}: ${issues}`)
    }

    return result.data
  },

  async saveAppSetting(
    this: { appConfigPath: string; saveJSONFile(filePath: string, data: unknown): Promise<void> },
    setting: AppSettings,
    filePath = this.appConfigPath,
  ): Promise<void> {
    await this.saveJSONFile(filePath, setting)
  },
  //#endregion

  //#region 通用
  async getTxtFile(filePath: string) {
    if (!filePath) throw Error(`fail to get file due to empty path`)
    if (!fs.existsSync(filePath)) return null

    return await fsPromise.readFile(filePath, 'utf8')
  },

  async makeDirIfNotExist(fileLocation: string) {
    if (!fileLocation || fs.existsSync(fileLocation)) return

    await fsPromise.mkdir(fileLocation, { recursive: true })
  },

  async saveJSONFile(filePath: string, data: unknown) {
    if (filePath.length === 0) throw new Error('no file path provided')

    const { dir } = path.parse(filePath)

    await this.makeDirIfNotExist(dir)

    await fsPromise.writeFile(filePath, JSON.stringify(data, null, 2), 'utf8')
  },

  fileExists(filePath: string) {
    return fs.existsSync(filePath)
  },

  async removeFile(filePath: string) {
    try {
      await fsPromise.rm(filePath, { force: true })
    } catch (error) {
      helper.msg(`fail to remove ${filePath}: ${helper.errorMessage(error)}`, 'warn')
    }
  },
  //#endregion
}

export default fileSys

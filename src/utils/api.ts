'use strict'
import cookie from 'cookie'
import { z } from 'zod'

import { ApiError, HttpStatusError } from './errors.js'

import type { QrCode, QrPollResult, ToViewItem, VideoInfo, VideoStream } from '../interfaces/api.js'

export type FetchFn = typeof fetch

const envelopeSchema = z.object({
  code: z.number(),
  message: z.string().default(''),
  data: z.unknown(),
})

const videoInfoSchema = z.object({
  bvid: z.string(),
  aid: z.number(),
  cid: z.number(),
  title: z.string(),
  owner: z.object({ mid: z.number(), name: z.string() }),
})

const variantSchema = z.object({
  id: z.number(),
  bandwidth: z.number(),
  mimeType: z.string(),
  baseUrl: z.string(),
  backupUrl: z
    .array(z.string())
    .nullish()
    .transform((urls) => urls ?? []),
})

const videoStreamSchema = z.object({
  result: z.string().default(''),
  dash: z
    .object({
      video: z
        .array(variantSchema)
        .nullish()
        .transform((v) => v ?? []),
      audio: z
        .array(variantSchema)
        .nullish()
        .transform((v) => v ?? []),
    })
    .nullish()
    .transform((dash) => dash ?? { video: [], audio: [] }),
})

const toViewSchema = z.object({
  list: z
    .array(
      z.object({
        bvid: z.string(),
        cid: z.number(),
        title: z.string(),
        owner: z.object({ name: z.string() }),
      }),
    )
    .nullish()
    .transform((list) => list ?? []),
})

const searchSchema = z.object({
  result: z
    .array(
      z.object({
        result_type: z.string(),
        data: z.array(z.unknown()).default([]),
      }),
    )
    .nullish()
    .transform((result) => result ?? []),
})

const qrCodeSchema = z.object({ url: z.string(), qrcode_key: z.string() })

const qrPollSchema = z.object({ code: z.number(), message: z.string().default('') })

export interface SearchSection {
  resultType: string
  data: unknown[]
}

interface ApiParams {
  cookies?: string
  fetchFn?: FetchFn
}

/** Thin client of the Bilibili web API. */
export default class Api {
  cookies: string

  fetchFn: FetchFn

  apiBaseUrl = 'https://api.bilibili.com'

  passportBaseUrl = 'https://passport.bilibili.com'

  userAgent = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/114.0.0.0 Safari/537.36'

  constructor({ cookies = '', fetchFn = fetch }: ApiParams = {}) {
    this.cookies = cookies
    this.fetchFn = fetchFn
  }

  /** Sent with API calls and CDN downloads alike; the CDN rejects requests without a referer. */
  get headers(): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Referer: 'https://www.bilibili.com',
    }
    if (this.cookies) headers.Cookie = this.cookies
    return headers
  }

  //#region 影片
  async getVideoInfo(bvid: string): Promise<VideoInfo> {
    const data = await this.getData(this.apiUrl('/x/web-interface/view', { bvid }))
    return videoInfoSchema.parse(data)
  }

  async getVideoStream(bvid: string, cid: number): Promise<VideoStream> {
    const url = this.apiUrl('/x/player/playurl', { bvid, cid: `${cid}`, fnval: '16', platform: 'pc' })
    const data = await this.getData(url)
    return videoStreamSchema.parse(data)
  }

  async getToViewList(): Promise<ToViewItem[]> {
    const data = await this.getData(this.apiUrl('/x/v2/history/toview', {}))
    return toViewSchema.parse(data).list
  }

  async search(keyword: string, page: number): Promise<SearchSection[]> {
    const data = await this.getData(this.apiUrl('/x/web-interface/search/all/v2', { keyword, page: `${page}` }))
    return searchSchema.parse(data).result.map((r) => ({ resultType: r.result_type, data: r.data }))
  }
  //#endregion

  //#region 登入
  async getQrCode(): Promise<QrCode> {
    const data = await this.getData(`${this.passportBaseUrl}/x/passport-login/web/qrcode/generate`)
    const { url, qrcode_key } = qrCodeSchema.parse(data)
    return { url, qrcodeKey: qrcode_key }
  }

  async pollQrCode(qrcodeKey: string): Promise<QrPollResult> {
    const url = new URL('/x/passport-login/web/qrcode/poll', this.passportBaseUrl)
    url.searchParams.set('qrcode_key', qrcodeKey)

    const res = await this.request(url.toString())
    const data = this.unwrap(await res.json(), url.pathname)
    const { code, message } = qrPollSchema.parse(data)

    return { code, message, cookies: this.collectCookies(res.headers.getSetCookie()) }
  }

  collectCookies(setCookies: string[]) {
    return setCookies
      .map((header) => Object.entries(cookie.parse(header))[0])
      .filter((pair): pair is [string, string] => pair !== undefined)
      .map(([name, value]) => `${name}=${value}`)
      .join('; ')
  }
  //#endregion

  //#region 請求
  apiUrl(pathname: string, params: Record<string, string>) {
    const url = new URL(pathname, this.apiBaseUrl)
    for (const [key, value] of Object.entries(params)) url.searchParams.set(key, value)
    return url.toString()
  }

  private async request(url: string) {
    const res = await this.fetchFn(url, { headers: this.headers })
    if (!res.ok) throw new HttpStatusError(res.status, url)
    return res
  }

  private async getData(url: string) {
    const res = await this.request(url)
    return this.unwrap(await res.json(), new URL(url).pathname)
  }

  private unwrap(json: unknown, endpoint: string) {
    const { code, message, data } = envelopeSchema.parse(json)
    if (code !== 0) throw new ApiError(code, message, endpoint)
    return data
  }
  //#endregion
}

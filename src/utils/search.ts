'use strict'
import { load } from 'cheerio'
import { Duration } from 'luxon'
import { z } from 'zod'

import helper from './common.js'

import type Gateway from './gateway.js'
import type { HistoryStore } from './history.js'
import type { VideoSearchResult } from '../interfaces/api.js'
import type { DownloadOption } from '../interfaces/setting.js'

const searchVideoSchema = z.object({
  bvid: z.string().min(1),
  author: z.string(),
  title: z.string(),
  tag: z.string().default(''),
  duration: z.string(),
  is_pay: z.number().default(0),
})

/** Search titles wrap the matched keyword in `<em class="keyword">`. */
export function getInnerText(html: string) {
  return load(html, null, false).root().text()
}

/** `m:ss` or `h:mm:ss`. */
export function parseDuration(text: string) {
  const parts = text.trim().split(':')
  if (parts.length < 2 || parts.length > 3 || parts.some((p) => !/^\d+$/.test(p))) {
    throw Error(`invalid duration: ${text}`)
  }

  const [seconds = 0, minutes = 0, hours = 0] = parts.map(Number).reverse()
  return Duration.fromObject({ hours, minutes, seconds })
}

export function toSearchResult(item: unknown): VideoSearchResult | null {
  const parsed = searchVideoSchema.safeParse(item)
  if (!parsed.success) return null

  const { bvid, author, title, tag, duration, is_pay } = parsed.data
  return {
    bvid,
    author,
    title: getInnerText(title),
    tags: tag.split(',').filter(Boolean),
    duration: parseDuration(duration),
    isPay: is_pay !== 0,
  }
}

export function toDownloadOptions(results: VideoSearchResult[], keyword: string): DownloadOption[] {
  return results.map((r, i) => ({
    bvid: r.bvid,
    ownerName: r.author,
    title: r.title,
    searchKeyword: keyword,
    tags: r.tags,
    downloadProgress: `[${i + 1}/${results.length}]`,
  }))
}

interface SearchParams {
  gateway: Gateway
  history: HistoryStore
}

export interface SearchOptions {
  keyword: string
  maxItems: number
  // zero disables the limit
  maxDuration: Duration
  // keep videos the history already has
  force?: boolean
  signal?: AbortSignal
}

export default class Search {
  gateway: Gateway

  history: HistoryStore

  constructor({ gateway, history }: SearchParams) {
    this.gateway = gateway
    this.history = history
  }

  /** Pages through the integrated search until `maxItems` new videos are found or a page has none. */
  async collect({ keyword, maxItems, maxDuration, force = false, signal }: SearchOptions) {
    const results: VideoSearchResult[] = []
    const seen = new Set<string>()
    const limit = maxDuration.toMillis()

    for (let page = 1; results.length < maxItems; page++) {
      const api = await this.gateway.acquireAccess(signal)
      const sections = await api.search(keyword, page)
      const videos = sections.filter((s) => s.resultType === 'video').flatMap((s) => s.data)

      if (videos.length === 0) {
        helper.msg(`No more search results at page ${page}`)
        break
      }

      helper.msg(`Search page ${page}, ${videos.length} videos`)

      for (const item of videos) {
        if (results.length >= maxItems) break

        let result: VideoSearchResult | null
        try {
          result = toSearchResult(item)
        } catch (error) {
          helper.msg(`Skip malformed search result: ${helper.errorMessage(error)}`, 'warn')
          continue
        }
        if (!result) {
          helper.msg('Skip malformed search result', 'warn')
          continue
        }

        if (seen.has(result.bvid)) continue
        seen.add(result.bvid)

        if (result.isPay) {
          helper.msg(`Skip paid video ${result.bvid}: ${result.title}`)
          continue
        }

        if (!force && this.history.isDownloaded(result.bvid)) continue

        if (limit > 0 && result.duration.toMillis() > limit) {
          helper.msg(`Skip long video ${result.bvid}: ${result.title}, ${result.duration.toFormat('hh:mm:ss')}`)
          continue
        }

        results.push(result)
      }
    }

    helper.msg(`Search completed, ${results.length} results`, 'success')
    return results
  }
}

import { Duration } from 'luxon'

import helper from '../utils/common.js'
import { createApp } from '../utils/app.js'
import { toDownloadOptions } from '../utils/search.js'
import { convertAidToBvid, isBvid } from '../utils/bvid.js'

import type { App } from '../utils/app.js'
import type { DownloadOption } from '../interfaces/setting.js'

interface CommonOptions {
  config: string
  force?: boolean
}

interface SingleOptions extends CommonOptions {
  bvid?: string
  aid?: number
}

interface SearchOptions extends CommonOptions {
  maxItems: number
  maxDuration: number
}

async function withApp(config: string, fn: (app: App) => Promise<void>) {
  const app = await createApp(config)
  try {
    await fn(app)
  } finally {
    app.history.close()
  }
}

export async function singleCommand({ bvid, aid, config, force }: SingleOptions, signal: AbortSignal) {
  const id = aid ? convertAidToBvid(aid) : bvid
  if (!id) throw Error('bvid/aid is required')
  if (!isBvid(id)) throw Error(`invalid bvid: ${id}`)

  await withApp(config, async ({ gateway, downloader }) => {
    const api = await gateway.acquireAccess(signal)
    const info = await api.getVideoInfo(id)

    await downloader.download(
      { bvid: info.bvid, cid: info.cid, ownerName: info.owner.name, title: info.title },
      { force, saveHistory: true, signal },
    )
  })
}

export async function toViewCommand({ config, force }: CommonOptions, signal: AbortSignal) {
  await withApp(config, async ({ gateway, downloader }) => {
    const api = await gateway.acquireAccess(signal)
    const list = await api.getToViewList()
    helper.msg(`${list.length} videos in watch later list`)

    const options: DownloadOption[] = list.map((v, i) => ({
      bvid: v.bvid,
      cid: v.cid,
      ownerName: v.owner.name,
      title: v.title,
      downloadProgress: `[${i + 1}/${list.length}]`,
    }))

    await downloader.downloadBatch(options, { force, saveHistory: true, signal })
  })
}

export async function searchCommand(keyword: string, { config, force, maxItems, maxDuration }: SearchOptions, signal: AbortSignal) {
  const trimmed = keyword.trim()
  if (!trimmed) throw Error('keyword is required')

  await withApp(config, async ({ search, downloader }) => {
    const results = await search.collect({
      keyword: trimmed,
      maxItems,
      maxDuration: Duration.fromObject({ minutes: maxDuration }),
      force,
      signal,
    })

    await downloader.downloadBatch(toDownloadOptions(results, trimmed), { force, saveHistory: true, signal })
  })
}

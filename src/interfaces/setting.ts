'use strict'

export interface AppSettings {
  // cookie string of a logged in account, filled by `login`
  cookies: string
  // directory of merged videos and intermediate tracks
  output: string
  // path of ffmpeg.exe file, it'll be "ffmpeg" if not be provided
  ffmpeg: string
  // sqlite file of the download history
  historyDb: string
  // bytes, 0 disables the check
  maxFileSize: number
}

export interface DownloadOption {
  bvid: string
  // resolved from video info when absent
  cid?: number
  ownerName: string
  title: string
  searchKeyword?: string
  tags?: string[]
  // e.g. "[3/10]", printed before the merge message
  downloadProgress?: string
}

export interface DownloadFlags {
  force?: boolean
  saveHistory?: boolean
  signal?: AbortSignal
}

export interface HistoryEntry {
  bvid: string
  author: string
  title: string
  keyword: string
  tags: string
  fileName: string
}

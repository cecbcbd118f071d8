'use strict'
import type { Duration } from 'luxon'

export interface VideoInfo {
  bvid: string
  aid: number
  cid: number
  title: string
  owner: { mid: number; name: string }
}

export interface StreamVariant {
  id: number
  bandwidth: number
  mimeType: string
  baseUrl: string
  backupUrl: string[]
}

export interface VideoStream {
  // "suee" when the video has no playable stream for this account
  result: string
  dash: {
    video: StreamVariant[]
    audio: StreamVariant[]
  }
}

export interface ToViewItem {
  bvid: string
  cid: number
  title: string
  owner: { name: string }
}

export interface VideoSearchResult {
  bvid: string
  author: string
  title: string
  tags: string[]
  duration: Duration
  isPay: boolean
}

export interface QrCode {
  url: string
  qrcodeKey: string
}

export interface QrPollResult {
  code: number
  message: string
  cookies: string
}

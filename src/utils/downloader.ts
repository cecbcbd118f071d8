'use strict'
import path from 'path'
import EventEmitter from 'events'
import PQueue from 'p-queue'
import { orderBy } from 'lodash-es'

import helper from './common.js'
import fileSys from './fileSys.js'
import { newFileName } from './fileName.js'
import { CancelledError, NoStreamError, isCancelled } from './errors.js'

import type Gateway from './gateway.js'
import type { HistoryStore } from './history.js'
import type { StreamVariant } from '../interfaces/api.js'
import type { DownloadFlags, DownloadOption } from '../interfaces/setting.js'

// playurl result of a video without any stream for the current account
export const NO_STREAM_RESULT = 'suee'

export type AcquisitionState = 'LOOKUP' | 'STREAM_SELECT' | 'TRANSFER_VIDEO' | 'TRANSFER_AUDIO' | 'MERGE' | 'FINALIZE' | 'DONE' | 'FAILED'

export type AcquisitionOutcome = 'already-downloaded' | 'no-streams' | 'file-exists' | 'merge-failed' | 'completed'

export interface AcquisitionResult {
  state: 'DONE'
  outcome: AcquisitionOutcome
  fileName?: string
}

export interface BatchSummary {
  succeeded: number
  skipped: number
  failed: number
}

export interface TrackTransfer {
  transfer(filePath: string, urls: string[], signal?: AbortSignal): Promise<void>
}

export interface Merger {
  mergeVideoAudio(videoPath: string, audioPath: string, outputPath: string): Promise<void>
}

export enum DownloaderEvent {
  STATE = 'downloader-state',
}

interface DownloaderEventMap {
  [DownloaderEvent.STATE]: [DownloadOption['bvid'], AcquisitionState]
}

interface DownloaderParams {
  gateway: Gateway
  controller: TrackTransfer
  ffmpeg: Merger
  history: HistoryStore
  outputPath: string
}

/** Highest bandwidth first; lodash's orderBy keeps the api order on ties. */
export function selectBest(variants: StreamVariant[]): StreamVariant | undefined {
  return orderBy(variants, ['bandwidth'], ['desc'])[0]
}

export const urlsOf = (variant: StreamVariant) => [variant.baseUrl, ...variant.backupUrl]

export default class Downloader extends EventEmitter<DownloaderEventMap> {
  gateway: Gateway

  controller: TrackTransfer

  ffmpeg: Merger

  history: HistoryStore

  outputPath: string

  constructor({ gateway, controller, ffmpeg, history, outputPath }: DownloaderParams) {
    super()

    this.gateway = gateway
    this.controller = controller
    this.ffmpeg = ffmpeg
    this.history = history
    this.outputPath = outputPath
  }

  //#region 單一影片
  async download(option: DownloadOption, { force = false, saveHistory = false, signal }: DownloadFlags = {}): Promise<AcquisitionResult> {
    const { bvid, ownerName, title } = option

    if (!force && this.history.isDownloaded(bvid)) {
      helper.msg(`Already downloaded ${bvid}: ${ownerName} - ${title}`)
      return this.done(bvid, 'already-downloaded')
    }

    try {
      const cid = await this.lookup(option, signal)

      this.transition(bvid, 'STREAM_SELECT')
      const api = await this.gateway.acquireAccess(signal)
      const { result, dash } = await api.getVideoStream(bvid, cid)

      const video = selectBest(dash.video)
      const audio = selectBest(dash.audio)
      if (!video || !audio) {
        if (result === NO_STREAM_RESULT) {
          helper.msg(`Not available streams, bvid: ${bvid}`, 'warn')
          return this.done(bvid, 'no-streams')
        }
        throw new NoStreamError(bvid)
      }

      const outputFile = newFileName(ownerName, title, '', 'mp4')
      const outputPath = path.join(this.outputPath, outputFile)
      if (fileSys.fileExists(outputPath)) {
        helper.msg(`Skip download, ${outputFile} exists`)
        return this.done(bvid, 'file-exists', outputFile)
      }

      this.transition(bvid, 'TRANSFER_VIDEO')
      const videoPath = path.join(this.outputPath, newFileName(ownerName, title, 'video', video.mimeType))
      await this.fetchTrack(videoPath, video, signal)

      this.transition(bvid, 'TRANSFER_AUDIO')
      const audioPath = path.join(this.outputPath, newFileName(ownerName, title, 'audio', audio.mimeType))
      await this.fetchTrack(audioPath, audio, signal)

      this.transition(bvid, 'MERGE')
      helper.msg(option.downloadProgress ? `${option.downloadProgress} Merging ${outputFile}` : `Merging ${outputFile}`)
      try {
        await this.ffmpeg.mergeVideoAudio(videoPath, audioPath, outputPath)
      } catch (error) {
        // tracks stay on disk for a manual merge
        helper.msg(`Merge failed, file: ${outputFile}, ${helper.errorMessage(error)}`, 'error')
        return this.done(bvid, 'merge-failed', outputFile)
      }

      this.transition(bvid, 'FINALIZE')
      await Promise.all([fileSys.removeFile(videoPath), fileSys.removeFile(audioPath)])

      if (saveHistory) {
        this.history.save({
          bvid,
          author: ownerName,
          title,
          keyword: option.searchKeyword ?? '',
          tags: (option.tags ?? []).join(';'),
          fileName: outputFile,
        })
      }

      helper.msg(`Downloaded ${outputFile}`, 'success')
      return this.done(bvid, 'completed', outputFile)
    } catch (error) {
      this.transition(bvid, 'FAILED')
      throw error
    }
  }

  private async lookup(option: DownloadOption, signal?: AbortSignal) {
    this.transition(option.bvid, 'LOOKUP')
    if (option.cid) return option.cid

    const api = await this.gateway.acquireAccess(signal)
    const info = await api.getVideoInfo(option.bvid)
    return info.cid
  }

  private async fetchTrack(filePath: string, variant: StreamVariant, signal?: AbortSignal) {
    if (fileSys.fileExists(filePath)) {
      helper.msg(`Reuse ${path.basename(filePath)}`)
      return
    }

    await this.controller.transfer(filePath, urlsOf(variant), signal)
  }

  private transition(bvid: string, state: AcquisitionState) {
    this.emit(DownloaderEvent.STATE, bvid, state)
  }

  private done(bvid: string, outcome: AcquisitionOutcome, fileName?: string): AcquisitionResult {
    this.transition(bvid, 'DONE')
    return { state: 'DONE', outcome, fileName }
  }
  //#endregion

  //#region 批次
  /** One video at a time; a failed video is logged and the batch goes on. Cancellation ends the batch. */
  async downloadBatch(options: DownloadOption[], flags: DownloadFlags = {}): Promise<BatchSummary> {
    const summary: BatchSummary = { succeeded: 0, skipped: 0, failed: 0 }
    const queue = new PQueue({ concurrency: 1 })

    const task = (option: DownloadOption) => async () => {
      if (flags.signal?.aborted) throw new CancelledError()

      try {
        const { outcome } = await this.download(option, flags)
        if (outcome === 'completed') summary.succeeded++
        else if (outcome === 'merge-failed') summary.failed++
        else summary.skipped++
      } catch (error) {
        if (isCancelled(error)) {
          queue.clear()
          throw error
        }

        summary.failed++
        helper.msg(`Download failed, bvid: ${option.bvid}, ${helper.errorMessage(error)}`, 'error')
      }
    }

    await queue.addAll(options.map(task))

    helper.msg(`Batch finished, succeeded: ${summary.succeeded}, skipped: ${summary.skipped}, failed: ${summary.failed}`, 'title')
    return summary
  }
  //#endregion
}

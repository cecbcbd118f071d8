'use strict'
import filenamify from 'filenamify'

import type { StreamType } from '../interfaces/common.js'

const MAX_BASE_LENGTH = 80

export function normalizeExtension(format: string) {
  if (format.includes('mp4')) return 'mp4'
  if (format.includes('flv')) return 'flv'
  return format
}

/** `{owner} - {title}[_{kind}].{ext}`, made safe for the file system. */
export function newFileName(owner: string, title: string, kind: StreamType | '', format: string) {
  // truncated before the suffix so that both tracks keep distinct names
  const base = filenamify(`${owner} - ${title}`, { replacement: '_', maxLength: MAX_BASE_LENGTH })
  const suffix = kind ? `_${kind}` : ''
  const extension = filenamify(normalizeExtension(format), { replacement: '_' })
  return `${base}${suffix}.${extension}`
}

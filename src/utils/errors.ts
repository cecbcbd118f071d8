'use strict'

export class CollectorError extends Error {
  readonly code: string

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'CollectorError'
    this.code = code
  }
}

/** Declared size of a track reaches `maxFileSize`. Never retried. */
export class FileTooLargeError extends CollectorError {
  constructor(
    readonly fileName: string,
    readonly size: number,
    readonly maxFileSize: number,
  ) {
    super(`${fileName} is too large: ${size} bytes, limit ${maxFileSize} bytes`, 'FILE_TOO_LARGE')
    this.name = 'FileTooLargeError'
  }
}

export class EmptyUrlListError extends CollectorError {
  constructor(readonly fileName: string) {
    super(`no url to download ${fileName}`, 'EMPTY_URL_LIST')
    this.name = 'EmptyUrlListError'
  }
}

export class DownloadFailedError extends CollectorError {
  constructor(
    readonly fileName: string,
    readonly attempts: number,
    options?: ErrorOptions,
  ) {
    super(`download ${fileName} failed after ${attempts} attempts`, 'DOWNLOAD_FAILED', options)
    this.name = 'DownloadFailedError'
  }
}

export class CancelledError extends CollectorError {
  constructor(message = 'operation cancelled') {
    super(message, 'CANCELLED')
    this.name = 'CancelledError'
  }
}

export class ReadTimeoutError extends CollectorError {
  constructor(readonly timeoutMs: number) {
    super(`no data received in ${timeoutMs} ms`, 'READ_TIMEOUT')
    this.name = 'ReadTimeoutError'
  }
}

export class HttpStatusError extends CollectorError {
  constructor(
    readonly status: number,
    readonly url: string,
  ) {
    super(`unexpected status ${status} from ${url}`, 'HTTP_STATUS')
    this.name = 'HttpStatusError'
  }
}

/** Non-zero `code` in a platform JSON response. */
export class ApiError extends CollectorError {
  constructor(
    readonly apiCode: number,
    message: string,
    readonly endpoint: string,
  ) {
    super(`${endpoint} failed, code: ${apiCode}, message: ${message}`, 'API_ERROR')
    this.name = 'ApiError'
  }
}

export class MergeError extends CollectorError {
  constructor(
    readonly outputPath: string,
    readonly output: string,
    options?: ErrorOptions,
  ) {
    super(`merge ${outputPath} failed: ${output}`, 'MERGE_FAILED', options)
    this.name = 'MergeError'
  }
}

export class NoStreamError extends CollectorError {
  constructor(readonly bvid: string) {
    super(`can't get video stream, bvid: ${bvid}`, 'NO_STREAM')
    this.name = 'NoStreamError'
  }
}

/** Startup problem: the command stops before any request is made. */
export class ConfigError extends CollectorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options)
    this.name = 'ConfigError'
  }
}

export const isCancelled = (error: unknown): error is CancelledError => error instanceof CancelledError

export class CommandFailedError extends CollectorError {
  constructor(
    readonly command: string,
    // stdout and stderr of the process, verbatim
    readonly output: string,
    options?: ErrorOptions,
  ) {
    super(`${command} failed: ${output}`, 'COMMAND_FAILED', options)
    this.name = 'CommandFailedError'
  }
}

import cp from 'child_process'

import helper from './common.js'
import { CommandFailedError, ConfigError, MergeError } from './errors.js'

import type { CommandRunner } from '../interfaces/common.js'

export class ProcessRunner implements CommandRunner {
  constructor(readonly bin: string) {}

  run(args: string[]) {
    return new Promise<string>((resolve, reject) => {
      cp.execFile(this.bin, args, { maxBuffer: 64 * 1024 * 1024, windowsHide: true }, (error, stdout, stderr) => {
        const output = `${stdout}${stderr}`
        if (error) {
          reject(new CommandFailedError(`${this.bin} ${args.join(' ')}`, output || error.message, { cause: error }))
          return
        }
        resolve(output)
      })
    })
  }
}

interface FFmpegParams {
  runner: CommandRunner
}

export default class FFmpeg {
  runner: CommandRunner

  constructor({ runner }: FFmpegParams) {
    this.runner = runner
  }

  async checkAvailable() {
    try {
      await this.runner.run(['-version'])
    } catch (error) {
      throw new ConfigError(`ffmpeg not exist, please install ffmpeg first: ${helper.errorMessage(error)}`, { cause: error })
    }
  }

  /** Copies both streams into `outputPath` without re-encoding. */
  async mergeVideoAudio(videoPath: string, audioPath: string, outputPath: string) {
    try {
      await this.runner.run(['-i', videoPath, '-i', audioPath, '-c:v', 'copy', '-c:a', 'copy', outputPath])
    } catch (error) {
      const output = error instanceof CommandFailedError ? error.output : helper.errorMessage(error)
      throw new MergeError(outputPath, output, { cause: error })
    }
  }
}

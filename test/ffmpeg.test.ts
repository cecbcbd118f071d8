import { describe, expect, it } from 'vitest'

import FFmpeg from '../src/utils/ffmpeg.js'
import { CommandFailedError, ConfigError, MergeError } from '../src/utils/errors.js'

import type { CommandRunner } from '../src/interfaces/common.js'

function recordingRunner(failWith?: Error) {
  const calls: string[][] = []
  const runner: CommandRunner = {
    run: async (args) => {
      calls.push(args)
      if (failWith) throw failWith
      return ''
    },
  }
  return { runner, calls }
}

describe('FFmpeg', () => {
  it('copies both streams without re-encoding', async () => {
    const { runner, calls } = recordingRunner()
    const ffmpeg = new FFmpeg({ runner })

    await ffmpeg.mergeVideoAudio('out/A - B_video.mp4', 'out/A - B_audio.mp4', 'out/A - B.mp4')

    expect(calls).toEqual([['-i', 'out/A - B_video.mp4', '-i', 'out/A - B_audio.mp4', '-c:v', 'copy', '-c:a', 'copy', 'out/A - B.mp4']])
  })

  it('keeps the process output in a failed merge', async () => {
    const output = 'out/A - B_audio.mp4: Invalid data found when processing input\n'
    const { runner } = recordingRunner(new CommandFailedError('ffmpeg -i ...', output))
    const ffmpeg = new FFmpeg({ runner })

    const error = await ffmpeg.mergeVideoAudio('v', 'a', 'out/A - B.mp4').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(MergeError)
    expect(error).toHaveProperty('output', output)
    expect(error).toHaveProperty('outputPath', 'out/A - B.mp4')
  })

  it('reports a missing binary as a configuration problem', async () => {
    const { runner, calls } = recordingRunner(new Error('spawn ffmpeg ENOENT'))
    const ffmpeg = new FFmpeg({ runner })

    await expect(ffmpeg.checkAvailable()).rejects.toBeInstanceOf(ConfigError)
    expect(calls).toEqual([['-version']])
  })
})

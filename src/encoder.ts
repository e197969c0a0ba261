import { spawn } from 'node:child_process'
import {
  CancelledError,
  type CueSplitError,
  EncodeError,
  TimedOutError,
} from './errors'
import { logger } from './logger'

const STDERR_TAIL_LINES = 20
const STDERR_BUFFER_LIMIT = 64 * 1024

export interface EncoderRunOptions {
  /** Kills the encoder when aborted; the job is reported as cancelled. */
  signal?: AbortSignal
  /** Kills the encoder after this many milliseconds. No limit by default. */
  timeoutMs?: number
  /** Prefix for debug log lines */
  label?: string
}

/**
 * Runs one encoder invocation to completion. Resolves on exit code 0 and
 * rejects with `EncodeError`, `TimedOutError` or `CancelledError`
 * otherwise.
 */
export type EncoderRunner = (
  args: readonly string[],
  options: EncoderRunOptions
) => Promise<void>

/**
 * Last `lines` non-empty lines of captured stderr.
 */
export function stderrTail(stderr: string, lines = STDERR_TAIL_LINES): string {
  return stderr
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '')
    .slice(-lines)
    .join('\n')
}

/**
 * An `EncoderRunner` backed by an ffmpeg executable.
 * Assumes `ffmpegPath` is a path or a name found in the system's PATH.
 */
export function createFfmpegRunner(ffmpegPath = 'ffmpeg'): EncoderRunner {
  return (args, { signal, timeoutMs, label = ffmpegPath }) =>
    new Promise<void>((resolvePromise, rejectPromise) => {
      if (signal?.aborted) {
        rejectPromise(new CancelledError())
        return
      }

      const ffmpegProcess = spawn(ffmpegPath, args, {
        stdio: ['ignore', 'ignore', 'pipe'],
      })
      let errorOutput = ''
      let stopReason: CueSplitError | undefined

      const stop = (reason: CueSplitError) => {
        if (stopReason) return
        stopReason = reason
        ffmpegProcess.kill('SIGTERM')
      }
      const onAbort = () => stop(new CancelledError('cancelled while encoding'))
      signal?.addEventListener('abort', onAbort, { once: true })
      const timer =
        timeoutMs === undefined
          ? undefined
          : setTimeout(() => stop(new TimedOutError(timeoutMs)), timeoutMs)
      const cleanup = () => {
        clearTimeout(timer)
        signal?.removeEventListener('abort', onAbort)
      }

      ffmpegProcess.stderr.on('data', (data: Buffer) => {
        const text = data.toString()
        logger.debug(`${label}: ${text.trim()}`)
        errorOutput += text
        if (errorOutput.length > STDERR_BUFFER_LIMIT) {
          errorOutput = errorOutput.slice(-STDERR_BUFFER_LIMIT / 2)
        }
      })

      ffmpegProcess.on('error', (err) => {
        cleanup()
        rejectPromise(
          new EncodeError(
            `failed to start ${ffmpegPath}. Is it installed and in your system's PATH? Error: ${err.message}`,
            null,
            stderrTail(errorOutput),
            { cause: err }
          )
        )
      })

      ffmpegProcess.on('close', (code, exitSignal) => {
        cleanup()
        if (stopReason) {
          rejectPromise(stopReason)
        } else if (code === 0) {
          resolvePromise()
        } else {
          rejectPromise(
            new EncodeError(
              `${ffmpegPath} exited with ${code === null ? `signal ${exitSignal}` : `code ${code}`}`,
              code,
              stderrTail(errorOutput)
            )
          )
        }
      })
    })
}

/**
 * Gets the duration of an audio file in seconds using ffprobe.
 * Assumes `ffprobePath` is a path or a name found in the system's PATH.
 */
export async function probeDuration(
  filePath: string,
  ffprobePath = 'ffprobe'
): Promise<number> {
  return new Promise((resolve, reject) => {
    const ffprobeProcess = spawn(ffprobePath, [
      '-v',
      'error',
      '-show_entries',
      'format=duration',
      '-of',
      'default=noprint_wrappers=1:nokey=1',
      filePath,
    ])
    let durationOutput = ''
    let errorOutput = ''

    ffprobeProcess.stdout.on('data', (data: Buffer) => {
      durationOutput += data.toString()
    })

    ffprobeProcess.stderr.on('data', (data: Buffer) => {
      errorOutput += data.toString()
    })

    ffprobeProcess.on('close', (code) => {
      if (code === 0) {
        const duration = parseFloat(durationOutput.trim())
        if (!isNaN(duration)) {
          resolve(duration)
        } else {
          reject(
            new EncodeError(
              `could not parse duration of ${filePath} from ffprobe output: ${durationOutput.trim()}`,
              code,
              stderrTail(errorOutput)
            )
          )
        }
      } else {
        reject(
          new EncodeError(
            `ffprobe exited with code ${code} for ${filePath}`,
            code,
            stderrTail(errorOutput)
          )
        )
      }
    })

    ffprobeProcess.on('error', (err) => {
      reject(
        new EncodeError(
          `failed to start ${ffprobePath}. Is it installed and in your system's PATH? Error: ${err.message}`,
          null,
          '',
          { cause: err }
        )
      )
    })
  })
}

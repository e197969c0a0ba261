import { mkdtemp, rm, stat, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { type CueSheet, parseCue, withFileLengths } from './cue'
import type { EncoderRunner } from './encoder'
import { ConfigError, EncodeError, TimedOutError } from './errors'
import { createPresetTable, getPreset } from './presets'
import {
  type EncodeJob,
  type EncoderConfig,
  type PlanOptions,
  planSplit,
  rawEncoder,
  reportOutcomes,
  resolveCodec,
  runSplit,
  splitSheet,
  summarize,
} from './split'
import { compileTemplate } from './template'
import { TimeCode } from './timecode'

const presets = createPresetTable()
const flac = getPreset(presets, 'flac')

const ALBUM = `REM DATE 1999
PERFORMER "The Band"
TITLE "Night Album"
FILE "image.flac" WAVE
  TRACK 01 AUDIO
    TITLE "Opening"
    INDEX 01 00:00:00
  TRACK 02 AUDIO
    TITLE "Nightfall"
    INDEX 01 03:30:00
`

function sheetOf(text: string, length: string): CueSheet {
  const parsed = parseCue(text)
  const time = TimeCode.parse(length)
  if (typeof time === 'string') {
    throw new Error(time)
  }
  return withFileLengths(parsed, new Map(parsed.files.map((f) => [f.file, time])))
}

function albumWith(count: number): string {
  const tracks = Array.from(
    { length: count },
    (_, i) =>
      `  TRACK ${String(i + 1).padStart(2, '0')} AUDIO\n    TITLE "Song ${i + 1}"\n    INDEX 01 ${String(i).padStart(2, '0')}:00:00\n`
  )
  return `TITLE "Long"\nFILE "image.wav" WAVE\n${tracks.join('')}`
}

function plan(options: Partial<PlanOptions> = {}, sheet = sheetOf(ALBUM, '05:00:00')) {
  return planSplit(sheet, {
    template: compileTemplate('<no>. <title>.<ext>'),
    encoder: { kind: 'preset', preset: flac, copyWhenPossible: true },
    cueDir: '/music/album',
    outDir: '/out',
    ...options,
  })
}

function outputOf(args: readonly string[]): string {
  return args[args.length - 1]
}

describe('resolveCodec', () => {
  it('should copy when the source already has the preset extension', () => {
    const encoder: EncoderConfig = { kind: 'preset', preset: flac, copyWhenPossible: true }
    expect(resolveCodec(encoder, '/a/image.FLAC')).toEqual({ args: ['-c', 'copy'], ext: 'flac' })
    expect(resolveCodec(encoder, '/a/image.wav')).toEqual({ args: flac.args, ext: 'flac' })
  })

  it('should re-encode when copying is disabled', () => {
    const encoder: EncoderConfig = { kind: 'preset', preset: flac, copyWhenPossible: false }
    expect(resolveCodec(encoder, '/a/image.flac')).toEqual({ args: flac.args, ext: 'flac' })
  })

  it('should copy known containers and fall back otherwise', () => {
    const encoder: EncoderConfig = { kind: 'auto', fallback: flac }
    expect(resolveCodec(encoder, '/a/image.mp3')).toEqual({ args: ['-c', 'copy'], ext: 'mp3' })
    expect(resolveCodec(encoder, '/a/image.ape')).toEqual({ args: flac.args, ext: 'flac' })
  })

  it('should pass raw arguments through verbatim', () => {
    const encoder = rawEncoder(['-c:a', 'libopus', '-b:a', '96k'], 'opus')
    expect(resolveCodec(encoder, '/a/image.flac')).toEqual({
      args: ['-c:a', 'libopus', '-b:a', '96k'],
      ext: 'opus',
    })
  })

  it('should require a valid extension for raw arguments', () => {
    expect(() => rawEncoder(['-c:a', 'libopus'], undefined)).toThrow(ConfigError)
    expect(() => rawEncoder(['-c:a', 'libopus'], 'op.us')).toThrow(
      'extensions must consist of alphanumeric characters only: op.us'
    )
  })
})

describe('planSplit', () => {
  it('should create one job per track with exact ranges', () => {
    const jobs = plan()
    expect(jobs.map((j) => [j.start.toSeconds(), j.duration.toSeconds()])).toEqual([
      [0, 210],
      [210, 90],
    ])
    expect(jobs.map((j) => j.output.path)).toEqual([
      '/out/1. Opening.flac',
      '/out/2. Nightfall.flac',
    ])
    expect(jobs[0].source).toBe('/music/album/image.flac')
  })

  it('should seek after the input so ffmpeg decodes up to the position', () => {
    const [, second] = plan()
    expect(second.args.slice(0, 15)).toEqual([
      '-nostdin',
      '-hide_banner',
      '-loglevel',
      'error',
      '-n',
      '-i',
      '/music/album/image.flac',
      '-ss',
      '210',
      '-t',
      '90',
      '-map',
      '0:a',
      '-map_metadata',
      '-1',
    ])
    expect(second.args.slice(-3)).toEqual(['-c', 'copy', '/out/2. Nightfall.flac'])
  })

  it('should pass every tag as a metadata argument', () => {
    const [, second] = plan()
    const title = second.args.indexOf('TITLE=Nightfall')
    expect(second.args[title - 1]).toBe('-metadata')
    expect(second.args).toContain('ALBUM=Night Album')
    expect(second.args).toContain('TRACKNUMBER=2')
    expect(second.args).toContain('ARTIST=The Band')
  })

  it('should overwrite only when asked to', () => {
    const [first] = plan({ existing: 'overwrite' })
    expect(first.args[4]).toBe('-y')
  })

  it('should pad track numbers to the highest number in the sheet', () => {
    const jobs = plan({}, sheetOf(albumWith(12), '20:00:00'))
    expect(jobs[2].output.relativePath).toBe('03. Song 3.flac')
    expect(jobs[11].output.relativePath).toBe('12. Song 12.flac')
  })

  it('should render year and album into nested directories', () => {
    const [first] = plan({ template: compileTemplate('<year> - <album>/<no>. <title>.<ext>') })
    expect(first.output.relativePath).toBe('1999 - Night Album/1. Opening.flac')
  })

  it('should reject a track with no known end', () => {
    expect(() => plan({}, parseCue(ALBUM))).toThrow(
      'track 2 has no end; the length of "image.flac" is unknown'
    )
  })

  it('should leave out a track that starts where the next one starts', () => {
    const sheet = sheetOf(
      [
        'FILE "image.flac" WAVE',
        'TRACK 01 AUDIO',
        'TITLE "Intro"',
        'INDEX 01 00:00:00',
        'TRACK 02 AUDIO',
        'TITLE "Hidden"',
        'INDEX 01 01:00:00',
        'TRACK 03 AUDIO',
        'TITLE "Main"',
        'INDEX 01 01:00:00',
      ].join('\n'),
      '02:00:00'
    )
    const jobs = plan({}, sheet)
    expect(jobs.map((j) => j.track.number)).toEqual([1, 3])
    expect(jobs.map((j) => j.duration.toSeconds())).toEqual([60, 60])
  })

  it('should reject two tracks rendering to the same path', () => {
    expect(() => plan({ template: compileTemplate('<album>.<ext>') })).toThrow(
      'tracks 1 and 2 would both be written to /out/Night Album.flac'
    )
  })
})

describe('runSplit', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cuesplit-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  function jobsIn(outDir: string, sheet?: CueSheet): EncodeJob[] {
    return plan(
      { outDir, template: compileTemplate('<album>/<no>. <title>.<ext>') },
      sheet
    )
  }

  it('should keep going after one job fails and report exactly that track', async () => {
    const runner: EncoderRunner = vi.fn(async (args: readonly string[]) => {
      if (outputOf(args).endsWith('2. Nightfall.flac')) {
        throw new EncodeError('ffmpeg exited with code 1', 1, 'Invalid data found')
      }
    })
    const outcomes = await runSplit(jobsIn(join(dir, 'out')), { runner, concurrency: 2 })

    expect(runner).toHaveBeenCalledTimes(2)
    expect(outcomes.map((o) => o.status)).toEqual(['done', 'failed'])
    const failed = outcomes.filter((o) => o.status === 'failed')
    expect(failed.map((o) => o.job.track.number)).toEqual([2])
    expect(summarize(outcomes)).toEqual({ done: 1, skipped: 0, failed: 1, ok: false })
    expect(reportOutcomes(outcomes).ok).toBe(false)
  })

  it('should create the output directories', async () => {
    const runner: EncoderRunner = async () => {}
    await runSplit(jobsIn(join(dir, 'out')), { runner, concurrency: 1 })
    expect((await stat(join(dir, 'out', 'Night Album'))).isDirectory()).toBe(true)
  })

  it('should return outcomes in track order whatever the completion order', async () => {
    const finished: number[] = []
    const runner: EncoderRunner = async (args) => {
      const slow = outputOf(args).endsWith('/1. Song 1.flac')
      await new Promise((resolve) => setTimeout(resolve, slow ? 30 : 1))
      finished.push(slow ? 1 : 0)
    }
    const sheet = sheetOf(albumWith(3), '05:00:00')
    const outcomes = await runSplit(jobsIn(join(dir, 'out'), sheet), { runner, concurrency: 3 })
    expect(finished.at(-1)).toBe(1)
    expect(outcomes.map((o) => o.job.track.number)).toEqual([1, 2, 3])
    expect(outcomes.every((o) => o.status === 'done')).toBe(true)
  })

  it('should never run more encoders than the pool size', async () => {
    let running = 0
    let peak = 0
    const runner: EncoderRunner = async () => {
      running++
      peak = Math.max(peak, running)
      await new Promise((resolve) => setTimeout(resolve, 5))
      running--
    }
    const sheet = sheetOf(albumWith(6), '10:00:00')
    await runSplit(jobsIn(join(dir, 'out'), sheet), { runner, concurrency: 2 })
    expect(peak).toBe(2)
  })

  it('should fail a job without encoding when its directory cannot be created', async () => {
    await writeFile(join(dir, 'blocker'), 'not a directory')
    const runner = vi.fn<Parameters<EncoderRunner>, ReturnType<EncoderRunner>>(async () => {})
    const outcomes = await runSplit(jobsIn(join(dir, 'blocker', 'out')), { runner })

    expect(runner).not.toHaveBeenCalled()
    expect(outcomes.map((o) => (o.status === 'failed' ? o.error.kind : o.status))).toEqual([
      'FilesystemError',
      'FilesystemError',
    ])
  })

  it('should skip or refuse existing outputs depending on the policy', async () => {
    const outDir = join(dir, 'out')
    const runner: EncoderRunner = async () => {}
    const jobs = jobsIn(outDir)
    await runSplit(jobs, { runner })
    await writeFile(jobs[0].output.path, 'already split')

    const skipping = plan(
      { outDir, existing: 'skip', template: compileTemplate('<album>/<no>. <title>.<ext>') }
    )
    const skipped = await runSplit(skipping, { runner })
    expect(skipped.map((o) => o.status)).toEqual(['skipped', 'done'])

    const refused = await runSplit(jobs, { runner })
    const [first] = refused
    expect(first.status).toBe('failed')
    if (first.status === 'failed') {
      expect(first.error.message).toBe(`output file already exists: ${jobs[0].output.path}`)
    }
  })

  it('should stop pulling jobs after cancellation', async () => {
    const controller = new AbortController()
    const runner = vi.fn<Parameters<EncoderRunner>, ReturnType<EncoderRunner>>(async () => {
      controller.abort()
    })
    const sheet = sheetOf(albumWith(3), '05:00:00')
    const outcomes = await runSplit(jobsIn(join(dir, 'out'), sheet), {
      runner,
      concurrency: 1,
      signal: controller.signal,
    })

    expect(runner).toHaveBeenCalledTimes(1)
    expect(outcomes.map((o) => (o.status === 'failed' ? o.error.kind : o.status))).toEqual([
      'done',
      'Cancelled',
      'Cancelled',
    ])
  })

  it('should report a timed out encoder as such', async () => {
    const runner: EncoderRunner = async () => {
      throw new TimedOutError(1000)
    }
    const [first] = await runSplit(jobsIn(join(dir, 'out')), { runner, timeoutMs: 1000 })
    expect(first.status === 'failed' && first.error.kind).toBe('TimedOut')
  })

  it('should wrap unexpected runner errors as encode errors', async () => {
    const runner: EncoderRunner = async () => {
      throw new Error('boom')
    }
    const [first] = await runSplit(jobsIn(join(dir, 'out')), { runner })
    expect(first.status === 'failed' && first.error).toBeInstanceOf(EncodeError)
  })

  it('should plan, run and count one sheet', async () => {
    const runner = vi.fn<Parameters<EncoderRunner>, ReturnType<EncoderRunner>>(async () => {})
    const { outcomes, summary } = await splitSheet(
      sheetOf(ALBUM, '05:00:00'),
      {
        template: compileTemplate('<no>. <title>.<ext>'),
        encoder: { kind: 'auto', fallback: flac },
        cueDir: '/music/album',
        outDir: join(dir, 'out'),
      },
      { runner, concurrency: 1 }
    )
    expect(runner).toHaveBeenCalledTimes(2)
    expect(outcomes.map((o) => o.path)).toEqual([
      join(dir, 'out', '1. Opening.flac'),
      join(dir, 'out', '2. Nightfall.flac'),
    ])
    expect(summary).toEqual({ done: 2, skipped: 0, failed: 0, ok: true })
  })

  it('should not start any encoder when planning fails', async () => {
    const runner = vi.fn<Parameters<EncoderRunner>, ReturnType<EncoderRunner>>(async () => {})
    await expect(
      splitSheet(
        parseCue(ALBUM),
        {
          template: compileTemplate('<no>.<ext>'),
          encoder: { kind: 'auto', fallback: flac },
          cueDir: '/music/album',
          outDir: join(dir, 'out'),
        },
        { runner }
      )
    ).rejects.toBeInstanceOf(ConfigError)
    expect(runner).not.toHaveBeenCalled()
  })

  it('should pass the timeout and signal to the runner', async () => {
    const controller = new AbortController()
    const runner = vi.fn<Parameters<EncoderRunner>, ReturnType<EncoderRunner>>(async () => {})
    await runSplit(jobsIn(join(dir, 'out')), {
      runner,
      concurrency: 1,
      timeoutMs: 5000,
      signal: controller.signal,
    })
    expect(runner.mock.calls[0][1]).toEqual({
      signal: controller.signal,
      timeoutMs: 5000,
      label: 'track 1',
    })
  })
})

import { ensureDir, pathExists } from 'fs-extra'
import { availableParallelism } from 'node:os'
import { basename, dirname, extname, join, resolve } from 'node:path'
import {
  type CueSheet,
  type FileSection,
  type Tag,
  type Track,
  albumYear,
  maxTrackNumber,
  trackMetadata,
} from './cue'
import type { EncoderRunner } from './encoder'
import {
  CancelledError,
  ConfigError,
  EncodeError,
  FilesystemError,
  type JobError,
  errorMessage,
  isJobError,
} from './errors'
import { logger } from './logger'
import { runPool } from './pool'
import { COPYABLE_EXTENSIONS, type Preset } from './presets'
import { type Template, renderTemplate } from './template'
import type { TimeCode } from './timecode'

/**
 * How tracks are encoded:
 * - `preset`: a named argument set; stream copy when the source already has
 *   the preset's extension and `copyWhenPossible` is set
 * - `raw`: caller-supplied ffmpeg arguments passed through verbatim, with an
 *   explicit output extension
 * - `auto`: stream copy for known audio containers, `fallback` otherwise
 */
export type EncoderConfig =
  | { readonly kind: 'preset'; readonly preset: Preset; readonly copyWhenPossible: boolean }
  | { readonly kind: 'raw'; readonly args: readonly string[]; readonly ext: string }
  | { readonly kind: 'auto'; readonly fallback: Preset }

/** What to do when an output file already exists. */
export type ExistingPolicy = 'overwrite' | 'skip' | 'fail'

export interface OutputSpec {
  /** Output path, `outDir` joined with the rendered template */
  readonly path: string
  /** The rendered template, `/`-separated */
  readonly relativePath: string
  readonly tags: readonly Tag[]
}

export interface EncodeJob {
  readonly track: Track
  readonly source: string
  readonly start: TimeCode
  readonly duration: TimeCode
  readonly output: OutputSpec
  readonly existing: ExistingPolicy
  readonly args: readonly string[]
}

export type JobOutcome =
  | { readonly status: 'done'; readonly job: EncodeJob; readonly path: string }
  | { readonly status: 'skipped'; readonly job: EncodeJob; readonly path: string }
  | {
      readonly status: 'failed'
      readonly job: EncodeJob
      readonly path: string
      readonly error: JobError
    }

export interface PlanOptions {
  template: Template
  encoder: EncoderConfig
  /** Directory image files are resolved against; usually the cuesheet's */
  cueDir: string
  outDir: string
  existing?: ExistingPolicy
}

export interface SplitRunOptions {
  runner: EncoderRunner
  /** Parallel encoder processes; defaults to the available parallelism */
  concurrency?: number
  signal?: AbortSignal
  /** Per-job deadline in milliseconds */
  timeoutMs?: number
}

export interface SplitSummary {
  done: number
  skipped: number
  failed: number
  ok: boolean
}

const COPY_ARGS: readonly string[] = ['-c', 'copy']

/**
 * Checks an output extension given alongside raw encoder arguments.
 */
export function rawEncoder(args: readonly string[], ext: string | undefined): EncoderConfig {
  if (!ext) {
    throw new ConfigError('raw encoder arguments require an explicit output extension (--ext)')
  }
  if (!/^[\p{L}\p{N}]+$/u.test(ext)) {
    throw new ConfigError(`extensions must consist of alphanumeric characters only: ${ext}`)
  }
  return { kind: 'raw', args, ext }
}

/**
 * Codec arguments and output extension for one source file.
 */
export function resolveCodec(
  encoder: EncoderConfig,
  source: string
): { args: readonly string[]; ext: string } {
  const sourceExt = extname(source).slice(1).toLowerCase()
  switch (encoder.kind) {
    case 'raw':
      return { args: encoder.args, ext: encoder.ext }
    case 'preset':
      return encoder.copyWhenPossible && sourceExt === encoder.preset.ext
        ? { args: COPY_ARGS, ext: encoder.preset.ext }
        : { args: encoder.preset.args, ext: encoder.preset.ext }
    case 'auto':
      return COPYABLE_EXTENSIONS.includes(sourceExt)
        ? { args: COPY_ARGS, ext: sourceExt }
        : { args: encoder.fallback.args, ext: encoder.fallback.ext }
  }
}

/**
 * The full ffmpeg argument list for one track. `-ss` and `-t` follow `-i`
 * so ffmpeg decodes up to the position instead of seeking by bytes.
 */
export function buildEncoderArgs(job: {
  source: string
  start: TimeCode
  duration: TimeCode
  tags: readonly Tag[]
  codecArgs: readonly string[]
  output: string
  overwrite: boolean
}): string[] {
  return [
    '-nostdin',
    '-hide_banner',
    '-loglevel',
    'error',
    job.overwrite ? '-y' : '-n',
    '-i',
    job.source,
    '-ss',
    job.start.toEncoderSeconds(),
    '-t',
    job.duration.toEncoderSeconds(),
    '-map',
    '0:a',
    '-map_metadata',
    '-1',
    ...job.tags.flatMap(([key, value]) => ['-metadata', `${key}=${value}`]),
    ...job.codecArgs,
    job.output,
  ]
}

function trackFields(
  sheet: CueSheet,
  section: FileSection,
  track: Track,
  ext: string,
  dirName: string
) {
  return {
    artist: track.performer,
    album: section.title ?? sheet.title,
    title: track.title,
    year: albumYear(sheet.date),
    genre: sheet.genre,
    no: track.number,
    ext,
    'dir-name': dirName,
  }
}

/**
 * Turns a sheet into one `EncodeJob` per track without touching the
 * filesystem. A track whose INDEX 01 equals the next track's has no audio
 * and gets no job. Throws `ConfigError` for a track whose end is unknown or when
 * two tracks would be written to the same path.
 */
export function planSplit(sheet: CueSheet, options: PlanOptions): EncodeJob[] {
  const existing = options.existing ?? 'fail'
  const width = String(maxTrackNumber(sheet)).length
  const dirName = basename(resolve(options.cueDir))
  const seen = new Map<string, Track>()
  const jobs: EncodeJob[] = []

  for (const section of sheet.files) {
    const source = resolve(options.cueDir, section.file)
    const codec = resolveCodec(options.encoder, source)

    for (const track of section.tracks) {
      if (!track.end) {
        throw new ConfigError(
          `track ${track.number} has no end; the length of "${section.file}" is unknown`
        )
      }
      const duration = track.end.subtract(track.start)
      if (duration.frames === 0) {
        logger.warn(`track ${track.number} has zero length at ${track.start}; not written`)
        continue
      }
      const relativePath = renderTemplate(
        options.template,
        trackFields(sheet, section, track, codec.ext, dirName),
        width
      )
      const path = join(options.outDir, relativePath)

      const clash = seen.get(path)
      if (clash) {
        throw new ConfigError(
          `tracks ${clash.number} and ${track.number} would both be written to ${path}\nhelp: specify a different file naming scheme with the --template option`
        )
      }
      seen.set(path, track)

      const tags = trackMetadata(sheet, section, track)
      jobs.push(
        Object.freeze({
          track,
          source,
          start: track.start,
          duration,
          output: Object.freeze({ path, relativePath, tags }),
          existing,
          args: buildEncoderArgs({
            source,
            start: track.start,
            duration,
            tags,
            codecArgs: codec.args,
            output: path,
            overwrite: existing === 'overwrite',
          }),
        })
      )
    }
  }

  return jobs
}

async function runJob(job: EncodeJob, options: SplitRunOptions): Promise<JobOutcome> {
  const { path } = job.output
  const failed = (error: JobError): JobOutcome => ({ status: 'failed', job, path, error })

  const dir = dirname(path)
  try {
    await ensureDir(dir)
  } catch (error) {
    return failed(
      new FilesystemError(`could not create directory ${dir}: ${errorMessage(error)}`, dir, {
        cause: error,
      })
    )
  }

  if (job.existing !== 'overwrite' && (await pathExists(path))) {
    if (job.existing === 'skip') {
      return { status: 'skipped', job, path }
    }
    return failed(new FilesystemError(`output file already exists: ${path}`, path))
  }

  if (options.signal?.aborted) {
    return failed(new CancelledError('cancelled before start'))
  }

  logger.debug(`encoding track ${job.track.number}`, {
    from: job.start.toString(),
    duration: job.duration.toString(),
    output: path,
  })

  try {
    await options.runner(job.args, {
      signal: options.signal,
      timeoutMs: options.timeoutMs,
      label: `track ${job.track.number}`,
    })
    return { status: 'done', job, path }
  } catch (error) {
    return failed(
      isJobError(error)
        ? error
        : new EncodeError(errorMessage(error), null, '', { cause: error })
    )
  }
}

/**
 * Drives every job to an outcome on a bounded pool. One job's failure
 * never stops the others; outcomes come back in job order. After `signal`
 * aborts, jobs that have not started are reported as cancelled.
 */
export async function runSplit(
  jobs: readonly EncodeJob[],
  options: SplitRunOptions
): Promise<JobOutcome[]> {
  const concurrency = options.concurrency ?? availableParallelism()
  return runPool<EncodeJob, JobOutcome>(
    jobs,
    concurrency,
    (job) => runJob(job, options),
    (job) => ({
      status: 'failed',
      job,
      path: job.output.path,
      error: new CancelledError('cancelled before start'),
    }),
    options.signal
  )
}

/**
 * Plans, runs and summarizes one sheet. Planning errors are thrown before
 * any encoder starts.
 */
export async function splitSheet(
  sheet: CueSheet,
  plan: PlanOptions,
  run: SplitRunOptions
): Promise<{ outcomes: JobOutcome[]; summary: SplitSummary }> {
  const outcomes = await runSplit(planSplit(sheet, plan), run)
  return { outcomes, summary: summarize(outcomes) }
}

export function summarize(outcomes: readonly JobOutcome[]): SplitSummary {
  const count = (status: JobOutcome['status']) =>
    outcomes.filter((outcome) => outcome.status === status).length
  const failed = count('failed')
  return { done: count('done'), skipped: count('skipped'), failed, ok: failed === 0 }
}

/**
 * Logs one status line per track, then the totals.
 */
export function reportOutcomes(outcomes: readonly JobOutcome[]): SplitSummary {
  for (const outcome of outcomes) {
    const label = `track ${outcome.job.track.number}: ${outcome.job.output.relativePath}`
    switch (outcome.status) {
      case 'done':
        logger.info(`[ok] ${label}`)
        break
      case 'skipped':
        logger.info(`[skipped] ${label} (already exists)`)
        break
      case 'failed': {
        const { error } = outcome
        const tail = error instanceof EncodeError && error.stderrTail ? `\n${error.stderrTail}` : ''
        logger.error(`[${error.kind}] ${label}: ${error.message}${tail}`)
        break
      }
    }
  }

  const summary = summarize(outcomes)
  const skipped = summary.skipped ? `, ${summary.skipped} skipped` : ''
  const message = `${summary.done} succeeded, ${summary.failed} failed${skipped}`
  if (summary.ok) {
    logger.info(message)
  } else {
    logger.error(message)
  }
  return summary
}

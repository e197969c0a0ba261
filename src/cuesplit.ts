#!/usr/bin/env node
import { Command, InvalidArgumentError } from '@commander-js/extra-typings'
import { pathExists } from 'fs-extra'
import { readFileSync } from 'node:fs'
import { dirname, join, resolve } from 'node:path'
import { z } from 'zod'
import { loadConfig } from './config'
import { type CueSheet, withFileLengths } from './cue'
import { findCueFiles, readCueSheet } from './discover'
import { createFfmpegRunner, probeDuration } from './encoder'
import { ConfigError, errorMessage } from './errors'
import { logger, setLogLevel } from './logger'
import { createPresetTable, formatPresetList, getPreset } from './presets'
import {
  type EncodeJob,
  type EncoderConfig,
  type ExistingPolicy,
  planSplit,
  rawEncoder,
  reportOutcomes,
  runSplit,
} from './split'
import {
  DEFAULT_TEMPLATE,
  TEMPLATE_HELP,
  type Template,
  compileTemplate,
} from './template'
import { TimeCode } from './timecode'

function readVersion(): string {
  const packageJson = z
    .object({ version: z.string() })
    .safeParse(JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')))
  return packageJson.success ? packageJson.data.version : '0.0.0'
}

function parsePositiveInt(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('must be a positive integer')
  }
  return n
}

function parsePositiveNumber(value: string): number {
  const n = Number(value)
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('must be a positive number')
  }
  return n
}

const program = new Command()
  .name('cuesplit')
  .description(
    'Splits cuesheet + image files into separate tagged tracks.\nRequires an ffmpeg executable.'
  )
  .version(readVersion())
  .argument('[path]', 'path to a cuesheet file or a directory')
  .argument('[encoderArgs...]', 'encoding options passed to ffmpeg, given after --')
  .option('-j, --jobs <n>', 'maximum number of parallel ffmpeg invocations', parsePositiveInt)
  .option('--dry', 'do not split files; only check for errors and print the plan')
  .option('-f, --force', 'overwrite existing output files')
  .option('-s, --skip-existing', 'leave tracks that already exist untouched')
  .option('-t, --template <template>', 'template for output file names', DEFAULT_TEMPLATE)
  .option('-o, --out-dir <dir>', 'output directory; defaults to <cue dir>/split')
  .option('-p, --preset <name>', 'encoding preset (defaults to stream copy, or flac)')
  .option('--no-copy', 'always re-encode, even when the source could be copied')
  .option('-e, --ext <ext>', 'output extension for raw encoder arguments, without the dot')
  .option('--encoding <label>', 'character encoding of the cuesheets', 'utf-8')
  .option('--ffmpeg <path>', 'path to the ffmpeg executable')
  .option('--ffprobe <path>', 'path to the ffprobe executable')
  .option('--timeout <seconds>', 'kill an encoder running longer than this', parsePositiveNumber)
  .option('--template-help', 'print help for the template syntax')
  .option('--list-presets', 'show the available presets')

type Options = ReturnType<typeof program.opts>

function encoderConfig(options: Options, encoderArgs: string[]): EncoderConfig {
  const presets = createPresetTable()
  if (options.preset && encoderArgs.length > 0) {
    throw new ConfigError('--preset cannot be combined with raw encoder arguments')
  }
  if (options.preset) {
    return {
      kind: 'preset',
      preset: getPreset(presets, options.preset),
      copyWhenPossible: options.copy,
    }
  }
  if (encoderArgs.length > 0) {
    return rawEncoder(encoderArgs, options.ext)
  }
  if (options.ext) {
    throw new ConfigError('--ext is only valid together with raw encoder arguments')
  }
  return { kind: 'auto', fallback: getPreset(presets, 'flac') }
}

function existingPolicy(options: Options): ExistingPolicy {
  if (options.force && options.skipExisting) {
    throw new ConfigError('--force and --skip-existing cannot be combined')
  }
  return options.force ? 'overwrite' : options.skipExisting ? 'skip' : 'fail'
}

/**
 * Parses one cuesheet, measures its image files and plans its jobs.
 */
async function planCueFile(
  cueFile: string,
  options: Options,
  template: Template,
  encoder: EncoderConfig,
  existing: ExistingPolicy,
  ffprobe: string
): Promise<EncodeJob[]> {
  logger.info(`Parsing CUE file: ${cueFile}`)
  const parsed: CueSheet = await readCueSheet(cueFile, options.encoding)
  const cueDir = dirname(cueFile)

  const lengths = new Map<string, TimeCode>()
  for (const section of parsed.files) {
    const source = resolve(cueDir, section.file)
    if (!(await pathExists(source))) {
      throw new ConfigError(`file specified in ${cueFile} does not exist: ${source}`)
    }
    if (!lengths.has(section.file)) {
      lengths.set(section.file, TimeCode.fromSeconds(await probeDuration(source, ffprobe)))
    }
  }

  const sheet = withFileLengths(parsed, lengths)
  const jobs = planSplit(sheet, {
    template,
    encoder,
    cueDir,
    outDir: options.outDir ? resolve(options.outDir) : join(cueDir, 'split'),
    existing,
  })
  logger.info(`Found ${jobs.length} tracks in ${cueFile}`)
  return jobs
}

async function main(path: string | undefined, encoderArgs: string[], options: Options) {
  const config = loadConfig()
  setLogLevel(config.logLevel)

  if (options.templateHelp) {
    console.log(TEMPLATE_HELP)
    return
  }
  if (options.listPresets) {
    console.log(formatPresetList(createPresetTable()))
    return
  }
  if (!path) {
    throw new ConfigError('missing path to a cuesheet file or directory')
  }

  // Everything that can fail for the whole run is checked before encoding.
  const template = compileTemplate(options.template)
  const encoder = encoderConfig(options, encoderArgs)
  const existing = existingPolicy(options)

  const cueFiles = await findCueFiles(path)
  if (cueFiles.length === 0) {
    throw new ConfigError(`no .cue files found in ${path}`)
  }

  const jobs: EncodeJob[] = []
  const owners = new Map<string, string>()
  for (const cueFile of cueFiles) {
    for (const job of await planCueFile(
      cueFile,
      options,
      template,
      encoder,
      existing,
      options.ffprobe ?? config.ffprobe
    )) {
      const owner = owners.get(job.output.path)
      if (owner) {
        throw new ConfigError(
          `tracks from ${owner} and ${cueFile} have the same file name: ${job.output.path}\nhelp: specify a different file naming scheme with the --template option`
        )
      }
      owners.set(job.output.path, cueFile)
      jobs.push(job)
    }
  }

  if (options.dry) {
    for (const job of jobs) {
      logger.info(
        `track ${job.track.number}: ${job.start} +${job.duration} -> ${job.output.path}`
      )
    }
    return
  }

  const controller = new AbortController()
  const onInterrupt = () => {
    logger.warn('Interrupted; stopping encoders')
    controller.abort()
  }
  process.once('SIGINT', onInterrupt)

  try {
    const outcomes = await runSplit(jobs, {
      runner: createFfmpegRunner(options.ffmpeg ?? config.ffmpeg),
      concurrency: options.jobs ?? config.jobs,
      signal: controller.signal,
      timeoutMs: options.timeout === undefined ? undefined : options.timeout * 1000,
    })
    const summary = reportOutcomes(outcomes)
    if (!summary.ok) {
      process.exitCode = 1
    }
  } finally {
    process.off('SIGINT', onInterrupt)
  }
}

program.action(async (path, encoderArgs, options) => {
  try {
    await main(path, encoderArgs, options)
  } catch (error) {
    logger.error(`error: ${errorMessage(error)}`)
    process.exitCode = 1
  }
})

program.parseAsync().catch((error: unknown) => {
  logger.error(`error: ${errorMessage(error)}`)
  process.exitCode = 1
})

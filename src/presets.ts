import { ConfigError } from './errors'

export interface Preset {
  readonly name: string
  /** ffmpeg codec/container arguments */
  readonly args: readonly string[]
  /** output extension without the dot */
  readonly ext: string
}

const opus = (bitrate: string) => ['-f', 'oga', '-c:a', 'libopus', '-b:a', bitrate]
const mp3 = (bitrate: string) => ['-f', 'mp3', '-c:a', 'libmp3lame', '-b:a', bitrate]
const aac = (bitrate: string) => ['-f', 'mp4', '-c:a', 'libfdk_aac', '-b:a', bitrate]
const vorbis = (quality: string) => ['-f', 'oga', '-c:a', 'libvorbis', '-q', quality]

const TABLE: ReadonlyArray<[string, string[], string]> = [
  ['wav', ['-f', 'wav'], 'wav'],
  ['flac', ['-f', 'flac', '-c:a', 'flac', '-compression_level', '8'], 'flac'],
  ['flac-comp10', ['-f', 'flac', '-c:a', 'flac', '-compression_level', '10'], 'flac'],
  ['libopus-low', opus('48k'), 'ogg'],
  ['libopus', opus('128k'), 'ogg'],
  ['libopus-high', opus('192k'), 'ogg'],
  ['libopus-ultra', opus('256k'), 'ogg'],
  ['libmp3lame-low', mp3('64k'), 'mp3'],
  ['libmp3lame', mp3('128k'), 'mp3'],
  ['libmp3lame-high', mp3('224k'), 'mp3'],
  ['libmp3lame-ultra', mp3('320k'), 'mp3'],
  ['libfdk-aac-low', aac('64k'), 'm4a'],
  ['libfdk-aac', aac('128k'), 'm4a'],
  ['libfdk-aac-high', aac('192k'), 'm4a'],
  ['libfdk-aac-ultra', [...aac('256k'), '-cutoff', '18000'], 'm4a'],
  ['libvorbis-low', vorbis('2.0'), 'ogg'],
  ['libvorbis', vorbis('5.0'), 'ogg'],
  ['libvorbis-high', vorbis('6.5'), 'ogg'],
  ['libvorbis-ultra', vorbis('8.0'), 'ogg'],
]

export type PresetTable = ReadonlyMap<string, Preset>

/**
 * Builds the preset lookup once; callers pass it along explicitly.
 */
export function createPresetTable(): PresetTable {
  return new Map(
    TABLE.map(([name, args, ext]) => [
      name,
      Object.freeze({ name, args: Object.freeze(args), ext }),
    ])
  )
}

export function getPreset(table: PresetTable, name: string): Preset {
  const preset = table.get(name.toLowerCase())
  if (!preset) {
    throw new ConfigError(
      `unknown preset "${name}"; run with --list-presets to see the available ones`
    )
  }
  return preset
}

export function formatPresetList(table: PresetTable): string {
  return [...table.values()]
    .map((preset) => `${preset.name}: ${preset.args.join(' ')}`)
    .join('\n')
}

/** Containers ffmpeg can stream-copy into without re-encoding. */
export const COPYABLE_EXTENSIONS: readonly string[] = [
  'wav',
  'flac',
  'mp3',
  'aac',
  'm4a',
  'opus',
  'ogg',
]

import { TextDecoder } from 'node:util'
import { ConfigError, ParseError } from './errors'
import { TimeCode } from './timecode'

export type Rems = ReadonlyMap<string, string>

/**
 * A track parsed from a CUE file. Performer and songwriter are already
 * inherited from the enclosing FILE section or the sheet.
 */
export interface Track {
  readonly number: number
  readonly title?: string
  readonly performer?: string
  readonly songwriter?: string
  readonly isrc?: string
  readonly rems: Rems
  /** INDEX 00, when present. The audio before `start` belongs to the previous track. */
  readonly pregap?: TimeCode
  /** INDEX 01 */
  readonly start: TimeCode
  /** Unresolved for the last track of a section until the file length is known. */
  readonly end?: TimeCode
  /** 1-based line of the TRACK command */
  readonly line: number
}

/**
 * One FILE entry and the tracks it owns.
 */
export interface FileSection {
  readonly file: string
  readonly fileType?: string
  readonly title?: string
  readonly performer?: string
  readonly songwriter?: string
  readonly rems: Rems
  readonly tracks: readonly Track[]
}

export interface CueSheet {
  readonly title?: string
  readonly performer?: string
  readonly songwriter?: string
  readonly catalog?: string
  readonly genre?: string
  readonly date?: string
  readonly rems: Rems
  readonly files: readonly FileSection[]
}

export type Tag = readonly [key: string, value: string]

/**
 * Decodes raw cuesheet bytes. `encoding` is any WHATWG label
 * (`utf-8`, `windows-1251`, `shift_jis`, ...); a UTF-8 BOM is dropped.
 */
export function decodeCue(data: Uint8Array, encoding = 'utf-8'): string {
  let decoder: TextDecoder
  try {
    decoder = new TextDecoder(encoding)
  } catch (error) {
    throw new ConfigError(`unsupported cuesheet encoding: ${encoding}`, {
      cause: error,
    })
  }
  return decoder.decode(data)
}

// ---------------------------------------------------------------------------
// Line-level helpers

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r' }

type Read<T> = { value: T; rest: string }

/** A problem on the current line; `parseCue` adds the line number. */
class LineError extends Error {}

/**
 * Reads one word or one double-quoted string from the start of `input`.
 * Returns an error message when a quote is left open.
 */
function readString(input: string): Read<string> | string {
  const text = input.trimStart()
  if (!text.startsWith('"')) {
    const end = text.search(/\s/)
    return end === -1
      ? { value: text, rest: '' }
      : { value: text.slice(0, end), rest: text.slice(end) }
  }

  let value = ''
  for (let i = 1; i < text.length; i++) {
    const c = text[i]
    if (c === '"') {
      return { value, rest: text.slice(i + 1) }
    }
    if (c === '\\' && i + 1 < text.length) {
      i++
      value += ESCAPES[text[i]] ?? text[i]
    } else {
      value += c
    }
  }
  return 'unterminated double-quoted string'
}

/**
 * Reads the remainder of a line as a single value: either one quoted
 * string, or everything up to the end of the line, trimmed.
 */
function readValue(input: string): string {
  const text = input.trim()
  if (!text) {
    throw new LineError('missing value')
  }
  if (!text.startsWith('"')) {
    return text
  }
  const read = readString(text)
  if (typeof read === 'string') {
    throw new LineError(read)
  }
  if (read.rest.trim()) {
    throw new LineError(`unexpected text after quoted value: ${read.rest.trim()}`)
  }
  return read.value
}

function readRem(input: string): Tag {
  const key = readString(input)
  if (typeof key === 'string') {
    throw new LineError(key)
  }
  if (!key.value) {
    throw new LineError('REM requires a key')
  }
  const value = key.rest.trim() ? readValue(key.rest) : ''
  return [key.value.toUpperCase(), value]
}

function readNumber(input: string, what: string): Read<number> {
  const word = readString(input)
  if (typeof word === 'string') {
    throw new LineError(word)
  }
  if (!/^\d+$/.test(word.value)) {
    throw new LineError(`invalid ${what}: ${word.value || '(missing)'}`)
  }
  return { value: Number(word.value), rest: word.rest }
}

function readTimeCode(input: string): TimeCode {
  const time = TimeCode.parse(readValue(input))
  if (typeof time === 'string') {
    throw new LineError(time)
  }
  return time
}

// ---------------------------------------------------------------------------
// Parser

interface TrackDraft {
  number: number
  line: number
  title?: string
  performer?: string
  songwriter?: string
  isrc?: string
  rems: Map<string, string>
  lastIndex?: { number: number; time: TimeCode }
  pregap?: TimeCode
  start?: TimeCode
}

interface SectionDraft {
  file: string
  fileType?: string
  line: number
  title?: string
  performer?: string
  songwriter?: string
  rems: Map<string, string>
  tracks: Track[]
}

interface SheetDraft {
  title?: string
  performer?: string
  songwriter?: string
  catalog?: string
  genre?: string
  date?: string
  rems: Map<string, string>
  files: FileSection[]
}

const SHEET_ONLY = new Set(['CATALOG', 'CDTEXTFILE', 'GENRE', 'DATE'])

/**
 * Parses cuesheet text into a `CueSheet`. Track ends are resolved from the
 * next track's start; the last track of each FILE section is left open (see
 * `withFileLengths`). Stops at the first structural error with a
 * `ParseError` naming the line.
 */
export function parseCue(text: string): CueSheet {
  const lines = text.replace(/^\uFEFF/, '').split(/\r\n|\r|\n/)

  const sheet: SheetDraft = { rems: new Map(), files: [] }
  let section: SectionDraft | undefined
  let track: TrackDraft | undefined
  let lastNumber = 0

  const closeTrack = () => {
    if (!track || !section) return
    const { start } = track
    if (!start) {
      throw new ParseError(
        track.line,
        `TRACK ${track.number} has no INDEX 01`,
        lines[track.line - 1].trim()
      )
    }
    section.tracks.push(
      Object.freeze({
        number: track.number,
        title: track.title ?? section.title,
        performer: track.performer ?? section.performer ?? sheet.performer,
        songwriter: track.songwriter ?? section.songwriter ?? sheet.songwriter,
        isrc: track.isrc,
        rems: track.rems,
        pregap: track.pregap,
        start,
        line: track.line,
      })
    )
    track = undefined
  }

  const closeSection = () => {
    closeTrack()
    if (!section) return
    if (section.tracks.length === 0) {
      throw new ParseError(
        section.line,
        `FILE "${section.file}" declares no tracks`,
        lines[section.line - 1].trim()
      )
    }
    sheet.files.push(
      Object.freeze({
        file: section.file,
        fileType: section.fileType,
        title: section.title,
        performer: section.performer,
        songwriter: section.songwriter,
        rems: section.rems,
        tracks: Object.freeze(section.tracks),
      })
    )
    section = undefined
  }

  for (let i = 0; i < lines.length; i++) {
    const ln = i + 1
    const raw = lines[i].trim()
    if (!raw) continue

    const split = raw.search(/\s/)
    const command = (split === -1 ? raw : raw.slice(0, split)).toUpperCase()
    const args = split === -1 ? '' : raw.slice(split)

    try {
      if (section && SHEET_ONLY.has(command)) {
        throw new LineError(`${command} must appear before the first FILE`)
      }

      switch (command) {
        case 'REM': {
          const [key, value] = readRem(args)
          if (track) {
            track.rems.set(key, value)
          } else if (section) {
            section.rems.set(key, value)
          } else {
            sheet.rems.set(key, value)
            if (key === 'DATE') sheet.date = value
            if (key === 'GENRE') sheet.genre = value
          }
          break
        }
        case 'TITLE':
        case 'PERFORMER':
        case 'SONGWRITER': {
          const value = readValue(args)
          const field =
            command === 'TITLE'
              ? 'title'
              : command === 'PERFORMER'
                ? 'performer'
                : 'songwriter'
          const target = track ?? section ?? sheet
          target[field] = value
          break
        }
        case 'CATALOG':
          sheet.catalog = readValue(args)
          break
        case 'GENRE':
          sheet.genre = readValue(args)
          break
        case 'DATE':
          sheet.date = readValue(args)
          break
        case 'CDTEXTFILE':
          readValue(args)
          break
        case 'FILE': {
          closeSection()
          const name = readString(args)
          if (typeof name === 'string') throw new LineError(name)
          if (!name.value) throw new LineError('FILE requires a file name')
          const fileType = name.rest.trim()
          section = {
            file: name.value,
            fileType: fileType || undefined,
            line: ln,
            rems: new Map(),
            tracks: [],
          }
          break
        }
        case 'TRACK': {
          if (!section) throw new LineError('TRACK before any FILE')
          closeTrack()
          const { value: number } = readNumber(args, 'track number')
          if (number < 1) throw new LineError('track numbers start at 1')
          if (number === lastNumber) {
            throw new LineError(`duplicate track number ${number}`)
          }
          if (number < lastNumber) {
            throw new LineError(`track number ${number} follows track ${lastNumber}; track numbers must increase`)
          }
          lastNumber = number
          track = { number, line: ln, rems: new Map() }
          break
        }
        case 'INDEX': {
          if (!section) throw new LineError('INDEX before any FILE')
          if (!track) throw new LineError('INDEX outside of a TRACK')
          const { value: number, rest } = readNumber(args, 'index number')
          if (number > 99) throw new LineError(`index number ${number} out of range`)
          const time = readTimeCode(rest)
          const last = track.lastIndex
          if (last && number <= last.number) {
            throw new LineError(`INDEX ${pad2(number)} follows INDEX ${pad2(last.number)}; index numbers must increase`)
          }
          if (last && time.compare(last.time) < 0) {
            throw new LineError(`INDEX ${pad2(number)} at ${time} is before INDEX ${pad2(last.number)} at ${last.time}`)
          }
          if (number === 1) {
            const previous = section.tracks.at(-1)
            if (previous && time.compare(previous.start) < 0) {
              throw new LineError(`INDEX 01 at ${time} is before the start of track ${previous.number} at ${previous.start}`)
            }
            track.start = time
          } else if (number === 0) {
            track.pregap = time
          }
          track.lastIndex = { number, time }
          break
        }
        case 'ISRC':
        case 'FLAGS':
        case 'PREGAP':
        case 'POSTGAP': {
          if (!track) throw new LineError(`${command} outside of a TRACK`)
          if (command === 'ISRC') {
            track.isrc = readValue(args)
          } else if (command !== 'FLAGS') {
            readTimeCode(args)
          }
          break
        }
        default:
          throw new LineError(`unknown command ${command}`)
      }
    } catch (error) {
      if (error instanceof LineError) {
        throw new ParseError(ln, error.message, raw)
      }
      throw error
    }
  }

  closeSection()

  if (sheet.files.length === 0) {
    throw new ParseError(Math.max(1, lines.length), 'cuesheet has no FILE')
  }

  return resolveEnds(
    Object.freeze({
      title: sheet.title,
      performer: sheet.performer,
      songwriter: sheet.songwriter,
      catalog: sheet.catalog,
      genre: sheet.genre,
      date: sheet.date,
      rems: sheet.rems,
      files: Object.freeze(sheet.files),
    })
  )
}

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

/**
 * Returns a new sheet where each track ends where the next track of the
 * same FILE section starts. The last track of a section keeps whatever end
 * it already has.
 */
export function resolveEnds(sheet: CueSheet): CueSheet {
  return mapSections(sheet, (section) =>
    section.tracks.map((track, i) => {
      const next = section.tracks[i + 1]
      return next ? Object.freeze({ ...track, end: next.start }) : track
    })
  )
}

/**
 * Closes the last track of every section with the length of its audio
 * file, keyed by the FILE name as written in the sheet.
 */
export function withFileLengths(
  sheet: CueSheet,
  lengths: ReadonlyMap<string, TimeCode>
): CueSheet {
  return mapSections(sheet, (section) => {
    const length = lengths.get(section.file)
    if (!length) {
      return section.tracks
    }
    return section.tracks.map((track, i) => {
      if (i < section.tracks.length - 1) return track
      if (length.compare(track.start) < 0) {
        throw new ConfigError(
          `"${section.file}" is ${length} long but track ${track.number} starts at ${track.start}`
        )
      }
      return Object.freeze({ ...track, end: length })
    })
  })
}

function mapSections(
  sheet: CueSheet,
  mapTracks: (section: FileSection) => readonly Track[]
): CueSheet {
  return Object.freeze({
    ...sheet,
    files: Object.freeze(
      sheet.files.map((section) =>
        Object.freeze({
          ...section,
          tracks: Object.freeze(mapTracks(section)),
        })
      )
    ),
  })
}

export function allTracks(sheet: CueSheet): Track[] {
  return sheet.files.flatMap((section) => section.tracks)
}

export function maxTrackNumber(sheet: CueSheet): number {
  return allTracks(sheet).reduce((max, t) => Math.max(max, t.number), 0)
}

/**
 * Extracts a year from a DATE value such as `1999`, `1999-05-01` or
 * `01/05/1999`: the longest numeric part.
 */
export function albumYear(date: string | undefined): string | undefined {
  if (!date) return undefined
  const longest = date
    .trim()
    .split(/[-./\\]/)
    .reduce((best, part) => (part.length > best.length ? part : best), '')
  return /^\d{1,4}$/.test(longest) ? longest : undefined
}

/**
 * The tags written into a track's output file. REM entries come first
 * (sheet, then section, then track); later values replace earlier ones with
 * the same key.
 */
export function trackMetadata(
  sheet: CueSheet,
  section: FileSection,
  track: Track
): Tag[] {
  const tags = new Map<string, Tag>()
  const put = (key: string, value: string | undefined) => {
    const v = value?.trim()
    if (!key || !v) return
    tags.set(key.toUpperCase(), [key, v])
  }

  for (const rems of [sheet.rems, section.rems, track.rems]) {
    for (const [key, value] of rems) put(key, value)
  }

  put('ARTIST', track.performer)
  put('PERFORMER', track.performer)
  put('ALBUM_ARTIST', section.performer ?? sheet.performer)
  put('ALBUM', section.title ?? sheet.title)
  put('TITLE', track.title)
  put('SONGWRITER', track.songwriter)
  put('GENRE', sheet.genre)
  put('DATE', sheet.date)
  put('ISRC', track.isrc)
  put('TRACKNUMBER', String(track.number))
  put('TRACKTOTAL', String(allTracks(sheet).length))

  return [...tags.values()]
}

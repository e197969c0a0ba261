import { TemplateError } from './errors'

export const PLACEHOLDERS = [
  'artist',
  'album',
  'title',
  'year',
  'genre',
  'no',
  'ext',
  'dir-name',
] as const

export type Placeholder = (typeof PLACEHOLDERS)[number]

type Token =
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'field'; readonly name: Placeholder }

/**
 * A validated naming template, e.g. `<artist>/<album>/<no>. <title>.<ext>`.
 */
export interface Template {
  readonly source: string
  readonly tokens: readonly Token[]
}

/**
 * Values available to a template. Absent fields render as empty text.
 */
export type TemplateFields = {
  readonly [K in Exclude<Placeholder, 'no' | 'ext'>]?: string
} & {
  readonly no: number
  readonly ext: string
}

export const DEFAULT_TEMPLATE = '<year> - <album>/<no>. <title>.<ext>'

export const TEMPLATE_HELP = `\
Templates control the names of the generated files.
Variables inside angle brackets are replaced with values; a "/" starts a
new directory level.
Allowed variables:
  - <artist>: Track performer
  - <album>: Album title
  - <title>: Track title
  - <year>: Release year of the album
  - <genre>: Album genre
  - <no>: Track number, zero-padded to the width of the highest number
  - <dir-name>: Name of the directory containing the .cue file
  - <ext>: File extension without the leading dot

Any other variable is an error. Default: ${DEFAULT_TEMPLATE}`

function isPlaceholder(name: string): name is Placeholder {
  return (PLACEHOLDERS as readonly string[]).includes(name)
}

/**
 * Tokenizes and validates a template once, before any track is rendered.
 * A `<` without a closing `>` is kept as literal text.
 */
export function compileTemplate(source: string): Template {
  if (!source.trim()) {
    throw new TemplateError('template is empty')
  }
  if (source.startsWith('/') || /^[A-Za-z]:/.test(source)) {
    throw new TemplateError(
      `template must be a relative path: ${source}`
    )
  }
  if (source.split('/').some((segment) => segment.trim() === '..')) {
    throw new TemplateError(`template must not contain "..": ${source}`)
  }

  const tokens: Token[] = []
  let i = 0
  while (i < source.length) {
    const open = source.indexOf('<', i)
    const close = open === -1 ? -1 : source.indexOf('>', open + 1)
    if (open === -1 || close === -1) {
      tokens.push({ kind: 'literal', text: source.slice(i) })
      break
    }
    if (open > i) {
      tokens.push({ kind: 'literal', text: source.slice(i, open) })
    }
    const name = source.slice(open + 1, close).toLowerCase()
    if (!isPlaceholder(name)) {
      throw new TemplateError(
        `unrecognized template variable: <${source.slice(open + 1, close)}>\nrun with --template-help for usage`
      )
    }
    tokens.push({ kind: 'field', name })
    i = close + 1
  }

  return Object.freeze({ source, tokens: Object.freeze(tokens) })
}

export function usesPlaceholder(template: Template, name: Placeholder) {
  return template.tokens.some(
    (token) => token.kind === 'field' && token.name === name
  )
}

const ILLEGAL_IN_VALUE = /[\\/:*?"<>|\u0000-\u001f]/g
const ILLEGAL_IN_SEGMENT = /[\\:*?"<>|\u0000-\u001f]/g

/**
 * Makes a metadata value safe to embed in a single path segment.
 */
export function sanitizeValue(value: string): string {
  return value.replace(ILLEGAL_IN_VALUE, '_')
}

function sanitizeSegment(segment: string): string {
  const cleaned = segment.replace(ILLEGAL_IN_SEGMENT, '_').replace(/[\s.]+$/, '')
  return cleaned || '_'
}

/**
 * Renders a relative, `/`-separated path. Pure: the same template and
 * fields always produce the same path. `trackNumberWidth` is the digit
 * count of the highest track number in the sheet.
 */
export function renderTemplate(
  template: Template,
  fields: TemplateFields,
  trackNumberWidth = 1
): string {
  const rendered = template.tokens
    .map((token) => {
      if (token.kind === 'literal') {
        return token.text
      }
      if (token.name === 'no') {
        return String(fields.no).padStart(trackNumberWidth, '0')
      }
      return sanitizeValue(fields[token.name] ?? '')
    })
    .join('')

  return rendered.split('/').map(sanitizeSegment).join('/')
}

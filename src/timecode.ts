/** Audio CD frames per second; the finest position a cuesheet can address. */
export const FRAMES_PER_SECOND = 75

const TIMECODE_PATTERN = /^(\d+):(\d{1,2}):(\d{1,2})$/

/**
 * An exact position or length in CD frames. All arithmetic stays in
 * integer frames so offsets never drift, however many tracks an image holds.
 */
export class TimeCode {
  static readonly ZERO = new TimeCode(0)

  private constructor(readonly frames: number) {}

  static fromFrames(frames: number): TimeCode {
    if (!Number.isSafeInteger(frames) || frames < 0) {
      throw new RangeError(`invalid frame count: ${frames}`)
    }
    return frames === 0 ? TimeCode.ZERO : new TimeCode(frames)
  }

  /**
   * Rounds a length in seconds (as reported by ffprobe) to the nearest frame.
   */
  static fromSeconds(seconds: number): TimeCode {
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new RangeError(`invalid number of seconds: ${seconds}`)
    }
    return TimeCode.fromFrames(Math.round(seconds * FRAMES_PER_SECOND))
  }

  /**
   * Parses `MM:SS:FF`. Minutes may run past 99; seconds must be below 60 and
   * frames below 75. Returns an error message instead of throwing so the
   * parser can attach a line number.
   */
  static parse(text: string): TimeCode | string {
    const match = TIMECODE_PATTERN.exec(text.trim())
    if (!match) {
      return `malformed timecode "${text}", expected MM:SS:FF`
    }
    const [, min, sec, frame] = match
    const minutes = Number(min)
    const seconds = Number(sec)
    const frames = Number(frame)
    if (seconds >= 60) {
      return `seconds out of range in timecode "${text}"`
    }
    if (frames >= FRAMES_PER_SECOND) {
      return `frames out of range in timecode "${text}" (must be below ${FRAMES_PER_SECOND})`
    }
    const total = (minutes * 60 + seconds) * FRAMES_PER_SECOND + frames
    if (!Number.isSafeInteger(total)) {
      return `timecode "${text}" is too large`
    }
    return TimeCode.fromFrames(total)
  }

  add(other: TimeCode): TimeCode {
    return TimeCode.fromFrames(this.frames + other.frames)
  }

  /** Throws when `other` lies after this position. */
  subtract(other: TimeCode): TimeCode {
    if (other.frames > this.frames) {
      throw new RangeError(`cannot subtract ${other} from ${this}`)
    }
    return TimeCode.fromFrames(this.frames - other.frames)
  }

  compare(other: TimeCode): number {
    return this.frames - other.frames
  }

  equals(other: TimeCode): boolean {
    return this.frames === other.frames
  }

  toSeconds(): number {
    return this.frames / FRAMES_PER_SECOND
  }

  /**
   * Decimal seconds for ffmpeg's `-ss`/`-t`, computed in integer
   * microseconds: `210`, `0.013333`, `61.5`.
   */
  toEncoderSeconds(): string {
    const whole = Math.floor(this.frames / FRAMES_PER_SECOND)
    const rest = this.frames % FRAMES_PER_SECOND
    if (rest === 0) {
      return String(whole)
    }
    const micros = Math.round((rest * 1_000_000) / FRAMES_PER_SECOND)
    const fraction = String(micros).padStart(6, '0').replace(/0+$/, '')
    return `${whole}.${fraction}`
  }

  /** `MM:SS:FF`, the form cuesheets use. */
  toString(): string {
    const minutes = Math.floor(this.frames / (60 * FRAMES_PER_SECOND))
    const seconds = Math.floor(this.frames / FRAMES_PER_SECOND) % 60
    const frames = this.frames % FRAMES_PER_SECOND
    const pad = (n: number) => String(n).padStart(2, '0')
    return `${pad(minutes)}:${pad(seconds)}:${pad(frames)}`
  }
}

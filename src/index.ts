export * from './cue'
export * from './encoder'
export * from './errors'
export * from './pool'
export * from './presets'
export * from './split'
export * from './template'
export * from './timecode'
export { findCueFiles, readCueSheet } from './discover'
export { logger, setLogLevel } from './logger'

export * from './parser'
export {ArchiveError, extractEntry, listEntries} from './lib/archive'
export type {ArchiveEntry, ArchiveErrorCode} from './lib/archive'
export {detectFileType} from './lib/fileTypes'
export type {FileType} from './lib/fileTypes'

export { ASTParser } from './ast/index'
export type { ClassEntity, ClassMemberEntity, ParseResult } from './ast/index'

export { DEFAULT_EXCLUDE, DEFAULT_INCLUDE, discoverFiles, matchesPattern } from './files'
export type { DiscoverFilesOptions } from './files'

export { createLogger, logger, LogLevels, setLogLevel } from './logger'

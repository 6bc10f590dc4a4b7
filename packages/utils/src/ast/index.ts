export { LANGUAGE_CONFIGS } from './languages'
export { ASTParser } from './parser'
export type {
  Accessibility,
  ClassEntity,
  ClassMemberEntity,
  ClassMemberKind,
  LanguageConfig,
  ParseResult,
  SourceSpan,
  SupportedLanguage,
} from './types'

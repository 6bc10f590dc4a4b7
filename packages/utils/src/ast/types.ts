/**
 * Kind of a class member as written in source
 */
export type ClassMemberKind = 'field' | 'constructor' | 'method' | 'getter' | 'setter'

export type Accessibility = 'public' | 'private' | 'protected'

/**
 * Location of a node. Lines are 1-indexed, columns 0-indexed.
 */
export interface SourceSpan {
  startLine: number
  startColumn: number
  endLine: number
  endColumn: number
}

/**
 * One member of a class body
 */
export interface ClassMemberEntity extends SourceSpan {
  kind: ClassMemberKind
  /** Member name as written (`#x` for private names). Empty for constructors. */
  name: string
  /** Explicit accessibility modifier, if any */
  accessibility?: Accessibility
  /** Declared with an ECMAScript private name (`#x`) */
  hasPrivateName: boolean
  /** Decorator names in source order, without `@` or arguments */
  decorators: string[]
}

/**
 * A class declaration or class expression with its members in source order
 */
export interface ClassEntity extends SourceSpan {
  /** Class name, `<anonymous>` for unnamed class expressions */
  name: string
  members: ClassMemberEntity[]
}

/**
 * Result of parsing a file
 */
export interface ParseResult {
  /** Detected language */
  language: string
  /** Classes in document order (outer before nested) */
  classes: ClassEntity[]
  /** Parsing errors */
  errors: string[]
}

/**
 * Supported language names
 */
export type SupportedLanguage = 'typescript' | 'tsx' | 'javascript'

/**
 * Language configurations with parser and settings
 */
export interface LanguageConfig {
  parser: unknown
  /** Node types that open a class body */
  classTypes: readonly string[]
}

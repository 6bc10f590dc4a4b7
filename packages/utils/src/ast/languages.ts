import type { LanguageConfig, SupportedLanguage } from './types'
import { createRequire } from 'node:module'

const requireNative = createRequire(import.meta.url)

interface TypeScriptGrammars {
  typescript: unknown
  tsx: unknown
}

// Tree-sitter grammars are native modules; parsing degrades to an empty result without them
let grammars: TypeScriptGrammars | undefined
try {
  grammars = requireNative('tree-sitter-typescript')
}
catch (err) {
  const code = (err as NodeJS.ErrnoException).code
  if (code !== 'MODULE_NOT_FOUND' && code !== 'ERR_MODULE_NOT_FOUND') {
    throw err
  }
}

/**
 * Class node types shared by the TypeScript and TSX grammars
 */
const CLASS_TYPES = ['class_declaration', 'abstract_class_declaration', 'class']

function configFor(parser: unknown): LanguageConfig | undefined {
  return parser ? { parser, classTypes: CLASS_TYPES } : undefined
}

/**
 * Language configurations.
 * JavaScript goes through the TSX grammar, which accepts JSX and plain JS.
 */
export const LANGUAGE_CONFIGS: Record<SupportedLanguage, LanguageConfig | undefined> = {
  typescript: configFor(grammars?.typescript),
  tsx: configFor(grammars?.tsx),
  javascript: configFor(grammars?.tsx),
}

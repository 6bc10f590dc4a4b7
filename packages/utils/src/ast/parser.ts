import type { default as Parser } from 'tree-sitter'
import type {
  Accessibility,
  ClassEntity,
  ClassMemberEntity,
  ClassMemberKind,
  LanguageConfig,
  ParseResult,
  SourceSpan,
  SupportedLanguage,
} from './types'
import { readFile } from 'node:fs/promises'
import { createRequire } from 'node:module'
import { LANGUAGE_CONFIGS } from './languages'

const requireNative = createRequire(import.meta.url)

// Try to load tree-sitter at runtime; the native binding may be missing
let ParserClass: (new () => Parser) | undefined
try {
  ParserClass = requireNative('tree-sitter')
}
catch {
  // tree-sitter native module not available
}

const ACCESSIBILITY: ReadonlySet<string> = new Set(['public', 'private', 'protected'])

function isAccessibility(text: string): text is Accessibility {
  return ACCESSIBILITY.has(text)
}

function spanOf(start: Parser.SyntaxNode, end: Parser.SyntaxNode): SourceSpan {
  return {
    startLine: start.startPosition.row + 1,
    startColumn: start.startPosition.column,
    endLine: end.endPosition.row + 1,
    endColumn: end.endPosition.column,
  }
}

/**
 * AST Parser using tree-sitter
 *
 * Extracts class bodies and their members, in source order, for ordering checks.
 */
export class ASTParser {
  private readonly parser: Parser | undefined

  constructor() {
    if (ParserClass) {
      this.parser = new ParserClass()
    }
  }

  /**
   * Check if tree-sitter is available and AST parsing is supported.
   */
  isAvailable(): boolean {
    return this.parser !== undefined
  }

  isLanguageSupported(language: string): boolean {
    return this.isSupportedLanguage(language)
  }

  private isSupportedLanguage(language: string): language is SupportedLanguage {
    return language in LANGUAGE_CONFIGS
  }

  /**
   * Detect language from file extension
   */
  detectLanguage(filePath: string): string {
    const ext = filePath.split('.').pop()?.toLowerCase()
    const langMap: Record<string, string> = {
      ts: 'typescript',
      mts: 'typescript',
      cts: 'typescript',
      tsx: 'tsx',
      js: 'javascript',
      jsx: 'javascript',
      mjs: 'javascript',
      cjs: 'javascript',
    }
    return langMap[ext ?? ''] ?? 'unknown'
  }

  /**
   * Parse source text and collect every class with its members
   */
  async parse(source: string, language: string): Promise<ParseResult> {
    const result: ParseResult = {
      language,
      classes: [],
      errors: [],
    }

    if (!this.parser) {
      return result
    }

    if (!source.trim()) {
      return result
    }

    if (!this.isSupportedLanguage(language)) {
      result.errors.push(`Unsupported language: ${language}`)
      return result
    }
    const config = LANGUAGE_CONFIGS[language]
    if (!config) {
      result.errors.push(`Grammar not available: ${language}`)
      return result
    }

    try {
      this.parser.setLanguage(
        config.parser as Parameters<typeof this.parser.setLanguage>[0],
      )

      const tree = this.parser.parse(source)

      if (!tree.rootNode) {
        result.errors.push('Failed to parse source code')
        return result
      }

      if (tree.rootNode.hasError) {
        result.errors.push('Syntax error in source code')
      }

      this.collectClasses(tree.rootNode, config, result.classes)
    }
    catch (error) {
      result.errors.push(`Parse error: ${error instanceof Error ? error.message : String(error)}`)
    }

    return result
  }

  /**
   * Parse a file from path
   */
  async parseFile(filePath: string): Promise<ParseResult> {
    const source = await readFile(filePath, 'utf-8')
    const language = this.detectLanguage(filePath)
    return this.parse(source, language)
  }

  /**
   * Walk the tree in document order; nested classes follow their outer class
   */
  private collectClasses(
    node: Parser.SyntaxNode,
    config: LanguageConfig,
    classes: ClassEntity[],
  ): void {
    if (config.classTypes.includes(node.type)) {
      classes.push(this.extractClass(node))
    }

    for (const child of node.namedChildren) {
      this.collectClasses(child, config, classes)
    }
  }

  private extractClass(node: Parser.SyntaxNode): ClassEntity {
    const body = node.childForFieldName('body')
    return {
      name: node.childForFieldName('name')?.text ?? '<anonymous>',
      ...spanOf(node, node),
      members: body ? this.extractMembers(body) : [],
    }
  }

  /**
   * Method decorators are siblings of the method inside the class body, so
   * decorators and leading comments are buffered until the next member.
   * A comment on the same line as the previous member belongs to that member.
   */
  private extractMembers(body: Parser.SyntaxNode): ClassMemberEntity[] {
    const members: ClassMemberEntity[] = []
    let leading: Parser.SyntaxNode[] = []
    let lastMemberEndRow = -1

    for (const child of body.namedChildren) {
      if (child.type === 'comment') {
        if (child.startPosition.row > lastMemberEndRow) {
          leading.push(child)
        }
        continue
      }

      if (child.type === 'decorator') {
        leading.push(child)
        continue
      }

      const kind = this.memberKind(child)
      if (kind) {
        members.push(this.extractMember(child, kind, leading))
        lastMemberEndRow = child.endPosition.row
      }
      leading = []
    }

    return members
  }

  private memberKind(node: Parser.SyntaxNode): ClassMemberKind | null {
    switch (node.type) {
      case 'public_field_definition':
        return 'field'
      case 'method_definition':
      case 'abstract_method_signature':
        break
      default:
        // overload signatures, index signatures and static blocks
        return null
    }

    if (node.type === 'method_definition' && this.isConstructorName(node.childForFieldName('name'))) {
      return 'constructor'
    }
    if (node.children.some(child => child.type === 'get')) {
      return 'getter'
    }
    if (node.children.some(child => child.type === 'set')) {
      return 'setter'
    }
    return 'method'
  }

  /**
   * `constructor() {}` and `'constructor'() {}` both declare the constructor
   */
  private isConstructorName(nameNode: Parser.SyntaxNode | null): boolean {
    if (!nameNode)
      return false
    if (nameNode.type === 'string') {
      return nameNode.text.slice(1, -1) === 'constructor'
    }
    return nameNode.text === 'constructor'
  }

  private extractMember(
    node: Parser.SyntaxNode,
    kind: ClassMemberKind,
    leading: Parser.SyntaxNode[],
  ): ClassMemberEntity {
    const nameNode = node.childForFieldName('name')
    const decoratorNodes = [
      ...leading.filter(n => n.type === 'decorator'),
      ...node.namedChildren.filter(n => n.type === 'decorator'),
    ]

    const member: ClassMemberEntity = {
      kind,
      name: kind === 'constructor' ? '' : nameNode?.text ?? '',
      hasPrivateName: nameNode?.type === 'private_property_identifier',
      decorators: decoratorNodes
        .map(decorator => this.extractDecoratorName(decorator))
        .filter((name): name is string => name !== null),
      ...spanOf(leading[0] ?? node, node),
    }

    const modifier = node.namedChildren.find(n => n.type === 'accessibility_modifier')?.text
    if (modifier && isAccessibility(modifier)) {
      member.accessibility = modifier
    }

    return member
  }

  /**
   * Name of the decorator's callee: `@Input()` → Input, `@core.Output()` → Output
   */
  private extractDecoratorName(decorator: Parser.SyntaxNode): string | null {
    const expression = decorator.namedChildren.find(n => n.type !== 'comment')
    if (!expression)
      return null

    const callee = expression.type === 'call_expression'
      ? expression.childForFieldName('function')
      : expression
    if (!callee)
      return null

    if (callee.type === 'member_expression') {
      return callee.childForFieldName('property')?.text ?? null
    }
    return callee.text
  }
}

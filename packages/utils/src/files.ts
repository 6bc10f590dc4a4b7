import type { Stats } from 'node:fs'
import { existsSync } from 'node:fs'
import { readdir, stat } from 'node:fs/promises'
import path from 'node:path'
import { createLogger } from './logger'

const log = createLogger('discoverFiles')

export const DEFAULT_INCLUDE: readonly string[] = [
  '**/*.ts',
  '**/*.tsx',
  '**/*.mts',
  '**/*.cts',
  '**/*.js',
  '**/*.jsx',
  '**/*.mjs',
  '**/*.cjs',
]

export const DEFAULT_EXCLUDE: readonly string[] = [
  '**/node_modules/**',
  '**/dist/**',
  '**/.git/**',
  '**/*.d.ts',
]

/**
 * Options for file discovery
 */
export interface DiscoverFilesOptions {
  include?: readonly string[]
  exclude?: readonly string[]
  /** Maximum directory depth below the root (default: 10) */
  maxDepth?: number
}

interface WalkContext {
  rootPath: string
  include: readonly string[]
  exclude: readonly string[]
  maxDepth: number
  files: string[]
}

/**
 * Discover source files under a directory, matching include/exclude globs
 * against paths relative to the root. A file path is returned as-is.
 *
 * @throws {Error} if the path does not exist
 */
export async function discoverFiles(
  rootPath: string,
  opts?: DiscoverFilesOptions,
): Promise<string[]> {
  if (!existsSync(rootPath)) {
    throw new Error(`Path does not exist: ${rootPath}`)
  }

  const rootStats = await stat(rootPath)
  if (rootStats.isFile()) {
    return [rootPath]
  }

  const context: WalkContext = {
    rootPath,
    include: opts?.include ?? DEFAULT_INCLUDE,
    exclude: opts?.exclude ?? DEFAULT_EXCLUDE,
    maxDepth: opts?.maxDepth ?? 10,
    files: [],
  }

  await walkDirectory(context, rootPath, 0)

  return context.files.sort((a, b) => a.localeCompare(b))
}

async function walkDirectory(context: WalkContext, dir: string, depth: number): Promise<void> {
  if (depth > context.maxDepth)
    return

  const entries = await readDirSafe(dir)
  if (!entries)
    return

  for (const entry of entries) {
    await processEntry(context, dir, entry, depth)
  }
}

async function readDirSafe(dir: string): Promise<string[] | null> {
  try {
    return await readdir(dir)
  }
  catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    log.warn(`Skipping directory ${dir}: ${msg}`)
    return null
  }
}

async function processEntry(
  context: WalkContext,
  dir: string,
  entry: string,
  depth: number,
): Promise<void> {
  const fullPath = path.join(dir, entry)
  const relativePath = path.relative(context.rootPath, fullPath)

  if (matchesPattern(relativePath, context.exclude))
    return

  let stats: Stats
  try {
    stats = await stat(fullPath)
  }
  catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    log.warn(`Skipping ${fullPath}: ${msg}`)
    return
  }

  if (stats.isDirectory()) {
    await walkDirectory(context, fullPath, depth + 1)
  }
  else if (stats.isFile() && matchesPattern(relativePath, context.include)) {
    context.files.push(fullPath)
  }
}

/**
 * Segment-wise glob match: `**` spans any number of segments, `*` and `?`
 * stay within one segment.
 */
export function matchesPattern(filePath: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => globMatch(filePath, pattern))
}

function globMatch(filePath: string, pattern: string): boolean {
  const pathSegments = filePath.replaceAll('\\', '/').split('/')
  const patternSegments = pattern.replaceAll('\\', '/').split('/')
  return matchSegments(pathSegments, patternSegments, 0, 0)
}

function matchSegments(
  pathSegs: string[],
  patternSegs: string[],
  pathIdx: number,
  patternIdx: number,
): boolean {
  if (pathIdx === pathSegs.length && patternIdx === patternSegs.length) {
    return true
  }
  if (patternIdx === patternSegs.length) {
    return false
  }

  const patternSeg = patternSegs[patternIdx]
  if (patternSeg === undefined)
    return false

  if (patternSeg === '**') {
    for (let i = pathIdx; i <= pathSegs.length; i++) {
      if (matchSegments(pathSegs, patternSegs, i, patternIdx + 1)) {
        return true
      }
    }
    return false
  }

  const pathSeg = pathSegs[pathIdx]
  if (pathSeg !== undefined && matchSegment(pathSeg, patternSeg)) {
    return matchSegments(pathSegs, patternSegs, pathIdx + 1, patternIdx + 1)
  }

  return false
}

function matchSegment(pathSeg: string, patternSeg: string): boolean {
  const regexPattern = patternSeg
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replaceAll('*', '.*')
    .replaceAll('?', '.')
  return new RegExp(`^${regexPattern}$`).test(pathSeg)
}

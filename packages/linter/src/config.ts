import { existsSync } from 'node:fs'
import { readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { configNotFoundError, DEFAULT_GROUP_ORDER, invalidOptionsError } from '@member-order/core'
import { DEFAULT_EXCLUDE, DEFAULT_INCLUDE } from '@member-order/utils/files'
import { createLogger } from '@member-order/utils/logger'
import { z } from 'zod/v4'

const log = createLogger('config')

export const CONFIG_FILE_NAME = '.member-order.json'

export const SeveritySchema = z.enum(['error', 'warning', 'style', 'none'])

/**
 * Options of the member-ordering rule.
 * Group keys are checked later by buildGroupOrder, which owns the taxonomy.
 */
export const MemberOrderingOptionsSchema = z.strictObject({
  /** Canonical group order; empty or absent means the built-in order */
  order: z.array(z.string()).optional(),
  /** Also require alphabetical order inside each group */
  alphabetize: z.boolean().optional(),
  severity: SeveritySchema.optional(),
})

export type MemberOrderingOptions = z.infer<typeof MemberOrderingOptionsSchema>

/**
 * Project configuration stored in .member-order.json
 */
export const ProjectConfigSchema = z.strictObject({
  /** Glob patterns of files to check */
  include: z.array(z.string()).optional(),
  /** Glob patterns of files and directories to skip */
  exclude: z.array(z.string()).optional(),
  /** Maximum directory depth */
  maxDepth: z.number().int().nonnegative().optional(),
  rules: z.strictObject({
    'member-ordering': MemberOrderingOptionsSchema.optional(),
  }).optional(),
})

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>

export const DEFAULT_CONFIG: ProjectConfig = {
  include: [...DEFAULT_INCLUDE],
  exclude: [...DEFAULT_EXCLUDE],
  rules: {
    'member-ordering': {
      order: [...DEFAULT_GROUP_ORDER],
      alphabetize: false,
      severity: 'style',
    },
  },
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.map(String).join('.')
      return where ? `${where}: ${issue.message}` : issue.message
    })
    .join('; ')
}

/**
 * Validate rule options.
 *
 * @throws ConfigurationError (INVALID_OPTIONS) when the shape is wrong
 */
export function parseRuleOptions(value: unknown): MemberOrderingOptions {
  const parsed = MemberOrderingOptionsSchema.safeParse(value ?? {})
  if (!parsed.success) {
    throw invalidOptionsError(describeIssues(parsed.error))
  }
  return parsed.data
}

/**
 * Validate a project configuration object.
 *
 * @throws ConfigurationError (INVALID_OPTIONS) when the shape is wrong
 */
export function parseProjectConfig(value: unknown, source = 'config'): ProjectConfig {
  const parsed = ProjectConfigSchema.safeParse(value)
  if (!parsed.success) {
    throw invalidOptionsError(`${source}: ${describeIssues(parsed.error)}`)
  }
  return parsed.data
}

/**
 * Load the project configuration.
 *
 * Without an explicit path, `.member-order.json` in rootDir is used when it
 * exists and the defaults otherwise. An explicit path must exist.
 */
export async function loadConfig(rootDir: string, configPath?: string): Promise<ProjectConfig> {
  const file = configPath ? path.resolve(configPath) : path.join(rootDir, CONFIG_FILE_NAME)

  if (!existsSync(file)) {
    if (configPath) {
      throw configNotFoundError(file)
    }
    log.debug(`No ${CONFIG_FILE_NAME} in ${rootDir}, using defaults`)
    return {}
  }

  const raw = await readFile(file, 'utf-8')
  let json: unknown
  try {
    json = JSON.parse(raw)
  }
  catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    throw invalidOptionsError(`${file} is not valid JSON (${msg})`)
  }

  log.debug(`Loaded ${file}`)
  return parseProjectConfig(json, file)
}

/**
 * Write the default configuration unless the file already exists.
 *
 * @returns true when a file was written
 */
export async function writeDefaultConfig(rootDir: string): Promise<boolean> {
  const file = path.join(rootDir, CONFIG_FILE_NAME)
  if (existsSync(file)) {
    log.warn(`${CONFIG_FILE_NAME} already exists, skipping config creation`)
    return false
  }

  await writeFile(file, `${JSON.stringify(DEFAULT_CONFIG, null, 2)}\n`)
  log.success(`Created ${CONFIG_FILE_NAME}`)
  return true
}

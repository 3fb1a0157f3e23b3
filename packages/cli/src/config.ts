import type { LogLevelName } from '@sfpack/utils/logger'
import path from 'node:path'
import {
  DEFAULT_API_VERSION,
  DEFAULT_PACKAGE_NAME,
  invalidConfigError,
  METADATA_NAMESPACE,
} from '@sfpack/manifest'
import { LOG_LEVEL_NAMES } from '@sfpack/utils/logger'
import { config as loadDotenv } from 'dotenv'
import { z } from 'zod'

/** Values given on the command line; absent ones fall back to the environment */
export interface ConfigFlags {
  root?: string
  dir?: string
  apiVersion?: string
  packageName?: string
  xmlnsSource?: string
}

export interface SfpackConfig {
  /** Absolute project root */
  root: string
  /** Subfolder to list; empty selects full-manifest mode */
  dir: string
  apiVersion: string
  packageName: string
  xmlnsSource: string
  logLevel: LogLevelName
}

export const ENV_KEYS = {
  root: 'SFPACK_ROOT',
  dir: 'SFPACK_DIR',
  apiVersion: 'SFPACK_API_VERSION',
  packageName: 'SFPACK_PACKAGE_NAME',
  xmlnsSource: 'SFPACK_XMLNS_SOURCE',
  logLevel: 'SFPACK_LOG_LEVEL',
} as const

const configSchema = z.object({
  root: z.string().min(1),
  dir: z.string(),
  apiVersion: z.string().min(1),
  // Resolved against root, so a relative path such as out/package.xml is allowed
  packageName: z.string().min(1),
  xmlnsSource: z.string().url(),
  logLevel: z.enum(LOG_LEVEL_NAMES),
})

export function loadEnv(): void {
  loadDotenv({ path: ['.env.local', '.env'] })
}

// An empty environment variable counts as unset
function fromEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]
  return value === undefined || value === '' ? undefined : value
}

/**
 * Merge flags over environment variables over defaults, then validate.
 * Throws INVALID_CONFIG listing every failed setting.
 */
export function resolveConfig(
  flags: ConfigFlags = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): SfpackConfig {
  const merged = {
    root: flags.root ?? fromEnv(env, ENV_KEYS.root) ?? cwd,
    dir: flags.dir ?? fromEnv(env, ENV_KEYS.dir) ?? '',
    apiVersion: flags.apiVersion ?? fromEnv(env, ENV_KEYS.apiVersion) ?? DEFAULT_API_VERSION,
    packageName: flags.packageName ?? fromEnv(env, ENV_KEYS.packageName) ?? DEFAULT_PACKAGE_NAME,
    xmlnsSource: flags.xmlnsSource ?? fromEnv(env, ENV_KEYS.xmlnsSource) ?? METADATA_NAMESPACE,
    logLevel: fromEnv(env, ENV_KEYS.logLevel) ?? 'info',
  }

  const parsed = configSchema.safeParse(merged)
  if (!parsed.success) {
    const reasons = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw invalidConfigError(reasons.join('; '))
  }

  return { ...parsed.data, root: path.resolve(cwd, parsed.data.root) }
}

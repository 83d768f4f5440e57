import { readFileSync, statSync } from 'node:fs'
import { dirname, isAbsolute, resolve } from 'node:path'
import {
  type MirrorConfig,
  type RetryPolicy,
  type SyncPlan,
  createRetryPolicy,
  createSyncPlan,
  safeParseMirrorConfig,
} from '@fanmirror/core'
import { parse as parseYaml } from 'yaml'
import { ConfigurationError } from '../errors'

/**
 * Everything read from a job config file.
 */
export interface LoadedJob {
  config: MirrorConfig
  plan: SyncPlan
  retryPolicy: RetryPolicy
}

/**
 * Interpolate environment variables in a string
 * Supports ${VAR} syntax, only replaces if the env var exists
 */
function interpolateEnvVars(content: string, env: Record<string, string | undefined>): string {
  return content.replace(/\$\{([^}]+)\}/g, (match, varName: string) => {
    const value = env[varName]
    return value !== undefined ? value : match
  })
}

/**
 * Interpolate every string value of a parsed document. Keys are left alone,
 * and values never pass back through a parser, so backslashes survive.
 */
function interpolateDocument(value: unknown, env: Record<string, string | undefined>): unknown {
  if (typeof value === 'string') {
    return interpolateEnvVars(value, env)
  }
  if (Array.isArray(value)) {
    return value.map((item) => interpolateDocument(item, env))
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, interpolateDocument(item, env)]),
    )
  }
  return value
}

function readConfigFile(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8')
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Cannot read configuration file: ${reason}`, filePath)
  }
}

function parseConfigDocument(content: string, filePath: string): unknown {
  try {
    // YAML is a superset of JSON, so this also takes plain JSON documents
    return parseYaml(content)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Cannot parse configuration: ${reason}`, filePath)
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory()
  } catch {
    return false
  }
}

/**
 * Load, validate and freeze a mirror job from a JSON (or YAML) config file.
 * Relative source and destination paths resolve against the file's directory.
 *
 * @throws ConfigurationError when the file is unreadable, malformed, incomplete,
 *   or names a source directory that does not exist
 */
export function loadSyncConfig(
  filePath: string,
  env: Record<string, string | undefined> = process.env,
): LoadedJob {
  const document = interpolateDocument(parseConfigDocument(readConfigFile(filePath), filePath), env)

  const result = safeParseMirrorConfig(document)
  if (!result.success) {
    throw new ConfigurationError('validation failed', filePath, result.errors)
  }

  const baseDir = dirname(filePath)
  const toAbsolute = (path: string) => (isAbsolute(path) ? path : resolve(baseDir, path))
  const config: MirrorConfig = {
    ...result.data,
    sourceDir: toAbsolute(result.data.sourceDir),
    destDirs: result.data.destDirs.map(toAbsolute),
  }

  if (!isDirectory(config.sourceDir)) {
    throw new ConfigurationError('source directory does not exist', filePath, [
      { path: 'SourceDir', message: `Not a directory: ${config.sourceDir}` },
    ])
  }

  return {
    config,
    plan: createSyncPlan(config),
    retryPolicy: createRetryPolicy(config),
  }
}

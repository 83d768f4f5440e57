/**
 * Case conversion for config files (PascalCase) to TypeScript (camelCase)
 *
 * Config files use PascalCase keys (SourceDir, DestDirs) for compatibility with
 * existing mirror job definitions. TypeScript code uses camelCase per JS conventions.
 */

import type { CamelCasedPropertiesDeep } from 'type-fest'

/**
 * Convert a string from PascalCase to camelCase
 */
export function pascalToCamel(str: string): string {
  return str.replace(/^[A-Z]+(?=[A-Z][a-z]|$)|^[A-Z]/, (head) => head.toLowerCase())
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function convertKeysDeep(value: unknown, convert: (key: string) => string): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => convertKeysDeep(item, convert))
  }

  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {}
    for (const [key, entry] of Object.entries(value)) {
      result[convert(key)] = convertKeysDeep(entry, convert)
    }
    return result
  }

  return value
}

/**
 * Recursively convert object keys from PascalCase to camelCase
 */
export function pascalToCamelDeep<T>(obj: T): CamelCasedPropertiesDeep<T> {
  return convertKeysDeep(obj, pascalToCamel) as CamelCasedPropertiesDeep<T>
}

// Re-export type-fest types for convenience
export type { CamelCasedPropertiesDeep }

import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'

import JSON5 from 'json5'

export type LibraryConfig = {
  /** Base URL of the episode API, e.g. `https://gigahertz.fm/api`. */
  apiBase?: string
  /** Output file, relative to the working directory unless absolute. */
  output?: string
  /** Name shown in the page header and title. */
  siteTitle?: string
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function assertNoComments(raw: string, path: string): void {
  let inString: '"' | "'" | null = null
  let escaped = false
  let line = 1
  let col = 1

  for (let i = 0; i < raw.length; i += 1) {
    const ch = raw[i] ?? ''
    const next = raw[i + 1] ?? ''

    if (inString) {
      if (escaped) {
        escaped = false
      } else if (ch === '\\') {
        escaped = true
      } else if (ch === inString) {
        inString = null
      }
    } else if (ch === '"' || ch === "'") {
      inString = ch
      escaped = false
    } else if (ch === '/' && (next === '/' || next === '*')) {
      throw new Error(
        `Invalid config file ${path}: comments are not allowed (found /${next} at ${line}:${col}).`
      )
    }

    if (ch === '\n') {
      line += 1
      col = 1
    } else {
      col += 1
    }
  }
}

function readOptionalString(
  parsed: Record<string, unknown>,
  key: keyof LibraryConfig,
  path: string
): string | undefined {
  const value = parsed[key]
  if (typeof value === 'undefined') return undefined
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new Error(`Invalid config file ${path}: "${key}" must be a non-empty string.`)
  }
  return value.trim()
}

export function parseApiBase(raw: string, source: string): string {
  let url: URL
  try {
    url = new URL(raw)
  } catch {
    throw new Error(`Invalid ${source}: "${raw}" is not a URL.`)
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Invalid ${source}: only http(s) URLs are supported.`)
  }
  return raw
}

/**
 * Loads the JSON5 config named by `--config`. Without a path nothing is read and the defaults
 * apply.
 */
export function loadLibraryConfig({
  cwd,
  configPath,
}: {
  cwd: string
  configPath?: string | null
}): { config: LibraryConfig | null; path: string | null } {
  const requested = typeof configPath === 'string' ? configPath.trim() : ''
  if (requested.length === 0) return { config: null, path: null }
  const path = resolve(cwd, requested)

  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch (error) {
    throw new Error(`Unable to read config file ${path}`, { cause: error })
  }

  assertNoComments(raw, path)
  let parsed: unknown
  try {
    parsed = JSON5.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Invalid JSON in config file ${path}: ${message}`)
  }

  if (!isRecord(parsed)) {
    throw new Error(`Invalid config file ${path}: expected an object at the top level`)
  }

  const apiBase = readOptionalString(parsed, 'apiBase', path)
  const config: LibraryConfig = {
    apiBase: apiBase ? parseApiBase(apiBase, `config file ${path} ("apiBase")`) : undefined,
    output: readOptionalString(parsed, 'output', path),
    siteTitle: readOptionalString(parsed, 'siteTitle', path),
  }

  return { config, path }
}

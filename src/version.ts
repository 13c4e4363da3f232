import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

import { isJsonRecord } from './api/json.js'

export const PROGRAM_NAME = 'episode-links-library'
export const FALLBACK_VERSION = '0.1.0'

export function resolvePackageVersion(importMetaUrl: string = import.meta.url): string {
  let dir = (() => {
    try {
      return path.dirname(fileURLToPath(importMetaUrl))
    } catch {
      return process.cwd()
    }
  })()

  for (let i = 0; i < 10; i += 1) {
    const candidate = path.join(dir, 'package.json')
    try {
      const raw = fs.readFileSync(candidate, 'utf8')
      const json: unknown = JSON.parse(raw)
      if (
        isJsonRecord(json) &&
        json.name === PROGRAM_NAME &&
        typeof json.version === 'string' &&
        json.version.trim().length > 0
      ) {
        return json.version.trim()
      }
    } catch {
      // keep walking up
    }

    const parent = path.dirname(dir)
    if (parent === dir) break
    dir = parent
  }

  return FALLBACK_VERSION
}

export function formatVersionLine(): string {
  return `${PROGRAM_NAME} ${resolvePackageVersion()}`
}

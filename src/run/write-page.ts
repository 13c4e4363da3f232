import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

import { WriteError, formatError } from '../errors.js'

export async function writeLibraryPage(outputPath: string, html: string): Promise<void> {
  try {
    await mkdir(dirname(outputPath), { recursive: true })
    await writeFile(outputPath, html, 'utf8')
  } catch (error) {
    throw new WriteError(`Failed to write ${outputPath}: ${formatError(error)}`, {
      path: outputPath,
      cause: error,
    })
  }
}

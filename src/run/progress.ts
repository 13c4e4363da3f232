import { formatError } from '../errors.js'
import type { LibraryProgressEvent } from '../events.js'
import { writeError, writeLine, writeVerbose } from '../logging.js'

export function createConsoleProgress({
  stream,
  verbose,
  color,
}: {
  stream: NodeJS.WritableStream
  verbose: boolean
  color: boolean
}): (event: LibraryProgressEvent) => void {
  return (event) => {
    switch (event.kind) {
      case 'api-request':
        writeVerbose(stream, verbose, `GET ${event.url}`, color)
        return
      case 'podcasts-start':
        writeLine(stream, 'Fetching podcasts list...')
        return
      case 'podcasts-done':
        writeLine(stream, `Found ${event.count} podcast${event.count === 1 ? '' : 's'}`)
        return
      case 'podcast-start':
        writeLine(stream, `Fetching details for podcast: ${event.slug}`)
        return
      case 'podcast-skipped':
        writeVerbose(stream, verbose, `skipping podcast "${event.title}": ${event.reason}`, color)
        return
      case 'podcast-failed':
        writeError(
          stream,
          `Error fetching podcast ${event.slug}: ${formatError(event.error)}`,
          color
        )
        return
      case 'episode-start':
        writeLine(stream, `Fetching episode ${event.episodeNumber} of ${event.slug}`)
        return
      case 'episode-done':
        writeVerbose(
          stream,
          verbose,
          `episode ${event.episodeNumber} of ${event.slug}: ${event.linkCount} links`,
          color
        )
        return
      case 'episode-failed':
        writeError(
          stream,
          `Error fetching episode ${event.episodeNumber} of ${event.slug}: ${formatError(event.error)}`,
          color
        )
        return
    }
  }
}

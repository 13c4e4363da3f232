export {
  DEFAULT_API_BASE,
  type EpisodeApiClient,
  createEpisodeApiClient,
  fetchJson,
} from './api/client.js'
export type { EpisodeDetail, EpisodeSummary, Podcast } from './api/types.js'
export { type LibraryConfig, loadLibraryConfig } from './config.js'
export { FetchError, WriteError, formatError } from './errors.js'
export type { LibraryProgressEvent, ProgressHandler } from './events.js'
export { collectEpisodes, sortEpisodesByDateDesc, summarizeLibrary } from './library/collect.js'
export type { Episode, LibrarySummary } from './library/types.js'
export { type Link, scanAnchors } from './links/anchor-scanner.js'
export { SECTION_HEADINGS, extractEpisodeLinks, findLinksSection } from './links/extract.js'
export { formatGenerationDate } from './render/format.js'
export { extractEmbeddedEpisodes, renderLibraryPage } from './render/page.js'
export { runCli } from './run.js'

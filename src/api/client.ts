import { FetchError, formatError } from '../errors.js'
import type { ProgressHandler } from '../events.js'
import {
  type EpisodeDetail,
  type EpisodeSummary,
  type Podcast,
  parseEpisodeDetail,
  parseEpisodeList,
  parsePodcastList,
} from './types.js'

export const DEFAULT_API_BASE = 'https://gigahertz.fm/api'

const REQUEST_HEADERS: Record<string, string> = {
  Accept: 'application/json',
}

export type EpisodeApiClient = {
  listPodcasts: () => Promise<Podcast[]>
  listEpisodes: (slug: string) => Promise<EpisodeSummary[]>
  getEpisode: (slug: string, episodeNumber: number) => Promise<EpisodeDetail>
}

export function normalizeApiBase(raw: string): string {
  return raw.trim().replace(/\/+$/, '')
}

export async function fetchJson(
  fetchImpl: typeof fetch,
  url: string,
  { onProgress }: { onProgress?: ProgressHandler } = {}
): Promise<unknown> {
  onProgress?.({ kind: 'api-request', url })

  let response: Response
  try {
    response = await fetchImpl(url, { headers: REQUEST_HEADERS, redirect: 'follow' })
  } catch (error) {
    throw new FetchError(`Request to ${url} failed: ${formatError(error)}`, { url, cause: error })
  }

  if (!response.ok) {
    throw new FetchError(`Request to ${url} failed (status ${response.status})`, {
      url,
      status: response.status,
    })
  }

  let text: string
  try {
    text = await response.text()
  } catch (error) {
    throw new FetchError(`Failed to read response from ${url}: ${formatError(error)}`, {
      url,
      status: response.status,
      cause: error,
    })
  }

  try {
    const payload: unknown = JSON.parse(text)
    return payload
  } catch (error) {
    throw new FetchError(`Invalid JSON from ${url}: ${formatError(error)}`, {
      url,
      status: response.status,
      cause: error,
    })
  }
}

export function createEpisodeApiClient({
  fetchImpl,
  baseUrl = DEFAULT_API_BASE,
  onProgress = null,
}: {
  fetchImpl: typeof fetch
  baseUrl?: string
  onProgress?: ProgressHandler
}): EpisodeApiClient {
  const base = normalizeApiBase(baseUrl)
  const getJson = (path: string) => fetchJson(fetchImpl, `${base}${path}`, { onProgress })

  return {
    listPodcasts: async () => parsePodcastList(await getJson('/podcasts.json')),
    listEpisodes: async (slug) =>
      parseEpisodeList(await getJson(`/podcasts/${encodeURIComponent(slug)}/index.json`)),
    getEpisode: async (slug, episodeNumber) =>
      parseEpisodeDetail(
        await getJson(`/podcasts/${encodeURIComponent(slug)}/${episodeNumber}.json`)
      ),
  }
}

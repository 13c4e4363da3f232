import { sumBy } from 'es-toolkit'

import type { EpisodeApiClient } from '../api/client.js'
import type { Podcast } from '../api/types.js'
import type { ProgressHandler } from '../events.js'
import { extractEpisodeLinks } from '../links/extract.js'
import type { Episode, LibrarySummary } from './types.js'

/** Newest first. `Array#sort` is stable, so equal dates keep fetch order. */
export function sortEpisodesByDateDesc(episodes: readonly Episode[]): Episode[] {
  return [...episodes].sort((a, b) => {
    if (a.date === b.date) return 0
    return a.date < b.date ? 1 : -1
  })
}

async function collectPodcastEpisodes(
  client: EpisodeApiClient,
  podcast: Podcast,
  onProgress: ProgressHandler
): Promise<Episode[]> {
  const { slug } = podcast
  const collected: Episode[] = []
  const summaries = await client.listEpisodes(slug)

  for (const { episodeNumber } of summaries) {
    if (episodeNumber === null) continue
    onProgress?.({ kind: 'episode-start', slug, episodeNumber })

    try {
      const detail = await client.getEpisode(slug, episodeNumber)
      const links = extractEpisodeLinks(detail.body)
      onProgress?.({ kind: 'episode-done', slug, episodeNumber, linkCount: links.length })
      if (links.length === 0) continue

      collected.push({
        id: detail.id,
        episodeNumber,
        title: detail.title,
        date: detail.date,
        permalink: detail.permalink,
        podcastTitle: podcast.title,
        podcastSlug: slug,
        links,
      })
    } catch (error) {
      onProgress?.({ kind: 'episode-failed', slug, episodeNumber, error })
    }
  }

  return collected
}

/**
 * Walks podcasts → episodes → episode details one request at a time and keeps the episodes whose
 * body has at least one link. A failing podcast or episode is reported and skipped; only the
 * initial podcast list is fatal.
 */
export async function collectEpisodes({
  client,
  onProgress = null,
}: {
  client: EpisodeApiClient
  onProgress?: ProgressHandler
}): Promise<Episode[]> {
  onProgress?.({ kind: 'podcasts-start' })
  const podcasts = await client.listPodcasts()
  onProgress?.({ kind: 'podcasts-done', count: podcasts.length })

  const episodes: Episode[] = []
  for (const podcast of podcasts) {
    if (!podcast.slug) {
      onProgress?.({ kind: 'podcast-skipped', title: podcast.title, reason: 'missing slug' })
      continue
    }
    onProgress?.({ kind: 'podcast-start', slug: podcast.slug })

    try {
      episodes.push(...(await collectPodcastEpisodes(client, podcast, onProgress)))
    } catch (error) {
      onProgress?.({ kind: 'podcast-failed', slug: podcast.slug, error })
    }
  }

  return sortEpisodesByDateDesc(episodes)
}

export function summarizeLibrary(episodes: readonly Episode[]): LibrarySummary {
  return {
    episodeCount: episodes.length,
    linkCount: sumBy(episodes, (episode) => episode.links.length),
    podcastCount: new Set(episodes.map((episode) => episode.podcastSlug)).size,
  }
}

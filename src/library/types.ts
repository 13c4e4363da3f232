import type { Link } from '../links/anchor-scanner.js'

export type Episode = {
  id: string | number | null
  episodeNumber: number
  title: string
  /** ISO-8601, as returned by the API. Compared as a plain string when sorting. */
  date: string
  permalink: string
  podcastTitle: string
  podcastSlug: string
  links: Link[]
}

export type LibrarySummary = {
  episodeCount: number
  linkCount: number
  podcastCount: number
}

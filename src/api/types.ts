import {
  asRecordArray,
  getJsonArray,
  getRecordInteger,
  getRecordString,
  isJsonRecord,
  type JsonRecord,
} from './json.js'

export type Podcast = {
  slug: string
  title: string
}

export type EpisodeSummary = {
  episodeNumber: number | null
}

export type EpisodeDetail = {
  id: string | number | null
  episodeNumber: number | null
  title: string
  date: string
  permalink: string
  body: string
}

export const UNKNOWN_PODCAST_TITLE = 'Unknown Podcast'

export function parsePodcastList(payload: unknown): Podcast[] {
  return asRecordArray(getJsonArray(payload, 'podcasts')).map((record) => ({
    slug: getRecordString(record, 'slug')?.trim() ?? '',
    title: getRecordString(record, 'title') ?? UNKNOWN_PODCAST_TITLE,
  }))
}

export function parseEpisodeList(payload: unknown): EpisodeSummary[] {
  return asRecordArray(getJsonArray(payload, 'episodes')).map((record) => ({
    episodeNumber: getRecordInteger(record, 'episodeNumber'),
  }))
}

function parseEpisodeId(record: JsonRecord): string | number | null {
  const value = record.id
  if (typeof value === 'string') return value
  if (typeof value === 'number' && Number.isFinite(value)) return value
  return null
}

export function parseEpisodeDetail(payload: unknown): EpisodeDetail {
  const record: JsonRecord = isJsonRecord(payload) ? payload : {}
  return {
    id: parseEpisodeId(record),
    episodeNumber: getRecordInteger(record, 'episodeNumber'),
    title: getRecordString(record, 'title') ?? '',
    date: getRecordString(record, 'date') ?? '',
    permalink: getRecordString(record, 'permalink') ?? '',
    body: getRecordString(record, 'body') ?? '',
  }
}

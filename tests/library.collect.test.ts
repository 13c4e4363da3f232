import { describe, expect, it } from 'vitest'

import type { EpisodeApiClient } from '../src/api/client.js'
import type { EpisodeDetail, EpisodeSummary, Podcast } from '../src/api/types.js'
import { FetchError } from '../src/errors.js'
import type { LibraryProgressEvent } from '../src/events.js'
import {
  collectEpisodes,
  sortEpisodesByDateDesc,
  summarizeLibrary,
} from '../src/library/collect.js'
import type { Episode } from '../src/library/types.js'

const withLinks = (label: string) =>
  `<p>Show notes</p><h3>Links do Episódio</h3><a href="https://${label}.example">${label}</a>`

function detail(episodeNumber: number, date: string, body: string): EpisodeDetail {
  return {
    id: `id-${episodeNumber}`,
    episodeNumber,
    title: `Episode ${episodeNumber}`,
    date,
    permalink: `https://example.com/${episodeNumber}`,
    body,
  }
}

function fakeClient({
  podcasts,
  episodes,
  details,
  failingPodcasts = [],
  failingEpisodes = [],
}: {
  podcasts: Podcast[]
  episodes: Record<string, EpisodeSummary[]>
  details: Record<string, EpisodeDetail>
  failingPodcasts?: string[]
  failingEpisodes?: string[]
}): EpisodeApiClient & { calls: string[] } {
  const calls: string[] = []
  return {
    calls,
    listPodcasts: async () => {
      calls.push('podcasts')
      return podcasts
    },
    listEpisodes: async (slug) => {
      calls.push(`list:${slug}`)
      if (failingPodcasts.includes(slug)) {
        throw new FetchError('boom', { url: `https://api.example/${slug}`, status: 500 })
      }
      return episodes[slug] ?? []
    },
    getEpisode: async (slug, episodeNumber) => {
      const key = `${slug}/${episodeNumber}`
      calls.push(`episode:${key}`)
      const found = details[key]
      if (!found || failingEpisodes.includes(key)) {
        throw new FetchError('missing', { url: `https://api.example/${key}`, status: 404 })
      }
      return found
    },
  }
}

function makeEpisode(overrides: Partial<Episode>): Episode {
  return {
    id: null,
    episodeNumber: 1,
    title: '',
    date: '',
    permalink: '',
    podcastTitle: 'P',
    podcastSlug: 'p',
    links: [{ text: 'x', url: 'https://x.example' }],
    ...overrides,
  }
}

describe('collectEpisodes', () => {
  it('builds episode records newest first', async () => {
    const client = fakeClient({
      podcasts: [{ slug: 'alpha', title: 'Alpha Cast' }],
      episodes: { alpha: [{ episodeNumber: 1 }, { episodeNumber: 2 }] },
      details: {
        'alpha/1': detail(1, '2024-01-02', withLinks('one')),
        'alpha/2': detail(2, '2024-01-10', withLinks('two')),
      },
    })

    const episodes = await collectEpisodes({ client })

    expect(episodes).toEqual([
      {
        id: 'id-2',
        episodeNumber: 2,
        title: 'Episode 2',
        date: '2024-01-10',
        permalink: 'https://example.com/2',
        podcastTitle: 'Alpha Cast',
        podcastSlug: 'alpha',
        links: [{ text: 'two', url: 'https://two.example' }],
      },
      {
        id: 'id-1',
        episodeNumber: 1,
        title: 'Episode 1',
        date: '2024-01-02',
        permalink: 'https://example.com/1',
        podcastTitle: 'Alpha Cast',
        podcastSlug: 'alpha',
        links: [{ text: 'one', url: 'https://one.example' }],
      },
    ])
  })

  it('drops episodes without links and entries without an episode number', async () => {
    const client = fakeClient({
      podcasts: [{ slug: 'alpha', title: 'Alpha' }],
      episodes: { alpha: [{ episodeNumber: 1 }, { episodeNumber: null }, { episodeNumber: 2 }] },
      details: {
        'alpha/1': detail(1, '2024-01-01', '<p>LINKS DO EPISÓDIO</p><p>none yet</p>'),
        'alpha/2': detail(2, '2024-01-02', withLinks('two')),
      },
    })

    const episodes = await collectEpisodes({ client })

    expect(episodes.map((e) => e.episodeNumber)).toEqual([2])
    expect(client.calls).toEqual(['podcasts', 'list:alpha', 'episode:alpha/1', 'episode:alpha/2'])
  })

  it('skips failing units and keeps going', async () => {
    const events: LibraryProgressEvent[] = []
    const client = fakeClient({
      podcasts: [
        { slug: 'broken', title: 'Broken' },
        { slug: '', title: 'Nameless' },
        { slug: 'beta', title: 'Beta' },
      ],
      episodes: { beta: [{ episodeNumber: 1 }, { episodeNumber: 2 }, { episodeNumber: 3 }] },
      details: {
        'beta/1': detail(1, '2024-03-01', withLinks('b1')),
        'beta/3': detail(3, '2024-03-03', withLinks('b3')),
      },
      failingPodcasts: ['broken'],
    })

    const episodes = await collectEpisodes({ client, onProgress: (event) => events.push(event) })

    expect(episodes.map((e) => `${e.podcastSlug}/${e.episodeNumber}`)).toEqual(['beta/3', 'beta/1'])
    expect(client.calls).toEqual([
      'podcasts',
      'list:broken',
      'list:beta',
      'episode:beta/1',
      'episode:beta/2',
      'episode:beta/3',
    ])
    expect(events.filter((e) => e.kind === 'podcast-failed')).toHaveLength(1)
    expect(events).toContainEqual({ kind: 'podcast-skipped', title: 'Nameless', reason: 'missing slug' })
    expect(events).toContainEqual(
      expect.objectContaining({ kind: 'episode-failed', slug: 'beta', episodeNumber: 2 })
    )
  })

  it('propagates a failure of the podcast list', async () => {
    const client: EpisodeApiClient = {
      listPodcasts: async () => {
        throw new FetchError('down', { url: 'https://api.example/podcasts.json', status: 503 })
      },
      listEpisodes: async () => [],
      getEpisode: async () => detail(1, '', ''),
    }

    await expect(collectEpisodes({ client })).rejects.toThrow('down')
  })
})

describe('sortEpisodesByDateDesc', () => {
  it('orders by date string descending and keeps fetch order for ties', () => {
    const input = [
      makeEpisode({ episodeNumber: 1, date: '2024-01-02' }),
      makeEpisode({ episodeNumber: 2, date: '2024-05-01' }),
      makeEpisode({ episodeNumber: 3, date: '2024-01-02' }),
      makeEpisode({ episodeNumber: 4, date: '' }),
      makeEpisode({ episodeNumber: 5, date: '2024-05-01' }),
    ]

    expect(sortEpisodesByDateDesc(input).map((e) => e.episodeNumber)).toEqual([2, 5, 1, 3, 4])
    expect(input.map((e) => e.episodeNumber)).toEqual([1, 2, 3, 4, 5])
  })
})

describe('summarizeLibrary', () => {
  it('counts episodes, links and podcasts', () => {
    const episodes = [
      makeEpisode({ podcastSlug: 'a' }),
      makeEpisode({
        podcastSlug: 'b',
        links: [
          { text: '1', url: 'https://1.example' },
          { text: '2', url: 'https://2.example' },
        ],
      }),
      makeEpisode({ podcastSlug: 'a' }),
    ]
    expect(summarizeLibrary(episodes)).toEqual({ episodeCount: 3, linkCount: 4, podcastCount: 2 })
    expect(summarizeLibrary([])).toEqual({ episodeCount: 0, linkCount: 0, podcastCount: 0 })
  })
})

import { load } from 'cheerio'
import { describe, expect, it } from 'vitest'

import type { Episode } from '../src/library/types.js'
import {
  escapeHtml,
  formatGenerationDate,
  serializeForScript,
} from '../src/render/format.js'
import { extractEmbeddedEpisodes, renderLibraryPage } from '../src/render/page.js'

const episodes: Episode[] = [
  {
    id: 'ep-2',
    episodeNumber: 2,
    title: 'Segundo & último </script><script>alert(1)</script>',
    date: '2024-01-10',
    permalink: 'https://example.com/2',
    podcastTitle: 'Tecnocast',
    podcastSlug: 'tecnocast',
    links: [
      { text: 'Site <b>oficial</b>', url: 'https://x.example/?a=1&b=2' },
      { text: 'Outro', url: 'https://y.example' },
    ],
  },
  {
    id: 41,
    episodeNumber: 1,
    title: 'Primeiro',
    date: '2024-01-02',
    permalink: 'https://example.com/1',
    podcastTitle: 'Tecnocast',
    podcastSlug: 'tecnocast',
    links: [{ text: 'Linha\u2028separada', url: 'https://z.example' }],
  },
]

describe('renderLibraryPage', () => {
  it('embeds the episodes so they can be read back unchanged', () => {
    const html = renderLibraryPage(episodes, '10/01/2024 às 09:30')
    expect(extractEmbeddedEpisodes(html)).toEqual(episodes)
  })

  it('keeps the data block intact when text contains script-breaking sequences', () => {
    const html = renderLibraryPage(episodes, '10/01/2024 às 09:30')
    const $ = load(html)

    expect($('script')).toHaveLength(2)
    const blob = $('script#episodes-data').text()
    expect(blob).not.toContain('</script>')
    expect(JSON.parse(blob)).toEqual(episodes)
  })

  it('renders the header, search box and footer', () => {
    const html = renderLibraryPage([], '01/02/2025 às 08:05', {
      siteTitle: 'Rádio <Teste>',
      sourceUrl: 'https://api.example.com/docs',
    })
    const $ = load(html)

    expect($('title').text()).toBe('Rádio <Teste> - Biblioteca de Links')
    expect($('h1').text()).toBe('🎙️ Rádio <Teste>')
    expect($('.last-update').text()).toBe('📅 Atualizado em: 01/02/2025 às 08:05')
    expect($('#searchBox').attr('placeholder')).toBe('Buscar por episódio, título ou link...')
    expect($('footer a').attr('href')).toBe('https://api.example.com/docs')
    expect($('script#episodes-data').text()).toBe('[]')
  })

  it('uses the default site title', () => {
    const $ = load(renderLibraryPage([], 'agora'))
    expect($('title').text()).toBe('Gigahertz FM - Biblioteca de Links')
  })
})

describe('extractEmbeddedEpisodes', () => {
  it('returns null when the page has no data block', () => {
    expect(extractEmbeddedEpisodes('<html><body></body></html>')).toBeNull()
  })

  it('returns null for a data block that is not a JSON array', () => {
    const html = '<script type="application/json" id="episodes-data">{"a":1}</script>'
    expect(extractEmbeddedEpisodes(html)).toBeNull()
  })
})

describe('render helpers', () => {
  it('escapes html', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;'
    )
  })

  it('serializes json without markup characters', () => {
    expect(serializeForScript({ t: '</script>&' })).toBe(
      '{"t":"\\u003c/script\\u003e\\u0026"}'
    )
  })

  it('formats the generation date as day/month/year and time', () => {
    expect(formatGenerationDate(new Date(2024, 0, 5, 7, 3))).toBe('05/01/2024 às 07:03')
    expect(formatGenerationDate(new Date(2023, 11, 31, 23, 59))).toBe('31/12/2023 às 23:59')
  })
})

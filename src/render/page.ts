import {
  asRecordArray,
  getRecordInteger,
  getRecordString,
  type JsonRecord,
} from '../api/json.js'
import type { Link } from '../links/anchor-scanner.js'
import type { Episode } from '../library/types.js'
import { CLIENT_SCRIPT } from './client-script.js'
import { escapeHtml, serializeForScript } from './format.js'
import { PAGE_STYLES } from './styles.js'

export const DEFAULT_SITE_TITLE = 'Gigahertz FM'
export const DEFAULT_SOURCE_URL = 'https://github.com/gigahertzfm/api'

export type RenderPageOptions = {
  siteTitle?: string
  sourceUrl?: string
}

const DATA_ELEMENT_ID = 'episodes-data'
const DATA_BLOCK_PATTERN = new RegExp(
  `<script type="application/json" id="${DATA_ELEMENT_ID}">([\\s\\S]*?)</script>`
)

export function renderLibraryPage(
  episodes: readonly Episode[],
  generatedAt: string,
  { siteTitle = DEFAULT_SITE_TITLE, sourceUrl = DEFAULT_SOURCE_URL }: RenderPageOptions = {}
): string {
  const title = escapeHtml(siteTitle)

  return `<!DOCTYPE html>
<html lang="pt-BR">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${title} - Biblioteca de Links</title>
  <style>${PAGE_STYLES}</style>
</head>
<body>
  <div class="container">
    <header>
      <h1>🎙️ ${title}</h1>
      <p class="subtitle">Biblioteca de Links dos Episódios</p>
      <div class="last-update">📅 Atualizado em: ${escapeHtml(generatedAt)}</div>
    </header>

    <div class="search-container">
      <input type="text" id="searchBox" class="search-box" placeholder="Buscar por episódio, título ou link...">
      <div class="stats">
        <span id="statsText">Carregando episódios...</span>
      </div>
    </div>

    <div id="episodesList" class="episodes-list">
      <div class="loading">Carregando episódios...</div>
    </div>

    <footer>
      <p>Gerado a partir da <a href="${escapeHtml(sourceUrl)}" target="_blank" rel="noopener">API ${title}</a></p>
    </footer>
  </div>

  <script type="application/json" id="${DATA_ELEMENT_ID}">${serializeForScript(episodes)}</script>
  <script>${CLIENT_SCRIPT}</script>
</body>
</html>
`
}

function parseEmbeddedLink(record: JsonRecord): Link | null {
  const text = getRecordString(record, 'text')
  const url = getRecordString(record, 'url')
  return text === null || url === null ? null : { text, url }
}

function parseEmbeddedEpisode(record: JsonRecord): Episode | null {
  const episodeNumber = getRecordInteger(record, 'episodeNumber')
  if (episodeNumber === null) return null
  const id = record.id
  return {
    id: typeof id === 'string' || typeof id === 'number' ? id : null,
    episodeNumber,
    title: getRecordString(record, 'title') ?? '',
    date: getRecordString(record, 'date') ?? '',
    permalink: getRecordString(record, 'permalink') ?? '',
    podcastTitle: getRecordString(record, 'podcastTitle') ?? '',
    podcastSlug: getRecordString(record, 'podcastSlug') ?? '',
    links: asRecordArray(record.links).flatMap((link) => parseEmbeddedLink(link) ?? []),
  }
}

/** Reads the episode list back out of a page produced by `renderLibraryPage`. */
export function extractEmbeddedEpisodes(html: string): Episode[] | null {
  const match = DATA_BLOCK_PATTERN.exec(html)
  if (!match) return null
  let parsed: unknown
  try {
    parsed = JSON.parse(match[1] ?? '')
  } catch {
    return null
  }
  if (!Array.isArray(parsed)) return null
  return asRecordArray(parsed).flatMap((record) => parseEmbeddedEpisode(record) ?? [])
}

import { type Link, scanAnchors } from './anchor-scanner.js'

export const SECTION_HEADINGS = [
  'LINKS DO EPISÓDIO',
  'Links do Episódio',
  'LINKS DO SHOW',
  'Links do Show',
] as const

function escapeRegExp(value: string): string {
  return value.replaceAll(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

// Lazy capture up to the next <h2>/<h3> or the end of the body.
const SECTION_PATTERN = new RegExp(
  `(?:${SECTION_HEADINGS.map(escapeRegExp).join('|')})([\\s\\S]*?)(?:<h2>|<h3>|$)`,
  'iu'
)

/**
 * Returns the part of the body between the links heading and the next `<h2>`/`<h3>`, or the whole
 * body when no heading is present.
 */
export function findLinksSection(bodyHtml: string): string {
  const match = SECTION_PATTERN.exec(bodyHtml)
  return match ? (match[1] ?? '') : bodyHtml
}

export function extractEpisodeLinks(bodyHtml: string | null | undefined): Link[] {
  if (!bodyHtml) return []
  return scanAnchors(findLinksSection(bodyHtml))
}

export type { Link }

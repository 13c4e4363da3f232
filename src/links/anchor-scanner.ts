import { decode } from 'html-entities'

export type Link = {
  text: string
  url: string
}

type ScanState = 'text' | 'tag' | 'comment'

type OpenAnchor = {
  url: string
  text: string
}

const TAG_NAME_PATTERN = /^\/?\s*([a-zA-Z][^\s/>]*)/
const ATTRIBUTE_PATTERN = /([^\s/>="'][^\s/>=]*)(?:\s*=\s*("[^"]*"|'[^']*'|[^\s>]*))?/g

function startsMarkup(html: string, index: number): boolean {
  const next = html[index + 1] ?? ''
  return /[a-zA-Z/!?]/.test(next)
}

function unquote(value: string): string {
  const first = value[0]
  if ((first === '"' || first === "'") && value.endsWith(first) && value.length >= 2) {
    return value.slice(1, -1)
  }
  return value
}

/** Returns the decoded value of the last `href` attribute, or null when the tag has none. */
export function readHrefAttribute(attributes: string): string | null {
  let href: string | null = null
  for (const match of attributes.matchAll(ATTRIBUTE_PATTERN)) {
    const name = match[1]?.toLowerCase()
    if (name !== 'href') continue
    href = decode(unquote(match[2] ?? ''))
  }
  return href
}

/**
 * Scans markup for anchors and returns their `(text, url)` pairs in document order.
 *
 * Explicit three-state scanner (text / tag / comment) with an "inside anchor" flag. It never
 * throws: unterminated tags, anchors that are never closed and anchors without `href` simply
 * produce no link.
 */
export function scanAnchors(html: string): Link[] {
  const links: Link[] = []
  let state: ScanState = 'text'
  let anchor: OpenAnchor | null = null
  let textStart = 0
  let tagStart = 0
  let quote: '"' | "'" | null = null
  let afterEquals = false

  const appendText = (end: number) => {
    if (anchor && end > textStart) anchor.text += decode(html.slice(textStart, end))
  }

  const handleTag = (raw: string) => {
    if (raw.startsWith('!') || raw.startsWith('?')) return

    const nameMatch = TAG_NAME_PATTERN.exec(raw)
    const name = nameMatch?.[1]?.toLowerCase()
    if (name !== 'a') return

    if (raw.startsWith('/')) {
      if (anchor) links.push({ text: anchor.text.trim(), url: anchor.url })
      anchor = null
      return
    }

    const attributes = raw.slice(nameMatch?.[0].length ?? 0)
    const url = readHrefAttribute(attributes)
    if (url === null) {
      // any <a> restarts the text of the anchor that is still open
      if (anchor) anchor.text = ''
      return
    }

    if (/\/\s*$/.test(attributes.replace(ATTRIBUTE_PATTERN, ''))) {
      links.push({ text: '', url })
      anchor = null
      return
    }
    anchor = { url, text: '' }
  }

  let i = 0
  while (i < html.length) {
    const ch = html[i]

    if (state === 'comment') {
      if (html.startsWith('-->', i)) {
        state = 'text'
        i += 3
        textStart = i
        continue
      }
      i += 1
      continue
    }

    if (state === 'tag') {
      if (quote) {
        if (ch === quote) quote = null
      } else if ((ch === '"' || ch === "'") && afterEquals) {
        quote = ch
      } else if (ch === '>') {
        handleTag(html.slice(tagStart + 1, i))
        state = 'text'
        textStart = i + 1
      }
      if (ch === '=') afterEquals = true
      else if (!/\s/.test(ch ?? '')) afterEquals = false
      i += 1
      continue
    }

    if (ch === '<' && startsMarkup(html, i)) {
      appendText(i)
      if (html.startsWith('<!--', i)) {
        state = 'comment'
        i += 4
        continue
      }
      state = 'tag'
      tagStart = i
      quote = null
      afterEquals = false
    }
    i += 1
  }

  return links
}

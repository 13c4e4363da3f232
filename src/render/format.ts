const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

export function escapeHtml(value: string): string {
  return value.replaceAll(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch)
}

const SCRIPT_ESCAPES: Record<string, string> = {
  '<': '\\u003c',
  '>': '\\u003e',
  '&': '\\u0026',
  '\u2028': '\\u2028',
  '\u2029': '\\u2029',
}

/**
 * JSON that is safe to inline in a `<script>` element: nothing in it can close the element or
 * open a comment, and `JSON.parse` of the result gives back the input.
 */
export function serializeForScript(value: unknown): string {
  return JSON.stringify(value).replaceAll(/[<>&\u2028\u2029]/g, (ch) => SCRIPT_ESCAPES[ch] ?? ch)
}

function pad2(value: number): string {
  return String(value).padStart(2, '0')
}

/** `dd/mm/yyyy às HH:MM`, local time. */
export function formatGenerationDate(date: Date): string {
  const day = pad2(date.getDate())
  const month = pad2(date.getMonth() + 1)
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}`
  return `${day}/${month}/${date.getFullYear()} às ${time}`
}

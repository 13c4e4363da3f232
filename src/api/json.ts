export type JsonRecord = Record<string, unknown>

export function isJsonRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function getJsonArray(value: unknown, key: string): unknown[] {
  if (!isJsonRecord(value)) return []
  const found = value[key]
  return Array.isArray(found) ? found : []
}

export function asRecordArray(value: unknown): JsonRecord[] {
  if (!Array.isArray(value)) return []
  return value.filter((v): v is JsonRecord => isJsonRecord(v))
}

export function getRecordString(record: JsonRecord, key: string): string | null {
  const value = record[key]
  return typeof value === 'string' ? value : null
}

/** Integers, or strings of digits. */
export function getRecordInteger(record: JsonRecord, key: string): number | null {
  const value = record[key]
  if (typeof value === 'number') return Number.isSafeInteger(value) ? value : null
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    const parsed = Number(value.trim())
    return Number.isSafeInteger(parsed) ? parsed : null
  }
  return null
}

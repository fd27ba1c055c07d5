import { CoercionError, type Coercer } from './coerce'
import { NormalizationError, describeError } from '../errors'
import type { RawRecord } from '../api/channel'

// One attribute name, or candidates across firmware versions (first present wins)
export type Source = string | readonly string[]

export interface NormalizationIssue {
  schema: string
  index: number
  field: string
  raw: string
  reason: string
}

// Field accessor handed to a schema's mapping for one record
export interface FieldReader {
  // Optional field: absent -> fallback; malformed -> fallback plus an issue
  field<T>(source: Source, coerce: Coercer<T>, fallback: T): T
  // Required field: absent or malformed rejects the whole record
  required<T>(source: Source, coerce: Coercer<T>): T
  has(source: Source): boolean
}

export interface Schema<T> {
  readonly name: string
  readonly map: (fields: FieldReader) => T
}

export interface NormalizeResult<T> {
  items: T[]
  issues: NormalizationIssue[]
  rejected: NormalizationError[]
}

export function defineSchema<T>(name: string, map: (fields: FieldReader) => T): Schema<T> {
  return { name, map }
}

function sourceNames(source: Source): readonly string[] {
  return typeof source === 'string' ? [source] : source
}

function lookup(record: RawRecord, source: Source): { name: string; raw: string } | null {
  for (const name of sourceNames(source)) {
    if (Object.prototype.hasOwnProperty.call(record, name)) {
      return { name, raw: record[name] }
    }
  }
  return null
}

function reasonOf(error: unknown): string {
  return error instanceof CoercionError ? error.message : describeError(error)
}

// Normalize one record; throws NormalizationError when a required field is unusable
export function normalizeRecord<T>(
  record: RawRecord,
  schema: Schema<T>,
  index = 0,
  issues: NormalizationIssue[] = []
): T {
  const reader: FieldReader = {
    field(source, coerce, fallback) {
      const found = lookup(record, source)
      if (!found) return fallback
      try {
        return coerce(found.raw)
      } catch (err) {
        issues.push({ schema: schema.name, index, field: found.name, raw: found.raw, reason: reasonOf(err) })
        return fallback
      }
    },
    required(source, coerce) {
      const found = lookup(record, source)
      const label = sourceNames(source).join('|')
      if (!found) {
        throw new NormalizationError(schema.name, label, index, undefined, 'required attribute missing')
      }
      try {
        return coerce(found.raw)
      } catch (err) {
        throw new NormalizationError(schema.name, found.name, index, found.raw, reasonOf(err))
      }
    },
    has(source) {
      return lookup(record, source) !== null
    },
  }
  return schema.map(reader)
}

// Normalize a reply; rejected records are left out, order is preserved
export function normalize<T>(records: readonly RawRecord[], schema: Schema<T>): NormalizeResult<T> {
  const result: NormalizeResult<T> = { items: [], issues: [], rejected: [] }

  records.forEach((record, index) => {
    const issues: NormalizationIssue[] = []
    try {
      result.items.push(normalizeRecord(record, schema, index, issues))
      result.issues.push(...issues)
    } catch (err) {
      if (!(err instanceof NormalizationError)) throw err
      result.rejected.push(err)
    }
  })

  return result
}

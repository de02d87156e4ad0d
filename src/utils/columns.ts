import { z } from 'zod';
import { Row } from '../config/database';
import { SerializationError } from './errors';

// node-postgres hands back NUMERIC and BIGINT as strings, TIMESTAMPTZ as Date
// and JSONB already parsed; other drivers may return text for any of them.

function toNumber(value: unknown): unknown {
  return typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
}

function toIsoString(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? value : parsed.toISOString();
  }
  return value;
}

// Text that is not JSON stays a string, which the object and list schemas reject
function parseJsonText(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

const isAbsent = (value: unknown) => value === null || value === undefined;

export const decimal = z.preprocess(toNumber, z.number().finite());
export const nullableDecimal = z.preprocess((v) => (isAbsent(v) ? null : toNumber(v)), z.number().finite().nullable());
export const integer = z.preprocess(toNumber, z.number().int());
export const nullableInteger = z.preprocess((v) => (isAbsent(v) ? null : toNumber(v)), z.number().int().nullable());
export const timestamp = z.preprocess(toIsoString, z.string().datetime());
export const nullableTimestamp = z.preprocess((v) => (isAbsent(v) ? null : toIsoString(v)), z.string().datetime().nullable());
export const nullableText = z.string().nullable().default(null);
export const jsonObject = z.preprocess(
  (v) => (isAbsent(v) ? null : parseJsonText(v)),
  z.record(z.unknown()).nullable()
);

/** List columns: a missing value reads as `[]`, never `null`. */
export const stringList = z.preprocess(
  (v) => (isAbsent(v) ? [] : parseJsonText(v)),
  z.array(z.string())
);

export const unitInterval = z.number().min(0).max(1);

export function encodeList(values: readonly string[] | null | undefined): string {
  return JSON.stringify(values ?? []);
}

export function encodeJson(value: Record<string, unknown> | null | undefined): string | null {
  return value ? JSON.stringify(value) : null;
}

export function decodeRow<S extends z.ZodTypeAny>(schema: S, row: Row, table: string): z.output<S> {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new SerializationError(table, detail);
  }
  return parsed.data;
}

export function decodeRows<S extends z.ZodTypeAny>(schema: S, rows: Row[], table: string): z.output<S>[] {
  return rows.map((row) => decodeRow(schema, row, table));
}

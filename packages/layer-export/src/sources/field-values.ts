/**
 * Conversion of driver values into tagged field values
 */

import type { FieldValue } from '../core/types.js';
import { fromDate, parseTimestampText } from '../transformation/timestamp.js';

/**
 * How a column was declared, where the driver knows
 */
export type FieldHint = 'boolean' | 'timestamp' | 'none';

/**
 * Classify a declared SQL column type
 */
export function hintFromDeclaredType(declared: string): FieldHint {
  const type = declared.trim().toUpperCase();
  if (type === 'BOOLEAN') return 'boolean';
  if (type === 'DATE' || type === 'DATETIME' || type === 'TIMESTAMP') return 'timestamp';
  return 'none';
}

function fromBigInt(value: bigint, hint: FieldHint): FieldValue {
  if (hint === 'boolean') {
    return { kind: 'boolean', value: value !== 0n };
  }
  const asNumber = Number(value);
  if (Number.isSafeInteger(asNumber)) {
    return { kind: 'number', value: asNumber };
  }
  // Outside the float64-exact range: keep every digit as text
  return { kind: 'string', value: value.toString() };
}

/**
 * Tag one raw driver value
 */
export function toFieldValue(raw: unknown, hint: FieldHint = 'none'): FieldValue {
  if (raw === null || raw === undefined) {
    return { kind: 'null' };
  }
  if (raw instanceof Date) {
    return Number.isNaN(raw.getTime())
      ? { kind: 'null' }
      : { kind: 'timestamp', value: fromDate(raw) };
  }
  if (typeof raw === 'bigint') {
    return fromBigInt(raw, hint);
  }
  if (typeof raw === 'number') {
    if (hint === 'boolean') return { kind: 'boolean', value: raw !== 0 };
    return Number.isFinite(raw) ? { kind: 'number', value: raw } : { kind: 'null' };
  }
  if (typeof raw === 'boolean') {
    return { kind: 'boolean', value: raw };
  }
  if (typeof raw === 'string') {
    if (hint === 'timestamp') {
      const ts = parseTimestampText(raw);
      if (ts) return { kind: 'timestamp', value: ts };
    }
    return { kind: 'string', value: raw };
  }
  if (raw instanceof Uint8Array) {
    return { kind: 'string', value: Buffer.from(raw).toString('base64') };
  }
  return { kind: 'string', value: String(raw) };
}

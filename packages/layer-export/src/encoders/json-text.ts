/**
 * JSON text writer over ordered entries
 *
 * Record attributes are written from their `[name, value]` pairs, never
 * through a plain object: object keys that look like integers would be
 * hoisted ahead of the others and a `__proto__` key would not become a
 * property at all.
 */

/**
 * Object whose keys are written in exactly the given order
 */
export class OrderedObject {
  constructor(readonly entries: ReadonlyArray<readonly [string, unknown]>) {}
}

/**
 * `indent` spaces per level as `JSON.stringify(value, null, indent)` lays
 * it out, or `'inline'` for one line with `", "` and `": "` separators
 */
export type JsonLayout = number | 'inline';

function entriesOf(value: object): ReadonlyArray<readonly [string, unknown]> {
  if (value instanceof OrderedObject) return value.entries;
  return Object.entries(value);
}

function scalarText(value: unknown): string {
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : 'null';
  return JSON.stringify(value) ?? 'null';
}

function write(value: unknown, layout: JsonLayout, depth: number): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value !== 'object') return scalarText(value);

  const isArray = Array.isArray(value);
  const members: string[] = isArray
    ? value.map((item: unknown) => write(item, layout, depth + 1))
    : entriesOf(value)
        .filter(([, member]) => member !== undefined)
        .map(
          ([key, member]) => `${JSON.stringify(key)}: ${write(member, layout, depth + 1)}`
        );

  const [open, close] = isArray ? ['[', ']'] : ['{', '}'];
  if (members.length === 0) return `${open}${close}`;
  if (layout === 'inline') return `${open}${members.join(', ')}${close}`;

  const inner = '\n' + ' '.repeat(layout * (depth + 1));
  const outer = '\n' + ' '.repeat(layout * depth);
  return `${open}${inner}${members.join(`,${inner}`)}${outer}${close}`;
}

/**
 * Serialize plain values, arrays, plain objects and `OrderedObject`s
 */
export function writeJson(value: unknown, layout: JsonLayout): string {
  return write(value, layout, 0);
}

import { DecodeError } from './errors';
import { logDebug } from './logger';

/**
 * A decoded JSON document. Dispatch on `kind` instead of inspecting runtime types.
 */
export type JsonValue =
  | { kind: 'null' }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'array'; items: readonly JsonValue[] }
  | { kind: 'object'; entries: ReadonlyMap<string, JsonValue> };

export type JsonKind = JsonValue['kind'];

// Deepest nesting of arrays and objects a document may have
export const MAX_DEPTH = 1000;

const JSON_WHITESPACE = new Set([' ', '\t', '\n', '\r']);
const SCALAR_TERMINATORS = new Set([',', ':', '[', ']', '{', '}', '"']);

/**
 * Returns the text of the first JSON value in `text`, leaving out anything after it.
 * Brackets inside strings are skipped; the slice itself is not validated.
 */
export function sliceFirstValue(text: string): string {
  let start = 0;
  while (start < text.length && JSON_WHITESPACE.has(text[start])) start++;
  if (start === text.length) {
    throw new DecodeError('unexpected end of JSON input');
  }

  const opener = text[start];
  if (opener === '{' || opener === '[') {
    let depth = 0;
    let inString = false;
    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (ch === '\\') i++;
        else if (ch === '"') inString = false;
        continue;
      }
      if (ch === '"') inString = true;
      else if (ch === '{' || ch === '[') depth++;
      else if (ch === '}' || ch === ']') {
        depth--;
        if (depth === 0) return text.slice(start, i + 1);
      }
    }
    return text.slice(start);
  }

  if (opener === '"') {
    for (let i = start + 1; i < text.length; i++) {
      if (text[i] === '\\') i++;
      else if (text[i] === '"') return text.slice(start, i + 1);
    }
    return text.slice(start);
  }

  let end = start;
  while (end < text.length && !JSON_WHITESPACE.has(text[end]) && !SCALAR_TERMINATORS.has(text[end])) end++;
  // A lone delimiter still has to reach JSON.parse so it reports the real token
  return text.slice(start, Math.max(end, start + 1));
}

/**
 * Converts an untyped `JSON.parse` result into a JsonValue.
 *
 * @param depth nesting level of `value`; the outermost array or object is level 1
 * @throws DecodeError when arrays and objects nest deeper than {@link MAX_DEPTH}
 */
export function toJsonValue(value: unknown, depth = 1): JsonValue {
  if (value === null) return { kind: 'null' };
  if (typeof value === 'object' && depth > MAX_DEPTH) {
    throw new DecodeError('exceeded max depth');
  }
  if (Array.isArray(value)) {
    return { kind: 'array', items: value.map(item => toJsonValue(item, depth + 1)) };
  }
  switch (typeof value) {
    case 'boolean': return { kind: 'boolean', value };
    case 'number': return { kind: 'number', value };
    case 'string': return { kind: 'string', value };
    case 'object': {
      const entries = new Map<string, JsonValue>();
      for (const [key, item] of Object.entries(value)) {
        entries.set(key, toJsonValue(item, depth + 1));
      }
      return { kind: 'object', entries };
    }
    default:
      throw new DecodeError(`unsupported value of type ${typeof value}`);
  }
}

/**
 * Decodes the first JSON value of `text`. Trailing data is ignored.
 *
 * @throws DecodeError when the input is empty, malformed or nested too deeply
 */
export function decodeJson(text: string): JsonValue {
  const slice = sliceFirstValue(text);
  let parsed: unknown;
  try {
    parsed = JSON.parse(slice);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DecodeError(message, { cause: error });
  }
  const decoded = toJsonValue(parsed);
  logDebug('decode', 'Decoded JSON document', {
    kind: decoded.kind,
    consumedChars: slice.length,
    inputChars: text.length,
  });
  return decoded;
}

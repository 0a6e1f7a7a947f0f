// Utilities for turning arbitrary JSON keys into C++ identifiers

// Trailing key segments rendered fully upper-case: foo_id -> fooID
const UPPERCASE_FIXUPS: ReadonlySet<string> = new Set(['id', 'url']);

const LETTER = /^\p{L}$/u;
const DIGIT = /^\p{Nd}$/u;
const WHITE_SPACE = /^\p{White_Space}$/u;
const ASCII_WORD = /^[0-9A-Za-z_]$/;

function isLetter(ch: string): boolean {
  return LETTER.test(ch);
}

function isDigit(ch: string): boolean {
  return DIGIT.test(ch);
}

/**
 * Whether a rune starts a new word for the casing passes.
 * ASCII runes other than [0-9A-Za-z_] are separators; beyond ASCII only whitespace is.
 */
export function isSeparator(ch: string): boolean {
  const codePoint = ch.codePointAt(0) ?? 0;
  if (codePoint <= 0x7f) {
    return !ASCII_WORD.test(ch);
  }
  if (isLetter(ch) || isDigit(ch)) {
    return false;
  }
  return WHITE_SPACE.test(ch);
}

// [first, last, delta] code point ranges whose one-rune case mapping differs
// from what toUpperCase/toLowerCase give; delta 0 keeps the rune
type CaseRange = readonly [first: number, last: number, delta: number];

// Greek letters with ypogegrammeni map to their capital with prosgegrammeni
const IOTA_SUBSCRIPT_UPPER: readonly CaseRange[] = [
  [0x1f80, 0x1f87, 8], [0x1f90, 0x1f97, 8], [0x1fa0, 0x1fa7, 8],
  [0x1fb3, 0x1fb3, 9], [0x1fc3, 0x1fc3, 9], [0x1ff3, 0x1ff3, 9],
];

const UPPER_RANGES: readonly CaseRange[] = IOTA_SUBSCRIPT_UPPER;

const TITLE_RANGES: readonly CaseRange[] = [
  // DŽ, LJ, NJ and DZ digraphs have their own titlecase form
  [0x01c4, 0x01c4, 1], [0x01c5, 0x01c5, 0], [0x01c6, 0x01c6, -1],
  [0x01c7, 0x01c7, 1], [0x01c8, 0x01c8, 0], [0x01c9, 0x01c9, -1],
  [0x01ca, 0x01ca, 1], [0x01cb, 0x01cb, 0], [0x01cc, 0x01cc, -1],
  [0x01f1, 0x01f1, 1], [0x01f2, 0x01f2, 0], [0x01f3, 0x01f3, -1],
  // Georgian Mkhedruli is its own titlecase
  [0x10d0, 0x10fa, 0], [0x10fd, 0x10ff, 0],
  ...IOTA_SUBSCRIPT_UPPER,
  [0x1f88, 0x1f8f, 0], [0x1f98, 0x1f9f, 0], [0x1fa8, 0x1faf, 0],
  [0x1fbc, 0x1fbc, 0], [0x1fcc, 0x1fcc, 0], [0x1ffc, 0x1ffc, 0],
];

const LOWER_RANGES: readonly CaseRange[] = [
  // İ
  [0x0130, 0x0130, 0x0069 - 0x0130],
];

function caseMapper(ranges: readonly CaseRange[], fallback: (rune: string) => string): (rune: string) => string {
  return rune => {
    const codePoint = rune.codePointAt(0) ?? 0;
    const range = ranges.find(([first, last]) => codePoint >= first && codePoint <= last);
    return range === undefined ? fallback(rune) : String.fromCodePoint(codePoint + range[2]);
  };
}

const toUpper = caseMapper(UPPER_RANGES, rune => rune.toUpperCase());
const toTitle = caseMapper(TITLE_RANGES, rune => rune.toUpperCase());
const toLower = caseMapper(LOWER_RANGES, rune => rune.toLowerCase());

// Case mappings that expand a rune (e.g. 'ß' -> 'SS') leave it unchanged
function mapRune(ch: string, map: (rune: string) => string): string {
  const mapped = map(ch);
  return Array.from(mapped).length === 1 ? mapped : ch;
}

function mapRunes(s: string, map: (rune: string) => string): string {
  return Array.from(s, ch => mapRune(ch, map)).join('');
}

/**
 * Applies `map` to every rune that follows a separator. The start of the
 * string counts as following one.
 */
function mapAfterSeparator(s: string, map: (rune: string) => string): string {
  let prev = ' ';
  let out = '';
  for (const ch of s) {
    out += isSeparator(prev) ? mapRune(ch, map) : ch;
    prev = ch;
  }
  return out;
}

function titleCase(part: string): string {
  return mapAfterSeparator(part, toTitle);
}

function softCamel(s: string): string {
  return mapAfterSeparator(s, toLower);
}

function sanitize(s: string): string {
  return Array.from(s, (ch, i) => {
    const ok = i === 0 ? isLetter(ch) : isLetter(ch) || isDigit(ch);
    return ok ? ch : '_';
  }).join('');
}

function assembleName(key: string): string {
  const parts = key.split('_').map(titleCase);
  const last = parts[parts.length - 1];
  if (UPPERCASE_FIXUPS.has(mapRunes(last, toLower))) {
    parts[parts.length - 1] = mapRunes(last, toUpper);
  }
  return sanitize(parts.join(''));
}

/**
 * Formats a JSON key as a struct type name.
 *
 * @example
 * formatTypeName('quest_id') // 'QuestID'
 */
export function formatTypeName(key: string): string {
  return assembleName(key) || '_';
}

/**
 * Formats a JSON key as a struct field identifier.
 *
 * @example
 * formatFieldName('quest_id')   // 'questID'
 * formatFieldName('FloorCount') // 'floorCount'
 */
export function formatFieldName(key: string): string {
  return softCamel(assembleName(key)) || '_';
}

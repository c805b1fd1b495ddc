/**
 * String helpers shared by the provider clients: accent folding, markup
 * removal, whitespace cleanup and fuzzy comparison of names and titles.
 * All functions are pure.
 */

// Mark, control, format, modifier-letter and symbol characters left after NFKD.
const DROPPED_CATEGORIES = /[\p{Mn}\p{Cc}\p{Cf}\p{Lm}\p{So}]/u;

export const normalizeNfkc = (text: string): string => text.normalize('NFKC');

/**
 * Removes diacritics and symbol characters. Characters in `excludeChars`
 * (`ñÑ` by default) are kept as they are.
 */
export const deaccentText = (text: string, excludeChars = 'ñÑ'): string => {
  const kept = new Set(Array.from(excludeChars));
  let output = '';
  for (const char of Array.from(normalizeNfkc(text))) {
    if (kept.has(char)) {
      output += char;
      continue;
    }
    for (const part of Array.from(char.normalize('NFKD'))) {
      if (!DROPPED_CATEGORIES.test(part)) output += part;
    }
  }
  return normalizeNfkc(output);
};

export const normalizeWhitespace = (value: string): string => value.replace(/\s+/g, ' ').trim();

const MARKUP_RULES: Array<[RegExp, string]> = [
  [/<!--[\s\S]*?-->/g, ' '],
  [/<ref[^>]*\/>/gi, ' '],
  [/<ref[^>]*>[\s\S]*?<\/ref>/gi, ' '],
  [/<\/?[a-z][^<>]*>/gi, ' '],
  [/\{\{[^{}]*\}\}/g, ' '],
  [/\[\[(?:[^[\]|]*\|)?([^[\]]*)\]\]/g, '$1'],
  [/\[https?:\/\/[^\s\]]+\s([^\]]+)\]/g, '$1'],
  [/'{2,}/g, ''],
];

const applyMarkupRules = (text: string): string =>
  MARKUP_RULES.reduce((current, [pattern, replacement]) => current.replace(pattern, replacement), text);

/**
 * Drops HTML tags, comments, references, templates and emphasis quotes, and
 * keeps the visible text of wiki links. Rules repeat until nothing changes so
 * nested templates and links unwrap completely; every rule that matches
 * shortens the text, so the loop ends.
 */
export const stripMarkup = (text: string): string => {
  let current = text;
  let next = applyMarkupRules(current);
  while (next !== current) {
    current = next;
    next = applyMarkupRules(current);
  }
  return current;
};

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/** Decodes named basic entities and numeric references. Single pass: `&amp;lt;` yields `&lt;`. */
export const decodeHtmlEntities = (text: string): string =>
  text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === '#') {
      const codePoint =
        entity[1] === 'x' || entity[1] === 'X' ? parseInt(entity.slice(2), 16) : parseInt(entity.slice(1), 10);
      return Number.isFinite(codePoint) && codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : match;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });

export interface NormalizeTextOptions {
  deaccent?: boolean;
  lowercase?: boolean;
}

/**
 * NFKC, optional case and accent folding, markup removal, whitespace
 * collapse. Applying it twice gives the same result as applying it once.
 */
export const normalizeText = (text: string, options: NormalizeTextOptions = {}): string => {
  let output = normalizeNfkc(text);
  if (options.lowercase) output = output.toLowerCase();
  if (options.deaccent) output = deaccentText(output);
  return normalizeWhitespace(normalizeNfkc(stripMarkup(output)));
};

// MARC subfield delimiters as VIAF prints them (`$d1547-1616`, `‡aCervantes`).
const SUBFIELD_DELIMITER = /(?<=^|[\s,.;:)])[$‡]([a-z])/;
const NAME_SUBFIELDS = new Set(['a', 'b']);

/** Keeps the text before any subfield code and the name subfields; dates, titles and fuller forms go. */
const nameSubfields = (heading: string): string => {
  const parts = heading.split(SUBFIELD_DELIMITER);
  let output = parts[0];
  // split() with a capture group yields [lead, code, text, code, text, ...]
  for (let i = 1; i < parts.length; i += 2) {
    if (NAME_SUBFIELDS.has(parts[i])) output += ` ${parts[i + 1] ?? ''}`;
  }
  return output;
};

const sanitizeNamePart = (value: string): string =>
  normalizeWhitespace(
    value
      .replace(/\(.*?\)/g, ' ')
      .replace(/\b\d{3,4}(-\d{2,4})?\b/g, ' ')
      .replace(/[\s,;:/-]+$/, '')
      // "Doyle." loses its period, the initial in "C. S." keeps it
      .replace(/(\p{L}{2,})\.$/u, '$1'),
  );

/**
 * VIAF headings come as "Last, First Middle, dates", optionally with MARC
 * subfield codes; this returns "First Middle Last".
 */
export const normalizePersonalName = (value: string): string => {
  const cleaned = sanitizeNamePart(nameSubfields(value));
  if (!cleaned) return '';

  const [surname, ...given] = cleaned
    .split(',')
    .map((segment) => sanitizeNamePart(segment))
    .filter(Boolean);
  if (given.length === 0) return cleaned;
  return normalizeWhitespace(`${given.join(' ')} ${surname}`);
};

export const titleToKey = (title: string): string => normalizeWhitespace(title).replace(/ /g, '_');

export const keyToTitle = (key: string): string => normalizeWhitespace(key.replace(/_/g, ' '));

interface MatchBlock {
  a: number;
  b: number;
  size: number;
}

const longestMatch = <T>(a: T[], b: T[], aLo: number, aHi: number, bLo: number, bHi: number): MatchBlock => {
  let best: MatchBlock = { a: aLo, b: bLo, size: 0 };
  let lengths = new Map<number, number>();
  for (let i = aLo; i < aHi; i++) {
    const next = new Map<number, number>();
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const size = (lengths.get(j - 1) ?? 0) + 1;
      next.set(j, size);
      if (size > best.size) best = { a: i - size + 1, b: j - size + 1, size };
    }
    lengths = next;
  }
  return best;
};

const countMatches = <T>(a: T[], b: T[], aLo: number, aHi: number, bLo: number, bHi: number): number => {
  if (aLo >= aHi || bLo >= bHi) return 0;
  const block = longestMatch(a, b, aLo, aHi, bLo, bHi);
  if (block.size === 0) return 0;
  return (
    block.size +
    countMatches(a, b, aLo, block.a, bLo, block.b) +
    countMatches(a, b, block.a + block.size, aHi, block.b + block.size, bHi)
  );
};

/** Ratcliff/Obershelp similarity: twice the matched elements over the total length, in [0, 1]. */
export const sequenceRatio = <T>(a: T[], b: T[]): number => {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * countMatches(a, b, 0, a.length, 0, b.length)) / total;
};

export interface SimilarityOptions {
  deaccent?: boolean;
  lowercase?: boolean;
  /** Sort the words of both strings before comparing. */
  sortTokens?: boolean;
  /** Compare characters (default) or whole words. */
  mode?: 'char' | 'word';
  /** Words dropped before comparing. */
  stopWords?: Iterable<string>;
}

export const similarity = (a: string, b: string, options: SimilarityOptions = {}): number => {
  const prepare = (value: string): string[] => {
    let text = value;
    if (options.deaccent) text = deaccentText(text);
    if (options.lowercase) text = text.toLowerCase();
    const stops = new Set(options.stopWords ?? []);
    let words = normalizeWhitespace(text)
      .split(' ')
      .filter((word) => word && !stops.has(word));
    if (options.sortTokens) words = [...words].sort();
    return options.mode === 'word' ? words : Array.from(words.join(' '));
  };
  return sequenceRatio(prepare(a), prepare(b));
};

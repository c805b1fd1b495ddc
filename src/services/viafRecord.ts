import { asNumber, asRecord, asRecordList, asString, isRecord, JsonRecord, textOf, toList } from '../utils/json';

/** A VIAF cluster record as returned by `viaf.json`, with namespace prefixes removed. */
export type ViafRecord = JsonRecord;

/** Library code (`LC`, `BNE`, `DNB`...) to that library's record id. */
export type SourceIds = Record<string, string>;

export interface SourceHeading {
  heading: string;
  id: string;
}

export interface ViafSummary {
  viafId: string;
  gender: string;
  dates: string;
  sources: Record<string, SourceIds>;
  sourcesX400: Record<string, SourceIds>;
  titles: string[];
  occupations: string[];
  coauthors: Record<string, number>;
  wikipedias: string[];
}

export interface AccessorOptions {
  /** NFKC-normalize returned text (default true). */
  nfkc?: boolean;
}

const OCCUPATION_SOURCES = new Set(['JPG', 'LC', 'BNE']);
const NAMESPACE_PREFIX = /^ns\d+:/;
const WIKIPEDIA_URL = /^https?:\/\/[^.]+\.wikipedia\.org/;

const normalize = (value: string, options: AccessorOptions): string =>
  options.nfkc === false ? value : value.normalize('NFKC');

/** VIAF serializes XML to JSON and keeps prefixes such as `ns2:`; this drops them at every depth. */
export const stripNamespaces = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(stripNamespaces);
  if (!isRecord(value)) return value;
  const output: JsonRecord = {};
  for (const [key, child] of Object.entries(value)) {
    output[key.replace(NAMESPACE_PREFIX, '')] = stripNamespaces(child);
  }
  return output;
};

export const toViafRecord = (value: unknown): ViafRecord => asRecord(stripNamespaces(value));

export const getViafId = (record: ViafRecord): string => textOf(record.viafID);

export const isPersonal = (record: ViafRecord): boolean => textOf(record.nameType) === 'Personal';

export const getTitles = (record: ViafRecord, options: AccessorOptions = {}): string[] => {
  const works = asRecord(record.titles).work;
  const titles: string[] = [];
  for (const work of asRecordList(works)) {
    for (const title of toList(work.title)) {
      const text = textOf(title);
      if (text) titles.push(normalize(text, options));
    }
  }
  return titles;
};

/** `a` is female and `b` male in VIAF fixed fields; other codes pass through. */
export const getGender = (record: ViafRecord): string => {
  if (!isRecord(record.fixed)) return '';
  const code = textOf(record.fixed.gender);
  if (code === 'a') return 'female';
  if (code === 'b') return 'male';
  return code;
};

const yearOf = (value: unknown): string => {
  const year = textOf(value).slice(0, 4);
  return year === '0' ? '' : year;
};

/** `birthYear:deathYear`, either side empty when unknown. */
export const getDates = (record: ViafRecord): string => `${yearOf(record.birthDate)}:${yearOf(record.deathDate)}`;

export const getOccupations = (record: ViafRecord, options: AccessorOptions = {}): string[] => {
  const occupations: string[] = [];
  for (const entry of asRecordList(asRecord(record.occupation).data)) {
    const sources = toList(asRecord(entry.sources).s).map(textOf);
    if (sources.some((source) => OCCUPATION_SOURCES.has(source))) {
      occupations.push(normalize(textOf(entry.text), options));
    }
  }
  return occupations;
};

const parseSourceIds = (value: unknown): SourceIds => {
  const ids: SourceIds = {};
  for (const sid of toList(asRecord(value).sid)) {
    const [library, id] = textOf(sid).split('|');
    if (library && id !== undefined) ids[library] = id;
  }
  return ids;
};

/** Main headings, each with the libraries (and their record ids) that use it. */
export const getSources = (record: ViafRecord, options: AccessorOptions = {}): Record<string, SourceIds> => {
  const headings: Record<string, SourceIds> = {};
  for (const entry of asRecordList(asRecord(record.mainHeadings).data)) {
    headings[normalize(textOf(entry.text), options)] = parseSourceIds(entry.sources);
  }
  return headings;
};

export const getMainHeadings = (record: ViafRecord, options: AccessorOptions = {}): string[] =>
  Object.keys(getSources(record, options));

/** Heading and id each requested library (`LC|BNE`) uses for this cluster, or null. */
export const getSourceIds = (
  record: ViafRecord,
  libraries: string,
  options: AccessorOptions = {},
): Record<string, SourceHeading | null> => {
  const wanted = libraries.split('|').filter(Boolean);
  const output: Record<string, SourceHeading | null> = {};
  for (const library of wanted) output[library] = null;
  for (const [heading, ids] of Object.entries(getSources(record, options))) {
    for (const library of wanted) {
      const id = ids[library];
      if (id !== undefined) output[library] = { heading, id };
    }
  }
  return output;
};

/** Alternate (`x400`) or related (`x500`) headings with their sources. */
export const getSourcesX400 = (
  record: ViafRecord,
  field: 'x400' | 'x500' = 'x400',
  options: AccessorOptions = {},
): Record<string, SourceIds> => {
  const headings: Record<string, SourceIds> = {};
  const container = record[`${field}s`];
  if (!isRecord(container)) return headings;
  for (const entry of asRecordList(container[field])) {
    const text = asString(asRecord(entry.datafield).normalized);
    if (!text) continue;
    headings[normalize(text, options)] = parseSourceIds(entry.sources);
  }
  return headings;
};

export const getCoauthors = (record: ViafRecord, options: AccessorOptions = {}): Record<string, number> => {
  const coauthors: Record<string, number> = {};
  for (const entry of asRecordList(asRecord(record.coauthors).data)) {
    coauthors[normalize(textOf(entry.text), options)] = asNumber(entry['@count']);
  }
  return coauthors;
};

export const getWikipediaLinks = (record: ViafRecord): string[] => {
  const links = asRecord(record.xLinks).xLink;
  return toList(links)
    .map(textOf)
    .filter((url) => WIKIPEDIA_URL.test(url));
};

export const getAllInfo = (record: ViafRecord, options: AccessorOptions = {}): ViafSummary => ({
  viafId: getViafId(record),
  gender: getGender(record),
  dates: getDates(record),
  sources: getSources(record, options),
  sourcesX400: getSourcesX400(record, 'x400', options),
  titles: getTitles(record, options),
  occupations: getOccupations(record, options),
  coauthors: getCoauthors(record, options),
  wikipedias: getWikipediaLinks(record),
});

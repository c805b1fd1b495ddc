import { DOMParser } from '@xmldom/xmldom';
import { InvalidArgumentError, ResponseFormatError } from '../utils/errors';
import { asNumber, asRecord, asString, isRecord, JsonRecord, textOf, toList } from '../utils/json';
import { logger } from '../utils/logger';
import { deaccentText } from '../utils/textNormalization';
import { fetchText, parseJsonText } from './httpClient';
import { getMainHeadings, toViafRecord, ViafRecord } from './viafRecord';

export const VIAF_BASE_URL = 'https://viaf.org';
/** Maximum `maximumRecords` VIAF accepts per SRU request. */
export const VIAF_PAGE_LIMIT = 250;

export type ViafSchema = 'JSON' | 'brief';
export type ViafNameIndex = 'personalNames' | 'names' | 'mainHeadingEl';
export type ViafRecordStatus = 'original' | 'redirect' | 'scavenged';

export interface ViafSuggestion {
  term: string;
  displayForm: string;
  nameType: string;
  viafId: string;
  /** Library code (lowercase, as VIAF sends it) to record id. */
  sources: Record<string, string>;
}

export interface ViafSearchOptions {
  schema?: ViafSchema;
  /** 1-based position of the first record. */
  start?: number;
  /** Maximum number of records to collect across pages. */
  max?: number;
}

export interface ViafCheckedRecord {
  status: ViafRecordStatus;
  viafId: string;
  record: ViafRecord;
}

export interface MarcSubfield {
  code: string;
  value: string;
}

export interface MarcDataField {
  tag: string;
  ind1: string;
  ind2: string;
  subfields: MarcSubfield[];
}

export interface MarcRecord {
  leader: string;
  controlFields: Record<string, string>;
  dataFields: MarcDataField[];
}

const SCHEMA_URIS: Record<ViafSchema, string> = {
  JSON: 'info:srw/schema/1/JSON',
  brief: 'http://viaf.org/BriefVIAFCluster',
};

const SUGGESTION_FIELDS = new Set(['term', 'displayForm', 'nametype', 'viafid', 'score', 'recordID']);
const MAX_REDIRECTS = 5;

/**
 * Cluster ids exceed Number.MAX_SAFE_INTEGER; quote them (`viafID` in
 * records, `viafid` in AutoSuggest) before JSON.parse rounds them.
 */
export const parseViafJson = (text: string, url?: string): unknown =>
  parseJsonText(text.replace(/"((?:ns\d+:)?viafid)":\s*(\d+)/gi, '"$1":"$2"'), url);

const toSuggestion = (entry: JsonRecord): ViafSuggestion => {
  const sources: Record<string, string> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!SUGGESTION_FIELDS.has(key) && typeof value === 'string') sources[key] = value;
  }
  return {
    term: asString(entry.term),
    displayForm: asString(entry.displayForm),
    nameType: asString(entry.nametype),
    viafId: asString(entry.viafid),
    sources,
  };
};

/** Name suggestions from VIAF AutoSuggest, or null when VIAF has none. */
export const autosuggest = async (
  author: string,
  options: { deaccent?: boolean } = {},
): Promise<ViafSuggestion[] | null> => {
  const query = options.deaccent === false ? author : deaccentText(author);
  const url = `${VIAF_BASE_URL}/viaf/AutoSuggest`;
  const payload = parseViafJson(await fetchText(url, { params: { query }, accept: 'application/json' }), url);
  if (!isRecord(payload)) {
    throw new ResponseFormatError('AutoSuggest response is not an object', url);
  }
  if (!Array.isArray(payload.result)) return null;
  return payload.result.filter(isRecord).map(toSuggestion);
};

export const autosuggestPersonal = async (
  author: string,
  options: { deaccent?: boolean } = {},
): Promise<ViafSuggestion[] | null> => {
  const suggestions = await autosuggest(author, options);
  if (suggestions === null) return null;
  return suggestions.filter((suggestion) => suggestion.nameType === 'personal');
};

const extractRecords = (response: JsonRecord): JsonRecord[] => {
  const records: JsonRecord[] = [];
  for (const item of toList(response.records)) {
    if (!isRecord(item)) continue;
    for (const record of toList(item.record ?? item)) {
      if (!isRecord(record)) continue;
      const data = asRecord(record.recordData);
      records.push(isRecord(data.VIAFCluster) ? data.VIAFCluster : data);
    }
  }
  return records;
};

/**
 * Runs a CQL query against the VIAF SRU search and returns records keyed by
 * VIAF id. Requests repeat with growing `startRecord` until `max` records are
 * collected or the result set is exhausted.
 */
export const searchViaf = async (cql: string, options: ViafSearchOptions = {}): Promise<Record<string, ViafRecord>> => {
  const schema = options.schema ?? 'JSON';
  const start = Math.max(1, options.start ?? 1);
  let remaining = Math.max(1, options.max ?? 30);
  const max = remaining;
  let startRecord = start;
  const url = `${VIAF_BASE_URL}/viaf/search`;
  const output: Record<string, ViafRecord> = {};

  while (remaining > 0) {
    const maximumRecords = Math.min(remaining, VIAF_PAGE_LIMIT);
    const text = await fetchText(url, {
      accept: 'application/json',
      params: {
        httpAccept: 'application/json',
        maximumRecords,
        recordSchema: SCHEMA_URIS[schema],
        startRecord,
        query: cql,
      },
    });
    const payload = toViafRecord(parseViafJson(text, url));
    if (!isRecord(payload.searchRetrieveResponse)) {
      throw new ResponseFormatError('VIAF search response lacks searchRetrieveResponse', url);
    }
    const response = payload.searchRetrieveResponse;
    const total = asNumber(textOf(response.numberOfRecords));
    if (total === 0) break;

    const records = extractRecords(response);
    for (const record of records) {
      const viafId = textOf(record.viafID);
      if (viafId) output[viafId] = record;
    }

    const available = total + 1 - start;
    const collected = Object.keys(output).length;
    if (records.length === 0 || collected >= max || collected >= available) break;
    logger.debug(`VIAF search: ${collected} of ${Math.min(max, available)} records`);
    startRecord += maximumRecords;
    remaining -= maximumRecords;
  }

  return output;
};

const quoteCql = (value: string): string => `"${value.replace(/"/g, "'")}"`;

export const searchAnyField = (text: string, options: ViafSearchOptions & { op?: string } = {}) =>
  searchViaf(`cql.any ${options.op ?? '='} ${quoteCql(text)}`, options);

export const searchByName = (
  name: string,
  options: ViafSearchOptions & { mode?: ViafNameIndex; op?: string } = {},
) => {
  const mode = options.mode ?? 'personalNames';
  if (mode !== 'personalNames' && mode !== 'names' && mode !== 'mainHeadingEl') {
    throw new InvalidArgumentError(`Unknown VIAF name index "${String(mode)}"`);
  }
  return searchViaf(`local.${mode} ${options.op ?? '='} ${quoteCql(name)}`, options);
};

export const searchByTitle = (title: string, options: ViafSearchOptions & { op?: string } = {}) =>
  searchViaf(`local.title ${options.op ?? '='} ${quoteCql(title)}`, options);

const recordUrl = (viafId: string, format: 'viaf.json' | 'viaf.xml'): string =>
  `${VIAF_BASE_URL}/viaf/${encodeURIComponent(viafId.trim())}/${format}`;

export const getRecord = async (viafId: string | number): Promise<ViafRecord> => {
  const url = recordUrl(String(viafId), 'viaf.json');
  const record = toViafRecord(parseViafJson(await fetchText(url, { accept: 'application/json' }), url));
  if (Object.keys(record).length === 0) {
    throw new ResponseFormatError(`VIAF record ${viafId} is empty`, url);
  }
  return record;
};

export const getRecordXml = async (viafId: string | number): Promise<string> =>
  fetchText(recordUrl(String(viafId), 'viaf.xml'), { accept: 'application/xml' });

/**
 * Fetches a cluster and reports whether it is the original, a redirect to
 * a merged cluster (followed) or a scavenged record.
 */
export const checkRecord = async (viafId: string | number): Promise<ViafCheckedRecord> => {
  let currentId = String(viafId);
  let status: ViafRecordStatus = 'original';
  for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
    const record = await getRecord(currentId);
    if (isRecord(record.redirect)) {
      const target = textOf(record.redirect.directto);
      if (!target) throw new ResponseFormatError(`VIAF redirect for ${currentId} has no target`);
      logger.debug(`VIAF ${currentId} redirects to ${target}`);
      currentId = target;
      status = 'redirect';
      continue;
    }
    if (isRecord(record.scavenged)) {
      return { status: 'scavenged', viafId: currentId, record: asRecord(record.scavenged.VIAFCluster) };
    }
    return { status, viafId: currentId, record };
  }
  throw new ResponseFormatError(`Too many VIAF redirects starting at ${viafId}`);
};

/** Preferred (first main) heading of the cluster, after following redirects. */
export const resolveViafName = async (viafId: string | number): Promise<string> => {
  const { record } = await checkRecord(viafId);
  return getMainHeadings(record)[0] ?? '';
};

/** Source record as VIAF processed it, in MARC21-XML; null for an empty id. */
export const getProcessedRecord = async (recordId: string | number, source = 'LC'): Promise<string | null> => {
  const id = String(recordId).trim();
  if (!id) return null;
  const url = `${VIAF_BASE_URL}/processed/${encodeURIComponent(`${source}|${id}`)}`;
  return fetchText(url, { accept: 'application/marc21+xml' });
};

const isElement = (node: Node): node is Element => node.nodeType === 1;

const childElements = (node: Element, localName: string): Element[] => {
  const output: Element[] = [];
  const children = node.childNodes;
  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    if (isElement(child) && child.localName === localName) output.push(child);
  }
  return output;
};

export const parseMarcXml = (xml: string): MarcRecord => {
  const doc = new DOMParser().parseFromString(xml, 'application/xml');
  const records = doc.getElementsByTagNameNS('*', 'record');
  const record = records.length > 0 ? records[0] : null;
  if (!record) {
    throw new ResponseFormatError('MARC21-XML document has no record element');
  }

  const leader = childElements(record, 'leader')[0]?.textContent ?? '';
  const controlFields: Record<string, string> = {};
  for (const field of childElements(record, 'controlfield')) {
    controlFields[field.getAttribute('tag') ?? ''] = field.textContent ?? '';
  }
  const dataFields = childElements(record, 'datafield').map(
    (field): MarcDataField => ({
      tag: field.getAttribute('tag') ?? '',
      ind1: field.getAttribute('ind1') ?? ' ',
      ind2: field.getAttribute('ind2') ?? ' ',
      subfields: childElements(field, 'subfield').map((subfield) => ({
        code: subfield.getAttribute('code') ?? '',
        value: subfield.textContent ?? '',
      })),
    }),
  );

  return { leader, controlFields, dataFields };
};

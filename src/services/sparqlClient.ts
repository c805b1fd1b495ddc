import { DOMParser } from '@xmldom/xmldom';
import { ResponseFormatError } from '../utils/errors';
import { asString, isRecord } from '../utils/json';
import { fetchText, parseJsonText, QueryParams } from './httpClient';

export type SparqlFormat = 'json' | 'xml';

export interface SparqlTerm {
  type: 'uri' | 'literal' | 'bnode' | 'typed-literal';
  value: string;
  lang?: string;
  datatype?: string;
}

export type SparqlBinding = Record<string, SparqlTerm>;

export interface SparqlResults {
  vars: string[];
  bindings: SparqlBinding[];
}

export type SparqlRow = Record<string, string>;

export interface SparqlRequestOptions {
  method?: 'GET' | 'POST';
  format?: SparqlFormat;
  /** Extra request parameters some endpoints expect, e.g. `format=json` on Virtuoso. */
  params?: QueryParams;
}

const ACCEPT_BY_FORMAT: Record<SparqlFormat, string> = {
  json: 'application/sparql-results+json',
  xml: 'application/sparql-results+xml',
};

const TERM_TYPES = new Set(['uri', 'literal', 'bnode', 'typed-literal']);

const toTerm = (value: unknown): SparqlTerm | null => {
  if (!isRecord(value)) return null;
  const type = asString(value.type);
  if (type !== 'uri' && type !== 'literal' && type !== 'bnode' && type !== 'typed-literal') return null;
  const term: SparqlTerm = { type, value: asString(value.value) };
  const lang = asString(value['xml:lang']);
  if (lang) term.lang = lang;
  const datatype = asString(value.datatype);
  if (datatype) term.datatype = datatype;
  return term;
};

export const parseSparqlJson = (payload: unknown): SparqlResults => {
  if (!isRecord(payload) || !isRecord(payload.head) || !isRecord(payload.results)) {
    throw new ResponseFormatError('SPARQL JSON response lacks head/results');
  }
  const rawVars = payload.head.vars;
  const rawBindings = payload.results.bindings;
  if (!Array.isArray(rawVars) || !Array.isArray(rawBindings)) {
    throw new ResponseFormatError('SPARQL JSON response lacks head.vars/results.bindings');
  }

  const vars = rawVars.map((entry) => asString(entry)).filter(Boolean);
  const bindings = rawBindings.map((rawBinding) => {
    const binding: SparqlBinding = {};
    if (!isRecord(rawBinding)) return binding;
    for (const [name, rawTerm] of Object.entries(rawBinding)) {
      const term = toTerm(rawTerm);
      if (term) binding[name] = term;
    }
    return binding;
  });

  return { vars, bindings };
};

export const parseSparqlXml = (text: string): SparqlResults => {
  const doc = new DOMParser().parseFromString(text, 'application/xml');
  const root = doc.documentElement;
  if (!root || root.localName !== 'sparql') {
    throw new ResponseFormatError('SPARQL XML response has no <sparql> root element');
  }

  const vars: string[] = [];
  const variableNodes = root.getElementsByTagName('variable');
  for (let i = 0; i < variableNodes.length; i++) {
    const name = variableNodes[i].getAttribute('name');
    if (name) vars.push(name);
  }

  const bindings: SparqlBinding[] = [];
  const resultNodes = root.getElementsByTagName('result');
  for (let i = 0; i < resultNodes.length; i++) {
    const binding: SparqlBinding = {};
    const bindingNodes = resultNodes[i].getElementsByTagName('binding');
    for (let j = 0; j < bindingNodes.length; j++) {
      const node = bindingNodes[j];
      const name = node.getAttribute('name');
      const valueNode = node.firstElementChild ?? firstElement(node);
      if (!name || !valueNode || !TERM_TYPES.has(valueNode.localName)) continue;
      const term = toTerm({
        type: valueNode.localName,
        value: valueNode.textContent ?? '',
        'xml:lang': valueNode.getAttribute('xml:lang') ?? undefined,
        datatype: valueNode.getAttribute('datatype') ?? undefined,
      });
      if (term) binding[name] = term;
    }
    bindings.push(binding);
  }

  return { vars, bindings };
};

// xmldom 0.8 nodes do not implement firstElementChild.
const firstElement = (node: Element): Element | null => {
  const children = node.childNodes;
  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    if (isElement(child)) return child;
  }
  return null;
};

const isElement = (node: Node): node is Element => node.nodeType === 1;

export const querySparql = async (
  endpoint: string,
  query: string,
  options: SparqlRequestOptions = {},
): Promise<SparqlResults> => {
  const format = options.format ?? 'json';
  const method = options.method ?? 'GET';
  const requestParams: QueryParams = { ...options.params, query };
  const text = await fetchText(endpoint, {
    method,
    accept: ACCEPT_BY_FORMAT[format],
    ...(method === 'GET' ? { params: requestParams } : { form: requestParams }),
  });

  if (format === 'xml') return parseSparqlXml(text);
  return parseSparqlJson(parseJsonText(text, endpoint));
};

/** One plain record per solution; unbound variables come back as empty strings. */
export const bindingsToRows = (results: SparqlResults): SparqlRow[] =>
  results.bindings.map((binding) => {
    const row: SparqlRow = {};
    const names = results.vars.length > 0 ? results.vars : Object.keys(binding);
    for (const name of names) {
      row[name] = binding[name]?.value ?? '';
    }
    return row;
  });

export const escapeSparqlString = (value: string): string =>
  value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r');

/** Splits a `GROUP_CONCAT(...; separator="|")` value. */
export const splitConcat = (value: string | undefined, separator = '|'): string[] => {
  if (!value) return [];
  return value.split(separator).filter(Boolean);
};

export const stripPrefix = (value: string, prefix: string): string =>
  value.startsWith(prefix) ? value.slice(prefix.length) : value;

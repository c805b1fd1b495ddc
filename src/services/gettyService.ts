import { fetchLabelGender, LabelGender } from './authoritySparql';
import { bindingsToRows, escapeSparqlString, querySparql, stripPrefix } from './sparqlClient';

export const GETTY_SPARQL_ENDPOINT = 'https://vocab.getty.edu/sparql';
const ULAN_PREFIX = 'http://vocab.getty.edu/ulan/';

const GENDER_PATTERN = `OPTIONAL {?getty foaf:focus/gvp:biographyPreferred/schema:gender/rdfs:label ?gender.
            FILTER(LANG(?gender)='en'). }`;

/** ULAN artists matching `label` in the full-text index, keyed by ULAN id. */
export const searchGettyLabel = async (label: string): Promise<Record<string, LabelGender>> => {
  const query = `SELECT DISTINCT ?getty ?label ?gender
WHERE {
  ?getty luc:term "${escapeSparqlString(label.trim())}";
         skos:inScheme ulan:;
         gvp:parentStringAbbrev "Persons, Artists";
         gvp:prefLabelGVP/xl:literalForm ?label.
  ${GENDER_PATTERN}
}`;
  const results = await querySparql(GETTY_SPARQL_ENDPOINT, query, { method: 'POST', params: { format: 'json' } });
  const output: Record<string, LabelGender> = {};
  for (const row of bindingsToRows(results)) {
    if (!row.getty) continue;
    output[stripPrefix(row.getty, ULAN_PREFIX)] = { label: row.label ?? '', gender: row.gender ?? '' };
  }
  return output;
};

export const getGettyGender = (
  ulanIds: string | string[],
  options: { chunkSize?: number } = {},
): Promise<Record<string, LabelGender>> =>
  fetchLabelGender(GETTY_SPARQL_ENDPOINT, ulanIds, {
    chunkSize: options.chunkSize ?? 10000,
    idPattern: /^\d+$/,
    subjectVar: 'getty',
    idFromUri: (uri) => stripPrefix(uri, ULAN_PREFIX),
    buildQuery: (chunk) => `SELECT DISTINCT ?getty ?label ?gender
WHERE {
  VALUES ?getty { ${chunk.map((id) => `ulan:${id}`).join(' ')} }
  OPTIONAL {?getty gvp:prefLabelGVP/xl:literalForm ?label}
  ${GENDER_PATTERN}
}`,
  });

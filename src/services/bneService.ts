import { fetchText } from './httpClient';
import { fetchLabelGender, LabelGender } from './authoritySparql';
import { bindingsToRows, escapeSparqlString, querySparql, stripPrefix } from './sparqlClient';

export const BNE_SPARQL_ENDPOINT = 'https://datos.bne.es/sparql';
const BNE_PERSON_URL = 'https://datos.bne.es/persona';
const BNE_RESOURCE_PREFIX = 'https://datos.bne.es/resource/';
const RDA_AGENT_NAMESPACE = 'http://www.rdaregistry.info/Elements/a/';

export interface BnePerson {
  entity: string;
  label: string;
  gender: string;
  birthDate: string;
  deathDate: string;
  occupations: string[];
  titles: string[];
}

/** Turtle description of a BNE person record, or null for an empty id. */
export const getBneTtl = async (bneId: string): Promise<string | null> => {
  const id = bneId.trim().toUpperCase();
  if (!id) return null;
  return fetchText(`${BNE_PERSON_URL}/${encodeURIComponent(id)}.ttl`, { accept: 'text/turtle' });
};

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/** Reads RDA `P50116` (gender) from a BNE Turtle document; empty when absent. */
export const genderFromTtl = (ttl: string): string => {
  const prefix = new RegExp(`@prefix\\s+([\\w-]*):\\s+<${escapeRegExp(RDA_AGENT_NAMESPACE)}>`).exec(ttl);
  if (!prefix) return '';
  const value = new RegExp(`${escapeRegExp(prefix[1])}:P50116\\s+"([^"]+)"`).exec(ttl);
  return value ? value[1] : '';
};

const splitLines = (value: string | undefined): string[] => (value ? value.split('\n').filter(Boolean) : []);

/** Persons whose `rdfs:label` is exactly `name`, with their works and occupations. */
export const searchBneByLabel = async (name: string): Promise<BnePerson[]> => {
  const query = `prefix ns2: <https://datos.bne.es/def/>
prefix ns4: <http://www.rdaregistry.info/Elements/a/>
SELECT DISTINCT ?entity ?label ?genero ?fnac ?fmor
 (GROUP_CONCAT(DISTINCT ?oc;separator="\\n") as ?ocs)
 (GROUP_CONCAT(DISTINCT ?title;separator="\\n") as ?titles)
WHERE {
  ?entity rdfs:label "${escapeSparqlString(name.trim())}" .
  ?entity rdf:type  ns2:C1005 .
  OPTIONAL {?entity ns2:P5001 ?label}
  OPTIONAL {?entity ns4:P50116 ?genero}
  OPTIONAL {?entity ns2:P5010 ?fnac}
  OPTIONAL {?entity ns2:P5011 ?fmor}
  OPTIONAL {?entity ns4:P50104 ?oc}
  OPTIONAL {?bimo   ns2:OP3006|ns2:OP1001|ns2:OP3003 ?entity.
            ?bimo   ns2:P3002|ns2:P1001  ?title.
           }
} GROUP BY ?entity ?label ?genero ?fnac ?fmor`;
  const results = await querySparql(BNE_SPARQL_ENDPOINT, query, { params: { format: 'json' } });
  return bindingsToRows(results).map((row) => ({
    entity: stripPrefix(row.entity ?? '', BNE_RESOURCE_PREFIX),
    label: row.label ?? '',
    gender: row.genero ?? '',
    birthDate: row.fnac ?? '',
    deathDate: row.fmor ?? '',
    occupations: splitLines(row.ocs),
    titles: splitLines(row.titles),
  }));
};

export const getBneGender = (
  bneIds: string | string[],
  options: { chunkSize?: number } = {},
): Promise<Record<string, LabelGender>> =>
  fetchLabelGender(BNE_SPARQL_ENDPOINT, bneIds, {
    chunkSize: options.chunkSize ?? 1500,
    idPattern: /^[a-z]{1,4}\d+$/i,
    subjectVar: 'bne',
    idFromUri: (uri) => stripPrefix(uri, BNE_RESOURCE_PREFIX),
    buildQuery: (chunk) => `prefix ns1: <${BNE_RESOURCE_PREFIX}>
prefix ns4: <${RDA_AGENT_NAMESPACE}>
SELECT DISTINCT ?bne ?label
(GROUP_CONCAT(DISTINCT ?sex;separator="|") as ?gender)
WHERE {
  VALUES ?bne { ${chunk.map((id) => `ns1:${id.toUpperCase()}`).join(' ')} }
  OPTIONAL {?bne rdfs:label ?label.}
  OPTIONAL {?bne ns4:P50116 ?sex.}
} GROUP BY ?bne ?label`,
  });

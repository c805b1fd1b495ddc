import { fetchLabelGender, LabelGender } from './authoritySparql';

export const IDREF_SPARQL_ENDPOINT = 'https://data.idref.fr/sparql';

const IDREF_URI = /^https?:\/\/www\.idref\.fr\/([^/]+)\/id$/;

/** Preferred label and `foaf:gender` of IdRef (SUDOC) authority records. */
export const getIdrefGender = (
  idrefIds: string | string[],
  options: { chunkSize?: number } = {},
): Promise<Record<string, LabelGender>> =>
  fetchLabelGender(IDREF_SPARQL_ENDPOINT, idrefIds, {
    chunkSize: options.chunkSize ?? 1500,
    idPattern: /^\d{8}[\dX]$/i,
    subjectVar: 'sudoc',
    idFromUri: (uri) => IDREF_URI.exec(uri)?.[1] ?? uri,
    buildQuery: (chunk) => `SELECT DISTINCT ?sudoc ?label
(GROUP_CONCAT(DISTINCT ?sex;separator="|") as ?gender)
WHERE {
  VALUES ?sudoc { ${chunk.map((id) => `<http://www.idref.fr/${encodeURIComponent(id)}/id>`).join(' ')} }
  OPTIONAL {?sudoc skos:prefLabel ?label.}
  OPTIONAL {?sudoc foaf:gender ?sex.}
} GROUP BY ?sudoc ?label`,
  });

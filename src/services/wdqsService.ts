import { getClientConfig } from '../config';
import { runInChunks } from '../utils/chunks';
import { InvalidArgumentError, ResponseFormatError } from '../utils/errors';
import { asRecord, asRecordList, asString, isRecord, JsonRecord, toList as asList } from '../utils/json';
import { logger } from '../utils/logger';
import { titleToKey } from '../utils/textNormalization';
import { apiUrl, MEDIAWIKI_TITLE_LIMIT, requestMediaWiki } from './mediaWikiService';
import {
  bindingsToRows,
  escapeSparqlString,
  querySparql,
  SparqlRequestOptions,
  SparqlRow,
  splitConcat,
  stripPrefix,
} from './sparqlClient';

export const WIKIDATA_ENTITY_PREFIX = 'http://www.wikidata.org/entity/';

/** Wikidata properties holding the identifier each library assigns, keyed by the VIAF source code. */
export const AUTHORITY_PROPERTIES: Readonly<Record<string, string>> = {
  VIAF: 'P214',
  LC: 'P244',
  BNE: 'P950',
  ISNI: 'P213',
  JPG: 'P245',
  ULAN: 'P245',
  BNF: 'P268',
  GND: 'P227',
  DNB: 'P227',
  SUDOC: 'P269',
  idRefID: 'P269',
  NTA: 'P1006',
  J9U: 'P8189',
  ELEM: 'P1565',
  NUKAT: 'P1207',
  RERO: 'P3065',
  CAOONL: 'P8179',
  NII: 'P4787',
  BIBSYS: 'P1015',
  NORAF: 'P1015',
  BNC: 'P9984',
  CANTIC: 'P9984',
  PLWABN: 'P7293',
  NLA: 'P409',
  MNCARS: 'P4439',
};

export interface InstanceOfRow {
  entity: string;
  instanceOf: string[];
  /** Present only when an `instanceOf` filter was requested. */
  matches?: boolean;
}

export interface WikipediasRow {
  entity: string;
  instanceOf: string[];
  pageCount: number;
  langs: string[];
  names: string[];
  pages: string[];
}

export interface ValidityRow {
  entity: string;
  valid: boolean;
  instanceOf: string[];
  redirection: string;
}

export interface PropertyValues {
  entities: string[];
  labels: string[];
}

export interface PropertyRow {
  entity: string;
  instanceOf: string[];
  instanceOfLabels: string[];
  properties: Record<string, PropertyValues>;
}

export interface LabelDescriptionRow {
  entity: string;
  labelLang: string;
  label: string;
  descriptionLang: string;
  description: string;
}

export interface EntityMatchRow {
  entity: string;
  label: string;
  description: string;
  instanceOf: string[];
  instanceOfLabels: string[];
}

export interface IdentifierMatchRow extends EntityMatchRow {
  id: string;
}

export type LabelSearchMode = 'exact' | 'startswith' | 'inlabel' | 'cirrus';

const ENTITY_PATTERN = /^[QP]\d+$/;
const PROPERTY_PATTERN = /^P\d+$/;
const LANGUAGE_PATTERN = /^[a-z][a-z0-9]*(?:-[a-z0-9]+)*$/i;
const CLASS_FILTER_PATTERN = /^Q\d+(?:\|Q\d+)*$/;
const CLASS_EXPRESSION_PATTERN = /^Q\d+(?:[|&]Q\d+)*$/;

const toList = (value: string | string[]): string[] => (Array.isArray(value) ? value : [value]);

/**
 * Trims, drops blanks and duplicates (first occurrence wins) and rejects
 * anything that is not a `Q`/`P` identifier.
 */
export const checkEntities = (entities: string | string[]): string[] => {
  const cleaned = toList(entities)
    .map((entity) => entity.trim())
    .filter(Boolean);
  if (cleaned.length === 0) {
    throw new InvalidArgumentError('The list of Wikidata entities is empty');
  }
  const invalid = cleaned.find((entity) => !ENTITY_PATTERN.test(entity));
  if (invalid !== undefined) {
    throw new InvalidArgumentError(`Invalid Wikidata entity "${invalid}"`);
  }
  return Array.from(new Set(cleaned));
};

const checkProperties = (properties: string): string[] => {
  const list = properties
    .split('|')
    .map((property) => property.trim())
    .filter(Boolean);
  if (list.length === 0 || list.some((property) => !PROPERTY_PATTERN.test(property))) {
    throw new InvalidArgumentError(`Invalid Wikidata property list "${properties}"`);
  }
  return list;
};

/** Language codes of a `|` list. They end up in query text, so anything else is rejected. */
const splitLanguages = (value: string | undefined): string[] => {
  const langs = (value ?? '')
    .split('|')
    .map((lang) => lang.trim())
    .filter(Boolean);
  const invalid = langs.find((lang) => !LANGUAGE_PATTERN.test(lang));
  if (invalid !== undefined) {
    throw new InvalidArgumentError(`Invalid language code "${invalid}"`);
  }
  return langs;
};

const checkLangsOrder = (value: string | undefined): string => splitLanguages(value).join('|');

/** `en|es` becomes `en,es`, the syntax the label service expects. */
const toLabelLanguages = (langsOrder: string): string => splitLanguages(langsOrder).join(',');

/** Classes joined by `|` (any of them); empty means no filter. */
const checkClassFilter = (instanceOf: string | undefined): string => {
  const value = instanceOf?.trim() ?? '';
  if (value && !CLASS_FILTER_PATTERN.test(value)) {
    throw new InvalidArgumentError(`Invalid instanceOf filter "${instanceOf}"`);
  }
  return value;
};

const toValues = (entities: string[]): string => entities.map((entity) => `wd:${entity}`).join(' ');

const entityIds = (value: string | undefined): string[] =>
  splitConcat(value).map((item) => stripPrefix(item, WIKIDATA_ENTITY_PREFIX));

const entityId = (value: string | undefined): string => stripPrefix(value ?? '', WIKIDATA_ENTITY_PREFIX);

const classPattern = (instanceOf: string): RegExp => new RegExp(`\\b(?:${instanceOf})\\b`);

const labelService = (langsOrder: string, clauses: string[]): string =>
  `SERVICE wikibase:label {bd:serviceParam wikibase:language "${toLabelLanguages(langsOrder)}".
      ${clauses.join('\n      ')}}`;

const ENTITY_LABEL_CLAUSES = [
  '?entity rdfs:label ?entityLabel.',
  '?entity schema:description ?entityDescription.',
  '?instanc rdfs:label ?instancLabel.',
];

const INSTANCE_LABELS_SELECT = "(GROUP_CONCAT(DISTINCT ?instancLabel; separator='|') as ?instanceofLabel)";

export const runWdqsQuery = async (query: string, options: SparqlRequestOptions = {}): Promise<SparqlRow[]> => {
  const results = await querySparql(getClientConfig().wdqsEndpoint, query, options);
  return bindingsToRows(results);
};

const toEntityMatch = (row: SparqlRow): EntityMatchRow => ({
  entity: entityId(row.entity),
  label: row.entityLabel ?? '',
  description: row.entityDescription ?? '',
  instanceOf: entityIds(row.instanceof),
  instanceOfLabels: splitConcat(row.instanceofLabel),
});

/**
 * Classes (P31) of every entity. With `instanceOf` (classes joined by `|`,
 * meaning OR) each row also says whether the entity belongs to one of them.
 */
export const isInstanceOf = async (
  entities: string | string[],
  options: { instanceOf?: string; chunkSize?: number } = {},
): Promise<InstanceOfRow[]> => {
  const list = checkEntities(entities);
  const instanceOf = checkClassFilter(options.instanceOf);

  return runInChunks(
    list,
    options.chunkSize ?? 50000,
    async (chunk) => {
      const query = `SELECT ?entity
(GROUP_CONCAT(DISTINCT ?instanc;separator="|") as ?instanceof)
WHERE {
  OPTIONAL {
    VALUES ?entity { ${toValues(chunk)} }
    OPTIONAL {?entity wdt:P31 ?instanc.}
  }
} GROUP BY ?entity`;
      const rows = await runWdqsQuery(query, { method: 'POST' });
      return rows.map((row) => {
        const result: InstanceOfRow = { entity: entityId(row.entity), instanceOf: entityIds(row.instanceof) };
        if (instanceOf) {
          result.matches = classPattern(instanceOf).test(result.instanceOf.join('|'));
        }
        return result;
      });
    },
    'isInstanceOf',
  );
};

const reorderByLanguage = (row: WikipediasRow, wikiLangs: string[]): WikipediasRow => {
  if (row.langs.length < 2) return row;
  const order = wikiLangs.map((lang) => row.langs.indexOf(lang)).filter((index) => index >= 0);
  const pick = (values: string[]): string[] => order.map((index) => values[index]).filter((value) => value !== undefined);
  return { ...row, langs: pick(row.langs), names: pick(row.names), pages: pick(row.pages) };
};

/**
 * Wikipedia articles about each entity. `wikiLangs` (`es|en|fr`) limits the
 * languages and orders the returned pages; `instanceOf` keeps only entities
 * of those classes.
 */
export const getWikipedias = async (
  entities: string | string[],
  options: { wikiLangs?: string; instanceOf?: string; chunkSize?: number } = {},
): Promise<WikipediasRow[]> => {
  const list = checkEntities(entities);
  const wikiLangs = splitLanguages(options.wikiLangs);
  const instanceOf = checkClassFilter(options.instanceOf);
  const languageFilter =
    wikiLangs.length > 0 ? `FILTER(?lang IN (${wikiLangs.map((lang) => `'${lang}'`).join(', ')}))` : '';

  const rows = await runInChunks(
    list,
    options.chunkSize ?? 10000,
    async (chunk) => {
      const query = `SELECT DISTINCT ?entity
(GROUP_CONCAT(DISTINCT ?instanc;separator="|") as ?instanceof)
(COUNT(DISTINCT ?page) as ?npages)
(GROUP_CONCAT(DISTINCT ?lang;separator="|") as ?langs)
(GROUP_CONCAT(DISTINCT ?name;separator="|") as ?names)
(GROUP_CONCAT(DISTINCT ?page;separator="|") as ?pages)
WHERE {
  OPTIONAL {
    VALUES ?entity { ${toValues(chunk)} }
    OPTIONAL {?entity wdt:P31 ?instanc.}
    OPTIONAL {
    ?page schema:about ?entity;
          schema:inLanguage ?lang;
          schema:name ?name;
          schema:isPartOf [wikibase:wikiGroup "wikipedia"].
          ${languageFilter}
    }
  }
} GROUP BY ?entity`;
      const result = await runWdqsQuery(query, { method: 'POST' });
      return result.map(
        (row): WikipediasRow => ({
          entity: entityId(row.entity),
          instanceOf: entityIds(row.instanceof),
          pageCount: Number(row.npages) || 0,
          langs: splitConcat(row.langs),
          names: splitConcat(row.names),
          pages: splitConcat(row.pages),
        }),
      );
    },
    'getWikipedias',
  );

  return rows
    .filter((row) => !instanceOf || classPattern(instanceOf).test(row.instanceOf.join('|')))
    .map((row) => (wikiLangs.length > 0 ? reorderByLanguage(row, wikiLangs) : row));
};

/**
 * An entity is valid when it has a label or a description. Merged entities
 * are invalid and report the target in `redirection`.
 */
export const isValid = async (
  entities: string | string[],
  options: { chunkSize?: number } = {},
): Promise<ValidityRow[]> => {
  const list = checkEntities(entities);
  return runInChunks(
    list,
    options.chunkSize ?? 50000,
    async (chunk) => {
      const query = `SELECT ?entity ?valid
(GROUP_CONCAT(DISTINCT ?instanc; separator='|') as ?instanceof) ?redirection
WHERE {
  OPTIONAL {
    VALUES ?entity { ${toValues(chunk)} }
    BIND(EXISTS{?entity rdfs:label []} || EXISTS{?entity schema:description []} AS ?valid).
    OPTIONAL {?entity wdt:P31 ?instanc.}
    OPTIONAL {?entity owl:sameAs ?redirection}
  }
} GROUP BY ?entity ?valid ?redirection`;
      const rows = await runWdqsQuery(query, { method: 'POST' });
      return rows.map(
        (row): ValidityRow => ({
          entity: entityId(row.entity),
          valid: row.valid === 'true',
          instanceOf: entityIds(row.instanceof),
          redirection: entityId(row.redirection),
        }),
      );
    },
    'isValid',
  );
};

/**
 * Values of the `|`-separated `properties` for each entity. Labels follow
 * `langsOrder`; entity ids of the values are returned with `includeEntities`.
 */
export const getProperties = async (
  entities: string | string[],
  properties: string,
  options: { includeEntities?: boolean; langsOrder?: string; chunkSize?: number } = {},
): Promise<PropertyRow[]> => {
  const list = checkEntities(entities);
  const propertyList = checkProperties(properties);
  const includeEntities = options.includeEntities ?? false;
  const langsOrder = checkLangsOrder(options.langsOrder ?? 'en');
  if (!includeEntities && !langsOrder) {
    throw new InvalidArgumentError('Either includeEntities or langsOrder must be set');
  }

  const selects: string[] = [];
  const patterns: string[] = [];
  const labelClauses: string[] = [];
  if (langsOrder) {
    selects.push(INSTANCE_LABELS_SELECT);
    labelClauses.push('?instanc rdfs:label ?instancLabel.');
  }
  for (const property of propertyList) {
    if (includeEntities) {
      selects.push(`(GROUP_CONCAT(DISTINCT ?${property}p;separator='|') as ?${property})`);
    }
    if (langsOrder) {
      selects.push(`(GROUP_CONCAT(DISTINCT STR(?${property}label);separator='|') as ?${property}Label)`);
      labelClauses.push(`?${property}p rdfs:label ?${property}label.`);
    }
    patterns.push(`    OPTIONAL {?entity wdt:${property} ?${property}p.}`);
  }
  const labels = langsOrder ? labelService(langsOrder, labelClauses) : '';

  return runInChunks(
    list,
    options.chunkSize ?? 5000,
    async (chunk) => {
      const query = `SELECT ?entity
(GROUP_CONCAT(DISTINCT ?instanc; separator='|') as ?instanceof)
${selects.join('\n')}
WHERE {
  OPTIONAL {
    VALUES ?entity { ${toValues(chunk)} }
    OPTIONAL {?entity wdt:P31 ?instanc.}
${patterns.join('\n')}
    ${labels}
  }
} GROUP BY ?entity`;
      const rows = await runWdqsQuery(query, { method: 'POST' });
      return rows.map((row): PropertyRow => {
        const values: Record<string, PropertyValues> = {};
        for (const property of propertyList) {
          values[property] = {
            entities: includeEntities ? entityIds(row[property]) : [],
            labels: langsOrder ? splitConcat(row[`${property}Label`]) : [],
          };
        }
        return {
          entity: entityId(row.entity),
          instanceOf: entityIds(row.instanceof),
          instanceOfLabels: splitConcat(row.instanceofLabel),
          properties: values,
        };
      });
    },
    'getProperties',
  );
};

/** Label and/or description of each entity in the first available language of `langsOrder`. */
export const getLabelDescriptions = async (
  entities: string | string[],
  options: { what?: 'L' | 'D' | 'LD'; langsOrder?: string; chunkSize?: number } = {},
): Promise<LabelDescriptionRow[]> => {
  const list = checkEntities(entities);
  const what = options.what ?? 'LD';
  const langsOrder = checkLangsOrder(options.langsOrder ?? 'en');
  if (!langsOrder) {
    throw new InvalidArgumentError('langsOrder must name at least one language');
  }

  const selects: string[] = [];
  const clauses: string[] = [];
  if (what.includes('L')) {
    selects.push('(LANG(?label) as ?labellang) ?label');
    clauses.push('?entity rdfs:label ?label.');
  }
  if (what.includes('D')) {
    selects.push('(LANG(?description) as ?descriptionlang) ?description');
    clauses.push('?entity schema:description ?description.');
  }

  return runInChunks(
    list,
    options.chunkSize ?? 25000,
    async (chunk) => {
      const query = `SELECT ?entity ${selects.join(' ')}
WHERE {
  VALUES ?entity {${toValues(chunk)}}
  ${labelService(langsOrder, clauses)}
}`;
      const rows = await runWdqsQuery(query, { method: 'POST' });
      return rows.map(
        (row): LabelDescriptionRow => ({
          entity: entityId(row.entity),
          labelLang: row.labellang ?? '',
          label: row.label ?? '',
          descriptionLang: row.descriptionlang ?? '',
          description: row.description ?? '',
        }),
      );
    },
    'getLabelDescriptions',
  );
};

export const resolveAuthorityProperty = (authority: string): string => {
  const trimmed = authority.trim();
  if (PROPERTY_PATTERN.test(trimmed)) return trimmed;
  const property = AUTHORITY_PROPERTIES[trimmed];
  if (!property) {
    throw new InvalidArgumentError(`Unknown authority "${authority}"`);
  }
  return property;
};

/**
 * Finds the entities holding each identifier in the `authority` property
 * (a `P` id or a library code such as `VIAF`, `BNE` or `LC`).
 */
export const searchByIdentifiers = async (
  ids: string | string[],
  authority: string,
  options: { langsOrder?: string; chunkSize?: number } = {},
): Promise<IdentifierMatchRow[]> => {
  const list = Array.from(
    new Set(
      toList(ids)
        .map((id) => id.trim())
        .filter(Boolean),
    ),
  );
  if (list.length === 0) {
    throw new InvalidArgumentError('The list of identifiers is empty');
  }
  const property = resolveAuthorityProperty(authority);
  const langsOrder = checkLangsOrder(options.langsOrder);
  const labelSelect = langsOrder ? '?entityLabel ?entityDescription' : '';

  return runInChunks(
    list,
    options.chunkSize ?? 3000,
    async (chunk) => {
      const values = chunk.map((id) => `"${escapeSparqlString(id)}"`).join(' ');
      const query = `SELECT DISTINCT ?id ?entity ${labelSelect}
(GROUP_CONCAT(DISTINCT ?instanc; separator='|') as ?instanceof)
${langsOrder ? INSTANCE_LABELS_SELECT : ''}
WHERE {
  OPTIONAL {
    VALUES ?id {${values}}
    OPTIONAL {?entity wdt:${property} ?id;
                      wdt:P31 ?instanc.}
    ${langsOrder ? labelService(langsOrder, ENTITY_LABEL_CLAUSES) : ''}
  }
} GROUP BY ?id ?entity ${labelSelect}`;
      const rows = await runWdqsQuery(query, { method: 'POST' });
      return rows.map((row): IdentifierMatchRow => ({ id: row.id ?? '', ...toEntityMatch(row) }));
    },
    'searchByIdentifiers',
  );
};

const buildLabelSearchPattern = (text: string, mode: LabelSearchMode, langs: string[]): string => {
  const literal = escapeSparqlString(text);
  if (mode === 'exact') {
    const labels = langs.map((lang) => ` {?entity rdfs:label "${literal}"@${lang}}`).join('\nUNION\n');
    const altLabels = langs.map((lang) => ` {?entity skos:altLabel "${literal}"@${lang}}`).join('\nUNION\n');
    return `WHERE {
  ${labels}
  UNION
  ${altLabels}`;
  }

  if (mode === 'startswith') {
    const services = langs
      .map(
        (lang) => `{
       SERVICE wikibase:mwapi {
         bd:serviceParam wikibase:api "EntitySearch";
                         wikibase:endpoint "www.wikidata.org";
                         mwapi:language "${lang}";
                         mwapi:search "${literal}".
         ?entity wikibase:apiOutputItem mwapi:item.}
      }`,
      )
      .join('\n    UNION\n    ');
    return `WITH {
    SELECT DISTINCT ?entity
    WHERE {
      ${services}
    }
  } AS %results
  WHERE {
    INCLUDE %results`;
  }

  let search = literal;
  if (mode === 'inlabel') {
    search = `inlabel:${literal}`;
    if (langs.length > 0) search += `@${langs.join(',')}`;
  }
  return `WHERE {
  SERVICE wikibase:mwapi {
    bd:serviceParam wikibase:api "Search";
                    wikibase:endpoint "www.wikidata.org";
                    mwapi:srsearch "${search}".
    ?entity wikibase:apiOutputItem mwapi:title.
  }`;
};

/**
 * Searches entities by label. `exact` matches labels and aliases, `startswith`
 * uses the entity-search autocompletion, `inlabel` and `cirrus` go through
 * the full-text search engine.
 */
export const searchByLabel = async (
  text: string,
  options: { mode?: LabelSearchMode; langs?: string; langsOrder?: string; instanceOf?: string } = {},
): Promise<EntityMatchRow[]> => {
  const mode = options.mode ?? 'inlabel';
  const search = text.trim();
  const langs = splitLanguages(options.langs);
  const langsOrder = checkLangsOrder(options.langsOrder);
  const instanceOf = checkClassFilter(options.instanceOf);
  if (!search) {
    throw new InvalidArgumentError('The search text is empty');
  }
  if ((mode === 'exact' || mode === 'startswith') && langs.length === 0) {
    throw new InvalidArgumentError(`langs is mandatory in mode "${mode}"`);
  }
  if (mode === 'cirrus' && langs.length > 0) {
    logger.info('langs is ignored in cirrus mode');
  }

  const labelSelect = langsOrder ? '?entityLabel ?entityDescription' : '';
  const query = `SELECT DISTINCT ?entity ${labelSelect}
(GROUP_CONCAT(DISTINCT ?instanc; separator='|') as ?instanceof)
${langsOrder ? INSTANCE_LABELS_SELECT : ''}
${buildLabelSearchPattern(search, mode, mode === 'cirrus' ? [] : langs)}
  OPTIONAL {?entity wdt:P31 ?instanc.}
  ${langsOrder ? labelService(langsOrder, ENTITY_LABEL_CLAUSES) : ''}
} GROUP BY ?entity ${labelSelect}`;

  const rows = (await runWdqsQuery(query)).map(toEntityMatch);
  if (!instanceOf) return rows;
  const pattern = classPattern(instanceOf);
  return rows.filter((row) => pattern.test(row.instanceOf.join('|')));
};

const countEntities = async (pattern: string): Promise<number> => {
  const rows = await runWdqsQuery(`SELECT (COUNT(DISTINCT ?entity) AS ?count) WHERE {${pattern}}`);
  return Number(rows[0]?.count) || 0;
};

interface PagedSearch {
  /** Graph pattern binding `?entity`; it is counted first, then read page by page. */
  pattern: string;
  /** Extra aggregate columns and the outer pattern that feeds them. */
  extraSelect?: string;
  extraPattern?: string;
  langsOrder: string;
  chunkSize: number;
  method?: 'GET' | 'POST';
  label: string;
}

/** Counts the entities matching a pattern, then reads them with LIMIT/OFFSET subqueries. */
const searchPaged = async (search: PagedSearch): Promise<SparqlRow[]> => {
  const total = await countEntities(search.pattern);
  const chunkSize = Math.max(1, search.chunkSize);
  const labelSelect = search.langsOrder ? '?entityLabel ?entityDescription' : '';
  logger.debug(`${search.label}: ${total} entities`);

  const rows: SparqlRow[] = [];
  for (let offset = 0; offset < total; offset += chunkSize) {
    if (total > chunkSize) {
      logger.debug(`${search.label}: ${offset + 1}-${Math.min(offset + chunkSize, total)} of ${total}`);
    }
    const query = `SELECT DISTINCT ?entity ${labelSelect}
(GROUP_CONCAT(DISTINCT ?instanc; separator='|') as ?instanceof)
${search.langsOrder ? INSTANCE_LABELS_SELECT : ''}
${search.extraSelect ?? ''}
WITH {
    SELECT DISTINCT ?entity
    WHERE {${search.pattern}}
    ORDER BY ?entity
    LIMIT ${chunkSize} OFFSET ${offset}
    } AS %results
WHERE {
   INCLUDE %results.
   ${search.langsOrder ? labelService(search.langsOrder, ENTITY_LABEL_CLAUSES) : ''}
   OPTIONAL {?entity wdt:P31 ?instanc.}
   ${search.extraPattern ?? ''}
} GROUP BY ?entity ${labelSelect}`;
    rows.push(...(await runWdqsQuery(query, { method: search.method ?? 'GET' })));
  }
  return rows;
};

const occupationPattern = (occupation: string): string => {
  const [id] = checkEntities(occupation);
  return `?entity wdt:P106 wd:${id}`;
};

export const countByOccupation = async (occupation: string): Promise<number> =>
  countEntities(occupationPattern(occupation));

/** Every entity with the given occupation (P106), fetched page by page with LIMIT/OFFSET. */
export const searchByOccupation = async (
  occupation: string,
  options: { langsOrder?: string; chunkSize?: number } = {},
): Promise<EntityMatchRow[]> => {
  const pattern = occupationPattern(occupation);
  const rows = await searchPaged({
    pattern,
    langsOrder: checkLangsOrder(options.langsOrder),
    chunkSize: options.chunkSize ?? 10000,
    label: `occupation ${occupation.trim()}`,
  });
  return rows.map(toEntityMatch);
};

export interface AuthorityHolderRow extends EntityMatchRow {
  /** Identifiers the entity holds in the authority property. */
  ids: string[];
}

export const countByAuthority = async (authority: string): Promise<number> =>
  countEntities(`?entity wdt:${resolveAuthorityProperty(authority)} []`);

/**
 * Every entity holding an identifier in the `authority` property (a `P` id
 * or a library code). `instanceOf` is applied after all pages are read.
 */
export const searchByAuthority = async (
  authority: string,
  options: { langsOrder?: string; instanceOf?: string; chunkSize?: number } = {},
): Promise<AuthorityHolderRow[]> => {
  const property = resolveAuthorityProperty(authority);
  const instanceOf = checkClassFilter(options.instanceOf);
  const rows = await searchPaged({
    pattern: `?entity wdt:${property} []`,
    extraSelect: `(GROUP_CONCAT(DISTINCT STR(?authid);separator='|') as ?ids)`,
    extraPattern: `?entity wdt:${property} ?authid.`,
    langsOrder: checkLangsOrder(options.langsOrder),
    chunkSize: options.chunkSize ?? 10000,
    label: `authority ${property}`,
  });

  const holders = rows.map((row): AuthorityHolderRow => ({ ...toEntityMatch(row), ids: splitConcat(row.ids) }));
  if (!instanceOf) return holders;
  const classes = classPattern(instanceOf);
  return holders.filter((row) => classes.test(row.instanceOf.join('|')));
};

/** `Q1|Q2` matches instances of any class, `Q1&Q2` instances of all of them; the two cannot be mixed. */
const instanceOfPattern = (instanceOf: string): string => {
  const expression = instanceOf.trim();
  if (!CLASS_EXPRESSION_PATTERN.test(expression) || (expression.includes('|') && expression.includes('&'))) {
    throw new InvalidArgumentError(`Invalid instanceOf expression "${instanceOf}"`);
  }
  if (expression.includes('|')) {
    return `VALUES ?class { ${toValues(expression.split('|'))} } ?entity wdt:P31 ?class`;
  }
  return `?entity wdt:P31 ${expression
    .split('&')
    .map((id) => `wd:${id}`)
    .join(', ')}`;
};

export const countByInstanceOf = async (instanceOf: string): Promise<number> =>
  countEntities(instanceOfPattern(instanceOf));

/** Every instance (P31) of the classes in `instanceOf`, page by page. */
export const searchByInstanceOf = async (
  instanceOf: string,
  options: { langsOrder?: string; chunkSize?: number } = {},
): Promise<EntityMatchRow[]> => {
  const rows = await searchPaged({
    pattern: instanceOfPattern(instanceOf),
    langsOrder: checkLangsOrder(options.langsOrder),
    chunkSize: options.chunkSize ?? 2500,
    method: 'POST',
    label: `instances of ${instanceOf.trim()}`,
  });
  return rows.map(toEntityMatch);
};

export interface GeolocationRow {
  place: string;
  placeLabel: string;
  lat: number | null;
  lon: number | null;
  /** Current country; a place replaced by another (P1366) takes its successor's country and coordinates. */
  country: string;
  countryLabel: string;
}

const toCoordinate = (value: string | undefined): number | null => {
  if (!value) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

/**
 * Coordinates (P625) and country (P17, restricted to sovereign states and
 * countries) of each place. Labels are returned with `langsOrder`.
 */
export const getGeolocations = async (
  places: string | string[],
  options: { langsOrder?: string; chunkSize?: number } = {},
): Promise<GeolocationRow[]> => {
  const list = checkEntities(places);
  const langsOrder = checkLangsOrder(options.langsOrder);
  const placeLabel = langsOrder ? '?placeLabel' : '';
  const countryLabel = langsOrder ? '?countryLabel' : '';
  const labels = langsOrder
    ? labelService(langsOrder, ['?place rdfs:label ?placeLabel.', '?country rdfs:label ?countryLabel.'])
    : '';

  const rows = await runInChunks(
    list,
    options.chunkSize ?? 1000,
    async (chunk) => {
      const query = `SELECT DISTINCT ?place ${placeLabel}
(STR(SAMPLE(?clat)) as ?placeLat) (STR(SAMPLE(?clon)) as ?placeLon)
?country ${countryLabel}
WHERE {
  VALUES ?place { ${toValues(chunk)} }
  OPTIONAL {?place wdt:P1366+ ?placelast.}
  OPTIONAL {?place wdt:P625 ?c1.}
  OPTIONAL {?placelast wdt:P625 ?c2.}
  BIND(COALESCE(?c1, ?c2) AS ?c).
  BIND(geof:longitude(?c) AS ?clon)
  BIND(geof:latitude(?c) AS ?clat)
  BIND(COALESCE(?placelast, ?place) AS ?actualplace).
  OPTIONAL {
    ?actualplace wdt:P17 ?country.
    ?country wdt:P31 ?instance.
    FILTER (?instance IN (wd:Q3624078, wd:Q7275, wd:Q6256)).
  }
  ${labels}
} GROUP BY ?place ${placeLabel} ?country ${countryLabel}`;
      const result = await runWdqsQuery(query, { method: 'POST' });
      return result.map(
        (row): GeolocationRow => ({
          place: entityId(row.place),
          placeLabel: row.placeLabel ?? '',
          lat: toCoordinate(row.placeLat),
          lon: toCoordinate(row.placeLon),
          country: entityId(row.country),
          countryLabel: row.countryLabel ?? '',
        }),
      );
    },
    'getGeolocations',
  );

  // Places split into several successors, or on a border, come back once per country.
  const seen = new Set<string>();
  return rows.filter((row) => {
    if (seen.has(row.place)) return false;
    seen.add(row.place);
    return true;
  });
};

export type EntityInfoMode = 'human' | 'film';

export interface EntityInfo {
  entity: string;
  /** `ok`, `missing`, or the id of the entity this one redirects to. */
  status: string;
  label: string | null;
  labelLang: string | null;
  description: string | null;
  descriptionLang: string | null;
  /** Claim values by field; entity values are replaced by their labels. */
  claims: Record<string, string[]>;
  /** Entity ids behind the entity-valued fields of `claims`. */
  claimEntities: Record<string, string[]>;
  /** `birthYear`, `deathYear` or `publicationYear`. */
  years: Record<string, string>;
  /** Geolocation of `birthPlace` and `deathPlace`. */
  places: Record<string, GeolocationRow>;
  wikipedias: string[];
}

interface ClaimFieldSet {
  fields: Readonly<Record<string, string>>;
  /** Only the preferred, or else the most referenced, value is kept. */
  single: ReadonlySet<string>;
}

const ENTITY_INFO_FIELDS: Record<EntityInfoMode, ClaimFieldSet> = {
  human: {
    fields: {
      P31: 'instanceOf',
      P18: 'pic',
      P21: 'sex',
      P69: 'educatedAt',
      P106: 'occupation',
      P101: 'fieldOfWork',
      P135: 'movement',
      P136: 'genre',
      P737: 'influencedBy',
      P800: 'notableWork',
      P463: 'memberOf',
      P166: 'award',
      P214: 'viafId',
      P950: 'bneId',
      P4439: 'mncarsId',
      P19: 'birthPlace',
      P20: 'deathPlace',
      P569: 'birthDate',
      P570: 'deathDate',
    },
    single: new Set(['P19', 'P20', 'P569', 'P570']),
  },
  film: {
    fields: {
      P31: 'instanceOf',
      P577: 'publicationDate',
      P3383: 'poster',
      P18: 'pic',
      P10: 'video',
      P1476: 'title',
      P2047: 'duration',
      P144: 'basedOn',
      P135: 'movement',
      P136: 'genre',
      P495: 'country',
      P364: 'originalLanguage',
      P57: 'director',
      P58: 'screenwriter',
      P161: 'castMember',
      P725: 'voiceActor',
      P1431: 'executiveProducer',
      P344: 'photographyDirector',
      P1040: 'filmEditor',
      P2554: 'productionDesigner',
      P86: 'composer',
      P162: 'producer',
      P272: 'productionCompany',
      P462: 'color',
      P180: 'depicts',
      P921: 'mainSubject',
      P166: 'award',
      P444: 'reviewScore',
      P214: 'viafId',
      P480: 'filmAffinityId',
      P345: 'imdbId',
    },
    single: new Set(['P577', 'P1476', 'P2047']),
  },
};

const PLACE_PROPERTIES = new Set(['P19', 'P20']);
const YEAR_FIELDS: Readonly<Record<string, string>> = { P569: 'birthYear', P570: 'deathYear', P577: 'publicationYear' };
const COMMONS_FIELDS = new Set(['pic', 'poster', 'video']);
const COMMONS_FILE_PATH = 'https://commons.wikimedia.org/wiki/Special:FilePath/';
const REVIEW_SCORE_PROPERTY = 'P444';
const REVIEWER_QUALIFIER = 'P447';
const WIKIDATA_PROJECT = 'www.wikidata.org';
// Sitelink keys that end in "wiki" without being a Wikipedia.
const NON_WIKIPEDIA_SITES = new Set([
  'commonswiki',
  'specieswiki',
  'metawiki',
  'mediawikiwiki',
  'wikidatawiki',
  'sourceswiki',
  'incubatorwiki',
  'outreachwiki',
  'wikimaniawiki',
  'foundationwiki',
]);

interface ClaimValue {
  value: string;
  /** Entities whose labels replace their ids in `value` later on. */
  refs: string[];
}

const readDataValue = (datavalue: JsonRecord): ClaimValue | null => {
  const type = asString(datavalue.type);
  const value = asRecord(datavalue.value);
  switch (type) {
    case 'string':
      return { value: asString(datavalue.value), refs: [] };
    case 'wikibase-entityid': {
      const id = asString(value.id);
      return { value: id, refs: [id] };
    }
    case 'time':
      return { value: asString(value.time), refs: [] };
    case 'monolingualtext':
      return { value: `${asString(value.text)}:${asString(value.language)}`, refs: [] };
    case 'quantity': {
      const unit = stripPrefix(asString(value.unit), WIKIDATA_ENTITY_PREFIX);
      const amount = asString(value.amount);
      if (!ENTITY_PATTERN.test(unit)) return { value: amount, refs: [] };
      return { value: `${amount} : ${unit}`, refs: [unit] };
    }
    default:
      logger.warn(`Wikidata value type "${type}" is not supported`);
      return null;
  }
};

const reviewerOf = (statement: JsonRecord): string => {
  const [qualifier] = asRecordList(asRecord(statement.qualifiers)[REVIEWER_QUALIFIER]);
  return qualifier ? asString(asRecord(asRecord(qualifier.datavalue).value).id) : '';
};

/** Values of one property; a preferred statement wins over all others. */
const readStatements = (property: string, statements: JsonRecord[], single: boolean): ClaimValue[] => {
  let values: ClaimValue[] = [];
  let references: number[] = [];
  for (const statement of statements) {
    const datavalue = asRecord(statement.mainsnak).datavalue;
    // "unknown value" and "no value" statements carry no datavalue
    if (!isRecord(datavalue)) continue;
    let claim = readDataValue(datavalue);
    if (!claim) continue;
    const reviewer = property === REVIEW_SCORE_PROPERTY ? reviewerOf(statement) : '';
    if (reviewer) claim = { value: `${claim.value} [${reviewer}]`, refs: [...claim.refs, reviewer] };
    if (statement.rank === 'preferred') {
      values = [claim];
      references = [0];
      break;
    }
    values.push(claim);
    references.push(asList(statement.references).length);
  }

  if (values.length === 0) return [];
  if (single) return [values[references.indexOf(Math.max(...references))]];
  const seen = new Set<string>();
  return values.filter((claim) => {
    if (seen.has(claim.value)) return false;
    seen.add(claim.value);
    return true;
  });
};

const pickLanguage = (values: unknown, langs: string[]): { value: string; lang: string } | null => {
  const byLang = asRecord(values);
  const preferred = langs.find((lang) => isRecord(byLang[lang]) && !('for-language' in asRecord(byLang[lang])));
  const key = preferred ?? Object.keys(byLang)[0];
  if (key === undefined) return null;
  const entry = asRecord(byLang[key]);
  return { value: asString(entry.value), lang: asString(entry.language) };
};

const wikipediaLinks = (sitelinks: JsonRecord, wikiLangs: string[]): string[] => {
  const sites =
    wikiLangs.length > 0
      ? wikiLangs.map((lang) => `${lang.replace(/-/g, '_')}wiki`)
      : Object.keys(sitelinks).filter((site) => /^[a-z][a-z0-9_]*wiki$/.test(site) && !NON_WIKIPEDIA_SITES.has(site));
  return sites
    .filter((site) => isRecord(sitelinks[site]))
    .map((site) => {
      const lang = site.slice(0, -'wiki'.length).replace(/_/g, '-');
      const title = asString(asRecord(sitelinks[site]).title);
      return `https://${lang}.wikipedia.org/wiki/${encodeURIComponent(titleToKey(title))}`;
    });
};

const emptyEntityInfo = (entity: string, status: string): EntityInfo => ({
  entity,
  status,
  label: null,
  labelLang: null,
  description: null,
  descriptionLang: null,
  claims: {},
  claimEntities: {},
  years: {},
  places: {},
  wikipedias: [],
});

interface EntityInfoDraft {
  info: EntityInfo;
  /** Fields whose values still hold entity ids or `: Q…` units. */
  pending: Record<string, ClaimValue[]>;
}

const readEntity = (
  entity: string,
  data: JsonRecord,
  fieldSet: ClaimFieldSet,
  labelLangs: string[],
  wikiLangs: string[],
): EntityInfoDraft => {
  if ('missing' in data) {
    logger.info(`${entity} is missing`);
    return { info: emptyEntityInfo(entity, 'missing'), pending: {} };
  }
  const status = isRecord(data.redirects) ? asString(data.id) : 'ok';
  if (status !== 'ok') logger.info(`${entity} redirects to ${status}`);

  const info = emptyEntityInfo(entity, status);
  const label = pickLanguage(data.labels, labelLangs);
  const description = pickLanguage(data.descriptions, labelLangs);
  info.label = label?.value ?? null;
  info.labelLang = label?.lang ?? null;
  info.description = description?.value ?? null;
  info.descriptionLang = description?.lang ?? null;

  const claims = asRecord(data.claims);
  const pending: Record<string, ClaimValue[]> = {};
  for (const [property, field] of Object.entries(fieldSet.fields)) {
    const values = readStatements(property, asRecordList(claims[property]), fieldSet.single.has(property));
    if (values.length === 0) continue;
    pending[field] = values;
    const yearField = YEAR_FIELDS[property];
    if (yearField) info.years[yearField] = values[0].value.slice(1, 5);
  }

  for (const field of COMMONS_FIELDS) {
    const files = pending[field];
    if (!files) continue;
    info.claims[field] = files.map((file) => `${COMMONS_FILE_PATH}${encodeURIComponent(titleToKey(file.value))}`);
    delete pending[field];
  }
  info.wikipedias = wikipediaLinks(asRecord(data.sitelinks), wikiLangs);
  return { info, pending };
};

const withLabels = (value: string, labels: Map<string, string>): string =>
  value
    .replace(/ : (Q\d+)$/, (match, id: string) => {
      const label = labels.get(id);
      return label ? ` ${label}` : match;
    })
    .replace(/\[(Q\d+)\]/g, (match, id: string) => {
      const label = labels.get(id);
      return label ? `[${label}]` : match;
    });

/**
 * Profile of people (`human`) or films (`film`) from the Wikibase API:
 * labels and descriptions in `langsOrder` (English, then any language, as
 * fallback), selected claims with labels, birth and death places with
 * coordinates and country, and Wikipedia URLs (limited to and ordered by
 * `wikiLangs` when given).
 */
export const getEntityInfo = async (
  entities: string | string[],
  options: { mode?: EntityInfoMode; langsOrder?: string; wikiLangs?: string; chunkSize?: number } = {},
): Promise<EntityInfo[]> => {
  const list = checkEntities(entities);
  const fieldSet = ENTITY_INFO_FIELDS[options.mode ?? 'human'];
  const labelLangs = splitLanguages(options.langsOrder);
  if (!labelLangs.includes('en')) labelLangs.push('en');
  const wikiLangs = splitLanguages(options.wikiLangs);
  const chunkSize = Math.min(MEDIAWIKI_TITLE_LIMIT, Math.max(1, options.chunkSize ?? MEDIAWIKI_TITLE_LIMIT));
  const fieldProperties = new Map(Object.entries(fieldSet.fields).map(([property, field]) => [field, property]));

  const drafts = await runInChunks(
    list,
    chunkSize,
    async (chunk) => {
      const payload = await requestMediaWiki(
        {
          action: 'wbgetentities',
          props: 'labels|descriptions|claims|sitelinks',
          ids: chunk.join('|'),
          sitefilter: wikiLangs.length > 0 ? wikiLangs.map((lang) => `${lang.replace(/-/g, '_')}wiki`).join('|') : undefined,
        },
        { project: WIKIDATA_PROJECT },
      );
      if (!isRecord(payload.entities)) {
        throw new ResponseFormatError('wbgetentities response has no entities', apiUrl(WIKIDATA_PROJECT));
      }
      const found = payload.entities;
      return chunk.map((entity): EntityInfoDraft => {
        const data = found[entity];
        return isRecord(data)
          ? readEntity(entity, data, fieldSet, labelLangs, wikiLangs)
          : { info: emptyEntityInfo(entity, 'missing'), pending: {} };
      });
    },
    'getEntityInfo',
  );

  const placeIds = new Set<string>();
  const labelIds = new Set<string>();
  for (const { pending } of drafts) {
    for (const [field, values] of Object.entries(pending)) {
      const isPlace = PLACE_PROPERTIES.has(fieldProperties.get(field) ?? '');
      for (const claim of values) {
        for (const ref of claim.refs) (isPlace ? placeIds : labelIds).add(ref);
      }
    }
  }

  const langsOrder = labelLangs.join('|');
  const places = new Map<string, GeolocationRow>();
  if (placeIds.size > 0) {
    for (const row of await getGeolocations(Array.from(placeIds), { langsOrder })) places.set(row.place, row);
  }
  const labels = new Map<string, string>();
  if (labelIds.size > 0) {
    const rows = await getLabelDescriptions(Array.from(labelIds), { what: 'L', langsOrder });
    for (const row of rows) if (row.label) labels.set(row.entity, row.label);
  }

  return drafts.map(({ info, pending }) => {
    for (const [field, values] of Object.entries(pending)) {
      const isEntityField = values.every((claim) => claim.refs.length === 1 && claim.refs[0] === claim.value);
      if (!isEntityField) {
        info.claims[field] = values.map((claim) => withLabels(claim.value, labels));
        continue;
      }
      const ids = values.map((claim) => claim.value);
      info.claimEntities[field] = ids;
      if (PLACE_PROPERTIES.has(fieldProperties.get(field) ?? '')) {
        const place = places.get(ids[0]);
        if (place) info.places[field] = place;
        info.claims[field] = ids.map((id) => places.get(id)?.placeLabel || id);
      } else {
        info.claims[field] = ids.map((id) => labels.get(id) ?? id);
      }
    }
    return info;
  });
};

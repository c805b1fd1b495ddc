import { getClientConfig } from '../config';
import { runInChunks } from '../utils/chunks';
import { AuthenticationError, InvalidArgumentError, MediaWikiApiError, ResponseFormatError } from '../utils/errors';
import { asNumber, asRecord, asRecordList, asString, isRecord, JsonRecord } from '../utils/json';
import { logger } from '../utils/logger';
import { fetchResponse, parseJsonText, QueryParams } from './httpClient';

/** Titles (or page ids) the Action API accepts in one query for ordinary accounts. */
export const MEDIAWIKI_TITLE_LIMIT = 50;

const FORBIDDEN_TITLE_CHARS = /[#<>[\]|{}]/;

const AUTH_ERROR_CODES = new Set([
  'badtoken',
  'notloggedin',
  'mustbeloggedin',
  'permissiondenied',
  'assertuserfailed',
  'assertbotfailed',
  'assertnameduserfailed',
]);

export type PageStatus =
  | 'OK'
  | 'invalid'
  | 'missing'
  | 'no_pageid'
  | 'no_pageprops'
  | 'no_wikibase_item'
  | 'disambiguation'
  | 'filehidden';

export interface MediaWikiRequestOptions {
  project?: string;
  method?: 'GET' | 'POST';
  /** `Cookie` header value for authenticated requests. */
  cookies?: string;
}

export interface MediaWikiResponse {
  payload: JsonRecord;
  setCookies: string[];
}

export interface TitleResolution {
  /** Title after MediaWiki normalization, when it differs from the input. */
  normalized: string | null;
  /** Redirect target of the (normalized) title. */
  target: string | null;
}

export interface ResolvedPage extends TitleResolution {
  status: PageStatus;
}

export interface SearchHit {
  index: number;
  title: string;
  status: PageStatus;
  entity: string | null;
}

export interface PageEntity extends ResolvedPage {
  entity: string | null;
}

export interface PageImage extends ResolvedPage {
  image: string | null;
}

export interface PageFiles extends ResolvedPage {
  files: string[] | null;
}

export interface ImageUrl extends ResolvedPage {
  url: string | null;
}

export interface PageLinks extends ResolvedPage {
  links: string[] | null;
}

export interface PageInLinks extends ResolvedPage {
  linksHere: string[];
}

export const apiUrl = (project: string): string => `https://${project}/w/api.php`;

const splitSetCookie = (header: string | null): string[] =>
  header ? header.split(/,(?=\s*[^;,=\s]+=)/).map((cookie) => cookie.trim()) : [];

const readSetCookies = (headers: Headers): string[] =>
  typeof headers.getSetCookie === 'function' ? headers.getSetCookie() : splitSetCookie(headers.get('set-cookie'));

const toApiError = (error: JsonRecord): MediaWikiApiError => {
  const code = asString(error.code) || 'unknown';
  const info = asString(error.info) || asString(error.text);
  return AUTH_ERROR_CODES.has(code) ? new AuthenticationError(code, info) : new MediaWikiApiError(code, info);
};

/**
 * One Action API call with `format=json&formatversion=2`. API-level errors
 * become `MediaWikiApiError`; warnings are logged. Returns the payload and
 * any cookies the wiki set.
 */
export const sendMediaWikiRequest = async (
  params: QueryParams,
  options: MediaWikiRequestOptions = {},
): Promise<MediaWikiResponse> => {
  const project = (options.project ?? getClientConfig().defaultProject).trim();
  if (!project) {
    throw new InvalidArgumentError('A Wikimedia project host is required');
  }
  if (typeof params.titles === 'string' && params.titles.split('|').length > MEDIAWIKI_TITLE_LIMIT) {
    throw new InvalidArgumentError(
      `The number of titles exceeds the MediaWiki API limit (${MEDIAWIKI_TITLE_LIMIT})`,
    );
  }

  const url = apiUrl(project);
  const query: QueryParams = { ...params, format: 'json', formatversion: '2' };
  const method = options.method ?? 'GET';
  const { response, text } = await fetchResponse(url, {
    method,
    accept: 'application/json',
    headers: options.cookies ? { Cookie: options.cookies } : undefined,
    ...(method === 'GET' ? { params: query } : { form: query }),
  });
  const payload = parseJsonText(text, url);
  if (!isRecord(payload)) {
    throw new ResponseFormatError('MediaWiki API response is not an object', url);
  }
  if (isRecord(payload.error)) {
    throw toApiError(payload.error);
  }
  if (isRecord(payload.warnings)) {
    for (const [module, warning] of Object.entries(payload.warnings)) {
      logger.warn(`MediaWiki API warning (${module}): ${asString(asRecord(warning).warnings)}`);
    }
  }
  return { payload, setCookies: readSetCookies(response.headers) };
};

export const requestMediaWiki = async (
  params: QueryParams,
  options: MediaWikiRequestOptions = {},
): Promise<JsonRecord> => (await sendMediaWikiRequest(params, options)).payload;

/** Trims, drops blanks and duplicates, and rejects titles with characters MediaWiki forbids. */
export const checkTitles = (titles: string | string[]): string[] => {
  const list = (Array.isArray(titles) ? titles : [titles]).map((title) => title.trim()).filter(Boolean);
  if (list.length === 0) {
    throw new InvalidArgumentError('No valid titles were given');
  }
  for (const title of list) {
    const forbidden = FORBIDDEN_TITLE_CHARS.exec(title);
    if (forbidden) {
      throw new InvalidArgumentError(`Title "${title}" has the forbidden character ${forbidden[0]}`);
    }
  }
  return Array.from(new Set(list));
};

/**
 * Follows the `normalized` and `redirects` arrays of a query response for
 * one requested title.
 */
export const resolveTitle = (title: string, query: JsonRecord): TitleResolution => {
  let current = title;
  for (const entry of asRecordList(query.normalized)) {
    const from = asString(entry.from);
    const to = asString(entry.to);
    if (entry.fromencoded === true && encodeURIComponent(current) === from) {
      current = to;
    }
    if (from === current) {
      current = to;
      break;
    }
  }

  let target: string | null = null;
  for (const entry of asRecordList(query.redirects)) {
    if (asString(entry.from) === current) {
      target = asString(entry.to);
      break;
    }
  }

  return { normalized: current === title ? null : current, target };
};

const pageStatus = (page: JsonRecord): PageStatus => {
  if ('invalid' in page) return 'invalid';
  if ('missing' in page) return 'missing';
  if (!('pageid' in page)) return 'no_pageid';
  return 'OK';
};

const entityStatus = (page: JsonRecord): { status: PageStatus; entity: string | null } => {
  if ('invalid' in page) return { status: 'invalid', entity: null };
  if ('missing' in page) return { status: 'missing', entity: null };
  if (!isRecord(page.pageprops)) return { status: 'no_pageprops', entity: null };
  const entity = asString(page.pageprops.wikibase_item);
  if (!entity) return { status: 'no_wikibase_item', entity: null };
  return { status: 'disambiguation' in page.pageprops ? 'disambiguation' : 'OK', entity };
};

type PageVisitor = (title: string, page: JsonRecord, resolution: TitleResolution) => void;

/**
 * Queries `titles` in chunks of 50 with `params`, follows `continue`
 * responses, and calls `visit` with the page each requested title resolved to.
 */
const visitTitlePages = async (
  titles: string[],
  params: QueryParams,
  options: MediaWikiRequestOptions,
  visit: PageVisitor,
): Promise<void> => {
  await runInChunks(
    titles,
    MEDIAWIKI_TITLE_LIMIT,
    async (chunk) => {
      let continuation: QueryParams = {};
      for (;;) {
        const payload = await requestMediaWiki(
          { action: 'query', redirects: '1', ...params, ...continuation, titles: chunk.join('|') },
          options,
        );
        if (!isRecord(payload.query)) {
          throw new ResponseFormatError('MediaWiki query response has no query object');
        }
        const query = payload.query;
        const pages = asRecordList(query.pages);
        for (const title of chunk) {
          const resolution = resolveTitle(title, query);
          const key = resolution.target ?? resolution.normalized ?? title;
          const page = pages.find((candidate) => asString(candidate.title) === key);
          if (page) visit(title, page, resolution);
        }
        if (!isRecord(payload.continue)) break;
        continuation = toQueryParams(payload.continue);
      }
      return [];
    },
    'MediaWiki titles',
  );
};

const toQueryParams = (value: JsonRecord): QueryParams => {
  const params: QueryParams = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string' || typeof entry === 'number' || typeof entry === 'boolean') params[key] = entry;
  }
  return params;
};

const titlesOf = (value: unknown): string[] => asRecordList(value).map((entry) => asString(entry.title));

export interface SearchPagesOptions extends MediaWikiRequestOptions {
  /** `title` searches prefixes of titles, `text` the full text. */
  mode?: 'title' | 'text';
  /** Prefix-search profile (title mode). */
  profile?: string;
  limit?: number;
}

/**
 * Searches articles (namespace 0) and returns each hit with its Wikidata
 * entity, ordered by relevance. Returns null when nothing matches.
 */
export const searchPages = async (text: string, options: SearchPagesOptions = {}): Promise<SearchHit[] | null> => {
  const search = text.trim();
  if (!search) {
    throw new InvalidArgumentError('The search text is empty');
  }
  const limit = Math.max(1, options.limit ?? 30);
  const apiLimit = limit > 500 ? 'max' : limit;
  const mode = options.mode ?? 'title';
  const params: QueryParams =
    mode === 'title'
      ? {
          action: 'query',
          redirects: '1',
          generator: 'prefixsearch',
          gpsnamespace: '0',
          gpsprofile: options.profile ?? 'engine_autoselect',
          gpslimit: apiLimit,
          gpssearch: search,
        }
      : {
          action: 'query',
          generator: 'search',
          gsrprop: '',
          gsrnamespace: '0',
          gsrqiprofile: 'engine_autoselect',
          gsrlimit: apiLimit,
          gsrsearch: search,
        };

  const hits: SearchHit[] = [];
  let continuation: QueryParams = {};
  while (hits.length < limit) {
    const payload = await requestMediaWiki(
      { ...params, prop: 'pageprops', ppprop: 'wikibase_item|disambiguation', ...continuation },
      options,
    );
    if (!isRecord(payload.query)) break;
    for (const page of asRecordList(payload.query.pages)) {
      const { status, entity } = entityStatus(page);
      hits.push({ index: asNumber(page.index), title: asString(page.title), status, entity });
      if (hits.length >= limit) break;
    }
    if (!isRecord(payload.continue)) break;
    continuation = toQueryParams(payload.continue);
  }

  if (hits.length === 0) return null;
  return hits.sort((a, b) => a.index - b.index);
};

/** Wikidata item linked to each page, with redirects resolved. */
export const getWikidataEntities = async (
  titles: string | string[],
  options: MediaWikiRequestOptions = {},
): Promise<Record<string, PageEntity>> => {
  const list = checkTitles(titles);
  const output: Record<string, PageEntity> = {};
  await visitTitlePages(
    list,
    { prop: 'pageprops', ppprop: 'wikibase_item|disambiguation' },
    options,
    (title, page, resolution) => {
      output[title] = { ...resolution, ...entityStatus(page) };
    },
  );
  return output;
};

/**
 * Redirect titles (namespace 0) pointing at each page. The list starts with
 * the page the title resolves to; null for invalid or missing titles.
 */
export const getRedirects = async (
  titles: string | string[],
  options: MediaWikiRequestOptions = {},
): Promise<Record<string, string[] | null>> => {
  const list = checkTitles(titles);
  const output: Record<string, string[] | null> = {};
  for (const title of list) output[title] = null;
  await visitTitlePages(
    list,
    { prop: 'redirects', rdnamespace: '0', rdprop: 'title', rdlimit: 'max' },
    options,
    (title, page) => {
      if ('invalid' in page || 'missing' in page) return;
      const redirects = output[title] ?? [asString(page.title)];
      redirects.push(...titlesOf(page.redirects));
      output[title] = redirects;
    },
  );
  return output;
};

/** URL of the original file of each page's lead image. */
export const getPrimaryImages = async (
  titles: string | string[],
  options: MediaWikiRequestOptions = {},
): Promise<Record<string, PageImage>> => {
  const list = checkTitles(titles);
  const output: Record<string, PageImage> = {};
  await visitTitlePages(list, { prop: 'pageimages', piprop: 'original', pilimit: 'max' }, options, (title, page, resolution) => {
    const status = pageStatus(page);
    const source = status === 'OK' ? asString(asRecord(page.original).source) : '';
    output[title] = { ...resolution, status, image: source || null };
  });
  return output;
};

const fileExtension = (fileTitle: string): string => {
  const name = fileTitle.slice(fileTitle.indexOf(':') + 1);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot + 1).toLowerCase() : '';
};

/**
 * Files used on each page, except files without extension and those whose
 * extension is listed in `excludeExtensions` (comma separated).
 */
export const getPageFiles = async (
  titles: string | string[],
  options: MediaWikiRequestOptions & { excludeExtensions?: string } = {},
): Promise<Record<string, PageFiles>> => {
  const list = checkTitles(titles);
  const excluded = new Set(
    (options.excludeExtensions ?? 'svg,webp,xcf')
      .split(/\W+/)
      .map((extension) => extension.toLowerCase())
      .filter(Boolean),
  );
  const output: Record<string, PageFiles> = {};
  await visitTitlePages(list, { prop: 'images', imlimit: 'max' }, options, (title, page, resolution) => {
    const existing = output[title];
    const entry: PageFiles = existing ?? { ...resolution, status: pageStatus(page), files: null };
    if (!existing && entry.status === 'OK') entry.files = [];
    const files = titlesOf(page.images).filter((file) => {
      const extension = fileExtension(file);
      return extension !== '' && !excluded.has(extension);
    });
    if (entry.files) entry.files.push(...files);
    output[title] = entry;
  });
  return output;
};

/** Download URL of each `File:` title. */
export const getImageUrls = async (
  titles: string | string[],
  options: MediaWikiRequestOptions = {},
): Promise<Record<string, ImageUrl>> => {
  const list = checkTitles(titles);
  const output: Record<string, ImageUrl> = {};
  await visitTitlePages(list, { prop: 'imageinfo', iiprop: 'url', iilimit: 'max' }, options, (title, page, resolution) => {
    let status: PageStatus = 'OK';
    // Files hosted on Commons come back as both `missing` and `known`.
    if (!('known' in page)) {
      if ('invalid' in page) status = 'invalid';
      else if ('missing' in page) status = 'missing';
      else if ('filehidden' in page) status = 'filehidden';
    }
    const info = asRecordList(page.imageinfo)[0];
    output[title] = { ...resolution, status, url: info ? asString(info.url) || null : null };
  });
  return output;
};

/** Article links (namespace 0) going out of each page. */
export const getOutLinks = async (
  titles: string | string[],
  options: MediaWikiRequestOptions = {},
): Promise<Record<string, PageLinks>> => {
  const list = checkTitles(titles);
  const output: Record<string, PageLinks> = {};
  await visitTitlePages(
    list,
    { prop: 'links', plnamespace: '0', pllimit: 'max' },
    options,
    (title, page, resolution) => {
      const existing = output[title];
      const entry: PageLinks = existing ?? { ...resolution, status: pageStatus(page), links: null };
      if (!existing && entry.status === 'OK') entry.links = [];
      if (entry.links) entry.links.push(...titlesOf(page.links));
      output[title] = entry;
    },
  );
  return output;
};

const collectInLinks = async (
  titles: string[],
  options: MediaWikiRequestOptions,
): Promise<Record<string, PageInLinks>> => {
  const output: Record<string, PageInLinks> = {};
  await visitTitlePages(
    titles,
    { prop: 'linkshere', lhnamespace: '0', lhprop: 'title', lhlimit: 'max', redirects: undefined },
    options,
    (title, page, resolution) => {
      const entry: PageInLinks = output[title] ?? { ...resolution, status: pageStatus(page), linksHere: [] };
      entry.linksHere.push(...titlesOf(page.linkshere));
      output[title] = entry;
    },
  );
  return output;
};

/**
 * Article pages linking to each page. With `redirects` (default) the links
 * to every redirect of the page are merged in without duplicates, and
 * `target` names the page the title resolves to.
 */
export const getInLinks = async (
  titles: string | string[],
  options: MediaWikiRequestOptions & { redirects?: boolean } = {},
): Promise<Record<string, PageInLinks>> => {
  const list = checkTitles(titles);
  const requestOptions: MediaWikiRequestOptions = {
    project: options.project,
    method: options.method,
    cookies: options.cookies,
  };
  if (options.redirects === false) {
    return collectInLinks(list, requestOptions);
  }

  const redirects = await getRedirects(list, requestOptions);
  const expanded = Array.from(new Set(list.flatMap((title) => redirects[title] ?? [title])));
  const byTitle = await collectInLinks(expanded, requestOptions);

  const output: Record<string, PageInLinks> = {};
  for (const title of list) {
    const group = redirects[title];
    if (!group) {
      if (byTitle[title]) output[title] = byTitle[title];
      continue;
    }
    const [target] = group;
    const base = byTitle[target];
    if (!base) continue;
    output[title] = {
      status: base.status,
      normalized: null,
      target: target === title ? null : target,
      linksHere: Array.from(new Set(group.flatMap((member) => byTitle[member]?.linksHere ?? []))),
    };
  }
  return output;
};

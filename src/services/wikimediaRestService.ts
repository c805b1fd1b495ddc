import { getClientConfig } from '../config';
import { InvalidArgumentError, ResponseFormatError } from '../utils/errors';
import { asNumber, asRecord, asRecordList, asString, isRecord, JsonRecord } from '../utils/json';
import { titleToKey } from '../utils/textNormalization';
import { fetchJson } from './httpClient';
import { getRedirects } from './mediaWikiService';

export const PAGEVIEWS_BASE_URL = 'https://wikimedia.org/api/rest_v1/metrics/pageviews/per-article';
export const XTOOLS_PAGE_API_URL = 'https://xtools.wmcloud.org/api/page';

export type PageViewsAccess = 'all-access' | 'desktop' | 'mobile-app' | 'mobile-web';
export type PageViewsAgent = 'all-agents' | 'user' | 'spider' | 'automated';
export type PageViewsGranularity = 'daily' | 'monthly';
export type XToolsInfoType = 'articleinfo' | 'prose' | 'links';

export interface PageViewsOptions {
  project?: string;
  access?: PageViewsAccess;
  agent?: PageViewsAgent;
  granularity?: PageViewsGranularity;
  /** Add the views of every redirect to the page. */
  redirects?: boolean;
}

export interface PageSummary {
  title: string;
  pageId: number;
  description: string;
  extract: string;
  wikibaseItem: string | null;
  thumbnail: string | null;
  pageUrl: string | null;
}

/** XTools answers with an open set of statistics per info type. */
export type XToolsPageInfo = JsonRecord;

const LINK_COUNT_FIELDS = ['links_out_count', 'links_ext_count', 'links_in_count', 'redirects_count', 'elapsed_time'];

const requireArticle = (article: string): string => {
  const trimmed = article.trim();
  if (!trimmed) {
    throw new InvalidArgumentError('An article title is required');
  }
  return trimmed;
};

const requireObject = async (url: string): Promise<JsonRecord> => {
  const payload = await fetchJson(url);
  if (!isRecord(payload)) {
    throw new ResponseFormatError('Response is not an object', url);
  }
  return payload;
};

/** The page itself followed by its redirects, or just the page when `redirects` is off. */
const articleGroup = async (article: string, project: string, redirects: boolean): Promise<string[]> => {
  if (!redirects) return [article];
  const groups = await getRedirects(article, { project });
  return groups[article] ?? [article];
};

/**
 * Views per period (`YYYYMMDDHH` timestamps as keys) between `start` and
 * `end` (`YYYYMMDD`).
 */
export const getPageViews = async (
  article: string,
  start: string,
  end: string,
  options: PageViewsOptions = {},
): Promise<Record<string, number>> => {
  const title = requireArticle(article);
  const project = options.project ?? getClientConfig().defaultProject;
  const access = options.access ?? 'all-access';
  const agent = options.agent ?? 'all-agents';
  const granularity = options.granularity ?? 'monthly';

  const views: Record<string, number> = {};
  for (const member of await articleGroup(title, project, options.redirects ?? false)) {
    const url = [
      PAGEVIEWS_BASE_URL,
      project,
      access,
      agent,
      encodeURIComponent(titleToKey(member)),
      granularity,
      start,
      end,
    ].join('/');
    const payload = await requireObject(url);
    for (const item of asRecordList(payload.items)) {
      const timestamp = asString(item.timestamp);
      views[timestamp] = (views[timestamp] ?? 0) + asNumber(item.views);
    }
  }
  return views;
};

export const getPageSummary = async (title: string, options: { project?: string } = {}): Promise<PageSummary> => {
  const project = options.project ?? getClientConfig().defaultProject;
  const key = titleToKey(requireArticle(title));
  const payload = await requireObject(`https://${project}/api/rest_v1/page/summary/${encodeURIComponent(key)}`);
  return {
    title: asString(payload.title),
    pageId: asNumber(payload.pageid),
    description: asString(payload.description),
    extract: asString(payload.extract),
    wikibaseItem: asString(payload.wikibase_item) || null,
    thumbnail: asString(asRecord(payload.thumbnail).source) || null,
    pageUrl: asString(asRecord(asRecord(payload.content_urls).desktop).page) || null,
  };
};

/**
 * One XTools page statistic. With `redirects`, `articleinfo` is read from
 * the redirect target and `links` counts are summed over the page and all
 * its redirects. `prose` always describes the target already.
 */
export const getPageInfoType = async (
  article: string,
  infoType: XToolsInfoType = 'articleinfo',
  options: { project?: string; redirects?: boolean } = {},
): Promise<XToolsPageInfo> => {
  const title = requireArticle(article);
  const project = options.project ?? getClientConfig().defaultProject;
  let members = infoType === 'prose' ? [title] : await articleGroup(title, project, options.redirects ?? true);
  if (infoType === 'articleinfo') members = members.slice(0, 1);

  let merged: XToolsPageInfo | null = null;
  for (const member of members) {
    const payload = await requireObject(
      `${XTOOLS_PAGE_API_URL}/${infoType}/${project}/${encodeURIComponent(titleToKey(member))}`,
    );
    if (!merged) {
      merged = { ...payload };
      continue;
    }
    for (const field of LINK_COUNT_FIELDS) {
      merged[field] = asNumber(merged[field]) + asNumber(payload[field]);
    }
  }
  return merged ?? {};
};

/** `articleinfo`, `prose` and `links` statistics merged into one record. */
export const getPageInfo = async (
  article: string,
  options: { project?: string; redirects?: boolean } = {},
): Promise<XToolsPageInfo> => {
  const output: XToolsPageInfo = {};
  for (const infoType of ['articleinfo', 'prose', 'links'] as const) {
    Object.assign(output, await getPageInfoType(article, infoType, options));
  }
  delete output.elapsed_time;
  return output;
};

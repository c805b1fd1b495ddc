import { getClientConfig } from '../config';
import { InvalidArgumentError, ResponseFormatError } from '../utils/errors';
import { asNumber, asRecord, asRecordList, asString, isRecord, JsonRecord } from '../utils/json';
import { titleToKey } from '../utils/textNormalization';
import { fetchJson, fetchText } from './httpClient';

export interface RestRequestOptions {
  project?: string;
}

export interface RevisionRef {
  id: number;
  timestamp: string;
}

export interface PageMetadata {
  id: number;
  key: string;
  title: string;
  latest: RevisionRef;
  contentModel: string;
  license: { url: string; title: string };
  htmlUrl: string | null;
}

export interface PageSource extends PageMetadata {
  source: string;
}

export interface HistoryRevision {
  id: number;
  timestamp: string;
  minor: boolean;
  size: number;
  delta: number | null;
  comment: string;
  user: string;
}

export interface PageHistory {
  revisions: HistoryRevision[];
  /** API URL of the next (older) segment, if any. */
  older: string | null;
  newer: string | null;
}

export type HistoryFilter = 'reverted' | 'anonymous' | 'bot' | 'minor';

export interface MediaFileVariant {
  mediatype: string;
  width: number | null;
  height: number | null;
  url: string;
}

export interface MediaFile {
  title: string;
  descriptionUrl: string;
  preferred: MediaFileVariant | null;
  original: MediaFileVariant | null;
}

export interface TitleSearchResult {
  id: number;
  key: string;
  title: string;
  description: string;
}

export const restBaseUrl = (project: string): string => `https://${project}/w/rest.php/v1`;

const pagePath = (title: string, options: RestRequestOptions): string => {
  const key = titleToKey(title);
  if (!key) {
    throw new InvalidArgumentError('A page title is required');
  }
  const project = options.project ?? getClientConfig().defaultProject;
  return `${restBaseUrl(project)}/page/${encodeURIComponent(key)}`;
};

const requireObject = async (url: string, params?: Record<string, string | number | undefined>): Promise<JsonRecord> => {
  const payload = await fetchJson(url, { params });
  if (!isRecord(payload)) {
    throw new ResponseFormatError('MediaWiki REST response is not an object', url);
  }
  return payload;
};

const toMetadata = (payload: JsonRecord): PageMetadata => {
  const latest = asRecord(payload.latest);
  const license = asRecord(payload.license);
  return {
    id: asNumber(payload.id),
    key: asString(payload.key),
    title: asString(payload.title),
    latest: { id: asNumber(latest.id), timestamp: asString(latest.timestamp) },
    contentModel: asString(payload.content_model),
    license: { url: asString(license.url), title: asString(license.title) },
    htmlUrl: asString(payload.html_url) || null,
  };
};

/** Latest wikitext of a page with its metadata. */
export const getPageSource = async (title: string, options: RestRequestOptions = {}): Promise<PageSource> => {
  const payload = await requireObject(pagePath(title, options));
  return { ...toMetadata(payload), source: asString(payload.source) };
};

export const getPageBare = async (title: string, options: RestRequestOptions = {}): Promise<PageMetadata> =>
  toMetadata(await requireObject(`${pagePath(title, options)}/bare`));

export const getPageHtml = async (title: string, options: RestRequestOptions = {}): Promise<string> =>
  fetchText(`${pagePath(title, options)}/html`, { accept: 'text/html' });

/** Up to 20 revisions per call, newest first; pass `olderThan` to page back. */
export const getPageHistory = async (
  title: string,
  options: RestRequestOptions & { filter?: HistoryFilter; olderThan?: number; newerThan?: number } = {},
): Promise<PageHistory> => {
  const payload = await requireObject(`${pagePath(title, options)}/history`, {
    filter: options.filter,
    older_than: options.olderThan,
    newer_than: options.newerThan,
  });
  return {
    revisions: asRecordList(payload.revisions).map((revision) => ({
      id: asNumber(revision.id),
      timestamp: asString(revision.timestamp),
      minor: revision.minor === true,
      size: asNumber(revision.size),
      delta: typeof revision.delta === 'number' ? revision.delta : null,
      comment: asString(revision.comment),
      user: asString(asRecord(revision.user).name),
    })),
    older: asString(payload.older) || null,
    newer: asString(payload.newer) || null,
  };
};

const toVariant = (value: unknown): MediaFileVariant | null => {
  if (!isRecord(value)) return null;
  return {
    mediatype: asString(value.mediatype),
    width: typeof value.width === 'number' ? value.width : null,
    height: typeof value.height === 'number' ? value.height : null,
    url: asString(value.url),
  };
};

const toMediaFile = (value: JsonRecord): MediaFile => ({
  title: asString(value.title),
  descriptionUrl: asString(value.file_description_url),
  preferred: toVariant(value.preferred),
  original: toVariant(value.original),
});

/** Media files used on a page. */
export const getPageMediaLinks = async (title: string, options: RestRequestOptions = {}): Promise<MediaFile[]> => {
  const payload = await requireObject(`${pagePath(title, options)}/links/media`);
  return asRecordList(payload.files).map(toMediaFile);
};

/** File description for a `File:` title (given with or without the prefix). */
export const getFile = async (title: string, options: RestRequestOptions = {}): Promise<MediaFile> => {
  const key = titleToKey(title.replace(/^[^:]+:/, ''));
  if (!key) {
    throw new InvalidArgumentError('A file title is required');
  }
  const project = options.project ?? getClientConfig().defaultProject;
  return toMediaFile(await requireObject(`${restBaseUrl(project)}/file/${encodeURIComponent(key)}`));
};

/** Title autocompletion through the REST search endpoint. */
export const searchTitles = async (
  query: string,
  options: RestRequestOptions & { limit?: number } = {},
): Promise<TitleSearchResult[]> => {
  const q = query.trim();
  if (!q) {
    throw new InvalidArgumentError('The search text is empty');
  }
  const project = options.project ?? getClientConfig().defaultProject;
  const payload = await requireObject(`${restBaseUrl(project)}/search/title`, {
    q,
    limit: Math.min(100, Math.max(1, options.limit ?? 10)),
  });
  return asRecordList(payload.pages).map((page) => ({
    id: asNumber(page.id),
    key: asString(page.key),
    title: asString(page.title),
    description: asString(page.description),
  }));
};

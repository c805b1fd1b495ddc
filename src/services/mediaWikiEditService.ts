import { getClientConfig } from '../config';
import { AuthenticationError, MediaWikiApiError } from '../utils/errors';
import { asNumber, asRecord, asString, JsonRecord } from '../utils/json';
import { logger } from '../utils/logger';
import { QueryParams } from './httpClient';
import { checkTitles, sendMediaWikiRequest } from './mediaWikiService';

/** Anonymous sessions get this placeholder instead of a real CSRF token. */
const ANONYMOUS_TOKEN = '+\\';

/**
 * Authentication state returned by `login`. The library keeps no copy; the
 * caller passes it to every write.
 */
export interface MediaWikiSession {
  project: string;
  username: string;
  /** `Cookie` header value carrying the login session. */
  cookies: string;
  csrfToken: string;
}

export interface EditOptions {
  summary?: string;
  minor?: boolean;
  bot?: boolean;
  /** Timestamp of the revision the edit is based on, for edit-conflict detection. */
  baseTimestamp?: string;
  /** Fail if the page already exists. */
  createOnly?: boolean;
  /** Fail if the page does not exist. */
  noCreate?: boolean;
}

export interface EditResult {
  title: string;
  pageId: number;
  /** True when the submitted text equals the current revision. */
  noChange: boolean;
  oldRevisionId: number | null;
  newRevisionId: number | null;
  newTimestamp: string | null;
}

export interface DeleteResult {
  title: string;
  reason: string;
  logId: number;
}

const flag = (value: boolean | undefined): string | undefined => (value ? '1' : undefined);

export const mergeCookies = (current: string, setCookies: string[]): string => {
  const jar = new Map<string, string>();
  const add = (pair: string) => {
    const separator = pair.indexOf('=');
    if (separator <= 0) return;
    jar.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
  };
  current.split(';').forEach(add);
  for (const cookie of setCookies) add(cookie.split(';')[0]);
  return Array.from(jar, ([name, value]) => `${name}=${value}`).join('; ');
};

const tokenOf = (payload: JsonRecord, name: string): string =>
  asString(asRecord(asRecord(payload.query).tokens)[name]);

/** CSRF token for an authenticated cookie set; anonymous sessions are rejected. */
export const fetchCsrfToken = async (project: string, cookies: string): Promise<string> => {
  const { payload } = await sendMediaWikiRequest({ action: 'query', meta: 'tokens', type: 'csrf' }, { project, cookies });
  const token = tokenOf(payload, 'csrftoken');
  if (!token || token === ANONYMOUS_TOKEN) {
    throw new AuthenticationError('notloggedin', 'The wiki issued no CSRF token for this session');
  }
  return token;
};

/**
 * Logs in with a bot password (or main account credentials, where the wiki
 * allows `action=login` for them) and returns the session for later writes.
 */
export const login = async (
  username: string,
  password: string,
  options: { project?: string } = {},
): Promise<MediaWikiSession> => {
  const project = (options.project ?? getClientConfig().defaultProject).trim();

  const tokenResponse = await sendMediaWikiRequest({ action: 'query', meta: 'tokens', type: 'login' }, { project });
  let cookies = mergeCookies('', tokenResponse.setCookies);
  const loginToken = tokenOf(tokenResponse.payload, 'logintoken');
  if (!loginToken) {
    throw new AuthenticationError('nologintoken', 'The wiki did not issue a login token');
  }

  const loginResponse = await sendMediaWikiRequest(
    { action: 'login', lgname: username, lgpassword: password, lgtoken: loginToken },
    { project, method: 'POST', cookies },
  );
  cookies = mergeCookies(cookies, loginResponse.setCookies);
  const result = asRecord(loginResponse.payload.login);
  if (asString(result.result) !== 'Success') {
    throw new AuthenticationError(asString(result.result) || 'Failed', asString(result.reason) || 'Login failed');
  }

  const csrfToken = await fetchCsrfToken(project, cookies);
  logger.info(`Logged in to ${project} as ${asString(result.lgusername) || username}`);
  return { project, username: asString(result.lgusername) || username, cookies, csrfToken };
};

const assertSession = (session: MediaWikiSession): void => {
  if (!session.csrfToken || session.csrfToken === ANONYMOUS_TOKEN || !session.cookies) {
    throw new AuthenticationError('notoken', 'A logged-in session with a CSRF token is required');
  }
};

const postWrite = async (session: MediaWikiSession, params: QueryParams): Promise<JsonRecord> => {
  const { payload } = await sendMediaWikiRequest(
    { ...params, assert: 'user', token: session.csrfToken },
    { project: session.project, method: 'POST', cookies: session.cookies },
  );
  return payload;
};

/** Replaces (or creates) the wikitext of a page. */
export const editPage = async (
  session: MediaWikiSession,
  title: string,
  text: string,
  options: EditOptions = {},
): Promise<EditResult> => {
  assertSession(session);
  const [pageTitle] = checkTitles(title);
  const payload = await postWrite(session, {
    action: 'edit',
    title: pageTitle,
    text,
    summary: options.summary,
    minor: flag(options.minor),
    bot: flag(options.bot),
    basetimestamp: options.baseTimestamp,
    createonly: flag(options.createOnly),
    nocreate: flag(options.noCreate),
  });

  const edit = asRecord(payload.edit);
  if (asString(edit.result) !== 'Success') {
    throw new MediaWikiApiError('editfailed', `Edit of "${pageTitle}" returned ${JSON.stringify(edit)}`);
  }
  return {
    title: asString(edit.title) || pageTitle,
    pageId: asNumber(edit.pageid),
    noChange: edit.nochange === true || edit.nochange === '',
    oldRevisionId: 'oldrevid' in edit ? asNumber(edit.oldrevid) : null,
    newRevisionId: 'newrevid' in edit ? asNumber(edit.newrevid) : null,
    newTimestamp: asString(edit.newtimestamp) || null,
  };
};

/** Creates a page; fails with `articleexists` when the title is taken. */
export const createPage = (
  session: MediaWikiSession,
  title: string,
  text: string,
  options: Omit<EditOptions, 'createOnly' | 'noCreate'> = {},
): Promise<EditResult> => editPage(session, title, text, { ...options, createOnly: true });

export const deletePage = async (
  session: MediaWikiSession,
  title: string,
  options: { reason?: string } = {},
): Promise<DeleteResult> => {
  assertSession(session);
  const [pageTitle] = checkTitles(title);
  const payload = await postWrite(session, { action: 'delete', title: pageTitle, reason: options.reason });
  const result = asRecord(payload.delete);
  return {
    title: asString(result.title) || pageTitle,
    reason: asString(result.reason),
    logId: asNumber(result.logid),
  };
};

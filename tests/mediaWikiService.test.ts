import {
  checkTitles,
  getImageUrls,
  getInLinks,
  getOutLinks,
  getPageFiles,
  getPrimaryImages,
  getRedirects,
  getWikidataEntities,
  requestMediaWiki,
  resolveTitle,
  searchPages,
} from '../src/services/mediaWikiService';
import { AuthenticationError, InvalidArgumentError, MediaWikiApiError } from '../src/utils/errors';
import { installFetchMock, makeJsonResponse, requestUrl } from './helpers/fetchMocks';

const PROJECT = 'es.wikipedia.org';

const redirectsPayload = {
  batchcomplete: true,
  query: {
    redirects: [{ from: 'Cervantes', to: 'Miguel de Cervantes' }],
    pages: [
      {
        pageid: 1,
        ns: 0,
        title: 'Miguel de Cervantes',
        redirects: [
          { pageid: 9, ns: 0, title: 'Cervantes' },
          { pageid: 10, ns: 0, title: 'Cervantes Saavedra' },
        ],
      },
    ],
  },
};

describe('MediaWiki Action API reads', () => {
  const originalFetch = global.fetch;

  beforeEach(() => {
    jest.resetAllMocks();
  });

  afterAll(() => {
    global.fetch = originalFetch;
  });

  it('adds the JSON format parameters', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValue(makeJsonResponse({ batchcomplete: true, query: {} }));

    await requestMediaWiki({ action: 'query', meta: 'siteinfo' }, { project: PROJECT });

    expect(String(fetchMock.mock.calls[0][0])).toBe(
      'https://es.wikipedia.org/w/api.php?action=query&meta=siteinfo&format=json&formatversion=2',
    );
  });

  it('raises API errors with their code', async () => {
    const fetchMock = installFetchMock();
    fetchMock
      .mockResolvedValueOnce(makeJsonResponse({ error: { code: 'badvalue', info: 'Unrecognized value' } }))
      .mockResolvedValueOnce(makeJsonResponse({ error: { code: 'badtoken', info: 'Invalid CSRF token.' } }));

    await expect(requestMediaWiki({ action: 'query', list: 'bogus' }, { project: PROJECT })).rejects.toMatchObject({
      name: 'MediaWikiApiError',
      code: 'badvalue',
      message: 'MediaWiki API error badvalue: Unrecognized value',
    });
    const authFailure = requestMediaWiki({ action: 'edit' }, { project: PROJECT, method: 'POST' });
    await expect(authFailure).rejects.toBeInstanceOf(AuthenticationError);
    await expect(authFailure).rejects.toBeInstanceOf(MediaWikiApiError);
  });

  it('refuses more than 50 titles in one request', async () => {
    const fetchMock = installFetchMock();
    const titles = Array.from({ length: 51 }, (_, i) => `Page ${i}`).join('|');

    await expect(requestMediaWiki({ action: 'query', titles }, { project: PROJECT })).rejects.toBeInstanceOf(
      InvalidArgumentError,
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('cleans titles and rejects forbidden characters', () => {
    expect(checkTitles([' A ', 'A', 'B'])).toEqual(['A', 'B']);
    expect(() => checkTitles('A|B')).toThrow(InvalidArgumentError);
    expect(() => checkTitles(['', ' '])).toThrow('No valid titles were given');
  });

  it('follows normalization and redirects for a title', () => {
    expect(
      resolveTitle('foo bar', {
        normalized: [{ fromencoded: false, from: 'foo bar', to: 'Foo bar' }],
        redirects: [{ from: 'Foo bar', to: 'Foo Bar' }],
      }),
    ).toEqual({ normalized: 'Foo bar', target: 'Foo Bar' });
    expect(resolveTitle('Foo', {})).toEqual({ normalized: null, target: null });
  });

  it('reports the Wikidata entity and status of each title', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValue(
      makeJsonResponse({
        batchcomplete: true,
        query: {
          normalized: [{ fromencoded: false, from: 'cervantes', to: 'Cervantes' }],
          redirects: [{ from: 'Cervantes', to: 'Miguel de Cervantes' }],
          pages: [
            { pageid: 1, ns: 0, title: 'Miguel de Cervantes', pageprops: { wikibase_item: 'Q5682' } },
            { ns: 0, title: 'Missing page', missing: true },
            { pageid: 3, ns: 0, title: 'Cervantes (desambiguación)', pageprops: { disambiguation: '', wikibase_item: 'Q100' } },
          ],
        },
      }),
    );

    const entities = await getWikidataEntities(['cervantes', 'Missing page', 'Cervantes (desambiguación)'], {
      project: PROJECT,
    });

    expect(entities).toEqual({
      cervantes: { normalized: 'Cervantes', target: 'Miguel de Cervantes', status: 'OK', entity: 'Q5682' },
      'Missing page': { normalized: null, target: null, status: 'missing', entity: null },
      'Cervantes (desambiguación)': { normalized: null, target: null, status: 'disambiguation', entity: 'Q100' },
    });
    const params = requestUrl(fetchMock).searchParams;
    expect(params.get('titles')).toBe('cervantes|Missing page|Cervantes (desambiguación)');
    expect(params.get('redirects')).toBe('1');
    expect(params.get('prop')).toBe('pageprops');
  });

  it('queries more than 50 titles in chunks', async () => {
    const fetchMock = installFetchMock();
    fetchMock
      .mockResolvedValueOnce(makeJsonResponse({ query: { pages: [] } }))
      .mockResolvedValueOnce(makeJsonResponse({ query: { pages: [] } }));
    const titles = Array.from({ length: 51 }, (_, i) => `Page ${i}`);

    await getWikidataEntities(titles, { project: PROJECT });

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(requestUrl(fetchMock, 1).searchParams.get('titles')).toBe('Page 50');
  });

  it('follows continuation for outgoing links', async () => {
    const fetchMock = installFetchMock();
    fetchMock
      .mockResolvedValueOnce(
        makeJsonResponse({
          continue: { plcontinue: '1|0|Europe', continue: '||' },
          query: { pages: [{ pageid: 1, ns: 0, title: 'Madrid', links: [{ ns: 0, title: 'Spain' }] }] },
        }),
      )
      .mockResolvedValueOnce(
        makeJsonResponse({
          batchcomplete: true,
          query: { pages: [{ pageid: 1, ns: 0, title: 'Madrid', links: [{ ns: 0, title: 'Europe' }] }] },
        }),
      );

    await expect(getOutLinks('Madrid', { project: PROJECT })).resolves.toEqual({
      Madrid: { normalized: null, target: null, status: 'OK', links: ['Spain', 'Europe'] },
    });
    expect(requestUrl(fetchMock, 1).searchParams.get('plcontinue')).toBe('1|0|Europe');
  });

  it('returns search hits ordered by relevance', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValue(
      makeJsonResponse({
        batchcomplete: true,
        query: {
          pages: [
            { pageid: 5, ns: 0, title: 'Cervantes (cráter)', index: 2, pageprops: { wikibase_item: 'Q2' } },
            { pageid: 1, ns: 0, title: 'Miguel de Cervantes', index: 1, pageprops: { wikibase_item: 'Q5682' } },
          ],
        },
      }),
    );

    await expect(searchPages('Cervan', { project: PROJECT })).resolves.toEqual([
      { index: 1, title: 'Miguel de Cervantes', status: 'OK', entity: 'Q5682' },
      { index: 2, title: 'Cervantes (cráter)', status: 'OK', entity: 'Q2' },
    ]);
    const params = requestUrl(fetchMock).searchParams;
    expect(params.get('generator')).toBe('prefixsearch');
    expect(params.get('gpssearch')).toBe('Cervan');
    expect(params.get('gpslimit')).toBe('30');
  });

  it('returns null when the search has no hits', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValue(makeJsonResponse({ batchcomplete: true }));

    await expect(searchPages('zzzz', { project: PROJECT, mode: 'text' })).resolves.toBeNull();
    expect(requestUrl(fetchMock).searchParams.get('gsrsearch')).toBe('zzzz');
  });

  it('lists a page followed by its redirects', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValue(
      makeJsonResponse({
        ...redirectsPayload,
        query: { ...redirectsPayload.query, pages: [...redirectsPayload.query.pages, { ns: 0, title: 'Nope', missing: true }] },
      }),
    );

    await expect(getRedirects(['Cervantes', 'Nope'], { project: PROJECT })).resolves.toEqual({
      Cervantes: ['Miguel de Cervantes', 'Cervantes', 'Cervantes Saavedra'],
      Nope: null,
    });
  });

  it('reads lead images, page files and image URLs', async () => {
    const fetchMock = installFetchMock();
    fetchMock
      .mockResolvedValueOnce(
        makeJsonResponse({
          query: {
            pages: [{ pageid: 1, ns: 0, title: 'Madrid', original: { source: 'https://upload.test/madrid.jpg' } }],
          },
        }),
      )
      .mockResolvedValueOnce(
        makeJsonResponse({
          query: {
            pages: [
              {
                pageid: 1,
                ns: 0,
                title: 'Madrid',
                images: [
                  { ns: 6, title: 'Archivo:Mapa.svg' },
                  { ns: 6, title: 'Archivo:Foto.JPG' },
                  { ns: 6, title: 'Archivo:LEEME' },
                ],
              },
            ],
          },
        }),
      )
      .mockResolvedValueOnce(
        makeJsonResponse({
          query: {
            pages: [
              {
                ns: 6,
                title: 'Archivo:Foto.JPG',
                missing: true,
                known: true,
                imagerepository: 'shared',
                imageinfo: [{ url: 'https://upload.test/foto.jpg' }],
              },
            ],
          },
        }),
      );

    await expect(getPrimaryImages('Madrid', { project: PROJECT })).resolves.toEqual({
      Madrid: { normalized: null, target: null, status: 'OK', image: 'https://upload.test/madrid.jpg' },
    });
    await expect(getPageFiles('Madrid', { project: PROJECT })).resolves.toEqual({
      Madrid: { normalized: null, target: null, status: 'OK', files: ['Archivo:Foto.JPG'] },
    });
    await expect(getImageUrls('Archivo:Foto.JPG', { project: PROJECT })).resolves.toEqual({
      'Archivo:Foto.JPG': { normalized: null, target: null, status: 'OK', url: 'https://upload.test/foto.jpg' },
    });
  });

  it('merges incoming links of all redirects', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValueOnce(makeJsonResponse(redirectsPayload)).mockResolvedValueOnce(
      makeJsonResponse({
        query: {
          pages: [
            {
              pageid: 1,
              ns: 0,
              title: 'Miguel de Cervantes',
              linkshere: [
                { ns: 0, title: 'Don Quijote' },
                { ns: 0, title: 'Literatura' },
              ],
            },
            {
              pageid: 9,
              ns: 0,
              title: 'Cervantes',
              redirect: true,
              linkshere: [
                { ns: 0, title: 'Literatura' },
                { ns: 0, title: 'Lepanto' },
              ],
            },
            { pageid: 10, ns: 0, title: 'Cervantes Saavedra', redirect: true },
          ],
        },
      }),
    );

    await expect(getInLinks('Cervantes', { project: PROJECT })).resolves.toEqual({
      Cervantes: {
        status: 'OK',
        normalized: null,
        target: 'Miguel de Cervantes',
        linksHere: ['Don Quijote', 'Literatura', 'Lepanto'],
      },
    });
    const params = requestUrl(fetchMock, 1).searchParams;
    expect(params.get('titles')).toBe('Miguel de Cervantes|Cervantes|Cervantes Saavedra');
    expect(params.has('redirects')).toBe(false);
  });
});

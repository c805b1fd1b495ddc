export interface MockResponseOptions {
  status?: number;
  contentType?: string;
  setCookies?: string[];
}

export const makeTextResponse = (body: string, options: MockResponseOptions = {}) => {
  const status = options.status ?? 200;
  const setCookies = options.setCookies ?? [];
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: {
      get: (name: string) => {
        const key = name.toLowerCase();
        if (key === 'content-type') return options.contentType ?? 'application/json';
        if (key === 'set-cookie') return setCookies.length > 0 ? setCookies.join(', ') : null;
        return null;
      },
      getSetCookie: () => setCookies,
    },
    json: async () => JSON.parse(body),
    text: async () => body,
  } as Response;
};

/** Headers arrive at once; the body never does until the request is aborted. */
export const makeStalledResponse = (init: RequestInit) =>
  ({
    ok: true,
    status: 200,
    headers: { get: () => 'application/json', getSetCookie: () => [] },
    text: () =>
      new Promise<string>((_, reject) => {
        init.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
      }),
  }) as unknown as Response;

export const makeJsonResponse = (payload: unknown, options: MockResponseOptions = {}) =>
  makeTextResponse(JSON.stringify(payload), options);

/** SPARQL JSON results; values starting with http(s) are typed as URIs. */
export const makeSparqlResponse = (vars: string[], rows: Array<Record<string, string>>) =>
  makeJsonResponse({
    head: { vars },
    results: {
      bindings: rows.map((row) =>
        Object.fromEntries(
          Object.entries(row).map(([name, value]) => [
            name,
            { type: /^https?:\/\//.test(value) ? 'uri' : 'literal', value },
          ]),
        ),
      ),
    },
  });

export const installFetchMock = () => {
  const fetchMock = jest.fn();
  global.fetch = fetchMock as unknown as typeof fetch;
  return fetchMock;
};

export const requestUrl = (fetchMock: jest.Mock, index = 0): URL => new URL(String(fetchMock.mock.calls[index][0]));

export const requestInit = (fetchMock: jest.Mock, index = 0): RequestInit => fetchMock.mock.calls[index][1];

export const requestHeaders = (fetchMock: jest.Mock, index = 0): Record<string, string> =>
  fetchMock.mock.calls[index][1].headers;

export const formBody = (fetchMock: jest.Mock, index = 0): URLSearchParams =>
  new URLSearchParams(String(requestInit(fetchMock, index).body));

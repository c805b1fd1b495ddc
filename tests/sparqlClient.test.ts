import {
  bindingsToRows,
  escapeSparqlString,
  parseSparqlJson,
  parseSparqlXml,
  querySparql,
  splitConcat,
} from '../src/services/sparqlClient';
import { ResponseFormatError } from '../src/utils/errors';
import {
  formBody,
  installFetchMock,
  makeJsonResponse,
  makeTextResponse,
  requestHeaders,
  requestInit,
  requestUrl,
} from './helpers/fetchMocks';

const HUMAN = 'http://www.wikidata.org/entity/Q5';

const jsonResults = {
  head: { vars: ['item', 'label'] },
  results: {
    bindings: [
      {
        item: { type: 'uri', value: HUMAN },
        label: { type: 'literal', value: 'human', 'xml:lang': 'en' },
      },
      { item: { type: 'uri', value: 'http://www.wikidata.org/entity/Q1' } },
    ],
  },
};

const xmlResults = `<?xml version="1.0"?>
<sparql xmlns="http://www.w3.org/2005/sparql-results#">
  <head>
    <variable name="item"/>
    <variable name="label"/>
  </head>
  <results>
    <result>
      <binding name="item">
        <uri>${HUMAN}</uri>
      </binding>
      <binding name="label">
        <literal xml:lang="en">human</literal>
      </binding>
    </result>
  </results>
</sparql>`;

describe('SPARQL client', () => {
  const originalFetch = global.fetch;

  beforeEach(() => {
    jest.resetAllMocks();
  });

  afterAll(() => {
    global.fetch = originalFetch;
  });

  it('parses JSON results and fills unbound variables', () => {
    const results = parseSparqlJson(jsonResults);
    expect(results.vars).toEqual(['item', 'label']);
    expect(results.bindings[0].label).toEqual({ type: 'literal', value: 'human', lang: 'en' });
    expect(bindingsToRows(results)).toEqual([
      { item: HUMAN, label: 'human' },
      { item: 'http://www.wikidata.org/entity/Q1', label: '' },
    ]);
  });

  it('parses XML results into the same shape', () => {
    const results = parseSparqlXml(xmlResults);
    expect(results.vars).toEqual(['item', 'label']);
    expect(results.bindings).toEqual([
      {
        item: { type: 'uri', value: HUMAN },
        label: { type: 'literal', value: 'human', lang: 'en' },
      },
    ]);
  });

  it('rejects documents that are not SPARQL results', () => {
    expect(() => parseSparqlJson({ data: [] })).toThrow(ResponseFormatError);
    expect(() => parseSparqlXml('<html><body/></html>')).toThrow(ResponseFormatError);
  });

  it('sends GET queries in the URL with extra parameters', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValue(makeJsonResponse(jsonResults));
    const query = 'SELECT ?item WHERE { ?item ?p ?o }';

    const results = await querySparql('https://sparql.test/query', query, { params: { format: 'json' } });

    const url = requestUrl(fetchMock);
    expect(url.origin + url.pathname).toBe('https://sparql.test/query');
    expect(url.searchParams.get('query')).toBe(query);
    expect(url.searchParams.get('format')).toBe('json');
    expect(requestHeaders(fetchMock).Accept).toBe('application/sparql-results+json');
    expect(results.bindings).toHaveLength(2);
  });

  it('sends POST queries as a form and reads XML', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValue(makeTextResponse(xmlResults, { contentType: 'application/sparql-results+xml' }));
    const query = 'SELECT ?item ?label WHERE { ?item rdfs:label ?label }';

    const results = await querySparql('https://sparql.test/query', query, { method: 'POST', format: 'xml' });

    expect(String(fetchMock.mock.calls[0][0])).toBe('https://sparql.test/query');
    expect(requestInit(fetchMock).method).toBe('POST');
    expect(formBody(fetchMock).get('query')).toBe(query);
    expect(requestHeaders(fetchMock).Accept).toBe('application/sparql-results+xml');
    expect(bindingsToRows(results)).toEqual([{ item: HUMAN, label: 'human' }]);
  });

  it('escapes literals and splits concatenated values', () => {
    expect(escapeSparqlString('say "hi"\\')).toBe('say \\"hi\\"\\\\');
    expect(escapeSparqlString('two\nlines')).toBe('two\\nlines');
    expect(splitConcat('a|b||c')).toEqual(['a', 'b', 'c']);
    expect(splitConcat(undefined)).toEqual([]);
  });
});

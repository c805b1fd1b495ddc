import {
  autosuggest,
  autosuggestPersonal,
  checkRecord,
  getProcessedRecord,
  getRecord,
  getRecordXml,
  parseMarcXml,
  parseViafJson,
  resolveViafName,
  searchAnyField,
  searchByName,
  searchByTitle,
  searchViaf,
} from '../src/services/viafService';
import { ResponseFormatError } from '../src/utils/errors';
import { installFetchMock, makeJsonResponse, makeTextResponse, requestHeaders, requestUrl } from './helpers/fetchMocks';

const searchPage = (total: number, ids: number[]) =>
  makeJsonResponse({
    searchRetrieveResponse: {
      version: '1.1',
      numberOfRecords: String(total),
      records: ids.map((id) => ({
        record: {
          recordSchema: 'info:srw/schema/1/JSON',
          recordData: { 'ns2:VIAFCluster': { 'ns2:viafID': id, 'ns2:nameType': 'Personal' } },
        },
      })),
    },
  });

const range = (from: number, to: number): number[] => Array.from({ length: to - from + 1 }, (_, i) => from + i);

const marcXml = `<?xml version="1.0" encoding="UTF-8"?>
<record xmlns="http://www.loc.gov/MARC21/slim">
  <leader>00000nz  a2200000n  4500</leader>
  <controlfield tag="001">n79000001</controlfield>
  <datafield tag="100" ind1="1" ind2=" ">
    <subfield code="a">Martí, José,</subfield>
    <subfield code="d">1853-1895</subfield>
  </datafield>
</record>`;

describe('VIAF service', () => {
  const originalFetch = global.fetch;

  beforeEach(() => {
    jest.resetAllMocks();
  });

  afterAll(() => {
    global.fetch = originalFetch;
  });

  it('keeps cluster ids larger than 2^53 as strings', () => {
    expect(parseViafJson('{"ns2:viafID": 123456789012345678901, "x": 1}')).toEqual({
      'ns2:viafID': '123456789012345678901',
      x: 1,
    });
  });

  it('returns autosuggest results with their source ids', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValue(
      makeTextResponse(
        '{"query":"jose marti","result":[' +
          '{"term":"martí, josé, 1853-1895","displayForm":"Martí, José, 1853-1895","nametype":"personal",' +
          '"viafid":123456789012345678901,"score":"100","recordID":"1","lc":"n79000001","bne":"XX0000002"},' +
          '{"term":"josé martí (ship)","displayForm":"José Martí (Ship)","nametype":"corporate",' +
          '"viafid":"2","score":"10","recordID":"2"}]}',
      ),
    );

    const suggestions = await autosuggestPersonal('José Martí');

    expect(requestUrl(fetchMock).searchParams.get('query')).toBe('Jose Marti');
    expect(suggestions).toEqual([
      {
        term: 'martí, josé, 1853-1895',
        displayForm: 'Martí, José, 1853-1895',
        nameType: 'personal',
        viafId: '123456789012345678901',
        sources: { lc: 'n79000001', bne: 'XX0000002' },
      },
    ]);
  });

  it('returns null when autosuggest has no result list', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValue(makeJsonResponse({ query: 'zzz', result: null }));

    await expect(autosuggest('zzz')).resolves.toBeNull();
  });

  it('pages through search results in steps of at most 250', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValueOnce(searchPage(260, range(1, 250))).mockResolvedValueOnce(searchPage(260, range(251, 260)));

    const records = await searchViaf('local.personalNames = "test"', { max: 300 });

    expect(Object.keys(records)).toHaveLength(260);
    expect(records['260']).toEqual({ viafID: '260', nameType: 'Personal' });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    const second = requestUrl(fetchMock, 1).searchParams;
    expect(second.get('startRecord')).toBe('251');
    expect(second.get('maximumRecords')).toBe('50');
  });

  it('stops once max records are collected or nothing matches', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValueOnce(searchPage(10, [1, 2]));
    await expect(searchViaf('cql.any = "x"', { max: 2 })).resolves.toEqual({
      '1': { viafID: '1', nameType: 'Personal' },
      '2': { viafID: '2', nameType: 'Personal' },
    });

    fetchMock.mockResolvedValueOnce(searchPage(0, []));
    await expect(searchViaf('cql.any = "nothing"')).resolves.toEqual({});
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('builds CQL name queries with double quotes replaced', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValue(searchPage(0, []));

    await searchByName('Miguel "el manco"', { mode: 'names' });

    const params = requestUrl(fetchMock).searchParams;
    expect(params.get('query')).toBe(`local.names = "Miguel 'el manco'"`);
    expect(params.get('recordSchema')).toBe('info:srw/schema/1/JSON');
    expect(params.get('startRecord')).toBe('1');
  });

  it('searches every field or titles only', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValueOnce(searchPage(1, [7])).mockResolvedValueOnce(searchPage(0, []));

    const anyField = await searchAnyField('Don Quijote', { op: 'all' });
    await searchByTitle('El "Quijote"');

    expect(Object.keys(anyField)).toEqual(['7']);
    expect(requestUrl(fetchMock, 0).searchParams.get('query')).toBe('cql.any all "Don Quijote"');
    expect(requestUrl(fetchMock, 1).searchParams.get('query')).toBe(`local.title = "El 'Quijote'"`);
  });

  it('fetches a record by id', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValue(makeTextResponse('{"ns1:viafID": 99, "ns1:nameType": "Personal"}'));

    await expect(getRecord(' 99 ')).resolves.toEqual({ viafID: '99', nameType: 'Personal' });
    expect(String(fetchMock.mock.calls[0][0])).toBe('https://viaf.org/viaf/99/viaf.json');
  });

  it('fetches the XML form of a record', async () => {
    const fetchMock = installFetchMock();
    const body = '<ns1:VIAFCluster xmlns:ns1="http://viaf.org/viaf/terms#"><ns1:viafID>99</ns1:viafID></ns1:VIAFCluster>';
    fetchMock.mockResolvedValue(makeTextResponse(body, { contentType: 'application/xml' }));

    await expect(getRecordXml(99)).resolves.toBe(body);
    expect(String(fetchMock.mock.calls[0][0])).toBe('https://viaf.org/viaf/99/viaf.xml');
    expect(requestHeaders(fetchMock).Accept).toBe('application/xml');
  });

  it('rejects empty records', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValue(makeJsonResponse({}));

    await expect(getRecord('1')).rejects.toBeInstanceOf(ResponseFormatError);
  });

  it('follows redirects to the merged cluster', async () => {
    const fetchMock = installFetchMock();
    const target = {
      viafID: 456,
      mainHeadings: { data: { text: 'Martí, José, 1853-1895', sources: { sid: 'LC|n79000001' } } },
    };
    fetchMock
      .mockResolvedValueOnce(makeJsonResponse({ viafID: 123, redirect: { directto: '456' } }))
      .mockResolvedValueOnce(makeJsonResponse(target))
      .mockResolvedValueOnce(makeJsonResponse({ viafID: 123, redirect: { directto: '456' } }))
      .mockResolvedValueOnce(makeJsonResponse(target));

    const checked = await checkRecord('123');
    expect(checked.status).toBe('redirect');
    expect(checked.viafId).toBe('456');
    expect(String(fetchMock.mock.calls[1][0])).toBe('https://viaf.org/viaf/456/viaf.json');

    await expect(resolveViafName('123')).resolves.toBe('Martí, José, 1853-1895');
  });

  it('unwraps scavenged clusters', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValue(makeJsonResponse({ scavenged: { VIAFCluster: { viafID: '789' } } }));

    await expect(checkRecord('789')).resolves.toEqual({
      status: 'scavenged',
      viafId: '789',
      record: { viafID: '789' },
    });
  });

  it('requests processed source records as MARC21-XML', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValue(makeTextResponse(marcXml, { contentType: 'application/marc21+xml' }));

    const xml = await getProcessedRecord('n79000001');

    expect(String(fetchMock.mock.calls[0][0])).toBe('https://viaf.org/processed/LC%7Cn79000001');
    expect(requestHeaders(fetchMock).Accept).toBe('application/marc21+xml');
    expect(xml).toBe(marcXml);
    await expect(getProcessedRecord('  ')).resolves.toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('parses MARC21-XML fields', () => {
    const record = parseMarcXml(marcXml);
    expect(record.leader).toBe('00000nz  a2200000n  4500');
    expect(record.controlFields).toEqual({ '001': 'n79000001' });
    expect(record.dataFields).toHaveLength(1);
    expect(record.dataFields[0]).toMatchObject({
      tag: '100',
      ind1: '1',
      subfields: [
        { code: 'a', value: 'Martí, José,' },
        { code: 'd', value: '1853-1895' },
      ],
    });
  });
});

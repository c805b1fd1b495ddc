import { genderFromTtl, getBneGender, getBneTtl, searchBneByLabel } from '../src/services/bneService';
import { getDnbGender, getEntityFacts } from '../src/services/dnbService';
import { getGettyGender, searchGettyLabel } from '../src/services/gettyService';
import { getIdrefGender } from '../src/services/idrefService';
import { InvalidArgumentError } from '../src/utils/errors';
import {
  formBody,
  installFetchMock,
  makeJsonResponse,
  makeSparqlResponse,
  makeTextResponse,
  requestInit,
  requestUrl,
} from './helpers/fetchMocks';

const bneTtl = `@prefix ns4: <http://www.rdaregistry.info/Elements/a/> .
@prefix rdfs: <http://www.w3.org/2000/01/rdf-schema#> .

<https://datos.bne.es/resource/XX0000001> rdfs:label "Cervantes Saavedra, Miguel de" ;
    ns4:P50116 "Masculino" .`;

describe('National library clients', () => {
  const originalFetch = global.fetch;

  beforeEach(() => {
    jest.resetAllMocks();
  });

  afterAll(() => {
    global.fetch = originalFetch;
  });

  describe('BNE', () => {
    it('downloads Turtle for upper-cased ids', async () => {
      const fetchMock = installFetchMock();
      fetchMock.mockResolvedValue(makeTextResponse(bneTtl, { contentType: 'text/turtle' }));

      await expect(getBneTtl(' xx0000001 ')).resolves.toBe(bneTtl);
      expect(String(fetchMock.mock.calls[0][0])).toBe('https://datos.bne.es/persona/XX0000001.ttl');
      await expect(getBneTtl('')).resolves.toBeNull();
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('reads the RDA gender from Turtle', () => {
      expect(genderFromTtl(bneTtl)).toBe('Masculino');
      expect(genderFromTtl('@prefix rdfs: <http://www.w3.org/2000/01/rdf-schema#> .')).toBe('');
    });

    it('searches persons by exact label', async () => {
      const fetchMock = installFetchMock();
      fetchMock.mockResolvedValue(
        makeSparqlResponse(
          ['entity', 'label', 'genero', 'fnac', 'fmor', 'ocs', 'titles'],
          [
            {
              entity: 'https://datos.bne.es/resource/XX0000001',
              label: 'Cervantes Saavedra, Miguel de',
              genero: 'Masculino',
              fnac: '1547',
              fmor: '1616',
              ocs: 'Novelistas\nPoetas',
              titles: 'Don Quijote\nLa Galatea',
            },
          ],
        ),
      );

      const persons = await searchBneByLabel('Cervantes Saavedra, Miguel de');

      expect(persons).toEqual([
        {
          entity: 'XX0000001',
          label: 'Cervantes Saavedra, Miguel de',
          gender: 'Masculino',
          birthDate: '1547',
          deathDate: '1616',
          occupations: ['Novelistas', 'Poetas'],
          titles: ['Don Quijote', 'La Galatea'],
        },
      ]);
      const params = requestUrl(fetchMock).searchParams;
      expect(params.get('format')).toBe('json');
      expect(params.get('query')).toContain('rdfs:label "Cervantes Saavedra, Miguel de"');
    });

    it('looks up labels and genders by id', async () => {
      const fetchMock = installFetchMock();
      fetchMock.mockResolvedValue(
        makeSparqlResponse(
          ['bne', 'label', 'gender'],
          [{ bne: 'https://datos.bne.es/resource/XX0000001', label: 'Cervantes', gender: 'Masculino' }],
        ),
      );

      const genders = await getBneGender(['xx0000001', 'XX0000002']);

      expect(genders).toEqual({ XX0000001: { label: 'Cervantes', gender: 'Masculino' } });
      expect(requestInit(fetchMock).method).toBe('POST');
      expect(formBody(fetchMock).get('format')).toBe('json');
      expect(formBody(fetchMock).get('query')).toContain('VALUES ?bne { ns1:XX0000001 ns1:XX0000002 }');
    });

    it('skips the request for an empty id list', async () => {
      const fetchMock = installFetchMock();
      await expect(getBneGender([' ', ''])).resolves.toEqual({});
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('rejects ids that are not BNE identifiers', async () => {
      const fetchMock = installFetchMock();
      await expect(getBneGender(['XX0000001', 'XX1 } ?s ?p ?o {'])).rejects.toThrow(
        'Invalid authority id "XX1 } ?s ?p ?o {"',
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  it('keys IdRef results by record id', async () => {
    const fetchMock = installFetchMock();
    fetchMock.mockResolvedValue(
      makeSparqlResponse(
        ['sudoc', 'label', 'gender'],
        [{ sudoc: 'http://www.idref.fr/027000001/id', label: 'Cervantes Saavedra, Miguel de', gender: 'male' }],
      ),
    );

    await expect(getIdrefGender('027000001')).resolves.toEqual({
      '027000001': { label: 'Cervantes Saavedra, Miguel de', gender: 'male' },
    });
    expect(formBody(fetchMock).get('query')).toContain('<http://www.idref.fr/027000001/id>');
  });

  it('rejects malformed IdRef and ULAN ids before querying', async () => {
    const fetchMock = installFetchMock();
    await expect(getIdrefGender('02700000')).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(getGettyGender(['500000001', 'ulan:500000002'])).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  describe('Getty ULAN', () => {
    it('searches artists by label', async () => {
      const fetchMock = installFetchMock();
      fetchMock.mockResolvedValue(
        makeSparqlResponse(
          ['getty', 'label', 'gender'],
          [{ getty: 'http://vocab.getty.edu/ulan/500000001', label: 'Goya, Francisco de', gender: 'male' }],
        ),
      );

      await expect(searchGettyLabel('Goya')).resolves.toEqual({
        '500000001': { label: 'Goya, Francisco de', gender: 'male' },
      });
      expect(formBody(fetchMock).get('query')).toContain('luc:term "Goya"');
    });

    it('looks up genders by ULAN id', async () => {
      const fetchMock = installFetchMock();
      fetchMock.mockResolvedValue(
        makeSparqlResponse(
          ['getty', 'label', 'gender'],
          [{ getty: 'http://vocab.getty.edu/ulan/500000001', label: 'Goya, Francisco de', gender: 'male' }],
        ),
      );

      const genders = await getGettyGender(['500000001']);

      expect(genders['500000001']).toEqual({ label: 'Goya, Francisco de', gender: 'male' });
      expect(formBody(fetchMock).get('query')).toContain('VALUES ?getty { ulan:500000001 }');
    });
  });

  describe('DNB entity facts', () => {
    const facts = {
      '@id': 'https://d-nb.info/gnd/100000001',
      preferredName: 'Cervantes Saavedra, Miguel de',
      gender: { '@id': 'https://d-nb.info/standards/vocab/gnd/gender#male', label: 'Männlich' },
      dateOfBirth: '29. September 1547',
      dateOfDeath: '22. April 1616',
      sameAs: [{ '@id': 'http://viaf.org/viaf/12345' }, { collection: {} }],
    };

    it('reads entity facts', async () => {
      const fetchMock = installFetchMock();
      fetchMock.mockResolvedValue(makeJsonResponse(facts));

      await expect(getEntityFacts('100000001')).resolves.toEqual({
        id: '100000001',
        preferredName: 'Cervantes Saavedra, Miguel de',
        gender: 'male',
        dateOfBirth: '29. September 1547',
        dateOfDeath: '22. April 1616',
        sameAs: ['http://viaf.org/viaf/12345'],
      });
      expect(String(fetchMock.mock.calls[0][0])).toBe('https://hub.culturegraph.org/entityfacts/100000001');
    });

    it('returns the gender fragment or an empty string', async () => {
      const fetchMock = installFetchMock();
      fetchMock
        .mockResolvedValueOnce(makeJsonResponse(facts))
        .mockResolvedValueOnce(makeJsonResponse({ preferredName: 'Unknown' }));

      await expect(getDnbGender('100000001')).resolves.toBe('male');
      await expect(getDnbGender('100000002')).resolves.toBe('');
    });

    it('rejects an empty id', async () => {
      const fetchMock = installFetchMock();
      await expect(getEntityFacts(' ')).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});

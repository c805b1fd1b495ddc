import { InvalidArgumentError, ResponseFormatError } from '../utils/errors';
import { asRecord, asRecordList, asString, isRecord } from '../utils/json';
import { fetchJson } from './httpClient';

export const ENTITYFACTS_BASE_URL = 'https://hub.culturegraph.org/entityfacts';

export interface EntityFacts {
  id: string;
  preferredName: string;
  /** Fragment of the GND gender URI, e.g. `male` or `female`. */
  gender: string;
  dateOfBirth: string;
  dateOfDeath: string;
  sameAs: string[];
}

const fragmentOf = (uri: string): string => {
  const match = /([^#]+)$/.exec(uri);
  return match ? match[1] : '';
};

/** Culturegraph entity facts for a GND/DNB authority id. */
export const getEntityFacts = async (dnbId: string): Promise<EntityFacts> => {
  const id = dnbId.trim();
  if (!id) {
    throw new InvalidArgumentError('A GND/DNB id is required');
  }
  const url = `${ENTITYFACTS_BASE_URL}/${encodeURIComponent(id)}`;
  const payload = await fetchJson(url, { accept: 'application/json' });
  if (!isRecord(payload)) {
    throw new ResponseFormatError('Entity facts response is not an object', url);
  }
  return {
    id,
    preferredName: asString(payload.preferredName),
    gender: fragmentOf(asString(asRecord(payload.gender)['@id'])),
    dateOfBirth: asString(payload.dateOfBirth),
    dateOfDeath: asString(payload.dateOfDeath),
    sameAs: asRecordList(payload.sameAs)
      .map((entry) => asString(entry['@id']))
      .filter(Boolean),
  };
};

export const getDnbGender = async (dnbId: string): Promise<string> => (await getEntityFacts(dnbId)).gender;

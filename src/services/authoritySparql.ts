import { mergeChunks } from '../utils/chunks';
import { InvalidArgumentError } from '../utils/errors';
import { bindingsToRows, querySparql } from './sparqlClient';

export interface LabelGender {
  label: string;
  /** Gender as the authority states it; several values are joined by `|`. */
  gender: string;
}

/**
 * Looks up label and gender for many authority ids through a SPARQL
 * endpoint, in chunks, keyed by the id `idFromUri` extracts from each
 * subject URI. Ids that do not match `idPattern` are rejected before any
 * request, since they are written into the query text.
 */
export const fetchLabelGender = async (
  endpoint: string,
  ids: string | string[],
  options: {
    chunkSize: number;
    idPattern: RegExp;
    subjectVar: string;
    buildQuery: (chunk: string[]) => string;
    idFromUri: (uri: string) => string;
  },
): Promise<Record<string, LabelGender>> => {
  const list = Array.from(
    new Set(
      (Array.isArray(ids) ? ids : [ids])
        .map((id) => id.trim())
        .filter(Boolean),
    ),
  );
  if (list.length === 0) return {};
  const invalid = list.find((id) => !options.idPattern.test(id));
  if (invalid !== undefined) {
    throw new InvalidArgumentError(`Invalid authority id "${invalid}"`);
  }

  return mergeChunks(
    list,
    options.chunkSize,
    async (chunk) => {
      const results = await querySparql(endpoint, options.buildQuery(chunk), {
        method: 'POST',
        params: { format: 'json' },
      });
      const output: Record<string, LabelGender> = {};
      for (const row of bindingsToRows(results)) {
        const uri = row[options.subjectVar] ?? '';
        if (!uri) continue;
        output[options.idFromUri(uri)] = { label: row.label ?? '', gender: row.gender ?? '' };
      }
      return output;
    },
    endpoint,
  );
};

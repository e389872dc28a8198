import { z } from 'zod';
import { tryRunSync } from '../utils/try-catch';
import { listingFound, listingNotFound, type ParseResult } from './store-listing';

const APPLE_LOOKUP_URL = 'https://itunes.apple.com/lookup';

export interface AppleLookupParams {
  bundleId: string;
  country?: string;
}

export function buildAppleLookupUri(params: AppleLookupParams): URL {
  const uri = new URL(APPLE_LOOKUP_URL);
  uri.searchParams.set('bundleId', params.bundleId);
  if (params.country) {
    uri.searchParams.set('country', params.country);
  }
  return uri;
}

const appleLookupResponseSchema = z.object({
  resultCount: z.number().optional(),
  results: z.array(z.unknown()),
});

const appleLookupResultSchema = z.object({
  version: z.string().optional(),
  trackViewUrl: z.string(),
  releaseNotes: z.string().nullish(),
});

export type AppleLookupResult = z.infer<typeof appleLookupResultSchema>;

/**
 * Reads the first result of an App Store lookup response.
 * An empty `results` array means the store has no app with that bundle id.
 */
export function parseAppleLookupResponse(body: string): ParseResult {
  let decodeFailure = 'Lookup response is not JSON';
  const json = tryRunSync<unknown>({
    context: 'apple_lookup_decode',
    func: () => JSON.parse(body),
    onError: (error) => {
      decodeFailure = `Lookup response is not JSON: ${error.message}`;
    },
  });
  if (json === null) {
    return listingNotFound(decodeFailure);
  }

  const response = appleLookupResponseSchema.safeParse(json);
  if (!response.success) {
    return listingNotFound('Lookup response has no results array');
  }

  const [first] = response.data.results;
  if (first === undefined) {
    return listingNotFound('No app in the App Store matches the lookup');
  }

  const result = appleLookupResultSchema.safeParse(first);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
    return listingNotFound(`Lookup result is malformed (${fields})`);
  }

  return listingFound({
    storeVersion: result.data.version ?? null,
    storeLink: result.data.trackViewUrl,
    releaseNotes: result.data.releaseNotes ?? null,
  });
}

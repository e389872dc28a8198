/**
 * What a store parser pulls out of a store response, before normalization.
 */
export interface StoreListing {
  /** Raw version text, null when the payload had no version field */
  storeVersion: string | null;
  storeLink: string;
  releaseNotes: string | null;
}

export type ParseResult = { found: true; listing: StoreListing } | { found: false; reason: string };

export function listingFound(listing: StoreListing): ParseResult {
  return { found: true, listing };
}

export function listingNotFound(reason: string): ParseResult {
  return { found: false, reason };
}

export { fetchStoreResponse, STORE_REQUEST_TIMEOUT_MS } from './store-fetcher';
export type {
  HttpTransport,
  TransportRequest,
  TransportResponse,
  FetchResult,
  FetchError,
  FetchFailureReason,
} from './store-fetcher';
export type { StoreListing, ParseResult } from './store-listing';
export { buildAppleLookupUri, parseAppleLookupResponse } from './apple-lookup';
export type { AppleLookupParams, AppleLookupResult } from './apple-lookup';
export { buildPlayDetailsUri, parsePlayDetailsPage } from './play-details';
export type { PlayDetailsParams } from './play-details';
export {
  EMBEDDED_DATA_MARKER,
  EMBEDDED_DATA_PATHS,
  extractEmbeddedStoreData,
  repairEmbeddedPayload,
  readStringAtPath,
} from './play-embedded-data';
export type { EmbeddedStoreData } from './play-embedded-data';

import {
  firstByClass,
  firstMatching,
  parseHtmlDocument,
  type DocumentNode,
  type DocumentParser,
} from '../utils/document-query';
import { EMBEDDED_DATA_MARKER, extractEmbeddedStoreData } from './play-embedded-data';
import { listingFound, listingNotFound, type ParseResult } from './store-listing';

const PLAY_DETAILS_URL = 'https://play.google.com/store/apps/details';

/** Class names of the older, server-rendered details page */
const STRUCTURED_MARKUP = {
  additionalInfo: 'hAyfc',
  infoLabel: 'BgcNfc',
  infoValue: 'htlgb',
  section: 'W4P4ne',
  sectionHeader: 'wSaTQd',
  sectionBody: 'PHBdkd',
  releaseNotes: 'DWPxHb',
} as const;

const CURRENT_VERSION_LABEL = 'Current Version';
const WHATS_NEW_HEADER = "What's New";

export interface PlayDetailsParams {
  appId: string;
  locale: string;
}

export function buildPlayDetailsUri(params: PlayDetailsParams): URL {
  const uri = new URL(PLAY_DETAILS_URL);
  uri.searchParams.set('id', params.appId);
  uri.searchParams.set('hl', params.locale);
  return uri;
}

interface ExtractedDetails {
  storeVersion: string;
  releaseNotes: string | null;
}

// Kept as the older page's cleanup had it: strips every letter and colon.
function cleanStructuredReleaseNotes(text: string): string {
  return text.replace(/[a-zA-Z:s]/g, '').trim();
}

function extractFromStructuredMarkup(document: DocumentNode): ExtractedDetails | null {
  const infoRows = document.findByClass(STRUCTURED_MARKUP.additionalInfo);
  const versionRow = firstMatching(
    infoRows,
    (row) => firstByClass(row, STRUCTURED_MARKUP.infoLabel)?.text === CURRENT_VERSION_LABEL
  );
  const versionValue = versionRow && firstByClass(versionRow, STRUCTURED_MARKUP.infoValue);
  if (!versionValue) {
    return null;
  }

  const sections = document.findByClass(STRUCTURED_MARKUP.section);
  const whatsNew = firstMatching(
    sections,
    (section) => firstByClass(section, STRUCTURED_MARKUP.sectionHeader)?.text === WHATS_NEW_HEADER
  );
  const sectionBody = whatsNew && firstByClass(whatsNew, STRUCTURED_MARKUP.sectionBody);
  const notes = sectionBody && firstByClass(sectionBody, STRUCTURED_MARKUP.releaseNotes);

  return {
    storeVersion: versionValue.text,
    releaseNotes: notes ? cleanStructuredReleaseNotes(notes.text) : null,
  };
}

function extractFromEmbeddedData(document: DocumentNode): ExtractedDetails | null {
  const script = firstMatching(document.findByTag('script'), (node) => node.text.includes(EMBEDDED_DATA_MARKER));
  if (!script) {
    return null;
  }
  return extractEmbeddedStoreData(script.text);
}

/**
 * Reads the published version and release notes from a Play Store details page.
 *
 * The structured markup is tried first; when it has no "Current Version" row
 * the embedded `ds:5` data script is used. The store link is the request URL.
 */
export function parsePlayDetailsPage(
  html: string,
  requestUri: URL,
  parseDocument: DocumentParser = parseHtmlDocument
): ParseResult {
  const document = parseDocument(html);
  const details = extractFromStructuredMarkup(document) ?? extractFromEmbeddedData(document);

  if (!details) {
    return listingNotFound('Play Store page has neither version markup nor a readable ds:5 data script');
  }

  return listingFound({
    storeVersion: details.storeVersion,
    storeLink: requestUri.toString(),
    releaseNotes: details.releaseNotes,
  });
}

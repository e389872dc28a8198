import { z } from 'zod';
import { tryRunSync } from '../utils/try-catch';

/**
 * Everything tied to the undocumented `ds:5` data blob of the Play Store
 * details page. When Google reshuffles the blob, this is the file to patch.
 */

export const EMBEDDED_DATA_MARKER = "key: 'ds:5'";

/** `AF_initDataCallback(` */
const CALLBACK_PREFIX_LENGTH = 20;
/** `);` */
const CALLBACK_SUFFIX_LENGTH = 2;

/** Index paths into `data` */
export const EMBEDDED_DATA_PATHS = {
  storeVersion: [1, 2, 140, 0, 0, 0],
  releaseNotes: [1, 2, 144, 1, 1],
} as const;

const PAYLOAD_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  ['key:', '"key":'],
  ['hash:', '"hash":'],
  ['data:', '"data":'],
  ['sideChannel:', '"sideChannel":'],
  ["d'", 'd’'],
  ["s'", 's’'],
  ["l'", 'l’'],
  ['#39;', ''],
  ["'", '"'],
];

const RELEASE_NOTES_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  ['d&', 'd’'],
  ['s&', 's’'],
  ['l&', 'l’'],
  ['<br>', '\n'],
  ['& ', '&'],
  ['&amp;', '&'],
];

const embeddedPayloadSchema = z.object({
  data: z.array(z.unknown()),
});

export interface EmbeddedStoreData {
  storeVersion: string;
  releaseNotes: string | null;
}

function applyReplacements(text: string, replacements: ReadonlyArray<readonly [string, string]>): string {
  return replacements.reduce((result, [search, replacement]) => result.replaceAll(search, replacement), text);
}

/**
 * Turns the callback script into JSON text: drops the call wrapper, quotes
 * the bare keys and swaps single quotes for double quotes.
 */
export function repairEmbeddedPayload(scriptText: string): string {
  const payload = scriptText.substring(CALLBACK_PREFIX_LENGTH, scriptText.length - CALLBACK_SUFFIX_LENGTH);
  return applyReplacements(payload, PAYLOAD_REPLACEMENTS);
}

export function cleanEmbeddedReleaseNotes(raw: string): string {
  return applyReplacements(raw, RELEASE_NOTES_REPLACEMENTS);
}

/**
 * Walks nested arrays by index. Returns null on any missing index or when
 * the leaf is not a string.
 */
export function readStringAtPath(data: unknown, path: readonly number[]): string | null {
  let cursor: unknown = data;
  for (const index of path) {
    if (!Array.isArray(cursor) || index >= cursor.length) {
      return null;
    }
    cursor = cursor[index];
  }
  return typeof cursor === 'string' ? cursor : null;
}

/**
 * Reads version and release notes from the `ds:5` script text.
 * Returns null when the payload does not parse or carries no version.
 */
export function extractEmbeddedStoreData(scriptText: string): EmbeddedStoreData | null {
  const parsed = tryRunSync<unknown>({
    context: 'play_embedded_data_decode',
    func: () => JSON.parse(repairEmbeddedPayload(scriptText)),
  });

  const payload = embeddedPayloadSchema.safeParse(parsed);
  if (!payload.success || payload.data.data.length === 0) {
    return null;
  }

  const storeVersion = readStringAtPath(payload.data.data, EMBEDDED_DATA_PATHS.storeVersion);
  if (storeVersion === null) {
    return null;
  }

  const releaseNotes = readStringAtPath(payload.data.data, EMBEDDED_DATA_PATHS.releaseNotes);

  return {
    storeVersion,
    releaseNotes: releaseNotes === null ? null : cleanEmbeddedReleaseNotes(releaseNotes),
  };
}

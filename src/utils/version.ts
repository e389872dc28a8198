const VERSION_PATTERN = /\d+\.\d+\.\d+/;

export const UNKNOWN_VERSION = '0.0.0';

/**
 * Reduces arbitrary version text to MAJOR.MINOR.PATCH.
 * Returns the first numeric triple found, or 0.0.0 when there is none.
 */
export function normalizeVersion(raw: string): string {
  return VERSION_PATTERN.exec(raw)?.[0] ?? UNKNOWN_VERSION;
}

function toFields(version: string): number[] {
  return version.split('.').map((field) => {
    const value = Number.parseInt(field, 10);
    return Number.isNaN(value) ? 0 : value;
  });
}

/**
 * Decides whether the store version should be offered over the local one.
 *
 * Fields are compared most significant first and the first difference
 * decides. When the local version is ahead or equal, the result is
 * `preferNewerLocalShowsChangelog`, so a caller can still surface the
 * changelog without a version bump.
 */
export function canUpdate(
  localVersion: string,
  storeVersion: string,
  preferNewerLocalShowsChangelog: boolean
): boolean {
  const local = toFields(localVersion);
  const store = toFields(storeVersion);
  const length = Math.max(local.length, store.length);

  for (let i = 0; i < length; i++) {
    const localField = local[i] ?? 0;
    const storeField = store[i] ?? 0;

    if (storeField > localField) {
      return true;
    }

    if (localField > storeField) {
      return preferNewerLocalShowsChangelog;
    }
  }

  return preferNewerLocalShowsChangelog;
}

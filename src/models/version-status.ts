import { canUpdate, normalizeVersion } from '../utils/version';
import { StorePlatform } from './store-platform';

/**
 * Result of comparing the installed version with the store listing.
 *
 * Built once per check by the checker and never mutated.
 */
export interface VersionStatus {
  /** Installed version, MAJOR.MINOR.PATCH */
  readonly localVersion: string;

  /** Published version, MAJOR.MINOR.PATCH (0.0.0 when the store gave none) */
  readonly storeVersion: string;

  /** Store page where the app can be updated */
  readonly storeLink: string;

  /** Release notes of the published version, when the store exposed them */
  readonly releaseNotes: string | null;

  /** Whether an equal or newer local version still reports an update */
  readonly preferNewerLocalShowsChangelog: boolean;

  /** Whether the update prompt should be shown */
  readonly canUpdate: boolean;

  readonly platform: StorePlatform;
}

export interface VersionStatusParams {
  localVersion: string;
  storeVersion: string;
  storeLink: string;
  releaseNotes?: string | null;
  preferNewerLocalShowsChangelog: boolean;
  platform: StorePlatform;
}

export function createVersionStatus(params: VersionStatusParams): VersionStatus {
  const localVersion = normalizeVersion(params.localVersion);
  const storeVersion = normalizeVersion(params.storeVersion);

  return Object.freeze({
    localVersion,
    storeVersion,
    storeLink: params.storeLink,
    releaseNotes: params.releaseNotes ?? null,
    preferNewerLocalShowsChangelog: params.preferNewerLocalShowsChangelog,
    canUpdate: canUpdate(localVersion, storeVersion, params.preferNewerLocalShowsChangelog),
    platform: params.platform,
  });
}

export function versionStatusToJson(status: VersionStatus): Record<string, unknown> {
  const json: Record<string, unknown> = {
    platform: status.platform,
    localVersion: status.localVersion,
    storeVersion: status.storeVersion,
    storeLink: status.storeLink,
    canUpdate: status.canUpdate,
    preferNewerLocalShowsChangelog: status.preferNewerLocalShowsChangelog,
  };

  if (status.releaseNotes !== null) json.releaseNotes = status.releaseNotes;

  return json;
}

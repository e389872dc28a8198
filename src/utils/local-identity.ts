/**
 * What the installed application reports about itself.
 */
export interface LocalIdentity {
  /** Host platform name, e.g. `ios` or `android` */
  platform: string;

  /** Bundle identifier (Apple) or application id (Play) */
  packageName: string;

  /** Raw version string, normalized later */
  version: string;

  /** Device locale, e.g. `en_US` */
  locale?: string;
}

export type LocalIdentityProvider = () => Promise<LocalIdentity>;

export function createStaticIdentityProvider(identity: LocalIdentity): LocalIdentityProvider {
  return async () => ({ ...identity });
}

/**
 * Locale of the current process in the device-locale form (`en_US`).
 */
export function getDefaultLocale(): string {
  return Intl.DateTimeFormat().resolvedOptions().locale.replace(/-/g, '_');
}

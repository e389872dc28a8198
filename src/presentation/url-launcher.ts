import { VersionCheckError } from '../utils/errors';

/**
 * Where a store link should open
 */
export enum LaunchMode {
  PlatformDefault = 'platform_default',
  InAppWebView = 'in_app_web_view',
  ExternalApplication = 'external_application',
  ExternalNonBrowserApplication = 'external_non_browser_application',
}

/**
 * Opens URLs on the host platform.
 * `launch` may report `false` when the platform refused the URL.
 */
export interface UrlLauncher {
  canLaunch(url: string): Promise<boolean>;
  launch(url: string, mode: LaunchMode): Promise<boolean | void>;
}

function parseStoreLink(storeLink: string): URL {
  try {
    return new URL(storeLink);
  } catch {
    throw new VersionCheckError('LAUNCH_FAILED', `Could not launch ${storeLink}: not a valid URL`);
  }
}

/**
 * Opens the App Store or Play Store page of the app.
 * Throws `LAUNCH_FAILED` when the link cannot be opened.
 */
export async function launchAppStore(
  storeLink: string,
  launcher: UrlLauncher,
  mode: LaunchMode = LaunchMode.PlatformDefault
): Promise<void> {
  const url = parseStoreLink(storeLink).toString();

  if (!(await launcher.canLaunch(url))) {
    throw new VersionCheckError('LAUNCH_FAILED', `Could not launch ${url}`);
  }

  const launched = await launcher.launch(url, mode);
  if (launched === false) {
    throw new VersionCheckError('LAUNCH_FAILED', `Could not launch ${url}`);
  }
}

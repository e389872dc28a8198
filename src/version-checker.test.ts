import { afterEach, describe, expect, it, vi } from 'vitest';
import { DiagnosticKind, StorePlatform } from './models';
import { LaunchMode, type DialogPresenter, type UpdateDialog, type UrlLauncher } from './presentation';
import type { HttpTransport } from './stores';
import { createStaticIdentityProvider, isVersionCheckError, type LocalIdentity } from './utils';
import { StoreVersionChecker, resolveVersionStatus, type StoreVersionCheckerOptions } from './version-checker';

const iosIdentity: LocalIdentity = { platform: 'ios', packageName: 'com.example.app', version: '1.0.0' };
const androidIdentity: LocalIdentity = {
  platform: 'android',
  packageName: 'com.example.app',
  version: '1.0.0+12',
  locale: 'en_US',
};

const appleBody = JSON.stringify({
  resultCount: 1,
  results: [{ version: '1.2.0', trackViewUrl: 'https://apps.apple.com/x', releaseNotes: 'Bug fixes' }],
});

const respondWith = (status: number, body: string) =>
  vi.fn<Parameters<HttpTransport>, ReturnType<HttpTransport>>(async () => ({ status, text: async () => body }));

function createChecker(overrides: Partial<StoreVersionCheckerOptions> = {}): StoreVersionChecker {
  return new StoreVersionChecker({
    identityProvider: createStaticIdentityProvider(iosIdentity),
    transport: respondWith(200, appleBody),
    preferNewerLocalShowsChangelog: false,
    enableDebugLogs: false,
    ...overrides,
  });
}

function createPresenter() {
  const presented: UpdateDialog[] = [];
  const presenter: DialogPresenter = {
    present: vi.fn(async (dialog: UpdateDialog) => {
      presented.push(dialog);
    }),
    close: vi.fn(),
  };
  return { presenter, presented };
}

describe('StoreVersionChecker', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('getVersionStatus', () => {
    it('resolves an App Store listing', async () => {
      const transport = respondWith(200, appleBody);
      const checker = createChecker({ transport });

      const status = await checker.getVersionStatus();

      expect(status).toEqual({
        platform: StorePlatform.Apple,
        localVersion: '1.0.0',
        storeVersion: '1.2.0',
        storeLink: 'https://apps.apple.com/x',
        releaseNotes: 'Bug fixes',
        canUpdate: true,
        preferNewerLocalShowsChangelog: false,
      });
      expect(transport).toHaveBeenCalledTimes(1);
      expect(transport.mock.calls[0]?.[0]).toBe('https://itunes.apple.com/lookup?bundleId=com.example.app');
    });

    it('uses the store id override and country for the lookup', async () => {
      const transport = respondWith(200, appleBody);
      const checker = createChecker({ transport, appleStoreId: 'com.example.store', appleStoreCountry: 'fr' });

      await checker.getVersionStatus();

      expect(transport.mock.calls[0]?.[0]).toBe('https://itunes.apple.com/lookup?bundleId=com.example.store&country=fr');
    });

    it('prefers the forced store version over the listing', async () => {
      const checker = createChecker({ forcedStoreVersion: 'v9.9.9-rc1' });

      const status = await checker.getVersionStatus();

      expect(status?.storeVersion).toBe('9.9.9');
      expect(status?.canUpdate).toBe(true);
    });

    it('reports equal versions as updatable when the changelog policy is set', async () => {
      const checker = createChecker({
        identityProvider: createStaticIdentityProvider({ ...iosIdentity, version: '1.2.0' }),
        preferNewerLocalShowsChangelog: true,
      });

      const status = await checker.getVersionStatus();

      expect(status?.canUpdate).toBe(true);
    });

    it('falls back to 0.0.0 when the listing has no version', async () => {
      const body = JSON.stringify({ results: [{ trackViewUrl: 'https://apps.apple.com/x' }] });
      const checker = createChecker({ transport: respondWith(200, body) });

      const status = await checker.getVersionStatus();

      expect(status?.storeVersion).toBe('0.0.0');
      expect(status?.canUpdate).toBe(false);
    });

    it('returns null when the App Store has no matching app', async () => {
      const onDiagnostic = vi.fn();
      const checker = createChecker({ transport: respondWith(200, '{"resultCount":0,"results":[]}'), onDiagnostic });

      expect(await checker.getVersionStatus()).toBeNull();
      expect(onDiagnostic).toHaveBeenCalledWith(
        expect.objectContaining({
          kind: DiagnosticKind.Parse,
          message: 'No app in the App Store matches the lookup',
          uri: 'https://itunes.apple.com/lookup?bundleId=com.example.app',
        })
      );
    });

    it('returns null without throwing on a 404', async () => {
      const onDiagnostic = vi.fn();
      const checker = createChecker({ transport: respondWith(404, 'Not Found'), onDiagnostic });

      await expect(checker.getVersionStatus()).resolves.toBeNull();
      expect(onDiagnostic).toHaveBeenCalledWith(
        expect.objectContaining({ kind: DiagnosticKind.Transport, status: 404 })
      );
    });

    it('returns null when the transport throws', async () => {
      const transport: HttpTransport = async () => {
        throw new Error('getaddrinfo ENOTFOUND itunes.apple.com');
      };
      const checker = createChecker({ transport });

      await expect(checker.getVersionStatus()).resolves.toBeNull();
    });

    it('skips the request on unsupported platforms', async () => {
      const transport = respondWith(200, appleBody);
      const onDiagnostic = vi.fn();
      const checker = createChecker({
        identityProvider: createStaticIdentityProvider({ ...iosIdentity, platform: 'linux' }),
        transport,
        onDiagnostic,
      });

      expect(await checker.getVersionStatus()).toBeNull();
      expect(transport).not.toHaveBeenCalled();
      expect(onDiagnostic).toHaveBeenCalledWith(
        expect.objectContaining({
          kind: DiagnosticKind.UnsupportedPlatform,
          message: 'The target platform "linux" is not supported',
        })
      );
    });

    it('returns null when the identity provider fails', async () => {
      const onDiagnostic = vi.fn();
      const checker = createChecker({
        identityProvider: async () => {
          throw new Error('package info unavailable');
        },
        onDiagnostic,
      });

      expect(await checker.getVersionStatus()).toBeNull();
      expect(onDiagnostic).toHaveBeenCalledWith(
        expect.objectContaining({
          kind: DiagnosticKind.Identity,
          message: 'Could not read the local app identity: package info unavailable',
        })
      );
    });

    it('still resolves to null when the diagnostic callback throws', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const onDiagnostic = vi.fn(() => {
        throw new Error('sink down');
      });
      const checker = createChecker({
        identityProvider: createStaticIdentityProvider({ ...iosIdentity, platform: 'linux' }),
        onDiagnostic,
        enableDebugLogs: true,
      });

      await expect(checker.getVersionStatus()).resolves.toBeNull();
      expect(onDiagnostic).toHaveBeenCalledTimes(1);
      expect(log).toHaveBeenCalledWith('StoreVersionCheck: Diagnostic sink failed: sink down');
    });

    it('resolves a Play Store page through the embedded data', async () => {
      const details: unknown[] = new Array(145).fill(null);
      details[140] = [[['1.0.3']]];
      details[144] = [null, [null, 'Smaller download']];
      const script = `AF_initDataCallback({key: 'ds:5', hash: '3', data:${JSON.stringify([null, [null, null, details]])}, sideChannel: {}});`;
      const transport = respondWith(200, `<html><head><script>${script}</script></head><body></body></html>`);
      const checker = createChecker({
        identityProvider: createStaticIdentityProvider(androidIdentity),
        transport,
      });

      const status = await checker.getVersionStatus();

      expect(status).toEqual({
        platform: StorePlatform.Play,
        localVersion: '1.0.0',
        storeVersion: '1.0.3',
        storeLink: 'https://play.google.com/store/apps/details?id=com.example.app&hl=en_US',
        releaseNotes: 'Smaller download',
        canUpdate: true,
        preferNewerLocalShowsChangelog: false,
      });
    });

    it('uses the Play overrides for the details page', async () => {
      const transport = respondWith(200, '<html></html>');
      const checker = createChecker({
        identityProvider: createStaticIdentityProvider(androidIdentity),
        playStoreId: 'com.example.play',
        playLocale: 'de_DE',
        transport,
      });

      expect(await checker.getVersionStatus()).toBeNull();
      expect(transport.mock.calls[0]?.[0]).toBe('https://play.google.com/store/apps/details?id=com.example.play&hl=de_DE');
    });

    it('logs the outcome when debug logs are enabled', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const checker = createChecker({ enableDebugLogs: true });

      await checker.getVersionStatus();

      expect(log).toHaveBeenCalledWith('StoreVersionCheck: Local 1.0.0, store 1.2.0, can update: true');
    });
  });

  describe('configuration', () => {
    it('rejects a country that is not a two-letter code', () => {
      let thrown: unknown;
      try {
        createChecker({ appleStoreCountry: 'FRA' });
      } catch (error) {
        thrown = error;
      }

      expect(isVersionCheckError(thrown) && thrown.code).toBe('INVALID_CONFIGURATION');
    });

    it('exposes the parsed configuration', () => {
      const checker = createChecker({ appleStoreCountry: ' us ' });

      expect(checker.configuration).toEqual({ appleStoreCountry: 'us', preferNewerLocalShowsChangelog: false });
    });
  });

  describe('showAlertIfNecessary', () => {
    it('presents the update dialog when the store is ahead', async () => {
      const { presenter, presented } = createPresenter();
      const checker = createChecker();

      expect(await checker.showAlertIfNecessary(presenter)).toBe(true);
      expect(presented).toHaveLength(1);
      expect(presented[0]?.title).toBe('Update Available');
      expect(presented[0]?.text).toBe('You can now update this app from 1.0.0 to 1.2.0');
    });

    it('does not present when no update is available', async () => {
      const { presenter } = createPresenter();
      const checker = createChecker({
        identityProvider: createStaticIdentityProvider({ ...iosIdentity, version: '1.2.0' }),
      });

      expect(await checker.showAlertIfNecessary(presenter)).toBe(false);
      expect(presenter.present).not.toHaveBeenCalled();
    });

    it('does not present once the caller is no longer interested', async () => {
      const { presenter } = createPresenter();
      const checker = createChecker();

      expect(await checker.showAlertIfNecessary(presenter, { isStillRelevant: () => false })).toBe(false);
      expect(presenter.present).not.toHaveBeenCalled();
    });
  });

  describe('launchAppStore', () => {
    it('opens the link through the configured launcher', async () => {
      const launcher: UrlLauncher = { canLaunch: vi.fn(async () => true), launch: vi.fn(async () => true) };
      const checker = createChecker({ urlLauncher: launcher });

      await checker.launchAppStore('https://apps.apple.com/x', LaunchMode.ExternalApplication);

      expect(launcher.launch).toHaveBeenCalledWith('https://apps.apple.com/x', LaunchMode.ExternalApplication);
    });

    it('fails without a launcher', async () => {
      const checker = createChecker();

      await expect(checker.launchAppStore('https://apps.apple.com/x')).rejects.toMatchObject({
        code: 'LAUNCH_FAILED',
        message: 'No URL launcher configured',
      });
    });

    it('propagates a failed launch from the dialog update action', async () => {
      const { presenter, presented } = createPresenter();
      const launcher: UrlLauncher = { canLaunch: vi.fn(async () => false), launch: vi.fn(async () => true) };
      const checker = createChecker({ urlLauncher: launcher });

      await checker.showAlertIfNecessary(presenter);
      const update = presented[0]?.actions.find((action) => action.role === 'update');

      await expect(update?.onPress()).rejects.toMatchObject({ code: 'LAUNCH_FAILED' });
      expect(presenter.close).not.toHaveBeenCalled();
    });
  });
});

describe('resolveVersionStatus', () => {
  it('runs a one-off check', async () => {
    const status = await resolveVersionStatus({
      identityProvider: createStaticIdentityProvider(iosIdentity),
      transport: respondWith(200, appleBody),
      preferNewerLocalShowsChangelog: false,
      enableDebugLogs: false,
    });

    expect(status?.storeVersion).toBe('1.2.0');
  });
});

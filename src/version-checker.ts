import {
  CheckConfiguration,
  CheckDiagnostic,
  DiagnosticKind,
  StorePlatform,
  VersionStatus,
  createCheckDiagnostic,
  createVersionStatus,
  parseCheckConfiguration,
  resolveStorePlatform,
} from './models';

import {
  HttpTransport,
  ParseResult,
  buildAppleLookupUri,
  buildPlayDetailsUri,
  fetchStoreResponse,
  parseAppleLookupResponse,
  parsePlayDetailsPage,
} from './stores';

import {
  DialogPresenter,
  LaunchMode,
  UpdateDialogOptions,
  UrlLauncher,
  buildUpdateDialog,
  launchAppStore,
} from './presentation';

import {
  DocumentParser,
  LocalIdentity,
  LocalIdentityProvider,
  VersionCheckError,
  getDefaultLocale,
  parseHtmlDocument,
  tryRun,
  tryRunSync,
} from './utils';

interface StoreVersionCheckerOptions extends CheckConfiguration {
  /** Supplies the installed app's platform, package name and version */
  identityProvider: LocalIdentityProvider;
  /** Defaults to the global `fetch` */
  transport?: HttpTransport;
  parseDocument?: DocumentParser;
  /** Required by `launchAppStore` and the dialog's update action */
  urlLauncher?: UrlLauncher;
  /** Receives the reason whenever a check yields no status */
  onDiagnostic?: (diagnostic: CheckDiagnostic) => void;
  enableDebugLogs?: boolean;
}

interface AlertOptions {
  /** Checked after the network await; the dialog is skipped when it returns false */
  isStillRelevant?: () => boolean;
  dialog?: UpdateDialogOptions;
}

interface StoreRequest {
  uri: URL;
  parse: (body: string) => ParseResult;
}

/**
 * Compares the installed app with its App Store or Play Store listing.
 */
class StoreVersionChecker {
  private readonly _configuration: CheckConfiguration;
  private readonly _identityProvider: LocalIdentityProvider;
  private readonly _transport?: HttpTransport;
  private readonly _parseDocument: DocumentParser;
  private readonly _urlLauncher?: UrlLauncher;
  private readonly _onDiagnostic?: (diagnostic: CheckDiagnostic) => void;
  private readonly _enableDebugLogs: boolean;

  private static readonly _logPrefix = 'StoreVersionCheck:';

  constructor(options: StoreVersionCheckerOptions) {
    this._configuration = parseCheckConfiguration({
      appleStoreId: options.appleStoreId,
      playStoreId: options.playStoreId,
      appleStoreCountry: options.appleStoreCountry,
      playLocale: options.playLocale,
      forcedStoreVersion: options.forcedStoreVersion,
      preferNewerLocalShowsChangelog: options.preferNewerLocalShowsChangelog,
    });
    this._identityProvider = options.identityProvider;
    this._transport = options.transport;
    this._parseDocument = options.parseDocument ?? parseHtmlDocument;
    this._urlLauncher = options.urlLauncher;
    this._onDiagnostic = options.onDiagnostic;
    this._enableDebugLogs = options.enableDebugLogs ?? process.env.NODE_ENV === 'development';
  }

  get configuration(): CheckConfiguration {
    return { ...this._configuration };
  }

  /**
   * Checks the store and returns the comparison, or null when it cannot be
   * determined (unsupported platform, request failure, unreadable listing).
   * Never rejects.
   */
  async getVersionStatus(): Promise<VersionStatus | null> {
    return tryRun({
      context: 'get_version_status',
      func: () => this._resolve(),
      onError: (error) => {
        this._report(DiagnosticKind.Unexpected, `Version check failed: ${error.message}`);
      },
    });
  }

  /**
   * Checks the version and presents the update dialog when an update is
   * available. Returns whether a dialog was presented.
   */
  async showAlertIfNecessary(presenter: DialogPresenter, options: AlertOptions = {}): Promise<boolean> {
    const status = await this.getVersionStatus();
    if (!status || !status.canUpdate) {
      return false;
    }

    if (options.isStillRelevant && !options.isStillRelevant()) {
      this._log('Skipping update dialog, caller is no longer interested');
      return false;
    }

    await this.showUpdateDialog(presenter, status, options.dialog);
    return true;
  }

  /**
   * Presents the update dialog for a status. The update action opens the
   * store page through the configured URL launcher.
   */
  async showUpdateDialog(
    presenter: DialogPresenter,
    status: VersionStatus,
    options?: UpdateDialogOptions
  ): Promise<void> {
    const dialog = buildUpdateDialog(
      status,
      {
        presenter,
        launcher: {
          canLaunch: (url) => this._requireLauncher().canLaunch(url),
          launch: (url, mode) => this._requireLauncher().launch(url, mode),
        },
      },
      options
    );
    await presenter.present(dialog);
  }

  /**
   * Opens the store page. Throws `LAUNCH_FAILED` when it cannot be opened.
   */
  async launchAppStore(storeLink: string, mode: LaunchMode = LaunchMode.PlatformDefault): Promise<void> {
    this._log(`Launching ${storeLink}`);
    await launchAppStore(storeLink, this._requireLauncher(), mode);
  }

  private async _resolve(): Promise<VersionStatus | null> {
    const identity = await tryRun({
      context: 'local_identity',
      func: () => this._identityProvider(),
      onError: (error) => {
        this._report(DiagnosticKind.Identity, `Could not read the local app identity: ${error.message}`);
      },
    });
    if (!identity) {
      return null;
    }

    const platform = resolveStorePlatform(identity.platform);

    if (platform === StorePlatform.Unsupported) {
      this._report(
        DiagnosticKind.UnsupportedPlatform,
        `The target platform "${identity.platform}" is not supported`
      );
      return null;
    }

    const request = this._buildRequest(platform, identity);
    const response = await fetchStoreResponse(request.uri, this._transport);
    if (!response.ok) {
      this._report(DiagnosticKind.Transport, response.error.message, request.uri, response.error.status);
      return null;
    }

    const parsed = request.parse(response.body);
    if (!parsed.found) {
      this._report(DiagnosticKind.Parse, parsed.reason, request.uri);
      return null;
    }

    const { listing } = parsed;
    const status = createVersionStatus({
      platform,
      localVersion: identity.version,
      storeVersion: this._configuration.forcedStoreVersion ?? listing.storeVersion ?? '',
      storeLink: listing.storeLink,
      releaseNotes: listing.releaseNotes,
      preferNewerLocalShowsChangelog: this._configuration.preferNewerLocalShowsChangelog,
    });

    this._log(
      `Local ${status.localVersion}, store ${status.storeVersion}, can update: ${status.canUpdate}`
    );
    return status;
  }

  private _buildRequest(platform: StorePlatform.Apple | StorePlatform.Play, identity: LocalIdentity): StoreRequest {
    if (platform === StorePlatform.Apple) {
      return {
        uri: buildAppleLookupUri({
          bundleId: this._configuration.appleStoreId ?? identity.packageName,
          country: this._configuration.appleStoreCountry,
        }),
        parse: (body) => parseAppleLookupResponse(body),
      };
    }

    const uri = buildPlayDetailsUri({
      appId: this._configuration.playStoreId ?? identity.packageName,
      locale: this._configuration.playLocale ?? identity.locale ?? getDefaultLocale(),
    });
    return {
      uri,
      parse: (body) => parsePlayDetailsPage(body, uri, this._parseDocument),
    };
  }

  private _requireLauncher(): UrlLauncher {
    if (!this._urlLauncher) {
      throw new VersionCheckError('LAUNCH_FAILED', 'No URL launcher configured');
    }
    return this._urlLauncher;
  }

  private _report(kind: DiagnosticKind, message: string, uri?: URL, status?: number): void {
    this._log(message);
    const onDiagnostic = this._onDiagnostic;
    if (!onDiagnostic) {
      return;
    }
    tryRunSync({
      context: 'diagnostic_sink',
      func: () => onDiagnostic(createCheckDiagnostic({ kind, message, uri: uri?.toString(), status })),
      onError: (error) => {
        this._log(`Diagnostic sink failed: ${error.message}`);
      },
    });
  }

  private _log(message: string): void {
    if (this._enableDebugLogs) {
      console.log(`${StoreVersionChecker._logPrefix} ${message}`);
    }
  }
}

/**
 * One-off check without keeping a checker around.
 */
async function resolveVersionStatus(options: StoreVersionCheckerOptions): Promise<VersionStatus | null> {
  return new StoreVersionChecker(options).getVersionStatus();
}

export { StoreVersionChecker, resolveVersionStatus };
export type { StoreVersionCheckerOptions, AlertOptions };

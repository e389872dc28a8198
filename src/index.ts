// Main class
export { StoreVersionChecker, resolveVersionStatus } from './version-checker';
export type { StoreVersionCheckerOptions, AlertOptions } from './version-checker';

// Models
export { StorePlatform, DiagnosticKind } from './models';
export type { VersionStatus, CheckConfiguration, CheckDiagnostic } from './models';
export { createVersionStatus, versionStatusToJson, checkConfigurationSchema, parseCheckConfiguration } from './models';

// Stores
export { fetchStoreResponse, parseAppleLookupResponse, parsePlayDetailsPage, STORE_REQUEST_TIMEOUT_MS } from './stores';
export type { HttpTransport, TransportRequest, TransportResponse, FetchResult, ParseResult, StoreListing } from './stores';

// Presentation
export { LaunchMode, launchAppStore, buildUpdateDialog } from './presentation';
export type { UrlLauncher, DialogPresenter, UpdateDialog, UpdateDialogOptions, DialogAction } from './presentation';

// Utilities
export { normalizeVersion, canUpdate, VersionCheckError, isVersionCheckError, createStaticIdentityProvider } from './utils';
export type { LocalIdentity, LocalIdentityProvider, DocumentNode, DocumentParser, VersionCheckErrorCode } from './utils';

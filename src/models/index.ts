export { StorePlatform, resolveStorePlatform } from './store-platform';
export type { VersionStatus, VersionStatusParams } from './version-status';
export { createVersionStatus, versionStatusToJson } from './version-status';
export type { CheckConfiguration } from './check-configuration';
export { checkConfigurationSchema, parseCheckConfiguration } from './check-configuration';
export type { CheckDiagnostic } from './check-diagnostic';
export { DiagnosticKind, createCheckDiagnostic } from './check-diagnostic';

export { normalizeVersion, canUpdate, UNKNOWN_VERSION } from './version';
export { VersionCheckError, isVersionCheckError, toError } from './errors';
export type { VersionCheckErrorCode } from './errors';
export { tryRun, tryRunSync } from './try-catch';
export { createStaticIdentityProvider, getDefaultLocale } from './local-identity';
export type { LocalIdentity, LocalIdentityProvider } from './local-identity';
export { parseHtmlDocument, firstMatching, firstByClass } from './document-query';
export type { DocumentNode, DocumentParser } from './document-query';

export type VersionCheckErrorCode = 'TIMEOUT' | 'LAUNCH_FAILED' | 'INVALID_CONFIGURATION';

export class VersionCheckError extends Error {
  readonly code: VersionCheckErrorCode;
  readonly details?: unknown;

  constructor(code: VersionCheckErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'VersionCheckError';
    this.code = code;
    this.details = details;
  }
}

export const isVersionCheckError = (error: unknown): error is VersionCheckError => {
  return error instanceof VersionCheckError;
};

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

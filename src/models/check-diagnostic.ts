/**
 * Why a check produced no status
 */
export enum DiagnosticKind {
  Transport = 'transport',
  Parse = 'parse',
  UnsupportedPlatform = 'unsupported_platform',
  Identity = 'identity',
  Unexpected = 'unexpected',
}

export interface CheckDiagnostic {
  kind: DiagnosticKind;
  message: string;
  uri?: string;
  status?: number;
  timestamp: string;
}

export function createCheckDiagnostic(params: Omit<CheckDiagnostic, 'timestamp'> & { timestamp?: string }): CheckDiagnostic {
  return {
    kind: params.kind,
    message: params.message,
    uri: params.uri,
    status: params.status,
    timestamp: params.timestamp ?? new Date().toISOString(),
  };
}

export type BridgeErrorCode = 'DECODE' | 'VALIDATION' | 'NO_ROUTE' | 'CONNECTION' | 'API';

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;

  constructor(code: BridgeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A single inbound frame could not be decoded. The session keeps running. */
export class DecodeError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DECODE', message, options);
  }
}

/** Puppet entries or a reload body were rejected. The registry is left as it was. */
export class ValidationError extends BridgeError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION', message);
    this.issues = issues;
  }
}

export class NoRouteError extends BridgeError {
  constructor(message: string) {
    super('NO_ROUTE', message);
  }
}

/** Stream connection failed; `attempts` counts consecutive failures. */
export class ConnectionError extends BridgeError {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super('CONNECTION', message, options);
    this.attempts = attempts;
  }
}

/** Mattermost REST call returned a non-2xx status or an unexpected body. */
export class ApiError extends BridgeError {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super('API', message, options);
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

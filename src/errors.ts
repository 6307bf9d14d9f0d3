export type PortalErrorCode =
  | 'CONNECTION_FAILED'
  | 'NAVIGATION_FAILED'
  | 'LOGIN_TIMEOUT'
  | 'TABLE_STRUCTURE'
  | 'CONFIG_INVALID';

/** Base class for every error this package raises on purpose. */
export class PortalError extends Error {
  readonly code: PortalErrorCode;
  /** What the operator can do about it, when there is something to do. */
  readonly hint?: string;

  constructor(code: PortalErrorCode, message: string, opts?: { hint?: string; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.hint = opts?.hint;
  }
}

/** The browser could not be reached, launched or attached to. Aborts a run. */
export class ConnectionError extends PortalError {
  constructor(message: string, opts?: { hint?: string; cause?: unknown }) {
    super('CONNECTION_FAILED', message, opts);
  }
}

/** An element or page state did not show up within its bound. Fails one patient. */
export class NavigationError extends PortalError {
  constructor(message: string, opts?: { cause?: unknown }) {
    super('NAVIGATION_FAILED', message, opts);
  }
}

/** The identity provider did not hand control back within the allowed time. */
export class LoginTimeoutError extends PortalError {
  constructor(timeoutMs: number) {
    super('LOGIN_TIMEOUT', `Login not completed within ${Math.round(timeoutMs / 1000)}s`, {
      hint: 'Complete the login in the browser window before the timeout expires.',
    });
  }
}

/** The results table lacks the document-type column. */
export class ScrapeStructureError extends PortalError {
  constructor(message: string) {
    super('TABLE_STRUCTURE', message);
  }
}

export class ConfigError extends PortalError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof PortalError && err.hint) return `${err.message} (${err.hint})`;
  return err instanceof Error ? err.message : String(err);
}

export type RegistryErrorKind = 'invalid-identifier' | 'auth' | 'not-found' | 'transport';

type RegistryErrorOpts = { companyNumber?: string; status?: number; cause?: unknown };

/**
 * Base class for every failure the Companies House client reports.
 * `kind` survives serialization, so callers switch on it rather than on `instanceof`.
 */
export abstract class RegistryError extends Error {
  abstract readonly kind: RegistryErrorKind;
  readonly companyNumber?: string;
  /** Upstream HTTP status, when there was a response at all. */
  readonly status?: number;

  constructor(message: string, opts: RegistryErrorOpts = {}) {
    super(message, { cause: opts.cause });
    this.name = new.target.name;
    this.companyNumber = opts.companyNumber;
    this.status = opts.status;
  }
}

export class InvalidIdentifierError extends RegistryError {
  readonly kind = 'invalid-identifier' as const;
  readonly input: string;

  constructor(input: string) {
    super(`Invalid company number: "${input}"`);
    this.input = input;
  }
}

export class AuthError extends RegistryError {
  readonly kind = 'auth' as const;

  constructor(message: string, companyNumber?: string, status?: number) {
    super(message, { companyNumber, status });
  }
}

export class NotFoundError extends RegistryError {
  readonly kind = 'not-found' as const;

  constructor(companyNumber: string, resource = 'company') {
    super(`No ${resource} found for ${companyNumber}`, { companyNumber, status: 404 });
  }
}

export class TransportError extends RegistryError {
  readonly kind = 'transport' as const;

  constructor(message: string, opts: RegistryErrorOpts = {}) {
    super(message, opts);
  }
}

export function isRegistryError(err: unknown): err is RegistryError {
  return err instanceof RegistryError;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class ShareholdingInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShareholdingInputError';
  }
}

export class TraversalTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Ownership traversal exceeded ${timeoutMs}ms`);
    this.name = 'TraversalTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

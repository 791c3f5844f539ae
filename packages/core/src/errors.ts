export type ErrorKind =
  | 'configuration'
  | 'validation'
  | 'connection'
  | 'command'
  | 'timeout'
  | 'bundle-missing'
  | 'token';

export abstract class ProvisioningError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends ProvisioningError {
  readonly kind = 'configuration';

  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
  }
}

export class ValidationError extends ProvisioningError {
  readonly kind = 'validation';

  constructor(message: string, readonly failedChecks: string[] = []) {
    super(message);
  }
}

export class ConnectionError extends ProvisioningError {
  readonly kind = 'connection';

  constructor(readonly host: string, message: string, options?: { cause?: unknown }) {
    super(`${host}: ${message}`, options);
  }
}

export class CommandError extends ProvisioningError {
  readonly kind = 'command';

  constructor(
    readonly command: string,
    readonly exitCode: number,
    readonly stderr: string,
  ) {
    const detail = stderr.trim();
    super(`'${command}' exited with ${exitCode}${detail ? `: ${detail}` : ''}`);
  }
}

export class TimeoutError extends ProvisioningError {
  readonly kind = 'timeout';

  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} did not finish within ${Math.round(timeoutMs / 1000)}s`);
  }
}

export class BundleMissingError extends ProvisioningError {
  readonly kind = 'bundle-missing';

  constructor(readonly artifact: string, readonly path: string, where: 'local' | 'remote' = 'local') {
    super(`${where} artifact '${artifact}' not found at ${path}`);
  }
}

export class TokenNotReadyError extends ProvisioningError {
  readonly kind = 'token';

  constructor() {
    super('cluster join token read before the first server produced it');
  }
}

export class TokenAlreadySetError extends ProvisioningError {
  readonly kind = 'token';

  constructor() {
    super('cluster join token is write-once and was already set');
  }
}

export function isProvisioningError(error: unknown): error is ProvisioningError {
  return error instanceof ProvisioningError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Errors raised by libraries (ssh2 sockets, fs) surface as connection failures. */
export function toProvisioningError(error: unknown, host?: string): ProvisioningError {
  if (isProvisioningError(error)) return error;
  return new ConnectionError(host ?? 'local', errorMessage(error), { cause: error });
}

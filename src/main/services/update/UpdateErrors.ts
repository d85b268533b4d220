import type { UpdateErrorKind, UpdateSessionError } from '@shared/contracts';

export class UpdateError extends Error {
  constructor(
    message: string,
    readonly kind: UpdateErrorKind,
    readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toSessionError(): UpdateSessionError {
    return {
      kind: this.kind,
      message: this.message,
      retryable: this.retryable
    };
  }
}

export class MalformedVersionError extends UpdateError {
  constructor(readonly text: string) {
    super(`Versao invalida: "${text}" (esperado X.Y.Z[-pre][+build]).`, 'malformed_version', false);
  }
}

export class FeedParseError extends UpdateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'feed_parse', true, options);
  }
}

export class InsecureUrlError extends UpdateError {
  constructor(message: string) {
    super(message, 'insecure_url', false);
  }
}

export class IntegrityError extends UpdateError {
  constructor(message: string) {
    super(message, 'integrity', true);
  }
}

export class DownloadError extends UpdateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'download', true, options);
  }
}

export class InstallError extends UpdateError {
  constructor(message: string) {
    super(message, 'install', true);
  }
}

export class FatalUpdateError extends UpdateError {
  constructor(message: string) {
    super(message, 'fatal', false);
  }
}

export class OperationCancelledError extends Error {
  constructor(message = 'Operacao cancelada.') {
    super(message);
    this.name = 'OperationCancelledError';
  }
}

export function toSessionError(error: unknown, fallbackKind: UpdateErrorKind = 'download'): UpdateSessionError {
  if (error instanceof UpdateError) {
    return error.toSessionError();
  }

  return {
    kind: fallbackKind,
    message: error instanceof Error ? error.message : String(error),
    retryable: fallbackKind !== 'fatal'
  };
}

export function errorReason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

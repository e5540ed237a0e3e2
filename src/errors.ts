export type DecodeErrorKind = 'ShortMessage' | 'UnknownTopic' | 'BadEncoding';

export type PersistenceErrorKind = 'WriteFailed' | 'RenameFailed';

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class DecodeError extends Error {
  readonly kind: DecodeErrorKind;

  constructor(kind: DecodeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodeError';
    this.kind = kind;
  }
}

export class PersistenceError extends Error {
  readonly kind: PersistenceErrorKind;
  readonly path: string | null;

  constructor(
    kind: PersistenceErrorKind,
    message: string,
    options?: { cause?: unknown; path?: string | null }
  ) {
    super(message, options);
    this.name = 'PersistenceError';
    this.kind = kind;
    this.path = options?.path ?? null;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join('; '));
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

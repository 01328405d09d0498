export type FetchErrorKind = 'transient' | 'permanent';

/**
 * Falha ao buscar uma página. `transient` (timeout, 429, 5xx, captcha) é repetida com backoff;
 * `permanent` (401/403 persistente) encerra a coleta.
 */
export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly pageIndex: number | null;

  constructor(kind: FetchErrorKind, message: string, options: { pageIndex?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.pageIndex = options.pageIndex ?? null;
  }

  static transient(message: string, options?: { pageIndex?: number; cause?: unknown }) {
    return new FetchError('transient', message, options);
  }

  static permanent(message: string, options?: { pageIndex?: number; cause?: unknown }) {
    return new FetchError('permanent', message, options);
  }
}

/** Leitura ou gravação de checkpoint falhou; sem progresso durável a coleta não continua. */
export class PersistenceError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'PersistenceError';
    this.path = path;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

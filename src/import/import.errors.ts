/**
 * Errores del pipeline de importación.
 * - FetchError: fallo del proveedor (red, timeout, payload). Fatal.
 * - ValidationError: un registro sin clave natural. Se omite y sigue el run.
 * - StorageError: fallo de BD durante el upsert o el commit. Fatal, sin commit parcial.
 */
export abstract class ImportError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FetchError extends ImportError {
  readonly code = 'FETCH_ERROR';
}

export class ValidationError extends ImportError {
  readonly code = 'VALIDATION_ERROR';

  constructor(readonly field: string, message: string) {
    super(message);
  }
}

export class StorageError extends ImportError {
  readonly code = 'STORAGE_ERROR';
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

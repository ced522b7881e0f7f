import type { ListLabel, RequiredColumn } from './types';

export type PriceListErrorCode = 'INVALID_ROW' | 'MISSING_COLUMN' | 'EMPTY_INPUT' | 'WORKBOOK_READ';

export abstract class PriceListError extends Error {
  abstract readonly code: PriceListErrorCode;
  /** Archivo (A o B) que originó el error, si se conoce. */
  list?: ListLabel;

  constructor(message: string, list?: ListLabel) {
    super(message);
    this.name = new.target.name;
    this.list = list;
  }
}

export class InvalidRowError extends PriceListError {
  readonly code = 'INVALID_ROW';

  constructor(
    message: string,
    readonly position: number,
    list?: ListLabel,
  ) {
    super(message, list);
  }
}

export class MissingColumnError extends PriceListError {
  readonly code = 'MISSING_COLUMN';

  constructor(
    readonly missing: RequiredColumn[],
    list?: ListLabel,
  ) {
    super(`No se encontraron las columnas requeridas: ${missing.join(', ')}`, list);
  }
}

export class EmptyInputError extends PriceListError {
  readonly code = 'EMPTY_INPUT';

  constructor() {
    super('Ambas listas están vacías, no hay nada que comparar');
  }
}

export class WorkbookReadError extends PriceListError {
  readonly code = 'WORKBOOK_READ';

  constructor(detail: string, list?: ListLabel) {
    super(`No se pudo leer el archivo Excel: ${detail}`, list);
  }
}

// Agrega la etiqueta del archivo a un error del importador sin perder su tipo.
export function tagWithList<E>(err: E, list: ListLabel): E {
  if (err instanceof PriceListError && !err.list) {
    err.list = list;
  }
  return err;
}

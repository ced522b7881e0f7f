import * as XLSX from 'xlsx';
import { InvalidRowError, MissingColumnError, WorkbookReadError } from './errors';
import { roundTo } from './comparator';
import { REQUIRED_COLUMNS, PriceList, PriceListRow, RequiredColumn } from './types';

type HeaderMap = Record<RequiredColumn, number>;

export interface PriceListParseOptions {
  sheetName?: string;
}

// El encabezado puede venir después de un título o de filas vacías.
const HEADER_SEARCH_LIMIT = 20;

function normalizeCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') return value.toString();
  return String(value).trim();
}

function normalizeLabel(value: unknown): string {
  return normalizeCell(value).normalize('NFC');
}

function isBlankRow(row: unknown[]): boolean {
  return row.every(cell => normalizeCell(cell) === '');
}

/**
 * Deja un solo punto decimal. Con ambos separadores, el último es el decimal.
 * Un punto aislado siempre es decimal; una coma aislada es de miles solo si le
 * siguen tres dígitos y la parte entera no es cero (`1,250` pero `0,500`).
 */
function normalizeSeparators(text: string): string {
  const dots = text.split('.').length - 1;
  const commas = text.split(',').length - 1;
  if (dots && commas) {
    const decimal = text.lastIndexOf('.') > text.lastIndexOf(',') ? '.' : ',';
    const thousands = decimal === '.' ? ',' : '.';
    return text.split(thousands).join('').replace(decimal, '.');
  }
  if (dots > 1) return text.split('.').join('');
  if (commas > 1) return text.split(',').join('');
  if (commas === 1) {
    const [intPart, fraction] = text.split(',');
    const isThousands = fraction.length === 3 && !/^-?0*$/.test(intPart);
    return isThousands ? `${intPart}${fraction}` : `${intPart}.${fraction}`;
  }
  return text;
}

export function toNumber(value: unknown): number | null {
  if (value === null || value === undefined || value === '') return null;
  if (typeof value === 'number') {
    return Number.isNaN(value) ? null : value;
  }
  const str = String(value).trim();
  if (!str) return null;
  const normalized = normalizeSeparators(str.replace(/[^0-9.,-]/g, ''));
  if (!/\d/.test(normalized)) return null;
  const num = Number(normalized);
  return Number.isNaN(num) ? null : num;
}

function findHeader(rows: unknown[][]): { header: HeaderMap; index: number } {
  const limit = Math.min(rows.length, HEADER_SEARCH_LIMIT);
  let bestMissing: RequiredColumn[] = [...REQUIRED_COLUMNS];
  for (let idx = 0; idx < limit; idx += 1) {
    const labels = rows[idx].map(normalizeLabel);
    const missing = REQUIRED_COLUMNS.filter(column => !labels.includes(column));
    if (!missing.length) {
      const header: HeaderMap = {
        Clave: labels.indexOf('Clave'),
        'Descripción': labels.indexOf('Descripción'),
        Precio: labels.indexOf('Precio'),
      };
      return { header, index: idx };
    }
    if (missing.length < bestMissing.length) {
      bestMissing = missing;
    }
  }
  throw new MissingColumnError(bestMissing);
}

function readWorkbook(source: Buffer | string): XLSX.WorkBook {
  try {
    return typeof source === 'string'
      ? XLSX.readFile(source, { cellDates: false })
      : XLSX.read(source, { type: 'buffer', cellDates: false });
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new WorkbookReadError(detail);
  }
}

function parseRow(row: unknown[], header: HeaderMap, rowNumber: number, position: number): PriceListRow {
  const key = normalizeCell(row[header.Clave]);
  if (!key) {
    throw new InvalidRowError(`Fila ${rowNumber}: falta la Clave`, position);
  }
  const rawPrice = row[header.Precio];
  const price = toNumber(rawPrice);
  if (price === null || !Number.isFinite(price)) {
    const shown = normalizeCell(rawPrice);
    throw new InvalidRowError(
      shown
        ? `Fila ${rowNumber}: el precio "${shown}" de ${key} no es numérico`
        : `Fila ${rowNumber}: falta el precio de ${key}`,
      position,
    );
  }
  if (price < 0) {
    throw new InvalidRowError(`Fila ${rowNumber}: el precio de ${key} es negativo`, position);
  }
  return {
    key,
    description: normalizeCell(row[header['Descripción']]),
    price: roundTo(price),
    rowNumber,
  };
}

/**
 * Lee una lista de precios de la primera hoja del libro (o de la indicada).
 * Se exige un encabezado con Clave, Descripción y Precio; las demás columnas
 * se ignoran y las filas conservan el orden del archivo.
 */
export function parsePriceListWorkbook(source: Buffer | string, options?: PriceListParseOptions): PriceList {
  const workbook = readWorkbook(source);
  const sheetName = options?.sheetName ?? workbook.SheetNames[0];
  const sheet = sheetName !== undefined ? workbook.Sheets[sheetName] : undefined;
  if (sheetName === undefined || !sheet) {
    throw new WorkbookReadError(
      options?.sheetName ? `la hoja "${options.sheetName}" no existe` : 'el libro no tiene hojas',
    );
  }
  if (!sheet['!ref']) {
    throw new MissingColumnError([...REQUIRED_COLUMNS]);
  }
  const firstRow = XLSX.utils.decode_range(sheet['!ref']).s.r;
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: '', blankrows: true });
  const { header, index } = findHeader(rows);

  const items: PriceListRow[] = [];
  for (let idx = index + 1; idx < rows.length; idx += 1) {
    const row = rows[idx];
    if (isBlankRow(row)) continue;
    items.push(parseRow(row, header, firstRow + idx + 1, items.length));
  }
  return { sheetName, rows: items };
}

import * as XLSX from 'xlsx';
import type { ComparisonResult, ComparisonRow, Presence } from './types';

export const REPORT_FILENAME = 'Analisis_Comparativo.xlsx';
export const REPORT_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const PRESENCE_LABELS: Record<Presence, string> = {
  BothLists: 'Ambas listas',
  OnlyA: 'Solo en A',
  OnlyB: 'Solo en B',
};

export interface DisplayRow {
  Clave: string;
  'Descripción': string;
  'Precio A': number | null;
  'Precio B': number | null;
  Diferencia: number | null;
  'Diferencia %': number | null;
  Estado: string;
}

export function toDisplayRow(row: ComparisonRow): DisplayRow {
  return {
    Clave: row.key,
    'Descripción': row.description,
    'Precio A': row.priceA,
    'Precio B': row.priceB,
    Diferencia: row.delta,
    'Diferencia %': row.deltaPercent,
    Estado: PRESENCE_LABELS[row.presence],
  };
}

export function toDisplayRows(result: ComparisonResult): DisplayRow[] {
  return result.rows.map(toDisplayRow);
}

function commonSheetRows(rows: ComparisonRow[]) {
  return rows
    .filter(row => row.presence === 'BothLists')
    .map(row => ({
      Clave: row.key,
      'Descripción A': row.descriptionA ?? '',
      'Descripción B': row.descriptionB ?? '',
      'Precio A': row.priceA,
      'Precio B': row.priceB,
      Diferencia: row.delta,
      'Diferencia %': row.deltaPercent,
      'Similitud Texto': row.descriptionSimilarity,
    }));
}

function singleListRows(rows: ComparisonRow[], presence: 'OnlyA' | 'OnlyB') {
  return rows
    .filter(row => row.presence === presence)
    .map(row => ({
      Clave: row.key,
      'Descripción': row.description,
      Precio: presence === 'OnlyA' ? row.priceA : row.priceB,
    }));
}

export function summaryRows(result: ComparisonResult) {
  const { summary } = result;
  return [
    { 'Métrica': 'Total Archivo A', Valor: summary.totalA },
    { 'Métrica': 'Total Archivo B', Valor: summary.totalB },
    { 'Métrica': 'Coincidencias', Valor: summary.common },
    { 'Métrica': 'Con cambio de precio', Valor: summary.changed },
    { 'Métrica': 'Solo en A', Valor: summary.onlyA },
    { 'Métrica': 'Solo en B', Valor: summary.onlyB },
  ];
}

/**
 * Arma el reporte Excel: Resumen siempre, y una hoja por grupo solo si tiene filas.
 */
export function buildComparisonWorkbook(result: ComparisonResult): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(summaryRows(result)), 'Resumen');

  const sheets: Array<[string, object[]]> = [
    ['Coincidencias', commonSheetRows(result.rows)],
    ['Solo en A', singleListRows(result.rows, 'OnlyA')],
    ['Solo en B', singleListRows(result.rows, 'OnlyB')],
  ];
  sheets.forEach(([name, rows]) => {
    if (!rows.length) return;
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(rows), name);
  });
  return workbook;
}

export function writeComparisonReport(result: ComparisonResult): Buffer {
  const workbook = buildComparisonWorkbook(result);
  const out: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(out)) {
    throw new Error('No se pudo generar el reporte Excel');
  }
  return out;
}

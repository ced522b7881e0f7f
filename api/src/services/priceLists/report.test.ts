import * as XLSX from 'xlsx';
import { describe, expect, it } from 'vitest';
import { comparePriceLists } from './comparator';
import { buildComparisonWorkbook, summaryRows, toDisplayRows, writeComparisonReport } from './report';
import type { PriceListRow } from './types';

const row = (key: string, price: number, description = key): PriceListRow => ({ key, description, price });

const result = comparePriceLists(
  [row('X1', 100, 'Filtro'), row('Y2', 50, 'Bujía')],
  [row('X1', 120, 'Filtro'), row('Z3', 8, 'Tornillo')],
);

describe('toDisplayRows', () => {
  it('usa las etiquetas de la tabla comparativa', () => {
    expect(toDisplayRows(result)).toEqual([
      {
        Clave: 'X1',
        'Descripción': 'Filtro',
        'Precio A': 100,
        'Precio B': 120,
        Diferencia: 20,
        'Diferencia %': 20,
        Estado: 'Ambas listas',
      },
      {
        Clave: 'Y2',
        'Descripción': 'Bujía',
        'Precio A': 50,
        'Precio B': null,
        Diferencia: null,
        'Diferencia %': null,
        Estado: 'Solo en A',
      },
      {
        Clave: 'Z3',
        'Descripción': 'Tornillo',
        'Precio A': null,
        'Precio B': 8,
        Diferencia: null,
        'Diferencia %': null,
        Estado: 'Solo en B',
      },
    ]);
  });
});

describe('summaryRows', () => {
  it('lista las métricas del resumen', () => {
    expect(summaryRows(result)).toEqual([
      { 'Métrica': 'Total Archivo A', Valor: 2 },
      { 'Métrica': 'Total Archivo B', Valor: 2 },
      { 'Métrica': 'Coincidencias', Valor: 1 },
      { 'Métrica': 'Con cambio de precio', Valor: 1 },
      { 'Métrica': 'Solo en A', Valor: 1 },
      { 'Métrica': 'Solo en B', Valor: 1 },
    ]);
  });
});

describe('buildComparisonWorkbook', () => {
  it('crea una hoja por grupo con filas', () => {
    const workbook = buildComparisonWorkbook(result);
    expect(workbook.SheetNames).toEqual(['Resumen', 'Coincidencias', 'Solo en A', 'Solo en B']);
    const common = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets.Coincidencias);
    expect(common).toEqual([
      {
        Clave: 'X1',
        'Descripción A': 'Filtro',
        'Descripción B': 'Filtro',
        'Precio A': 100,
        'Precio B': 120,
        Diferencia: 20,
        'Diferencia %': 20,
        'Similitud Texto': 100,
      },
    ]);
    const onlyB = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets['Solo en B']);
    expect(onlyB).toEqual([{ Clave: 'Z3', 'Descripción': 'Tornillo', Precio: 8 }]);
  });

  it('omite las hojas sin filas', () => {
    const same = comparePriceLists([row('A', 1)], [row('A', 1)]);
    expect(buildComparisonWorkbook(same).SheetNames).toEqual(['Resumen', 'Coincidencias']);
  });
});

describe('writeComparisonReport', () => {
  it('genera un xlsx legible', () => {
    const buffer = writeComparisonReport(result);
    const workbook = XLSX.read(buffer, { type: 'buffer' });
    const summary = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets.Resumen);
    expect(summary[0]).toEqual({ 'Métrica': 'Total Archivo A', Valor: 2 });
    expect(workbook.SheetNames).toHaveLength(4);
  });
});
